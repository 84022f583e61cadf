import type {
  LedgerRow,
  Participant,
  ParticipantId,
  Points,
  Raffle,
  RaffleHistoryEntry,
  RaffleId,
} from '../../shared/types/entities.js';
import {
  ConflictError,
  InsufficientBalanceError,
  NotFoundError,
  RaffleClosedError,
} from '../errors.js';
import { nowIso } from '../utils/time.js';
import type {
  CurrentRaffleRecord,
  EntryReceipt,
  EntryWrite,
  RaffleSettlement,
  RaffleStore,
  ResetOptions,
} from './raffle-store.js';

/**
 * Process-local store. Each method finishes its reads and writes without yielding, so every
 * call is atomic with respect to the others.
 */
export class MemoryRaffleStore implements RaffleStore {
  private readonly participants = new Map<ParticipantId, Participant>();
  private readonly raffles = new Map<RaffleId, Raffle>();
  private readonly ledgers = new Map<RaffleId, Map<ParticipantId, number>>();
  private history: RaffleHistoryEntry[] = [];
  private currentId: RaffleId | null = null;

  async createParticipants(participants: readonly Participant[]): Promise<void> {
    const duplicate = participants.find((participant) => this.participants.has(participant.id));
    if (duplicate) {
      throw new ConflictError(`Participant ${duplicate.id} already exists.`);
    }
    participants.forEach((participant) => this.participants.set(participant.id, participant));
  }

  async getParticipant(participantId: ParticipantId): Promise<Participant | null> {
    return this.participants.get(participantId) ?? null;
  }

  async listParticipants(): Promise<Participant[]> {
    return [...this.participants.values()].sort(
      (a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt),
    );
  }

  async setParticipantBalance(participantId: ParticipantId, balance: Points): Promise<Participant> {
    const participant = this.requireParticipant(participantId);
    const updated: Participant = { ...participant, balance, updatedAt: nowIso() };
    this.participants.set(participantId, updated);
    return updated;
  }

  async getCurrentRaffle(): Promise<CurrentRaffleRecord | null> {
    if (!this.currentId) {
      return null;
    }
    const raffle = this.raffles.get(this.currentId);
    if (!raffle) {
      return null;
    }
    return { raffle, ledger: this.ledgerRows(raffle.id) };
  }

  async openRaffle(raffle: Raffle): Promise<void> {
    this.raffles.set(raffle.id, raffle);
    this.ledgers.set(raffle.id, new Map());
    this.currentId = raffle.id;
  }

  async recordEntry(entry: EntryWrite): Promise<EntryReceipt> {
    const participant = this.requireParticipant(entry.participantId);
    const raffle = this.raffles.get(entry.raffleId);
    if (!raffle) {
      throw new NotFoundError(`Raffle ${entry.raffleId} not found.`);
    }
    if (raffle.status !== 'open' || this.currentId !== raffle.id) {
      throw new RaffleClosedError();
    }
    if (participant.balance < entry.cost) {
      throw new InsufficientBalanceError(undefined, {
        details: { balance: participant.balance, cost: entry.cost },
      });
    }

    const updatedParticipant: Participant = {
      ...participant,
      balance: participant.balance - entry.cost,
      updatedAt: nowIso(),
    };
    const updatedRaffle: Raffle = {
      ...raffle,
      pot: raffle.pot + entry.cost,
      totalEntries: raffle.totalEntries + entry.weight,
    };
    const ledger = this.ledgers.get(raffle.id) ?? new Map<ParticipantId, number>();
    const participantWeight = (ledger.get(entry.participantId) ?? 0) + entry.weight;

    ledger.set(entry.participantId, participantWeight);
    this.ledgers.set(raffle.id, ledger);
    this.participants.set(participant.id, updatedParticipant);
    this.raffles.set(raffle.id, updatedRaffle);

    return { participant: updatedParticipant, participantWeight, pot: updatedRaffle.pot };
  }

  async setRaffleStatus(raffleId: RaffleId, status: 'open' | 'drawing'): Promise<void> {
    const raffle = this.raffles.get(raffleId);
    if (!raffle) {
      throw new NotFoundError(`Raffle ${raffleId} not found.`);
    }
    this.raffles.set(raffleId, { ...raffle, status });
  }

  async settleRaffle(settlement: RaffleSettlement): Promise<void> {
    const stored = this.raffles.get(settlement.closed.id);
    if (!stored || stored.status !== 'drawing') {
      throw new ConflictError(`Raffle ${settlement.closed.id} is not being drawn.`);
    }

    const credited = settlement.credits.map((credit) => {
      const participant = this.requireParticipant(credit.participantId);
      return {
        ...participant,
        balance: participant.balance + credit.amount,
        totalWinnings: participant.totalWinnings + credit.amount,
        totalWins: participant.totalWins + 1,
        updatedAt: nowIso(),
      } satisfies Participant;
    });

    credited.forEach((participant) => this.participants.set(participant.id, participant));
    this.raffles.set(settlement.closed.id, settlement.closed);
    this.history = [settlement.history, ...this.history];
    this.raffles.set(settlement.next.id, settlement.next);
    this.ledgers.set(settlement.next.id, new Map());
    this.currentId = settlement.next.id;
  }

  async listHistory(limit: number): Promise<RaffleHistoryEntry[]> {
    return this.history.slice(0, limit);
  }

  async reset(next: Raffle, options: ResetOptions): Promise<void> {
    this.raffles.clear();
    this.ledgers.clear();
    this.history = [];
    if (!options.keepParticipants) {
      this.participants.clear();
    }
    this.raffles.set(next.id, next);
    this.ledgers.set(next.id, new Map());
    this.currentId = next.id;
  }

  private requireParticipant(participantId: ParticipantId): Participant {
    const participant = this.participants.get(participantId);
    if (!participant) {
      throw new NotFoundError(`Participant ${participantId} not found.`);
    }
    return participant;
  }

  private ledgerRows(raffleId: RaffleId): LedgerRow[] {
    const ledger = this.ledgers.get(raffleId);
    if (!ledger) {
      return [];
    }
    return Array.from(ledger, ([participantId, weight]) => ({ participantId, weight }));
  }
}
