import type {
  LedgerRow,
  Participant,
  ParticipantId,
  Points,
  Raffle,
  RaffleHistoryEntry,
  RaffleId,
} from '../../shared/types/entities.js';

export interface CurrentRaffleRecord {
  readonly raffle: Raffle;
  readonly ledger: readonly LedgerRow[];
}

export interface EntryWrite {
  readonly raffleId: RaffleId;
  readonly participantId: ParticipantId;
  readonly weight: number;
  readonly cost: Points;
}

export interface EntryReceipt {
  readonly participant: Participant;
  readonly participantWeight: number;
  readonly pot: Points;
}

export interface WinnerCredit {
  readonly participantId: ParticipantId;
  readonly amount: Points;
}

export interface RaffleSettlement {
  readonly closed: Raffle;
  readonly history: RaffleHistoryEntry;
  readonly credits: readonly WinnerCredit[];
  readonly next: Raffle;
}

export interface ResetOptions {
  readonly keepParticipants: boolean;
}

/**
 * Persistence boundary for the draw engine. Each method is one atomic unit: either every
 * write it implies lands or none does.
 */
export interface RaffleStore {
  createParticipants(participants: readonly Participant[]): Promise<void>;
  getParticipant(participantId: ParticipantId): Promise<Participant | null>;
  listParticipants(): Promise<Participant[]>;
  setParticipantBalance(participantId: ParticipantId, balance: Points): Promise<Participant>;

  getCurrentRaffle(): Promise<CurrentRaffleRecord | null>;
  /** Stores a fresh raffle and makes it the current one. */
  openRaffle(raffle: Raffle): Promise<void>;
  /**
   * Debits the participant and adds the weight and cost to the raffle. Throws
   * `InsufficientBalanceError`, `RaffleClosedError` or `NotFoundError` without writing.
   */
  recordEntry(entry: EntryWrite): Promise<EntryReceipt>;
  setRaffleStatus(raffleId: RaffleId, status: 'open' | 'drawing'): Promise<void>;
  /** Credits winners, appends history, closes the raffle and opens the next one. */
  settleRaffle(settlement: RaffleSettlement): Promise<void>;
  /** Newest first. */
  listHistory(limit: number): Promise<RaffleHistoryEntry[]>;
  /** Drops raffles, ledgers and history (and participants unless kept), then opens `next`. */
  reset(next: Raffle, options: ResetOptions): Promise<void>;
}
