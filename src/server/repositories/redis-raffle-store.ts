import type { ChainableCommander, Redis } from 'ioredis';
import type {
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
import { historyKeys, participantKeys, raffleKeys } from '../utils/redis-keys.js';
import {
  deserializeHistoryEntry,
  deserializeLedger,
  deserializeParticipant,
  deserializeRaffle,
  serializeHistoryEntry,
  serializeParticipant,
  serializeRaffle,
} from '../utils/serializers.js';
import { SerialGate } from '../utils/serial-gate.js';
import { nowIso, toEpochMillis } from '../utils/time.js';
import { runTransactionWithRetry } from '../utils/transactions.js';
import type {
  CurrentRaffleRecord,
  EntryReceipt,
  EntryWrite,
  RaffleSettlement,
  RaffleStore,
  ResetOptions,
} from './raffle-store.js';

interface EntryState {
  readonly participant: Participant | null;
  readonly raffle: Raffle | null;
  readonly currentId: string | null;
  readonly weight: number;
}

interface SettlementState {
  readonly raffle: Raffle | null;
  readonly missing: readonly ParticipantId[];
}

interface ResetState {
  readonly raffleIds: readonly string[];
  readonly participantIds: readonly string[];
}

/**
 * Redis-backed store. WATCH is scoped to the connection, so transactional methods run one at
 * a time through a gate.
 */
export class RedisRaffleStore implements RaffleStore {
  private readonly client: Redis;
  private readonly gate = new SerialGate();

  constructor(client: Redis) {
    this.client = client;
  }

  async createParticipants(participants: readonly Participant[]): Promise<void> {
    if (participants.length === 0) {
      return;
    }

    const keys = participants.map((participant) => participantKeys.record(participant.id));

    await this.gate.run(() =>
      runTransactionWithRetry(
        this.client,
        keys,
        async (client) => client.exists(...keys),
        (tx, existing) => {
          if (existing > 0) {
            throw new ConflictError('One or more participant ids already exist.');
          }

          for (const participant of participants) {
            tx.hset(participantKeys.record(participant.id), serializeParticipant(participant));
            tx.zadd(participantKeys.index(), toEpochMillis(participant.createdAt), participant.id);
          }
        },
        { label: 'participants:create' },
      ),
    );
  }

  async getParticipant(participantId: ParticipantId): Promise<Participant | null> {
    const hash = await this.client.hgetall(participantKeys.record(participantId));
    return deserializeParticipant(hash);
  }

  async listParticipants(): Promise<Participant[]> {
    const ids = await this.client.zrevrange(participantKeys.index(), 0, -1);
    const hashes = await Promise.all(
      ids.map((id) => this.client.hgetall(participantKeys.record(id))),
    );

    return hashes
      .map((hash) => deserializeParticipant(hash))
      .filter((participant): participant is Participant => participant !== null);
  }

  async setParticipantBalance(participantId: ParticipantId, balance: Points): Promise<Participant> {
    const key = participantKeys.record(participantId);

    return this.gate.run(() =>
      runTransactionWithRetry(
        this.client,
        [key],
        async (client) => deserializeParticipant(await client.hgetall(key)),
        (tx, participant) => {
          if (!participant) {
            throw new NotFoundError(`Participant ${participantId} not found.`);
          }

          const updated: Participant = { ...participant, balance, updatedAt: nowIso() };
          tx.hset(key, { balance: updated.balance.toString(), updatedAt: updated.updatedAt });
          return updated;
        },
        { label: 'participant:set-balance' },
      ),
    );
  }

  async getCurrentRaffle(): Promise<CurrentRaffleRecord | null> {
    const currentId = await this.client.get(raffleKeys.current());
    if (!currentId) {
      return null;
    }

    const [raffleHash, ledgerHash, order] = await Promise.all([
      this.client.hgetall(raffleKeys.record(currentId)),
      this.client.hgetall(raffleKeys.ledger(currentId)),
      this.client.zrange(raffleKeys.ledgerOrder(currentId), 0, -1),
    ]);

    const raffle = deserializeRaffle(raffleHash);
    if (!raffle) {
      return null;
    }

    return { raffle, ledger: deserializeLedger(ledgerHash, order) };
  }

  async openRaffle(raffle: Raffle): Promise<void> {
    await this.gate.run(async () => {
      const tx = this.client.multi();
      this.queueOpen(tx, raffle);
      await tx.exec();
    });
  }

  async recordEntry(entry: EntryWrite): Promise<EntryReceipt> {
    const participantKey = participantKeys.record(entry.participantId);
    const raffleKey = raffleKeys.record(entry.raffleId);
    const ledgerKey = raffleKeys.ledger(entry.raffleId);
    const currentKey = raffleKeys.current();

    return this.gate.run(() =>
      runTransactionWithRetry<EntryReceipt, EntryState>(
        this.client,
        [participantKey, raffleKey, ledgerKey, currentKey],
        async (client) => {
          const [participantHash, raffleHash, currentId, weight] = await Promise.all([
            client.hgetall(participantKey),
            client.hgetall(raffleKey),
            client.get(currentKey),
            client.hget(ledgerKey, entry.participantId),
          ]);

          return {
            participant: deserializeParticipant(participantHash),
            raffle: deserializeRaffle(raffleHash),
            currentId,
            weight: weight ? Number(weight) : 0,
          };
        },
        (tx, state) => {
          if (!state.participant) {
            throw new NotFoundError(`Participant ${entry.participantId} not found.`);
          }
          if (!state.raffle) {
            throw new NotFoundError(`Raffle ${entry.raffleId} not found.`);
          }
          if (state.raffle.status !== 'open' || state.currentId !== state.raffle.id) {
            throw new RaffleClosedError();
          }
          if (state.participant.balance < entry.cost) {
            throw new InsufficientBalanceError(undefined, {
              details: { balance: state.participant.balance, cost: entry.cost },
            });
          }

          const updatedAt = nowIso();
          tx.hincrby(participantKey, 'balance', -entry.cost);
          tx.hset(participantKey, { updatedAt });
          tx.hincrby(raffleKey, 'pot', entry.cost);
          tx.hincrby(raffleKey, 'totalEntries', entry.weight);
          tx.hincrby(ledgerKey, entry.participantId, entry.weight);
          tx.zadd(raffleKeys.ledgerOrder(entry.raffleId), 'NX', Date.now(), entry.participantId);

          return {
            participant: {
              ...state.participant,
              balance: state.participant.balance - entry.cost,
              updatedAt,
            },
            participantWeight: state.weight + entry.weight,
            pot: state.raffle.pot + entry.cost,
          } satisfies EntryReceipt;
        },
        { label: 'raffle:enter' },
      ),
    );
  }

  async setRaffleStatus(raffleId: RaffleId, status: 'open' | 'drawing'): Promise<void> {
    const key = raffleKeys.record(raffleId);

    await this.gate.run(() =>
      runTransactionWithRetry(
        this.client,
        [key],
        async (client) => client.exists(key),
        (tx, exists) => {
          if (exists === 0) {
            throw new NotFoundError(`Raffle ${raffleId} not found.`);
          }
          tx.hset(key, { status });
        },
        { label: `raffle:status:${status}` },
      ),
    );
  }

  async settleRaffle(settlement: RaffleSettlement): Promise<void> {
    const raffleKey = raffleKeys.record(settlement.closed.id);
    const creditKeys = settlement.credits.map((credit) => participantKeys.record(credit.participantId));

    await this.gate.run(() =>
      runTransactionWithRetry<void, SettlementState>(
        this.client,
        [raffleKey, raffleKeys.current(), ...creditKeys],
        async (client) => {
          const raffle = deserializeRaffle(await client.hgetall(raffleKey));
          const existence = await Promise.all(
            settlement.credits.map(async (credit) => ({
              participantId: credit.participantId,
              exists: (await client.exists(participantKeys.record(credit.participantId))) > 0,
            })),
          );
          return {
            raffle,
            missing: existence.filter((item) => !item.exists).map((item) => item.participantId),
          };
        },
        (tx, state) => {
          if (!state.raffle || state.raffle.status !== 'drawing') {
            throw new ConflictError(`Raffle ${settlement.closed.id} is not being drawn.`);
          }
          if (state.missing.length > 0) {
            throw new NotFoundError('Winning participants no longer exist.', {
              details: { participantIds: [...state.missing] },
            });
          }

          const updatedAt = nowIso();
          for (const credit of settlement.credits) {
            const key = participantKeys.record(credit.participantId);
            tx.hincrby(key, 'balance', credit.amount);
            tx.hincrby(key, 'totalWinnings', credit.amount);
            tx.hincrby(key, 'totalWins', 1);
            tx.hset(key, { updatedAt });
          }

          tx.hset(raffleKey, serializeRaffle(settlement.closed));
          tx.lpush(historyKeys.list(), serializeHistoryEntry(settlement.history));
          this.queueOpen(tx, settlement.next);
        },
        { label: 'raffle:settle' },
      ),
    );
  }

  async listHistory(limit: number): Promise<RaffleHistoryEntry[]> {
    const raw = await this.client.lrange(historyKeys.list(), 0, Math.max(0, limit - 1));
    return raw.map((entry) => deserializeHistoryEntry(entry));
  }

  async reset(next: Raffle, options: ResetOptions): Promise<void> {
    await this.gate.run(() =>
      runTransactionWithRetry<void, ResetState>(
        this.client,
        [raffleKeys.index(), participantKeys.index(), raffleKeys.current()],
        async (client) => {
          const [raffleIds, participantIds] = await Promise.all([
            client.smembers(raffleKeys.index()),
            client.zrange(participantKeys.index(), 0, -1),
          ]);
          return { raffleIds, participantIds };
        },
        (tx, state) => {
          const keys = [
            raffleKeys.current(),
            raffleKeys.index(),
            historyKeys.list(),
            ...state.raffleIds.flatMap((id) => [
              raffleKeys.record(id),
              raffleKeys.ledger(id),
              raffleKeys.ledgerOrder(id),
            ]),
          ];

          if (!options.keepParticipants) {
            keys.push(
              participantKeys.index(),
              ...state.participantIds.map((id) => participantKeys.record(id)),
            );
          }

          tx.del(...keys);
          this.queueOpen(tx, next);
        },
        { label: 'raffle:reset' },
      ),
    );
  }

  private queueOpen(tx: ChainableCommander, raffle: Raffle): void {
    tx.hset(raffleKeys.record(raffle.id), serializeRaffle(raffle));
    tx.del(raffleKeys.ledger(raffle.id), raffleKeys.ledgerOrder(raffle.id));
    tx.sadd(raffleKeys.index(), raffle.id);
    tx.set(raffleKeys.current(), raffle.id);
  }
}
