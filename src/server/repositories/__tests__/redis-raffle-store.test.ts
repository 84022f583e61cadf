import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChainableCommander, Redis } from 'ioredis';

import { RedisRaffleStore } from '../redis-raffle-store.js';
import type { TransactionHandler, TransactionStateLoader } from '../../utils/transactions.js';
import { serializeParticipant, serializeRaffle } from '../../utils/serializers.js';
import { ConflictError, InsufficientBalanceError, RaffleClosedError } from '../../errors.js';
import { ParticipantIdSchema, RaffleIdSchema } from '../../../shared/schema/entities.schema.js';
import type { Participant, Raffle, RaffleHistoryEntry } from '../../../shared/types/entities.js';

const { runTransactionMock } = vi.hoisted(() => ({ runTransactionMock: vi.fn() }));

vi.mock('../../utils/transactions.js', () => ({
  runTransactionWithRetry: (...args: unknown[]) => runTransactionMock(...args),
}));

const alice = ParticipantIdSchema.parse('TKN-AAAAAA');

const PARTICIPANT_KEY = 'raffle:participant:TKN-AAAAAA';
const RAFFLE_KEY = 'raffle:raffle:raffle-1';
const LEDGER_KEY = 'raffle:raffle:raffle-1:ledger';
const LEDGER_ORDER_KEY = 'raffle:raffle:raffle-1:ledger-order';

const participant: Participant = {
  schemaVersion: 1,
  id: alice,
  balance: 100,
  totalWinnings: 0,
  totalWins: 0,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
};

const createRaffle = (id: string, overrides: Partial<Raffle> = {}): Raffle => ({
  schemaVersion: 1,
  id: RaffleIdSchema.parse(id),
  status: 'open',
  pot: 0,
  totalEntries: 0,
  drawAt: '2026-01-01T01:00:00.000Z',
  createdAt: '2026-01-01T00:00:00.000Z',
  closedAt: null,
  ...overrides,
});

const createFakes = (hashes: Record<string, Record<string, string>>, current: string | null) => {
  const client = {
    hgetall: vi.fn(async (key: string) => hashes[key] ?? {}),
    get: vi.fn(async () => current),
    hget: vi.fn(async () => null),
    exists: vi.fn(async (...keys: string[]) => keys.filter((key) => key in hashes).length),
    zrange: vi.fn(async (): Promise<string[]> => []),
  };
  const tx = {
    hincrby: vi.fn(),
    hset: vi.fn(),
    zadd: vi.fn(),
    lpush: vi.fn(),
    del: vi.fn(),
    sadd: vi.fn(),
    set: vi.fn(),
  };
  return { client, tx };
};

beforeEach(() => {
  runTransactionMock.mockReset();
});

const wire = (fakes: ReturnType<typeof createFakes>) => {
  const redis = fakes.client as unknown as Redis;
  runTransactionMock.mockImplementation(
    async (
      client: Redis,
      _keys: string[],
      loadState: TransactionStateLoader<unknown>,
      handler: TransactionHandler<unknown, unknown>,
    ) => handler(fakes.tx as unknown as ChainableCommander, await loadState(client)),
  );
  return new RedisRaffleStore(redis);
};

describe('RedisRaffleStore', () => {
  describe('recordEntry', () => {
    it('queues the debit, pot and ledger writes together', async () => {
      const fakes = createFakes(
        {
          [PARTICIPANT_KEY]: serializeParticipant(participant),
          [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1')),
        },
        'raffle-1',
      );
      const store = wire(fakes);

      const receipt = await store.recordEntry({
        raffleId: RaffleIdSchema.parse('raffle-1'),
        participantId: alice,
        weight: 3,
        cost: 30,
      });

      expect(receipt.participant.balance).toBe(70);
      expect(receipt.participantWeight).toBe(3);
      expect(receipt.pot).toBe(30);
      expect(fakes.tx.hincrby.mock.calls).toEqual([
        [PARTICIPANT_KEY, 'balance', -30],
        [RAFFLE_KEY, 'pot', 30],
        [RAFFLE_KEY, 'totalEntries', 3],
        [LEDGER_KEY, alice, 3],
      ]);
      expect(fakes.tx.zadd).toHaveBeenCalledWith(LEDGER_ORDER_KEY, 'NX', expect.any(Number), alice);
    });

    it('queues nothing when the balance is short', async () => {
      const fakes = createFakes(
        {
          [PARTICIPANT_KEY]: serializeParticipant(participant),
          [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1')),
        },
        'raffle-1',
      );
      const store = wire(fakes);

      await expect(
        store.recordEntry({
          raffleId: RaffleIdSchema.parse('raffle-1'),
          participantId: alice,
          weight: 11,
          cost: 110,
        }),
      ).rejects.toBeInstanceOf(InsufficientBalanceError);
      expect(fakes.tx.hincrby).not.toHaveBeenCalled();
    });

    it('rejects entries for a raffle that is no longer current', async () => {
      const fakes = createFakes(
        {
          [PARTICIPANT_KEY]: serializeParticipant(participant),
          [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1')),
        },
        'raffle-2',
      );
      const store = wire(fakes);

      await expect(
        store.recordEntry({
          raffleId: RaffleIdSchema.parse('raffle-1'),
          participantId: alice,
          weight: 1,
          cost: 10,
        }),
      ).rejects.toBeInstanceOf(RaffleClosedError);
    });
  });

  describe('settleRaffle', () => {
    const closed = createRaffle('raffle-1', {
      status: 'closed',
      pot: 10,
      totalEntries: 1,
      closedAt: '2026-01-01T01:00:00.000Z',
    });
    const history: RaffleHistoryEntry = {
      schemaVersion: 1,
      raffleId: closed.id,
      trigger: 'scheduled',
      drawAt: closed.drawAt,
      drawnAt: '2026-01-01T01:00:00.000Z',
      totalPot: 10,
      houseCut: 1,
      distributable: 9,
      unclaimed: 0,
      totalEntries: 1,
      participantCount: 1,
      seed: 'test-seed',
      participants: [{ participantId: alice, weight: 1 }],
      winners: [{ raffleId: closed.id, position: 1, participantId: alice, amount: 9 }],
    };
    const next = createRaffle('raffle-2');

    it('credits winners, appends history and opens the next raffle', async () => {
      const fakes = createFakes(
        {
          [PARTICIPANT_KEY]: serializeParticipant(participant),
          [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1', { status: 'drawing' })),
        },
        'raffle-1',
      );
      const store = wire(fakes);

      await store.settleRaffle({
        closed,
        history,
        credits: [{ participantId: alice, amount: 9 }],
        next,
      });

      expect(fakes.tx.hincrby.mock.calls).toEqual([
        [PARTICIPANT_KEY, 'balance', 9],
        [PARTICIPANT_KEY, 'totalWinnings', 9],
        [PARTICIPANT_KEY, 'totalWins', 1],
      ]);
      expect(fakes.tx.hset).toHaveBeenCalledWith(RAFFLE_KEY, serializeRaffle(closed));
      expect(fakes.tx.lpush).toHaveBeenCalledWith('raffle:history', JSON.stringify(history));
      expect(fakes.tx.set).toHaveBeenCalledWith('raffle:current', 'raffle-2');
    });

    it('refuses to settle a raffle that is not drawing', async () => {
      const fakes = createFakes(
        {
          [PARTICIPANT_KEY]: serializeParticipant(participant),
          [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1')),
        },
        'raffle-1',
      );
      const store = wire(fakes);

      await expect(
        store.settleRaffle({ closed, history, credits: [], next }),
      ).rejects.toBeInstanceOf(ConflictError);
      expect(fakes.tx.lpush).not.toHaveBeenCalled();
    });
  });

  it('reads the current raffle with its ledger in registration order', async () => {
    const fakes = createFakes(
      {
        [RAFFLE_KEY]: serializeRaffle(createRaffle('raffle-1', { pot: 40, totalEntries: 4 })),
        [LEDGER_KEY]: { 'TKN-BBBBBB': '3', 'TKN-AAAAAA': '1' },
      },
      'raffle-1',
    );
    fakes.client.zrange.mockResolvedValue(['TKN-AAAAAA', 'TKN-BBBBBB']);
    const store = wire(fakes);

    const current = await store.getCurrentRaffle();

    expect(current?.raffle).toMatchObject({ id: 'raffle-1', pot: 40, totalEntries: 4 });
    expect(current?.ledger).toEqual([
      { participantId: 'TKN-AAAAAA', weight: 1 },
      { participantId: 'TKN-BBBBBB', weight: 3 },
    ]);
  });
});
