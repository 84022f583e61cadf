import {
  LedgerRowSchema,
  ParticipantSchema,
  RaffleHistoryEntrySchema,
  RaffleSchema,
} from '../../shared/schema/entities.schema.js';
import type {
  LedgerRow,
  Participant,
  Raffle,
  RaffleHistoryEntry,
} from '../../shared/types/entities.js';

export type RedisHash = Record<string, string>;

const asNumber = (value: string | undefined, fallback = 0): number =>
  value === undefined ? fallback : Number(value);

const assertHash = (hash: RedisHash | null | undefined): hash is RedisHash =>
  Boolean(hash && Object.keys(hash).length > 0);

export const serializeParticipant = (participant: Participant): RedisHash => ({
  schemaVersion: participant.schemaVersion.toString(),
  id: participant.id,
  balance: participant.balance.toString(),
  totalWinnings: participant.totalWinnings.toString(),
  totalWins: participant.totalWins.toString(),
  createdAt: participant.createdAt,
  updatedAt: participant.updatedAt,
});

export const deserializeParticipant = (hash: RedisHash | null | undefined): Participant | null => {
  if (!assertHash(hash)) {
    return null;
  }

  return ParticipantSchema.parse({
    schemaVersion: asNumber(hash.schemaVersion, 1),
    id: hash.id,
    balance: asNumber(hash.balance),
    totalWinnings: asNumber(hash.totalWinnings),
    totalWins: asNumber(hash.totalWins),
    createdAt: hash.createdAt,
    updatedAt: hash.updatedAt,
  });
};

export const serializeRaffle = (raffle: Raffle): RedisHash => ({
  schemaVersion: raffle.schemaVersion.toString(),
  id: raffle.id,
  status: raffle.status,
  pot: raffle.pot.toString(),
  totalEntries: raffle.totalEntries.toString(),
  drawAt: raffle.drawAt,
  createdAt: raffle.createdAt,
  closedAt: raffle.closedAt ?? '',
});

export const deserializeRaffle = (hash: RedisHash | null | undefined): Raffle | null => {
  if (!assertHash(hash)) {
    return null;
  }

  return RaffleSchema.parse({
    schemaVersion: asNumber(hash.schemaVersion, 1),
    id: hash.id,
    status: hash.status,
    pot: asNumber(hash.pot),
    totalEntries: asNumber(hash.totalEntries),
    drawAt: hash.drawAt,
    createdAt: hash.createdAt,
    closedAt: hash.closedAt ? hash.closedAt : null,
  });
};

/** Ledger weights come back from a hash; `order` is the first-registration order. */
export const deserializeLedger = (
  weights: RedisHash | null | undefined,
  order: readonly string[],
): LedgerRow[] => {
  if (!assertHash(weights)) {
    return [];
  }

  const ordered = [...order, ...Object.keys(weights).filter((id) => !order.includes(id))];
  const rows: LedgerRow[] = [];
  for (const rawId of ordered) {
    const weight = weights[rawId];
    if (weight === undefined) {
      continue;
    }
    rows.push(
      LedgerRowSchema.parse({
        participantId: rawId,
        weight: asNumber(weight),
      }),
    );
  }
  return rows;
};

export const serializeHistoryEntry = (entry: RaffleHistoryEntry): string => JSON.stringify(entry);

export const deserializeHistoryEntry = (raw: string): RaffleHistoryEntry =>
  RaffleHistoryEntrySchema.parse(JSON.parse(raw));
