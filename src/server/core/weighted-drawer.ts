import { ValidationError } from '../errors.js';
import type { RandomSource } from './random-source.js';

export interface PoolEntry<TId extends string> {
  readonly participantId: TId;
  readonly weight: number;
}

const buildCandidates = <TId extends string>(
  pool: readonly PoolEntry<TId>[],
): { ids: TId[]; weights: number[] } => {
  const merged = new Map<TId, number>();
  for (const entry of pool) {
    if (!Number.isSafeInteger(entry.weight) || entry.weight < 0) {
      throw new ValidationError('Pool weights must be non-negative integers.', {
        details: { participantId: entry.participantId, weight: entry.weight },
      });
    }
    merged.set(entry.participantId, (merged.get(entry.participantId) ?? 0) + entry.weight);
  }

  const ids: TId[] = [];
  const weights: number[] = [];
  for (const [id, weight] of merged) {
    if (weight > 0) {
      ids.push(id);
      weights.push(weight);
    }
  }
  return { ids, weights };
};

/**
 * Picks up to `count` distinct participants, each step weight-proportional over those not yet
 * picked. Zero-weight entries are never selected; a pool smaller than `count` yields every
 * eligible participant.
 */
export const selectWinners = <TId extends string>(
  pool: readonly PoolEntry<TId>[],
  count: number,
  random: RandomSource,
): TId[] => {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new ValidationError('Winner count must be a non-negative integer.', {
      details: { count },
    });
  }

  const { ids, weights } = buildCandidates(pool);
  let remainingWeight = weights.reduce((sum, weight) => sum + weight, 0);
  const winners: TId[] = [];

  while (winners.length < count && ids.length > 0) {
    const target = random.nextInt(remainingWeight);

    let index = 0;
    let cumulative = weights[0] ?? 0;
    while (cumulative <= target && index < weights.length - 1) {
      index += 1;
      cumulative += weights[index] ?? 0;
    }

    const [winner] = ids.splice(index, 1);
    const [weight] = weights.splice(index, 1);
    if (winner === undefined || weight === undefined) {
      break;
    }

    winners.push(winner);
    remainingWeight -= weight;
  }

  return winners;
};
