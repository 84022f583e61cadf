import type { Points } from '../../shared/types/entities.js';
import { BASIS_POINTS, toBasisPoints } from '../../shared/schema/config.schema.js';
import { InvalidConfigurationError } from '../errors.js';

export interface PayoutInput {
  readonly totalPot: Points;
  readonly houseEdge: number;
  readonly positionShares: readonly number[];
  /** Number of winners actually drawn. */
  readonly winnerCount: number;
  readonly redistributeUnclaimed?: boolean;
}

export interface PayoutBreakdown {
  readonly houseCut: Points;
  readonly distributable: Points;
  readonly amounts: readonly Points[];
  /** Share of the distributable pot left with the house by unfilled positions. */
  readonly unclaimed: Points;
  /** Flooring remainder across the filled positions. */
  readonly roundingRemainder: Points;
}

const validateInput = (input: PayoutInput): number[] => {
  if (!Number.isSafeInteger(input.totalPot) || input.totalPot < 0) {
    throw new InvalidConfigurationError('Total pot must be a non-negative integer.');
  }

  if (!Number.isFinite(input.houseEdge) || input.houseEdge < 0 || input.houseEdge >= 1) {
    throw new InvalidConfigurationError('House edge must be in [0, 1).');
  }

  if (!Number.isSafeInteger(input.winnerCount) || input.winnerCount < 0) {
    throw new InvalidConfigurationError('Winner count must be a non-negative integer.');
  }

  const sharesBps = input.positionShares.map(toBasisPoints);
  if (sharesBps.some((share) => share <= 0)) {
    throw new InvalidConfigurationError('Position shares must be positive.');
  }

  const totalBps = sharesBps.reduce((sum, share) => sum + share, 0);
  if (totalBps !== BASIS_POINTS) {
    throw new InvalidConfigurationError('Position shares must sum to 1.0.', {
      details: { positionShares: [...input.positionShares] },
    });
  }

  return sharesBps;
};

/**
 * Splits the pot after the house edge. Arithmetic runs in basis points and every amount is
 * floored, so the house keeps the rounding remainder.
 */
export const buildPayoutBreakdown = (input: PayoutInput): PayoutBreakdown => {
  const sharesBps = validateInput(input);
  const houseCut = Math.floor((input.totalPot * toBasisPoints(input.houseEdge)) / BASIS_POINTS);
  const distributable = input.totalPot - houseCut;

  const filled = sharesBps.slice(0, Math.min(input.winnerCount, sharesBps.length));
  const denominator = input.redistributeUnclaimed
    ? filled.reduce((sum, share) => sum + share, 0)
    : BASIS_POINTS;

  const amounts = filled.map((share) => Math.floor((distributable * share) / denominator));
  const paid = amounts.reduce((sum, amount) => sum + amount, 0);

  const unclaimedBps = input.redistributeUnclaimed
    ? 0
    : BASIS_POINTS - filled.reduce((sum, share) => sum + share, 0);
  const unclaimed =
    filled.length === 0
      ? distributable
      : Math.floor((distributable * unclaimedBps) / BASIS_POINTS);

  return {
    houseCut,
    distributable,
    amounts,
    unclaimed,
    roundingRemainder: distributable - paid - unclaimed,
  };
};

export const computePayouts = (
  totalPot: Points,
  houseEdge: number,
  positionShares: readonly number[],
  winnerCount: number,
): Points[] => [
  ...buildPayoutBreakdown({ totalPot, houseEdge, positionShares, winnerCount }).amounts,
];
