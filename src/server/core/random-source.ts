import { createHash, randomBytes } from 'node:crypto';

/**
 * Source of uniformly distributed integers. Draws take one as a parameter so tests can
 * replace it with a deterministic sequence.
 */
export interface RandomSource {
  /** Returns an integer in `[0, maxExclusive)`. */
  nextInt(maxExclusive: number): number;
}

// 48 bits is the widest integer `readUIntBE` returns and stays exact in a double.
const SAMPLE_BYTES = 6;
const SAMPLE_RANGE = 2 ** (SAMPLE_BYTES * 8);

const assertRange = (maxExclusive: number): void => {
  if (!Number.isSafeInteger(maxExclusive) || maxExclusive < 1 || maxExclusive >= SAMPLE_RANGE) {
    throw new RangeError(`maxExclusive must be an integer in [1, 2^48), got ${maxExclusive}.`);
  }
};

export const createDrawSeed = (): string => randomBytes(16).toString('hex');

/**
 * Deterministic source derived from `sha256(seed:counter)`. The same seed always yields the
 * same sequence, which lets a stored draw seed reproduce the draw.
 */
export const createSeededRandomSource = (seed: string): RandomSource => {
  let counter = 0;

  const nextSample = (): number => {
    const digest = createHash('sha256').update(`${seed}:${counter}`).digest();
    counter += 1;
    return digest.readUIntBE(0, SAMPLE_BYTES);
  };

  return {
    nextInt(maxExclusive) {
      assertRange(maxExclusive);
      // Rejection sampling keeps the modulo unbiased.
      const limit = SAMPLE_RANGE - (SAMPLE_RANGE % maxExclusive);
      let sample = nextSample();
      while (sample >= limit) {
        sample = nextSample();
      }
      return sample % maxExclusive;
    },
  };
};
