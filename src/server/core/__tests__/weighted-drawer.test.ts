import { describe, expect, it } from 'vitest';

import { selectWinners, type PoolEntry } from '../weighted-drawer.js';
import { createSeededRandomSource, type RandomSource } from '../random-source.js';
import { ValidationError } from '../../errors.js';

const scripted = (values: number[]) => {
  const bounds: number[] = [];
  let index = 0;
  const source: RandomSource = {
    nextInt(maxExclusive) {
      bounds.push(maxExclusive);
      const value = values[index] ?? 0;
      index += 1;
      return value;
    },
  };
  return { source, bounds };
};

const pool = (...entries: [string, number][]): PoolEntry<string>[] =>
  entries.map(([participantId, weight]) => ({ participantId, weight }));

describe('selectWinners', () => {
  it('walks the cumulative weights and removes each winner before the next pick', () => {
    const { source, bounds } = scripted([3, 0]);

    const winners = selectWinners(pool(['A', 1], ['B', 2], ['C', 3]), 2, source);

    expect(winners).toEqual(['C', 'A']);
    expect(bounds).toEqual([6, 3]);
  });

  it('maps targets onto the participant whose range contains them', () => {
    const entries = pool(['A', 1], ['B', 2], ['C', 3]);

    expect(selectWinners(entries, 1, scripted([0]).source)).toEqual(['A']);
    expect(selectWinners(entries, 1, scripted([1]).source)).toEqual(['B']);
    expect(selectWinners(entries, 1, scripted([2]).source)).toEqual(['B']);
    expect(selectWinners(entries, 1, scripted([5]).source)).toEqual(['C']);
  });

  it('returns an empty list for an empty pool without consuming randomness', () => {
    const { source, bounds } = scripted([]);

    expect(selectWinners([], 5, source)).toEqual([]);
    expect(bounds).toEqual([]);
  });

  it('returns every participant when fewer than the requested count are eligible', () => {
    const winners = selectWinners(
      pool(['A', 4], ['B', 1]),
      5,
      createSeededRandomSource('test-seed'),
    );

    expect(winners).toHaveLength(2);
    expect(new Set(winners)).toEqual(new Set(['A', 'B']));
  });

  it('never selects zero-weight rows', () => {
    const { source, bounds } = scripted([0]);

    expect(selectWinners(pool(['A', 0], ['B', 5]), 2, source)).toEqual(['B']);
    expect(bounds).toEqual([5]);
  });

  it('merges the weights of duplicate ids', () => {
    const { source, bounds } = scripted([3, 0]);

    const winners = selectWinners(pool(['A', 1], ['B', 1], ['A', 2]), 2, source);

    expect(winners).toEqual(['B', 'A']);
    expect(bounds).toEqual([4, 3]);
  });

  it('rejects negative or fractional weights and counts', () => {
    const random = scripted([]).source;

    expect(() => selectWinners(pool(['A', -1]), 1, random)).toThrow(ValidationError);
    expect(() => selectWinners(pool(['A', 1.5]), 1, random)).toThrow(ValidationError);
    expect(() => selectWinners(pool(['A', 1]), -1, random)).toThrow(ValidationError);
  });

  it('returns distinct winners', () => {
    const entries = pool(['A', 5], ['B', 5], ['C', 5], ['D', 5], ['E', 5], ['F', 5], ['G', 5]);
    const random = createSeededRandomSource('distinct');

    for (let round = 0; round < 50; round += 1) {
      const winners = selectWinners(entries, 5, random);
      expect(winners).toHaveLength(5);
      expect(new Set(winners).size).toBe(5);
    }
  });

  it('picks the first winner in proportion to weight', () => {
    const entries = pool(['A', 1], ['B', 3]);
    const random = createSeededRandomSource('frequency');
    const rounds = 4_000;

    let bFirst = 0;
    for (let round = 0; round < rounds; round += 1) {
      const [first] = selectWinners(entries, 1, random);
      if (first === 'B') {
        bFirst += 1;
      }
    }

    const share = bFirst / rounds;
    expect(share).toBeGreaterThan(0.7);
    expect(share).toBeLessThan(0.8);
  });

  it('samples an equal-weight pool uniformly at every position', () => {
    const ids = ['A', 'B', 'C', 'D'];
    const entries = pool(...ids.map((id): [string, number] => [id, 2]));
    const random = createSeededRandomSource('uniform');
    const rounds = 8_000;

    const first = new Map<string, number>();
    const second = new Map<string, number>();
    let afterA = 0;
    let bAfterA = 0;
    for (let round = 0; round < rounds; round += 1) {
      const [winner, runnerUp] = selectWinners(entries, 2, random);
      if (winner === undefined || runnerUp === undefined) {
        throw new Error('expected two winners');
      }
      expect(runnerUp).not.toBe(winner);
      first.set(winner, (first.get(winner) ?? 0) + 1);
      second.set(runnerUp, (second.get(runnerUp) ?? 0) + 1);
      if (winner === 'A') {
        afterA += 1;
        if (runnerUp === 'B') {
          bAfterA += 1;
        }
      }
    }

    for (const id of ids) {
      expect((first.get(id) ?? 0) / rounds).toBeCloseTo(0.25, 1);
      expect((second.get(id) ?? 0) / rounds).toBeCloseTo(0.25, 1);
    }
    expect(bAfterA / afterA).toBeGreaterThan(0.28);
    expect(bAfterA / afterA).toBeLessThan(0.39);
  });

  it('shrinks the range by the removed weight when all weights are equal', () => {
    const { source, bounds } = scripted([7, 0, 3]);

    const winners = selectWinners(pool(['A', 2], ['B', 2], ['C', 2], ['D', 2]), 3, source);

    expect(winners).toEqual(['D', 'A', 'C']);
    expect(bounds).toEqual([8, 6, 4]);
  });
});
