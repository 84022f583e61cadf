import { describe, expect, it } from 'vitest';

import { EntryLedger } from '../entry-ledger.js';
import { RaffleClosedError, ValidationError } from '../../errors.js';
import { ParticipantIdSchema } from '../../../shared/schema/entities.schema.js';

const alice = ParticipantIdSchema.parse('TKN-AAAAAA');
const bob = ParticipantIdSchema.parse('TKN-BBBBBB');

describe('EntryLedger', () => {
  it('accumulates weight per participant in first-registration order', () => {
    const ledger = new EntryLedger();

    expect(ledger.register(bob, 2)).toBe(2);
    expect(ledger.register(alice, 1)).toBe(1);
    expect(ledger.register(bob, 3)).toBe(5);

    expect(ledger.snapshot()).toEqual([
      { participantId: bob, weight: 5 },
      { participantId: alice, weight: 1 },
    ]);
    expect(ledger.totalWeight).toBe(6);
    expect(ledger.participantCount).toBe(2);
  });

  it('returns immutable snapshots', () => {
    const ledger = new EntryLedger();
    ledger.register(alice, 1);

    const snapshot = ledger.snapshot();
    ledger.register(alice, 4);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toEqual([{ participantId: alice, weight: 1 }]);
  });

  it('rejects registrations once frozen', () => {
    const ledger = new EntryLedger();
    ledger.register(alice, 2);

    const pool = ledger.freeze();

    expect(pool).toEqual([{ participantId: alice, weight: 2 }]);
    expect(ledger.isFrozen).toBe(true);
    expect(() => ledger.register(bob, 1)).toThrow(RaffleClosedError);
    expect(() => ledger.freeze()).toThrow(RaffleClosedError);
  });

  it('rejects weight deltas that are not positive integers', () => {
    const ledger = new EntryLedger();

    expect(() => ledger.register(alice, 0)).toThrow(ValidationError);
    expect(() => ledger.register(alice, -2)).toThrow(ValidationError);
    expect(() => ledger.register(alice, 1.5)).toThrow(ValidationError);
  });

  it('clears weights and reopens on reset', () => {
    const ledger = new EntryLedger();
    ledger.register(alice, 3);
    ledger.freeze();

    ledger.reset();

    expect(ledger.snapshot()).toEqual([]);
    expect(ledger.isFrozen).toBe(false);
    expect(ledger.register(alice, 1)).toBe(1);
  });

  it('rebuilds from stored rows, skipping empty ones', () => {
    const ledger = EntryLedger.fromRows([
      { participantId: alice, weight: 4 },
      { participantId: bob, weight: 0 },
    ]);

    expect(ledger.weightOf(alice)).toBe(4);
    expect(ledger.weightOf(bob)).toBe(0);
    expect(ledger.participantCount).toBe(1);
  });
});
