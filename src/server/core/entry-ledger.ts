import type { LedgerRow, ParticipantId } from '../../shared/types/entities.js';
import { RaffleClosedError, ValidationError } from '../errors.js';

export type LedgerSnapshot = readonly LedgerRow[];

/**
 * Accumulated entry weight per participant for the currently open raffle. Rows keep
 * first-registration order so snapshots are stable.
 */
export class EntryLedger {
  private readonly weights = new Map<ParticipantId, number>();
  private frozen = false;

  static fromRows(rows: readonly LedgerRow[]): EntryLedger {
    const ledger = new EntryLedger();
    for (const row of rows) {
      if (row.weight > 0) {
        ledger.register(row.participantId, row.weight);
      }
    }
    return ledger;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get participantCount(): number {
    return this.weights.size;
  }

  get totalWeight(): number {
    let total = 0;
    for (const weight of this.weights.values()) {
      total += weight;
    }
    return total;
  }

  weightOf(participantId: ParticipantId): number {
    return this.weights.get(participantId) ?? 0;
  }

  register(participantId: ParticipantId, weightDelta: number): number {
    if (this.frozen) {
      throw new RaffleClosedError();
    }

    if (!Number.isSafeInteger(weightDelta) || weightDelta <= 0) {
      throw new ValidationError('Entry weight must be a positive integer.', {
        details: { participantId, weightDelta },
      });
    }

    const next = this.weightOf(participantId) + weightDelta;
    this.weights.set(participantId, next);
    return next;
  }

  snapshot(): LedgerSnapshot {
    return Object.freeze(
      Array.from(this.weights, ([participantId, weight]) => Object.freeze({ participantId, weight })),
    );
  }

  /** Stops accepting registrations and returns the pool the draw will use. */
  freeze(): LedgerSnapshot {
    if (this.frozen) {
      throw new RaffleClosedError('Entry ledger is already frozen.');
    }
    this.frozen = true;
    return this.snapshot();
  }

  unfreeze(): void {
    this.frozen = false;
  }

  reset(): void {
    this.weights.clear();
    this.frozen = false;
  }
}
