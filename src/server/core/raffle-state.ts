import type { LedgerRow, ParticipantId, Points, Raffle } from '../../shared/types/entities.js';
import { ConflictError, RaffleClosedError } from '../errors.js';
import { EntryLedger, type LedgerSnapshot } from './entry-ledger.js';

/**
 * The single current raffle and its entry ledger, owned by one lifecycle instance. Every
 * mutation here is synchronous; callers serialize access around the store writes.
 */
export class RaffleState {
  private current: Raffle | null = null;
  private ledger = new EntryLedger();

  get raffle(): Raffle | null {
    return this.current;
  }

  get participantCount(): number {
    return this.ledger.participantCount;
  }

  weightOf(participantId: ParticipantId): number {
    return this.ledger.weightOf(participantId);
  }

  rows(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  load(raffle: Raffle, rows: readonly LedgerRow[]): void {
    this.current = raffle;
    this.ledger = EntryLedger.fromRows(rows);
    if (raffle.status !== 'open') {
      this.ledger.freeze();
    }
  }

  open(raffle: Raffle): void {
    if (raffle.status !== 'open') {
      throw new ConflictError('A new raffle must start open.');
    }
    this.current = raffle;
    this.ledger = new EntryLedger();
  }

  applyEntry(participantId: ParticipantId, weight: number, pot: Points): number {
    const raffle = this.requireOpen();
    const total = this.ledger.register(participantId, weight);
    this.current = { ...raffle, pot, totalEntries: raffle.totalEntries + weight };
    return total;
  }

  /** OPEN -> DRAWING; the returned snapshot is the pool for this draw. */
  beginDraw(): LedgerSnapshot {
    const raffle = this.requireOpen();
    const snapshot = this.ledger.freeze();
    this.current = { ...raffle, status: 'drawing' };
    return snapshot;
  }

  /** DRAWING -> OPEN after a failed draw. */
  abortDraw(): void {
    if (!this.current || this.current.status !== 'drawing') {
      return;
    }
    this.current = { ...this.current, status: 'open' };
    this.ledger.unfreeze();
  }

  clear(): void {
    this.current = null;
    this.ledger.reset();
  }

  private requireOpen(): Raffle {
    if (!this.current || this.current.status !== 'open') {
      throw new RaffleClosedError();
    }
    return this.current;
  }
}
