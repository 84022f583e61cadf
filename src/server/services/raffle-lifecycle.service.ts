import type { AppConfig } from '../../shared/types/config.js';
import type {
  DrawTrigger,
  LedgerRow,
  ParticipantId,
  Points,
  Raffle,
  RaffleHistoryEntry,
  RaffleId,
  WinnerRecord,
} from '../../shared/types/entities.js';
import { buildPayoutBreakdown } from '../core/payout-calculator.js';
import { createDrawSeed, createSeededRandomSource, type RandomSource } from '../core/random-source.js';
import { RaffleState } from '../core/raffle-state.js';
import { selectWinners } from '../core/weighted-drawer.js';
import {
  ConflictError,
  DrawInProgressError,
  NoOpRaffleError,
  RaffleClosedError,
  ValidationError,
  isAppError,
} from '../errors.js';
import { logger } from '../logging.js';
import type { RaffleStore } from '../repositories/raffle-store.js';
import { createRaffleId } from '../utils/id.js';
import { SerialGate } from '../utils/serial-gate.js';
import { addMinutes } from '../utils/time.js';

export interface ConfigReader {
  getConfig(): Promise<AppConfig>;
}

export interface RaffleLifecycleDependencies {
  readonly store: RaffleStore;
  readonly config: ConfigReader;
  readonly clock?: () => Date;
  readonly createSeed?: () => string;
  readonly createRandomSource?: (seed: string) => RandomSource;
}

export interface RegistrationResult {
  readonly raffleId: RaffleId;
  readonly participantId: ParticipantId;
  readonly cost: Points;
  readonly balance: Points;
  readonly participantEntries: number;
  readonly pot: Points;
}

export interface DrawOptions {
  readonly trigger: DrawTrigger;
  readonly raffleId?: RaffleId;
}

export interface DrawOutcome {
  readonly history: RaffleHistoryEntry;
  readonly next: Raffle;
}

export interface ResetOptions {
  readonly keepParticipants?: boolean;
}

export interface ResetOutcome {
  readonly raffle: Raffle;
  readonly participantsCleared: boolean;
}

export interface RaffleView {
  readonly raffle: Raffle;
  readonly participants: readonly LedgerRow[];
}

interface BegunDraw {
  readonly raffle: Raffle;
  readonly pool: readonly LedgerRow[];
  readonly config: AppConfig;
}

/**
 * Owns the current raffle. Registrations, the begin and complete steps of a draw, and resets
 * all run through one gate; winner selection and payouts run outside it on the frozen pool.
 */
export class RaffleLifecycleService {
  private readonly store: RaffleStore;
  private readonly config: ConfigReader;
  private readonly clock: () => Date;
  private readonly createSeed: () => string;
  private readonly createRandomSource: (seed: string) => RandomSource;
  private readonly gate = new SerialGate();
  private readonly state = new RaffleState();
  private loaded = false;

  constructor(deps: RaffleLifecycleDependencies) {
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
    this.createSeed = deps.createSeed ?? createDrawSeed;
    this.createRandomSource = deps.createRandomSource ?? createSeededRandomSource;
  }

  /** Loads the current raffle, reverting one left in DRAWING and opening one if none exists. */
  async initialize(): Promise<Raffle> {
    return this.gate.run(async () => {
      this.loaded = false;
      await this.loadIfNeeded();

      const current = this.state.raffle;
      if (!current || current.status === 'closed') {
        return this.openRaffleLocked();
      }

      logger.info('Raffle loaded', { raffleId: current.id, drawAt: current.drawAt });
      return current;
    });
  }

  async openNewRaffle(): Promise<Raffle> {
    return this.gate.run(async () => {
      await this.loadIfNeeded();
      const current = this.state.raffle;
      if (current && current.status !== 'closed') {
        throw new ConflictError('A raffle is already active.', {
          details: { raffleId: current.id, status: current.status },
        });
      }
      return this.openRaffleLocked();
    });
  }

  async register(participantId: ParticipantId, entries: number): Promise<RegistrationResult> {
    if (!Number.isSafeInteger(entries) || entries < 1) {
      throw new ValidationError('Entries must be a positive integer.', { details: { entries } });
    }

    return this.gate.run(async () => {
      await this.loadIfNeeded();
      const raffle = this.state.raffle;
      if (!raffle || raffle.status !== 'open') {
        throw new RaffleClosedError();
      }

      const config = await this.config.getConfig();
      if (entries > config.maxEntriesPerRegistration) {
        throw new ValidationError(
          `At most ${config.maxEntriesPerRegistration} entries per registration.`,
          { details: { entries, max: config.maxEntriesPerRegistration } },
        );
      }

      const cost = entries * config.entryCost;
      const receipt = await this.store.recordEntry({
        raffleId: raffle.id,
        participantId,
        weight: entries,
        cost,
      });
      const participantEntries = this.state.applyEntry(participantId, entries, receipt.pot);

      logger.debug('Entry registered', { raffleId: raffle.id, participantId, entries, cost });

      return {
        raffleId: raffle.id,
        participantId,
        cost,
        balance: receipt.participant.balance,
        participantEntries,
        pot: receipt.pot,
      };
    });
  }

  async triggerDraw(options: DrawOptions): Promise<DrawOutcome> {
    const begun = await this.gate.run(() => this.beginDraw(options));

    let outcome: DrawOutcome;
    try {
      outcome = this.computeOutcome(begun, options.trigger);
    } catch (error) {
      await this.abortDraw(begun.raffle.id, error);
      throw error;
    }

    try {
      return await this.gate.run(() => this.completeDraw(begun.raffle.id, outcome));
    } catch (error) {
      await this.abortDraw(begun.raffle.id, error);
      throw error;
    }
  }

  /**
   * Scheduler entry point. Draws only when the current raffle is open and due; a tick that
   * loses a race with another trigger returns null.
   */
  async onTimerTick(now: Date = this.clock()): Promise<DrawOutcome | null> {
    const raffle = await this.gate.run(async () => {
      await this.loadIfNeeded();
      return this.state.raffle;
    });

    if (!raffle || raffle.status !== 'open' || now.getTime() < Date.parse(raffle.drawAt)) {
      return null;
    }

    try {
      return await this.triggerDraw({ trigger: 'scheduled', raffleId: raffle.id });
    } catch (error) {
      if (error instanceof NoOpRaffleError || error instanceof DrawInProgressError) {
        logger.debug('Scheduled draw skipped', { raffleId: raffle.id, reason: error.code });
        return null;
      }
      throw error;
    }
  }

  /** Clears raffles, ledgers and history (and participants unless kept) and opens a fresh raffle. */
  async reset(options: ResetOptions = {}): Promise<ResetOutcome> {
    const keepParticipants = options.keepParticipants ?? false;

    return this.gate.run(async () => {
      const config = await this.config.getConfig();
      const next = this.buildRaffle(config);
      const previous = this.state.raffle;

      await this.store.reset(next, { keepParticipants });
      this.state.open(next);
      this.loaded = true;

      logger.warn('Raffle state reset', {
        previousRaffleId: previous?.id ?? null,
        previousStatus: previous?.status ?? null,
        raffleId: next.id,
        keepParticipants,
      });

      return { raffle: next, participantsCleared: !keepParticipants };
    });
  }

  async currentRaffle(): Promise<RaffleView | null> {
    return this.gate.run(async () => {
      await this.loadIfNeeded();
      const raffle = this.state.raffle;
      return raffle ? { raffle, participants: this.state.rows() } : null;
    });
  }

  async entriesFor(participantId: ParticipantId): Promise<number> {
    return this.gate.run(async () => {
      await this.loadIfNeeded();
      return this.state.weightOf(participantId);
    });
  }

  private async beginDraw(options: DrawOptions): Promise<BegunDraw> {
    await this.loadIfNeeded();
    const raffle = this.state.raffle;

    if (!raffle || raffle.status === 'closed') {
      throw new NoOpRaffleError();
    }
    if (options.raffleId && raffle.id !== options.raffleId) {
      throw new NoOpRaffleError(`Raffle ${options.raffleId} is no longer current.`, {
        details: { expected: options.raffleId, current: raffle.id },
      });
    }
    if (raffle.status === 'drawing') {
      throw new DrawInProgressError();
    }

    const config = await this.config.getConfig();
    await this.store.setRaffleStatus(raffle.id, 'drawing');
    const pool = this.state.beginDraw();

    logger.info('Draw started', {
      raffleId: raffle.id,
      trigger: options.trigger,
      participants: pool.length,
      pot: raffle.pot,
    });

    return { raffle: { ...raffle, status: 'drawing' }, pool, config };
  }

  private computeOutcome(begun: BegunDraw, trigger: DrawTrigger): DrawOutcome {
    const { raffle, pool, config } = begun;
    const seed = this.createSeed();
    const winnerIds = selectWinners(pool, config.winnerCount, this.createRandomSource(seed));
    const breakdown = buildPayoutBreakdown({
      totalPot: raffle.pot,
      houseEdge: config.houseEdge,
      positionShares: config.positionShares,
      winnerCount: winnerIds.length,
      redistributeUnclaimed: config.redistributeUnclaimedShares,
    });

    const winners: WinnerRecord[] = winnerIds.map((participantId, index) => ({
      raffleId: raffle.id,
      position: index + 1,
      participantId,
      amount: breakdown.amounts[index] ?? 0,
    }));

    const drawnAt = this.clock().toISOString();
    const history: RaffleHistoryEntry = {
      schemaVersion: 1,
      raffleId: raffle.id,
      trigger,
      drawAt: raffle.drawAt,
      drawnAt,
      totalPot: raffle.pot,
      houseCut: breakdown.houseCut,
      distributable: breakdown.distributable,
      unclaimed: breakdown.unclaimed,
      totalEntries: raffle.totalEntries,
      participantCount: pool.length,
      seed,
      participants: pool,
      winners,
    };

    return { history, next: this.buildRaffle(config) };
  }

  private async completeDraw(raffleId: RaffleId, outcome: DrawOutcome): Promise<DrawOutcome> {
    const raffle = this.state.raffle;
    if (!raffle || raffle.id !== raffleId || raffle.status !== 'drawing') {
      throw new ConflictError('Draw was superseded by a reset.', { details: { raffleId } });
    }

    const closed: Raffle = { ...raffle, status: 'closed', closedAt: outcome.history.drawnAt };
    await this.store.settleRaffle({
      closed,
      history: outcome.history,
      credits: outcome.history.winners.map((winner) => ({
        participantId: winner.participantId,
        amount: winner.amount,
      })),
      next: outcome.next,
    });
    this.state.open(outcome.next);

    logger.info('Draw completed', {
      raffleId,
      trigger: outcome.history.trigger,
      winners: outcome.history.winners.length,
      houseCut: outcome.history.houseCut,
      nextRaffleId: outcome.next.id,
      nextDrawAt: outcome.next.drawAt,
    });

    return outcome;
  }

  private async abortDraw(raffleId: RaffleId, cause: unknown): Promise<void> {
    await this.gate.run(async () => {
      const raffle = this.state.raffle;
      if (!raffle || raffle.id !== raffleId || raffle.status !== 'drawing') {
        logger.warn('Draw abandoned', { raffleId, error: cause });
        return;
      }

      try {
        await this.store.setRaffleStatus(raffleId, 'open');
        logger.error('Draw failed; raffle reopened', {
          raffleId,
          error: cause,
          code: isAppError(cause) ? cause.code : undefined,
        });
      } catch (revertError) {
        // Store may still read DRAWING; the next gate pass reloads and repairs it.
        this.loaded = false;
        logger.error('Draw failed and the raffle could not be reopened', {
          raffleId,
          error: cause,
          revertError,
        });
      } finally {
        this.state.abortDraw();
      }
    });
  }

  private async loadIfNeeded(): Promise<void> {
    if (this.loaded) {
      return;
    }

    const current = await this.store.getCurrentRaffle();
    if (current?.raffle.status === 'drawing') {
      // Only reached with no draw in flight in this process.
      await this.store.setRaffleStatus(current.raffle.id, 'open');
      this.state.load({ ...current.raffle, status: 'open' }, current.ledger);
      logger.warn('Reverted raffle left in drawing state', { raffleId: current.raffle.id });
    } else if (current) {
      this.state.load(current.raffle, current.ledger);
    } else {
      this.state.clear();
    }
    this.loaded = true;
  }

  private async openRaffleLocked(): Promise<Raffle> {
    const config = await this.config.getConfig();
    const raffle = this.buildRaffle(config);
    await this.store.openRaffle(raffle);
    this.state.open(raffle);
    this.loaded = true;

    logger.info('Raffle opened', { raffleId: raffle.id, drawAt: raffle.drawAt });
    return raffle;
  }

  private buildRaffle(config: AppConfig): Raffle {
    const now = this.clock();
    return {
      schemaVersion: 1,
      id: createRaffleId(),
      status: 'open',
      pot: 0,
      totalEntries: 0,
      drawAt: addMinutes(now, config.drawIntervalMinutes).toISOString(),
      createdAt: now.toISOString(),
      closedAt: null,
    };
  }
}
