import cron from 'node-cron';
import type { DrawOutcome } from './raffle-lifecycle.service.js';
import { DEFAULT_DRAW_TICK_CRON } from '../config/constants.js';
import { ValidationError } from '../errors.js';
import { logger } from '../logging.js';

export interface TickTarget {
  onTimerTick(now?: Date): Promise<DrawOutcome | null>;
}

export interface ScheduledJob {
  stop(): void;
}

export type ScheduleFn = (expression: string, task: () => void) => ScheduledJob;

const scheduleWithCron: ScheduleFn = (expression, task) => cron.schedule(expression, task);

export interface SchedulerOptions {
  readonly expression?: string;
  readonly schedule?: ScheduleFn;
  readonly validate?: (expression: string) => boolean;
  readonly clock?: () => Date;
}

/**
 * Drives the lifecycle tick from a cron expression. A tick that starts while the previous one
 * is still running is skipped, and failures are logged so the loop keeps going.
 */
export class SchedulerService {
  private readonly target: TickTarget;
  private readonly expression: string;
  private readonly schedule: ScheduleFn;
  private readonly validate: (expression: string) => boolean;
  private readonly clock: () => Date;
  private job: ScheduledJob | null = null;
  private running: Promise<void> | null = null;

  constructor(target: TickTarget, options: SchedulerOptions = {}) {
    this.target = target;
    this.expression = options.expression ?? DEFAULT_DRAW_TICK_CRON;
    this.schedule = options.schedule ?? scheduleWithCron;
    this.validate = options.validate ?? ((expression) => cron.validate(expression));
    this.clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.job !== null;
  }

  start(): void {
    if (this.job) {
      return;
    }

    if (!this.validate(this.expression)) {
      throw new ValidationError(`Invalid cron expression: ${this.expression}`);
    }

    this.job = this.schedule(this.expression, () => {
      void this.tick();
    });
    logger.info('draw scheduler started', { expression: this.expression });
  }

  async stop(): Promise<void> {
    if (!this.job) {
      return;
    }

    this.job.stop();
    this.job = null;
    await this.running;
    logger.info('draw scheduler stopped');
  }

  /** Runs one tick. Resolves once the tick (or the one already in flight) has settled. */
  async tick(): Promise<void> {
    if (this.running) {
      logger.debug('previous draw tick still running; skipping');
      return this.running;
    }

    this.running = this.runTick().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async runTick(): Promise<void> {
    try {
      const outcome = await this.target.onTimerTick(this.clock());
      if (outcome) {
        logger.info('scheduled draw finished', {
          raffleId: outcome.history.raffleId,
          winners: outcome.history.winners.length,
          nextRaffleId: outcome.next.id,
        });
      }
    } catch (error) {
      logger.error('scheduled draw tick failed', { error });
    }
  }
}
