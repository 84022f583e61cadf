import { beforeEach, describe, expect, it, vi } from 'vitest';

import { SchedulerService, type ScheduleFn, type TickTarget } from '../scheduler.service.js';
import type { DrawOutcome } from '../raffle-lifecycle.service.js';
import { ValidationError } from '../../errors.js';
import { logger } from '../../logging.js';

const NOW = new Date('2026-01-01T01:00:00.000Z');

const setup = (onTimerTick: TickTarget['onTimerTick']) => {
  const stop = vi.fn();
  let scheduledTask: (() => void) | null = null;
  const schedule = vi.fn<ScheduleFn>((_expression, task) => {
    scheduledTask = task;
    return { stop };
  });

  const target: TickTarget = { onTimerTick: vi.fn(onTimerTick) };
  const scheduler = new SchedulerService(target, {
    expression: '*/5 * * * * *',
    schedule,
    validate: () => true,
    clock: () => NOW,
  });

  return {
    scheduler,
    target,
    schedule,
    stop,
    fire: () => scheduledTask?.(),
  };
};

beforeEach(() => {
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
});

describe('SchedulerService', () => {
  it('schedules the tick once', () => {
    const { scheduler, schedule } = setup(async () => null);

    scheduler.start();
    scheduler.start();

    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule).toHaveBeenCalledWith('*/5 * * * * *', expect.any(Function));
    expect(scheduler.isRunning).toBe(true);
  });

  it('rejects an invalid cron expression', () => {
    const scheduler = new SchedulerService(
      { onTimerTick: async () => null },
      { expression: 'every minute', schedule: vi.fn<ScheduleFn>(), validate: () => false },
    );

    expect(() => scheduler.start()).toThrow(ValidationError);
  });

  it('passes the current time to the lifecycle on each tick', async () => {
    const { scheduler, target, fire } = setup(async () => null);
    scheduler.start();

    fire();
    await scheduler.tick();

    expect(target.onTimerTick).toHaveBeenCalledWith(NOW);
  });

  it('skips a tick while the previous one is still running', async () => {
    let release: (value: DrawOutcome | null) => void = () => undefined;
    const pending = new Promise<DrawOutcome | null>((resolve) => {
      release = resolve;
    });
    const { scheduler, target } = setup(() => pending);

    const first = scheduler.tick();
    const second = scheduler.tick();
    release(null);
    await Promise.all([first, second]);

    expect(target.onTimerTick).toHaveBeenCalledTimes(1);

    await scheduler.tick();
    expect(target.onTimerTick).toHaveBeenCalledTimes(2);
  });

  it('logs a failed tick and keeps going', async () => {
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const { scheduler, target } = setup(async () => {
      throw new Error('store unavailable');
    });

    await expect(scheduler.tick()).resolves.toBeUndefined();
    await expect(scheduler.tick()).resolves.toBeUndefined();

    expect(target.onTimerTick).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith('scheduled draw tick failed', {
      error: expect.any(Error),
    });
  });

  it('stops the cron job', async () => {
    const { scheduler, stop } = setup(async () => null);
    scheduler.start();

    await scheduler.stop();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning).toBe(false);
  });
});
