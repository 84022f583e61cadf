import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigService } from '../config.service.js';
import { InMemoryConfigRepository } from '../../repositories/config.repository.js';
import { DEFAULT_APP_CONFIG } from '../../config/defaults.js';
import { InvalidConfigurationError } from '../../errors.js';
import { logger } from '../../logging.js';

beforeEach(() => {
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
});

describe('ConfigService', () => {
  it('serves the built-in defaults when nothing is set', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {});

    const snapshot = await service.getSnapshot();

    expect(snapshot.config).toEqual(DEFAULT_APP_CONFIG);
    expect(snapshot.source).toBe('defaults');
  });

  it('reads defaults from the environment', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {
      RAFFLE_ENTRY_COST: '25',
      RAFFLE_POSITION_SHARES: '0.6, 0.4',
      RAFFLE_HOUSE_EDGE: '0.05',
      RAFFLE_REDISTRIBUTE_UNCLAIMED: 'true',
    });

    expect(await service.getConfig()).toEqual({
      ...DEFAULT_APP_CONFIG,
      entryCost: 25,
      winnerCount: 2,
      positionShares: [0.6, 0.4],
      houseEdge: 0.05,
      redistributeUnclaimedShares: true,
    });
  });

  it('falls back to the built-in defaults when the environment is inconsistent', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {
      RAFFLE_POSITION_SHARES: '0.5,0.4',
    });

    expect(await service.getConfig()).toEqual(DEFAULT_APP_CONFIG);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('persists a merged override', async () => {
    const repository = new InMemoryConfigRepository();
    const service = new ConfigService(repository, {});

    const updated = await service.updateConfig({ houseEdge: 0.2, entryCost: 5 });

    expect(updated).toEqual({ ...DEFAULT_APP_CONFIG, houseEdge: 0.2, entryCost: 5 });
    expect(await repository.getOverride()).toEqual(updated);
    expect((await service.getSnapshot()).source).toBe('override');
  });

  it('rejects an override that breaks the share table', async () => {
    const repository = new InMemoryConfigRepository();
    const service = new ConfigService(repository, {});

    await expect(service.updateConfig({ positionShares: [0.5, 0.5] })).rejects.toBeInstanceOf(
      InvalidConfigurationError,
    );
    await expect(
      service.updateConfig({ positionShares: [0.5, 0.4], winnerCount: 2 }),
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(await repository.getOverride()).toBeNull();
  });

  it('rejects unknown or mistyped fields', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {});

    await expect(service.updateConfig({ jackpot: true })).rejects.toBeInstanceOf(
      InvalidConfigurationError,
    );
    await expect(service.updateConfig({ entryCost: -1 })).rejects.toBeInstanceOf(
      InvalidConfigurationError,
    );
    await expect(service.updateConfig({ houseEdge: 1 })).rejects.toBeInstanceOf(
      InvalidConfigurationError,
    );
  });

  it('accepts a share table that matches its winner count', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {});

    const updated = await service.updateConfig({ positionShares: [0.7, 0.3], winnerCount: 2 });

    expect(updated.positionShares).toEqual([0.7, 0.3]);
    expect(updated.winnerCount).toBe(2);
  });

  it('clears the override back to the defaults', async () => {
    const service = new ConfigService(new InMemoryConfigRepository(), {});
    await service.updateConfig({ entryCost: 5 });

    const cleared = await service.clearOverride();

    expect(cleared).toEqual(DEFAULT_APP_CONFIG);
    expect((await service.getSnapshot()).source).toBe('defaults');
  });
});
