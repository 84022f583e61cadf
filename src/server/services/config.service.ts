import type { AppConfig, ConfigSnapshot } from '../../shared/types/config.js';
import { AppConfigPatchSchema, AppConfigSchema } from '../../shared/schema/config.schema.js';
import { parseWith } from '../../shared/validation.js';
import { nowIso } from '../utils/time.js';
import type { ConfigOverrideStore } from '../repositories/config.repository.js';
import { DEFAULT_APP_CONFIG } from '../config/defaults.js';
import { CONFIG_ENV_KEYS } from '../config/env.js';
import { InvalidConfigurationError } from '../errors.js';
import { logger } from '../logging.js';

type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigService {
  private readonly repository: ConfigOverrideStore;
  private readonly defaults: AppConfig;

  constructor(repository: ConfigOverrideStore, env: EnvSource = process.env) {
    this.repository = repository;
    this.defaults = this.loadDefaults(env);
  }

  async getConfig(): Promise<AppConfig> {
    const snapshot = await this.getSnapshot();
    return snapshot.config;
  }

  async getSnapshot(): Promise<ConfigSnapshot> {
    const override = await this.repository.getOverride();
    return {
      config: override ?? this.defaults,
      source: override ? 'override' : 'defaults',
      fetchedAt: nowIso(),
    };
  }

  /** Merges `patch` over the active configuration and persists the result as the override. */
  async updateConfig(patch: unknown): Promise<AppConfig> {
    const parsedPatch = parseWith(AppConfigPatchSchema, patch, 'Invalid configuration patch.');
    if (!parsedPatch.ok) {
      throw new InvalidConfigurationError(parsedPatch.error.message, {
        details: { issues: parsedPatch.error.issues },
      });
    }

    const current = await this.getConfig();
    const merged = parseWith(
      AppConfigSchema,
      { ...current, ...parsedPatch.value },
      'Invalid configuration.',
    );
    if (!merged.ok) {
      throw new InvalidConfigurationError(merged.error.message, {
        details: { issues: merged.error.issues },
      });
    }

    await this.repository.saveOverride(merged.value);
    logger.info('Configuration override saved', { fields: Object.keys(parsedPatch.value) });
    return merged.value;
  }

  async clearOverride(): Promise<AppConfig> {
    await this.repository.clearOverride();
    logger.info('Configuration override cleared');
    return this.defaults;
  }

  private loadDefaults(env: EnvSource): AppConfig {
    const result = parseWith(AppConfigSchema, this.mergeWithDefaults(env));
    if (!result.ok) {
      logger.warn('Invalid raffle configuration in environment; falling back to defaults', {
        issues: result.error.issues,
      });
      return DEFAULT_APP_CONFIG;
    }
    return result.value;
  }

  private mergeWithDefaults(env: EnvSource): AppConfig {
    const positionShares = this.asShares(
      env[CONFIG_ENV_KEYS.positionShares],
      DEFAULT_APP_CONFIG.positionShares,
    );

    return {
      entryCost: this.asNumber(env[CONFIG_ENV_KEYS.entryCost], DEFAULT_APP_CONFIG.entryCost),
      maxEntriesPerRegistration: this.asNumber(
        env[CONFIG_ENV_KEYS.maxEntriesPerRegistration],
        DEFAULT_APP_CONFIG.maxEntriesPerRegistration,
      ),
      startingBalance: this.asNumber(
        env[CONFIG_ENV_KEYS.startingBalance],
        DEFAULT_APP_CONFIG.startingBalance,
      ),
      drawIntervalMinutes: this.asNumber(
        env[CONFIG_ENV_KEYS.drawIntervalMinutes],
        DEFAULT_APP_CONFIG.drawIntervalMinutes,
      ),
      winnerCount: this.asNumber(env[CONFIG_ENV_KEYS.winnerCount], positionShares.length),
      positionShares,
      houseEdge: this.asFraction(env[CONFIG_ENV_KEYS.houseEdge], DEFAULT_APP_CONFIG.houseEdge),
      redistributeUnclaimedShares: this.asBoolean(
        env[CONFIG_ENV_KEYS.redistributeUnclaimedShares],
        DEFAULT_APP_CONFIG.redistributeUnclaimedShares,
      ),
    } satisfies AppConfig;
  }

  private asNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }

    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  private asFraction(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }

    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  // "0.4,0.25,0.18,0.1,0.07"
  private asShares(value: string | undefined, fallback: readonly number[]): readonly number[] {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }

    const shares = value.split(',').map((part) => Number.parseFloat(part.trim()));
    return shares.every((share) => Number.isFinite(share)) ? shares : fallback;
  }

  private asBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    const lowered = value.toLowerCase();
    if (lowered === 'true') {
      return true;
    }
    if (lowered === 'false') {
      return false;
    }
    return fallback;
  }
}
