import type { Redis } from 'ioredis';
import type { AppConfig } from '../../shared/types/config.js';
import { AppConfigSchema } from '../../shared/schema/config.schema.js';
import { configKeys } from '../utils/redis-keys.js';
import { ensureValid } from '../../shared/validation.js';
import { logger } from '../logging.js';

export interface ConfigOverrideStore {
  getOverride(): Promise<AppConfig | null>;
  saveOverride(config: AppConfig): Promise<void>;
  clearOverride(): Promise<void>;
}

export class ConfigRepository implements ConfigOverrideStore {
  private readonly client: Redis;

  constructor(client: Redis) {
    this.client = client;
  }

  async getOverride(): Promise<AppConfig | null> {
    const key = configKeys.override();
    const payload = await this.client.get(key);
    if (!payload) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(payload);
      return ensureValid(AppConfigSchema, parsed);
    } catch (error) {
      await this.client.del(key);
      logger.warn('Invalid config override encountered; purging', { error });
      return null;
    }
  }

  async saveOverride(config: AppConfig): Promise<void> {
    const validated = ensureValid(AppConfigSchema, config);
    await this.client.set(configKeys.override(), JSON.stringify(validated));
  }

  async clearOverride(): Promise<void> {
    await this.client.del(configKeys.override());
  }
}

export class InMemoryConfigRepository implements ConfigOverrideStore {
  private override: AppConfig | null = null;

  async getOverride(): Promise<AppConfig | null> {
    return this.override;
  }

  async saveOverride(config: AppConfig): Promise<void> {
    this.override = ensureValid(AppConfigSchema, config);
  }

  async clearOverride(): Promise<void> {
    this.override = null;
  }
}
