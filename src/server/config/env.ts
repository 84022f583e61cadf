import { z } from 'zod';
import { ensureValid } from '../../shared/validation.js';
import { DEFAULT_DRAW_TICK_CRON } from './constants.js';

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  REDIS_URL: z.string().min(1).default('redis://127.0.0.1:6379'),
  RAFFLE_STORE: z.enum(['redis', 'memory']).default('redis'),
  ADMIN_API_KEY: z
    .string()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : null)),
  DRAW_TICK_CRON: z.string().min(1).default(DEFAULT_DRAW_TICK_CRON),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export const loadServerEnv = (source: NodeJS.ProcessEnv = process.env): ServerEnv =>
  ensureValid(ServerEnvSchema, source, 'Invalid server environment.');

/** Env keys that seed the raffle configuration defaults. */
export const CONFIG_ENV_KEYS = {
  entryCost: 'RAFFLE_ENTRY_COST',
  maxEntriesPerRegistration: 'RAFFLE_MAX_ENTRIES',
  startingBalance: 'RAFFLE_STARTING_BALANCE',
  drawIntervalMinutes: 'RAFFLE_DRAW_INTERVAL_MINUTES',
  winnerCount: 'RAFFLE_WINNER_COUNT',
  positionShares: 'RAFFLE_POSITION_SHARES',
  houseEdge: 'RAFFLE_HOUSE_EDGE',
  redistributeUnclaimedShares: 'RAFFLE_REDISTRIBUTE_UNCLAIMED',
} as const;
