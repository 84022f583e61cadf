import { loadServerEnv } from './config/env.js';
import { createApp } from './app.js';
import { createRedisClient } from './redis-client.js';
import { ConfigRepository, InMemoryConfigRepository } from './repositories/config.repository.js';
import { MemoryRaffleStore } from './repositories/memory-raffle-store.js';
import { RedisRaffleStore } from './repositories/redis-raffle-store.js';
import { ConfigService } from './services/config.service.js';
import { ParticipantsService } from './services/participants.service.js';
import { RaffleLifecycleService } from './services/raffle-lifecycle.service.js';
import { RaffleQueryService } from './services/raffle-query.service.js';
import { SchedulerService } from './services/scheduler.service.js';
import { logger } from './logging.js';

const env = loadServerEnv();

const redis = env.RAFFLE_STORE === 'redis' ? createRedisClient(env.REDIS_URL) : null;
if (redis) {
  await redis.connect();
}

const store = redis ? new RedisRaffleStore(redis) : new MemoryRaffleStore();
const configService = new ConfigService(
  redis ? new ConfigRepository(redis) : new InMemoryConfigRepository(),
);

const lifecycleService = new RaffleLifecycleService({ store, config: configService });
const participantsService = new ParticipantsService(store, configService, lifecycleService);
const raffleQueryService = new RaffleQueryService(store, lifecycleService, configService);
const scheduler = new SchedulerService(lifecycleService, { expression: env.DRAW_TICK_CRON });

await lifecycleService.initialize();

if (!env.ADMIN_API_KEY) {
  logger.warn('ADMIN_API_KEY is not set; admin routes will reject every request');
}

const app = createApp(
  { lifecycleService, participantsService, raffleQueryService, configService },
  { adminKey: env.ADMIN_API_KEY },
);

const server = app.listen(env.PORT, () => {
  logger.info('server listening', { port: env.PORT, store: env.RAFFLE_STORE });
});
server.on('error', (err) =>
  logger.error('server error', {
    message: err instanceof Error ? err.message : 'unknown error',
  }),
);

scheduler.start();

const shutdown = async (signal: string) => {
  logger.info('shutting down', { signal });
  await scheduler.stop();
  server.close();
  if (redis) {
    await redis.quit();
  }
};

const onSignal = (signal: NodeJS.Signals) => {
  shutdown(signal).catch((error: unknown) => {
    logger.error('shutdown failed', { error });
    process.exitCode = 1;
  });
};

process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);
