import type { ChainableCommander, Redis } from 'ioredis';
import { MAX_TRANSACTION_RETRIES } from '../config/constants.js';
import { logger } from '../logging.js';

export type TransactionHandler<T, TState> = (tx: ChainableCommander, state: TState) => T | Promise<T>;
export type TransactionStateLoader<TState> = (client: Redis) => Promise<TState>;

interface TransactionOptions {
  readonly retries?: number;
  readonly label?: string;
}

export class TransactionConflictError extends Error {
  constructor(label: string) {
    super(`transaction ${label} aborted due to concurrent modification`);
    this.name = 'TransactionConflictError';
  }
}

/**
 * Optimistic WATCH/MULTI/EXEC with retry. `loadState` reads under the watch; `handler`
 * validates that state and queues the writes. Only watch conflicts are retried.
 */
export const runTransactionWithRetry = async <T, TState>(
  client: Redis,
  keys: string[],
  loadState: TransactionStateLoader<TState>,
  handler: TransactionHandler<T, TState>,
  options?: TransactionOptions,
): Promise<T> => {
  const maxRetries = options?.retries ?? MAX_TRANSACTION_RETRIES;
  const label = options?.label ?? 'transaction';

  for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
    await client.watch(...keys);

    try {
      const state = await loadState(client);
      const tx = client.multi();
      const result = await handler(tx, state);
      const execResult = await tx.exec();

      if (execResult === null) {
        throw new TransactionConflictError(label);
      }

      const failed = execResult.find(([error]) => error !== null);
      if (failed?.[0]) {
        throw failed[0];
      }

      return result;
    } catch (error) {
      await client.unwatch().catch((unwatchError: unknown) => {
        logger.warn('failed to release watched keys', { label, error: unwatchError });
      });

      if (!(error instanceof TransactionConflictError)) {
        throw error;
      }

      if (attempt === maxRetries) {
        logger.error('transaction aborted after retries', { label, attempt });
        throw error;
      }

      logger.warn('transaction conflict detected; retrying', { label, attempt });
    }
  }

  throw new Error('transaction retry loop exhausted unexpectedly');
};
