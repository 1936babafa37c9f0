/**
 * Fetcher-level retry.
 *
 * Retries happen entirely inside the wrapped fetcher; the coordinator only ever sees the final
 * outcome, so its cooldown and pending bookkeeping are unaffected.
 */

import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Fetcher, FetchError } from './types';
import LibLogger from '../logger';

const logger = LibLogger.get('retry');

export interface RetryOptions {
  /** Total number of attempts, including the first */
  attempts: number;
  /** Pause between attempts in milliseconds */
  delayMs: number;
  /** Return false to stop retrying on a particular error */
  shouldRetry?: (error: FetchError) => boolean;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Wrap a fetcher so that a failed attempt is retried after a short pause.
 */
export const withRetry = <K, V>(fetcher: Fetcher<K, V>, options: RetryOptions): Fetcher<K, V> => {
  if (!Number.isInteger(options.attempts) || options.attempts < 1) {
    throw new Error(`Retry attempts must be a positive integer, got ${options.attempts}`);
  }
  if (options.delayMs < 0) {
    throw new Error(`Retry delay must be non-negative, got ${options.delayMs}`);
  }

  const fetch = async (key: K): Promise<Result<V, FetchError>> => {
    let lastError: FetchError = { type: 'network', message: 'No attempt made' };

    for (let attempt = 1; attempt <= options.attempts; attempt++) {
      const result = await fetcher.fetch(key);
      if (result.isOk()) {
        return result;
      }
      lastError = result.error;

      if (options.shouldRetry && !options.shouldRetry(lastError)) {
        break;
      }
      if (attempt < options.attempts) {
        logger.debug('Retrying fetch', { source: fetcher.name, key, attempt, error: lastError.message });
        await sleep(options.delayMs);
      }
    }

    return err(lastError);
  };

  return { name: fetcher.name, fetch };
};
