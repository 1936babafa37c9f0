import type { ResultChannel, ResultMessage } from '../channel/ResultChannel';
import { toFetchError } from '../fetchers/types';
import type { Fetcher } from '../fetchers/types';
import LibLogger from '../logger';

const logger = LibLogger.get('Worker');

export interface WorkerTask<K, V> {
  fetcher: Fetcher<K, V>;
  key: K;
  channel: ResultChannel<K, V>;
  generation: number;
}

/**
 * Run one fetch and post exactly one message.
 * Never rejects: a throwing fetcher is reported as a failure.
 */
export const runWorker = async <K, V>(task: WorkerTask<K, V>): Promise<void> => {
  const { fetcher, key, channel, generation } = task;

  // Yield first so the spawning request() returns before any fetcher code runs.
  await Promise.resolve();

  let message: ResultMessage<K, V>;
  try {
    const result = await fetcher.fetch(key);
    message = result.match<ResultMessage<K, V>>(
      value => ({ type: 'loaded', key, value, generation }),
      error => ({ type: 'failed', key, error, generation })
    );
  } catch (error) {
    message = { type: 'failed', key, error: toFetchError(error), generation };
  }

  logger.trace('Worker finished', { source: fetcher.name, key, type: message.type });
  channel.send(message);
};

/**
 * Start a fire-and-forget worker. Its completion is observed only through the channel.
 */
export const spawnWorker = <K, V>(task: WorkerTask<K, V>): void => {
  runWorker(task).catch((error: unknown) => {
    logger.error('Worker crashed before delivering its result', {
      source: task.fetcher.name,
      key: task.key,
      error
    });
  });
};
