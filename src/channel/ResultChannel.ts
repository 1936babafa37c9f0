import type { FetchError } from '../fetchers/types';
import LibLogger from '../logger';

const logger = LibLogger.get('ResultChannel');

/**
 * Outcome of one worker, tagged with the coordinator generation it was spawned in.
 */
export type ResultMessage<K, V> =
  | { type: 'loaded'; key: K; value: V; generation: number }
  | { type: 'failed'; key: K; error: FetchError; generation: number };

/**
 * Unbounded FIFO carrying worker results to the consumer.
 *
 * Any number of workers may send; one consumer drains. Receiving never waits: it returns
 * whatever is already queued. After `close()` sends are dropped.
 */
export class ResultChannel<K, V> {
  private queue: ResultMessage<K, V>[] = [];
  private closed = false;

  /**
   * Queue a message. Returns false if the channel is closed and the message was dropped.
   */
  public send(message: ResultMessage<K, V>): boolean {
    if (this.closed) {
      logger.debug('Send on closed channel dropped', { type: message.type, key: message.key });
      return false;
    }
    this.queue.push(message);
    return true;
  }

  /**
   * Take every queued message in send order, leaving the channel empty.
   */
  public drain(): ResultMessage<K, V>[] {
    const messages = this.queue;
    this.queue = [];
    return messages;
  }

  public get size(): number {
    return this.queue.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting messages and discard anything still queued.
   */
  public close(): void {
    this.closed = true;
    this.queue = [];
  }
}
