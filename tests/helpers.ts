import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Fetcher, FetchError } from '../src/fetchers/types';

/**
 * Let every spawned worker run up to its next real wait.
 */
export const flushWorkers = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

interface Waiting<K, V> {
  key: K;
  resolve: (result: Result<V, FetchError>) => void;
  reject: (error: unknown) => void;
}

/**
 * Fetcher whose calls stay open until the test settles them.
 */
export class ControlledFetcher<K, V> implements Fetcher<K, V> {
  public readonly name = 'controlled';
  public readonly calls: K[] = [];
  private readonly waiting: Waiting<K, V>[] = [];

  public fetch(key: K): Promise<Result<V, FetchError>> {
    this.calls.push(key);
    return new Promise((resolve, reject) => {
      this.waiting.push({ key, resolve, reject });
    });
  }

  public get inFlight(): number {
    return this.waiting.length;
  }

  public succeed(key: K, value: V): void {
    this.take(key).resolve(ok(value));
  }

  public fail(key: K, message = 'boom', type: FetchError['type'] = 'network'): void {
    this.take(key).resolve(err({ type, message }));
  }

  public throw(key: K, error: unknown): void {
    this.take(key).reject(error);
  }

  private take(key: K): Waiting<K, V> {
    const index = this.waiting.findIndex(entry => entry.key === key);
    if (index < 0) {
      throw new Error(`No fetch in flight for ${String(key)}`);
    }
    const [entry] = this.waiting.splice(index, 1);
    return entry;
  }
}

/**
 * Manually advanced millisecond clock.
 */
export const createClock = (start = 1_000_000) => {
  let current = start;
  return {
    now: (): number => current,
    advance: (ms: number): void => {
      current += ms;
    },
    set: (ms: number): void => {
      current = ms;
    }
  };
};
