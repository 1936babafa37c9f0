import { KeyedMap } from './KeyedMap';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheStore');

/**
 * A cached value and the time it was fetched.
 * Entries are replaced wholesale on refresh, never patched.
 */
export interface CacheEntry<K, V> {
  key: K;
  value: V;
  /** Clock time (ms) at which the value was stored */
  fetchedAt: number;
}

/**
 * Keyed store of fetched values with a per-store TTL.
 *
 * Staleness only gates re-fetching: a stale entry stays readable until it is overwritten,
 * removed or the store is cleared.
 */
export class CacheStore<K, V> {
  private entries: KeyedMap<K, CacheEntry<K, V>> = new KeyedMap();

  /**
   * @param ttl - Time-to-live in milliseconds. `Infinity` keeps entries fresh forever.
   */
  public constructor(public readonly ttl: number) { }

  public get(key: K): V | null {
    const entry = this.entries.get(key);
    return entry ? entry.value : null;
  }

  public getEntry(key: K): CacheEntry<K, V> | null {
    return this.entries.get(key) ?? null;
  }

  public set(key: K, value: V, fetchedAt: number): void {
    logger.trace('set', { key, fetchedAt });
    this.entries.set(key, { key, value, fetchedAt });
  }

  public has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * An entry is fresh iff `now - fetchedAt < ttl`.
   */
  public isFresh(key: K, now: number): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    return now - entry.fetchedAt < this.ttl;
  }

  /**
   * Mark an entry stale while keeping its value readable.
   * Returns false when there is no entry for the key.
   */
  public markStale(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.entries.set(key, { ...entry, fetchedAt: Number.NEGATIVE_INFINITY });
    return true;
  }

  public delete(key: K): boolean {
    return this.entries.delete(key);
  }

  public keys(): K[] {
    return this.entries.keys();
  }

  public get size(): number {
    return this.entries.size;
  }

  public clear(): void {
    this.entries.clear();
  }
}
