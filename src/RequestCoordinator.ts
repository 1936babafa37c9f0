import { ResultChannel } from './channel/ResultChannel';
import type { ResultMessage } from './channel/ResultChannel';
import { CacheStatsManager } from './CacheStats';
import type { CacheStats } from './CacheStats';
import { CacheEventEmitter } from './events/CacheEventEmitter';
import type { CacheEventListener, CacheSubscription, CacheSubscriptionOptions } from './events/CacheEventTypes';
import { describeFetchError } from './fetchers/types';
import { describeKey } from './normalization';
import { createOptions } from './Options';
import type { Options } from './Options';
import { CacheStore } from './store/CacheStore';
import type { CacheEntry } from './store/CacheStore';
import { CooldownMap } from './store/CooldownMap';
import { PendingSet } from './store/PendingSet';
import { spawnWorker } from './worker/Worker';
import LibLogger from './logger';

/**
 * Background content cache with request coalescing.
 *
 * The owner (a render loop) calls {@link request} for whatever it wants to show and
 * {@link processPending} once per frame. Cache misses spawn a fire-and-forget worker; at most one
 * worker is in flight per key, and a key that failed is left alone until its cooldown elapses.
 * Every method is synchronous and returns immediately. All state is mutated on the caller's
 * side; workers only ever post to the result channel.
 *
 * @template K - Key type (category, stream id, URL, ...)
 * @template V - Cached value type
 */
export class RequestCoordinator<K, V> {
  public readonly options: Options<K, V>;

  private readonly store: CacheStore<K, V>;
  private readonly pending: PendingSet<K> = new PendingSet();
  private readonly cooldowns: CooldownMap<K>;
  private readonly channel: ResultChannel<K, V> = new ResultChannel();
  private readonly events: CacheEventEmitter<K, V> = new CacheEventEmitter();
  private readonly stats: CacheStatsManager;
  private readonly logger: ReturnType<typeof LibLogger.get>;

  private error: string | null = null;
  private generation = 0;
  /** Messages from generations below this are always dropped */
  private oldestAccepted = 0;

  public constructor(options: Pick<Options<K, V>, 'name' | 'fetcher'> & Partial<Options<K, V>>) {
    this.options = createOptions(options);
    this.store = new CacheStore(this.options.ttl);
    this.cooldowns = new CooldownMap(this.options.cooldown);
    this.stats = new CacheStatsManager(this.options.name);
    this.logger = LibLogger.get('RequestCoordinator', this.options.name);
  }

  public get name(): string {
    return this.options.name;
  }

  /**
   * Ensure `key` is fresh, fetching it in the background if needed.
   * A no-op when the value is fresh, the key is cooling down or a fetch is already in flight.
   */
  public request(key: K): void {
    if (this.channel.isClosed) {
      return;
    }
    if (this.options.accepts && !this.options.accepts(key)) {
      this.logger.trace('request rejected by key guard', { key: describeKey(key) });
      return;
    }

    this.stats.incrementRequests();
    const now = this.options.now();

    if (this.store.isFresh(key, now)) {
      this.stats.incrementFreshHits();
      return;
    }
    if (this.cooldowns.isCoolingDown(key, now)) {
      this.stats.incrementCooldownSkips();
      return;
    }
    if (!this.pending.add(key)) {
      this.stats.incrementCoalesced();
      return;
    }

    this.stats.incrementSpawned();
    this.logger.debug('Spawning fetch', { key: describeKey(key), generation: this.generation });
    spawnWorker({
      fetcher: this.options.fetcher,
      key,
      channel: this.channel,
      generation: this.generation
    });

    this.events.emit({
      type: 'fetch_started',
      timestamp: now,
      source: this.name,
      key,
      hadValue: this.store.has(key)
    });
  }

  /**
   * Request several keys, e.g. every channel on the visible page.
   */
  public requestMany(keys: Iterable<K>): void {
    for (const key of keys) {
      this.request(key);
    }
  }

  public isLoading(key: K): boolean {
    return this.pending.has(key);
  }

  public isAnyLoading(): boolean {
    return this.pending.size > 0;
  }

  /**
   * Cached value regardless of freshness, or null if nothing was ever loaded.
   */
  public get(key: K): V | null {
    return this.store.get(key);
  }

  public getEntry(key: K): CacheEntry<K, V> | null {
    return this.store.getEntry(key);
  }

  public isFresh(key: K): boolean {
    return this.store.isFresh(key, this.options.now());
  }

  /**
   * Milliseconds until a failed key may be fetched again; 0 when it is not cooling down.
   */
  public cooldownRemaining(key: K): number {
    return this.cooldowns.remaining(key, this.options.now());
  }

  public keys(): K[] {
    return this.store.keys();
  }

  /**
   * Apply every result already posted by workers. Never waits for more.
   *
   * @returns number of messages taken off the channel
   */
  public processPending(): number {
    const messages = this.channel.drain();
    for (const message of messages) {
      this.applyMessage(message);
    }
    return messages.length;
  }

  private applyMessage(message: ResultMessage<K, V>): void {
    const now = this.options.now();

    const stale = message.generation < this.oldestAccepted ||
      (this.options.discardStaleDeliveries && message.generation !== this.generation);
    if (stale) {
      this.stats.incrementStaleDropped();
      this.logger.debug('Dropping result from before clear()', {
        key: describeKey(message.key),
        messageGeneration: message.generation,
        generation: this.generation
      });
      this.events.emit({
        type: 'delivery_dropped',
        timestamp: now,
        source: this.name,
        key: message.key,
        generation: message.generation
      });
      return;
    }

    this.pending.delete(message.key);

    if (message.type === 'loaded') {
      const previousValue = this.store.get(message.key);
      this.store.set(message.key, message.value, now);
      this.cooldowns.delete(message.key);
      this.error = null;
      this.stats.incrementLoaded();
      this.logger.debug('Loaded', { key: describeKey(message.key) });
      this.events.emit({
        type: 'value_loaded',
        timestamp: now,
        source: this.name,
        key: message.key,
        value: message.value,
        previousValue
      });
      return;
    }

    this.cooldowns.recordFailure(message.key, now);
    this.error = describeFetchError(message.error);
    this.stats.incrementFailed();
    this.logger.warning('Fetch failed', {
      key: describeKey(message.key),
      errorType: message.error.type,
      error: this.error,
      retryInMs: this.options.cooldown
    });
    this.events.emit({
      type: 'fetch_failed',
      timestamp: now,
      source: this.name,
      key: message.key,
      error: message.error,
      retryAt: now + this.options.cooldown
    });
  }

  /**
   * Most recent failure message; cleared by the next successful load.
   */
  public lastError(): string | null {
    return this.error;
  }

  /**
   * Drop one cached entry so the next request refetches it (subject to any cooldown).
   */
  public remove(key: K): void {
    if (!this.store.delete(key)) {
      return;
    }
    this.events.emit({ type: 'key_removed', timestamp: this.options.now(), source: this.name, key });
  }

  /**
   * Mark one entry stale. Its value stays readable until the refetch lands.
   */
  public invalidate(key: K): boolean {
    return this.store.markStale(key);
  }

  /**
   * Invalidate every cached key and request each one again.
   */
  public refreshAll(): void {
    const keys = this.store.keys();
    for (const key of keys) {
      this.store.markStale(key);
    }
    this.requestMany(keys);
  }

  /**
   * Forget everything: values, in-flight keys, cooldowns and the last error.
   * Workers already running are not cancelled. Their results still land unless
   * `discardStaleDeliveries` is set or `discardInFlight` is passed.
   */
  public clear(options: { discardInFlight?: boolean } = {}): void {
    const itemsCleared = this.store.size;
    const pendingForgotten = this.pending.size;

    this.store.clear();
    this.pending.clear();
    this.cooldowns.clear();
    this.error = null;
    this.generation++;
    if (options.discardInFlight) {
      this.oldestAccepted = this.generation;
    }

    this.logger.debug('Cleared', { itemsCleared, pendingForgotten, generation: this.generation });
    this.events.emit({
      type: 'cache_cleared',
      timestamp: this.options.now(),
      source: this.name,
      itemsCleared,
      pendingForgotten
    });
  }

  /**
   * Stop accepting results and requests. Outstanding workers finish, and their sends are dropped.
   */
  public close(): void {
    this.channel.close();
    this.pending.clear();
    this.events.destroy();
    this.logger.debug('Closed');
  }

  public get isClosed(): boolean {
    return this.channel.isClosed;
  }

  public subscribe(
    listener: CacheEventListener<K, V>,
    options?: CacheSubscriptionOptions<K, V>
  ): CacheSubscription {
    return this.events.subscribe(listener, options);
  }

  public getStats(): CacheStats {
    return this.stats.getStats();
  }
}

/**
 * Create a coordinator from options
 */
export const createCoordinator = <K, V>(
  options: Pick<Options<K, V>, 'name' | 'fetcher'> & Partial<Options<K, V>>
): RequestCoordinator<K, V> => {
  return new RequestCoordinator(options);
};
