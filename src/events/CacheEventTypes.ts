import type { FetchError } from '../fetchers/types';

/**
 * Types of events emitted by a coordinator
 */
export type CacheEventType =
  | 'fetch_started'    // A worker was spawned for a key
  | 'value_loaded'     // A loaded message was stored
  | 'fetch_failed'     // A failed message put the key into cooldown
  | 'delivery_dropped' // A message from before the last clear() was discarded
  | 'key_removed'      // A single entry was removed
  | 'cache_cleared';   // The whole coordinator was cleared

/**
 * Base interface for all coordinator events
 */
export interface CacheEvent {
  type: CacheEventType;

  /** Coordinator clock time when the event occurred */
  timestamp: number;

  /** Name of the emitting coordinator */
  source: string;
}

export interface FetchStartedEvent<K> extends CacheEvent {
  type: 'fetch_started';
  key: K;
  /** True when a (stale) value was already cached */
  hadValue: boolean;
}

export interface ValueLoadedEvent<K, V> extends CacheEvent {
  type: 'value_loaded';
  key: K;
  value: V;
  /** The value this one replaced, if any */
  previousValue: V | null;
}

export interface FetchFailedEvent<K> extends CacheEvent {
  type: 'fetch_failed';
  key: K;
  error: FetchError;
  /** When the key may be fetched again */
  retryAt: number;
}

export interface DeliveryDroppedEvent<K> extends CacheEvent {
  type: 'delivery_dropped';
  key: K;
  generation: number;
}

export interface KeyRemovedEvent<K> extends CacheEvent {
  type: 'key_removed';
  key: K;
}

export interface CacheClearedEvent extends CacheEvent {
  type: 'cache_cleared';
  /** Number of entries that were cleared */
  itemsCleared: number;
  /** Workers still running that were forgotten */
  pendingForgotten: number;
}

/**
 * Union type of all coordinator events
 */
export type AnyCacheEvent<K, V> =
  | FetchStartedEvent<K>
  | ValueLoadedEvent<K, V>
  | FetchFailedEvent<K>
  | DeliveryDroppedEvent<K>
  | KeyRemovedEvent<K>
  | CacheClearedEvent;

export type CacheEventListener<K, V> = (event: AnyCacheEvent<K, V>) => void;

/**
 * Options for subscribing to coordinator events
 */
export interface CacheSubscriptionOptions<K, V> {
  /** Only emit events for these keys (events without a key are skipped) */
  keys?: K[];

  /** Filter by event types */
  eventTypes?: CacheEventType[];

  /** Called when the listener throws; by default the error is logged */
  onError?: (error: unknown, event: AnyCacheEvent<K, V>) => void;
}

/**
 * Represents an active subscription to coordinator events
 */
export interface CacheSubscription {
  id: string;
  unsubscribe: () => void;
  isActive: () => boolean;
}
