import type {
  AnyCacheEvent,
  CacheEventListener,
  CacheSubscription,
  CacheSubscriptionOptions
} from './CacheEventTypes';
import { createNormalizedHashFunction } from '../normalization';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheEventEmitter');

interface InternalSubscription<K, V> {
  id: string;
  listener: CacheEventListener<K, V>;
  options: CacheSubscriptionOptions<K, V>;
  /** Normalized hashes of options.keys */
  keyHashes: Set<string> | null;
  isActive: boolean;
}

/**
 * Synchronous event emitter for coordinator events.
 *
 * Events are dispatched on the caller's stack, which for a coordinator is always the consumer
 * (render loop); listeners can therefore read the coordinator without locking.
 */
export class CacheEventEmitter<K, V> {
  private subscriptions = new Map<string, InternalSubscription<K, V>>();
  private nextSubscriptionId = 1;
  private isDestroyed = false;
  private readonly hashKey = createNormalizedHashFunction<K>();

  /**
   * Subscribe to events
   */
  public subscribe(
    listener: CacheEventListener<K, V>,
    options: CacheSubscriptionOptions<K, V> = {}
  ): CacheSubscription {
    if (this.isDestroyed) {
      throw new Error('Cannot subscribe to destroyed event emitter');
    }

    const id = `subscription_${this.nextSubscriptionId++}`;
    this.subscriptions.set(id, {
      id,
      listener,
      options,
      keyHashes: options.keys && options.keys.length > 0
        ? new Set(options.keys.map(key => this.hashKey(key)))
        : null,
      isActive: true
    });

    return {
      id,
      unsubscribe: () => {
        this.unsubscribe(id);
      },
      isActive: () => this.subscriptions.get(id)?.isActive ?? false
    };
  }

  public unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }
    subscription.isActive = false;
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  /**
   * Emit an event to all matching subscriptions
   */
  public emit(event: AnyCacheEvent<K, V>): void {
    if (this.isDestroyed) {
      logger.debug('Event emission skipped - emitter is destroyed', { eventType: event.type });
      return;
    }

    let emittedCount = 0;
    // Copy so listeners may unsubscribe while we iterate
    for (const subscription of Array.from(this.subscriptions.values())) {
      if (!subscription.isActive || !this.shouldEmitToSubscription(event, subscription)) {
        continue;
      }
      emittedCount++;
      try {
        subscription.listener(event);
      } catch (error) {
        this.handleListenerError(error, event, subscription);
      }
    }

    logger.trace('Event emitted', { source: event.source, eventType: event.type, emittedCount });
  }

  public getSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Remove all subscriptions and refuse new ones
   */
  public destroy(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.isActive = false;
    }
    this.subscriptions.clear();
    this.isDestroyed = true;
  }

  private shouldEmitToSubscription(
    event: AnyCacheEvent<K, V>,
    subscription: InternalSubscription<K, V>
  ): boolean {
    const { options, keyHashes } = subscription;

    if (options.eventTypes && !options.eventTypes.includes(event.type)) {
      return false;
    }

    if (keyHashes) {
      if (!('key' in event)) {
        return false;
      }
      return keyHashes.has(this.hashKey(event.key));
    }

    return true;
  }

  private handleListenerError(
    error: unknown,
    event: AnyCacheEvent<K, V>,
    subscription: InternalSubscription<K, V>
  ): void {
    if (subscription.options.onError) {
      try {
        subscription.options.onError(error, event);
      } catch (handlerError) {
        logger.error('Error in event listener error handler', {
          subscriptionId: subscription.id,
          originalError: error,
          handlerError
        });
      }
      return;
    }
    logger.error('Error in cache event listener', {
      subscriptionId: subscription.id,
      eventType: event.type,
      error
    });
  }
}
