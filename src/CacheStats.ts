import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Coordinator statistics
 */
export interface CacheStats {
  /** Total number of request() calls */
  numRequests: number;
  /** Requests answered by a fresh cached value */
  numFreshHits: number;
  /** Requests skipped because the key was cooling down after a failure */
  numCooldownSkips: number;
  /** Requests folded into an already in-flight fetch */
  numCoalesced: number;
  /** Workers spawned */
  numSpawned: number;
  /** Loaded messages processed */
  numLoaded: number;
  /** Failed messages processed */
  numFailed: number;
  /** Messages dropped because they predate the last clear() */
  numStaleDropped: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numFreshHits: 0,
  numCooldownSkips: 0,
  numCoalesced: 0,
  numSpawned: 0,
  numLoaded: 0,
  numFailed: 0,
  numStaleDropped: 0
});

/**
 * Tracks coordinator counters and logs a summary every LOG_THRESHOLD requests
 */
export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100;

  public constructor(private readonly name: string) { }

  incrementRequests(): void {
    this.stats.numRequests++;
    this.maybeLogStats();
  }

  incrementFreshHits(): void {
    this.stats.numFreshHits++;
  }

  incrementCooldownSkips(): void {
    this.stats.numCooldownSkips++;
  }

  incrementCoalesced(): void {
    this.stats.numCoalesced++;
  }

  incrementSpawned(): void {
    this.stats.numSpawned++;
  }

  incrementLoaded(): void {
    this.stats.numLoaded++;
  }

  incrementFailed(): void {
    this.stats.numFailed++;
  }

  incrementStaleDropped(): void {
    this.stats.numStaleDropped++;
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;
    if (requestsSinceLastLog < this.LOG_THRESHOLD) {
      return;
    }

    const hitRate = this.stats.numRequests > 0
      ? ((this.stats.numFreshHits / this.stats.numRequests) * 100).toFixed(2)
      : '0.00';

    logger.debug('Coordinator statistics update', {
      name: this.name,
      totalRequests: this.stats.numRequests,
      freshHits: this.stats.numFreshHits,
      hitRate: `${hitRate}%`,
      spawned: this.stats.numSpawned,
      loaded: this.stats.numLoaded,
      failed: this.stats.numFailed,
      requestsSinceLastLog
    });

    this.lastLoggedRequests = this.stats.numRequests;
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}
