import type { Fetcher } from './fetchers/types';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;

/**
 * Configuration for one RequestCoordinator instance
 */
export interface Options<K, V> {
  /** Instance name used in log output and stats */
  name: string;

  /** Loader for this instance's data source */
  fetcher: Fetcher<K, V>;

  /** How long a fetched value counts as fresh, in milliseconds. `Infinity` never goes stale. */
  ttl: number;

  /** How long a failed key is left alone before it may be fetched again, in milliseconds */
  cooldown: number;

  /** Clock in milliseconds (default: Date.now) */
  now: () => number;

  /**
   * Drop results of workers spawned before the last clear() instead of storing them
   * (default: false, results from before a clear repopulate the store)
   */
  discardStaleDeliveries: boolean;

  /** Keys this instance will never fetch (e.g. empty URLs); rejected keys make request() a no-op */
  accepts?: (key: K) => boolean;
}

/**
 * Default timing used when an instance does not set its own
 */
const DEFAULT_OPTIONS = {
  ttl: 5 * MINUTE,
  cooldown: 30 * SECOND,
  now: Date.now,
  discardStaleDeliveries: false
};

/**
 * Timing for each data source of the media client
 */
export const SOURCE_PRESETS = {
  discover: { ttl: 5 * MINUTE, cooldown: 30 * SECOND },
  shows: { ttl: 10 * MINUTE, cooldown: 30 * SECOND },
  fixtures: { ttl: 5 * MINUTE, cooldown: 30 * SECOND },
  epg: { ttl: 5 * MINUTE, cooldown: 30 * SECOND },
  posters: { ttl: Number.POSITIVE_INFINITY, cooldown: 30 * SECOND },
  search: { ttl: Number.POSITIVE_INFINITY, cooldown: 30 * SECOND }
} as const satisfies Record<string, { ttl: number; cooldown: number }>;

export type SourcePreset = keyof typeof SOURCE_PRESETS;

/**
 * Create coordinator options with defaults
 */
export const createOptions = <K, V>(
  options: Pick<Options<K, V>, 'name' | 'fetcher'> & Partial<Options<K, V>>
): Options<K, V> => {
  const result: Options<K, V> = {
    ...DEFAULT_OPTIONS,
    ...options
  };
  validateOptions(result);
  return result;
};

/**
 * Create options from a named source preset; explicit overrides win
 */
export const createPresetOptions = <K, V>(
  preset: SourcePreset,
  options: Pick<Options<K, V>, 'name' | 'fetcher'> & Partial<Options<K, V>>
): Options<K, V> => {
  return createOptions({ ...SOURCE_PRESETS[preset], ...options });
};

/**
 * Validate coordinator options. Throws on the first invalid setting.
 */
export const validateOptions = <K, V>(options: Options<K, V>): void => {
  if (typeof options.name !== 'string' || options.name.trim() === '') {
    throw new Error('Coordinator name must be a non-empty string');
  }

  if (!options.fetcher || typeof options.fetcher.fetch !== 'function') {
    throw new Error(`Coordinator "${options.name}" needs a fetcher with a fetch(key) method`);
  }

  if (typeof options.ttl !== 'number' || Number.isNaN(options.ttl) || options.ttl <= 0) {
    throw new Error(`ttl must be a positive number of milliseconds, got ${options.ttl}`);
  }

  if (typeof options.cooldown !== 'number' || !Number.isFinite(options.cooldown) || options.cooldown < 0) {
    throw new Error(`cooldown must be a non-negative number of milliseconds, got ${options.cooldown}`);
  }

  if (typeof options.now !== 'function') {
    throw new Error('now must be a function returning the current time in milliseconds');
  }

  if (options.ttl < options.cooldown) {
    logger.debug('ttl shorter than cooldown', {
      name: options.name,
      ttl: options.ttl,
      cooldown: options.cooldown,
      note: 'A key that fails after going stale waits for the cooldown, not the ttl'
    });
  }
};
