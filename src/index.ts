// Coordinator
export { RequestCoordinator, createCoordinator } from './RequestCoordinator';

// Configuration and options
export {
  createOptions,
  createPresetOptions,
  validateOptions,
  SOURCE_PRESETS,
  SECOND,
  MINUTE
} from './Options';
export type { Options, SourcePreset } from './Options';

// Building blocks
export { CacheStore, CooldownMap, PendingSet } from './store';
export type { CacheEntry } from './store';
export { ResultChannel } from './channel/ResultChannel';
export type { ResultMessage } from './channel/ResultChannel';
export { runWorker, spawnWorker } from './worker/Worker';
export type { WorkerTask } from './worker/Worker';

// Fetchers
export {
  createFetcher,
  describeFetchError,
  isFetchError,
  toFetchError
} from './fetchers/types';
export type { Fetcher, FetchError, FetchErrorType } from './fetchers/types';
export { withRetry } from './fetchers/retry';
export type { RetryOptions } from './fetchers/retry';

// HTTP
export { createHttpClient, looksLikeHtml } from './http';
export type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse } from './http';

// Data sources
export * from './sources';

// EPG
export * from './epg';

// Session
export { MediaSession, createMediaSession, createSessionConfig } from './MediaSession';
export type { SessionConfig } from './MediaSession';

// Events
export { CacheEventEmitter } from './events/CacheEventEmitter';
export type {
  AnyCacheEvent,
  CacheEventListener,
  CacheEventType,
  CacheSubscription,
  CacheSubscriptionOptions
} from './events/CacheEventTypes';

// Statistics
export { CacheStatsManager } from './CacheStats';
export type { CacheStats } from './CacheStats';

// Utilities
export { normalizeKeyValue, createNormalizedHashFunction, describeKey } from './normalization';
