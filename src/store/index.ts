export { CacheStore } from './CacheStore';
export type { CacheEntry } from './CacheStore';
export { CooldownMap } from './CooldownMap';
export { KeyedMap } from './KeyedMap';
export { PendingSet } from './PendingSet';
