// Normalization utilities for cache keys
import safeStringify from 'fast-safe-stringify';

/**
 * Normalize a primitive key value to string for consistent comparison and hashing.
 * The type prefix keeps `1` and `'1'` apart.
 */
export const normalizeKeyValue = (value: string | number | boolean | bigint): string => {
  return `${typeof value}:${String(value)}`;
};

/**
 * Create the hash function used by the keyed stores.
 *
 * Primitive keys hash by value. Object keys (fixture filters, composite search keys) hash by a
 * stable serialization, so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` address the same entry.
 */
export const createNormalizedHashFunction = <K>() => {
  return (key: K): string => {
    if (
      typeof key === 'string' ||
      typeof key === 'number' ||
      typeof key === 'boolean' ||
      typeof key === 'bigint'
    ) {
      return normalizeKeyValue(key);
    }
    if (key === null || key === undefined) {
      return String(key);
    }
    return `object:${safeStringify.stableStringify(key)}`;
  };
};

/**
 * Render a key for log output.
 */
export const describeKey = (key: unknown): string => {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'object' && key !== null) {
    return safeStringify.stableStringify(key);
  }
  return String(key);
};
