import type { Result } from 'neverthrow';
import safeStringify from 'fast-safe-stringify';

/**
 * Kinds of fetch failure.
 * The coordinator treats all of them alike; the kind only shapes the message shown to the user.
 */
export type FetchErrorType =
  | 'network'      // Connection failed before a response arrived
  | 'timeout'      // The client's own timeout elapsed
  | 'http'         // Non-2xx status
  | 'parse'        // Body could not be decoded
  | 'blocked'      // A proxy answered with an HTML page instead of the API
  | 'upstream'     // Well-formed error payload from the remote service
  | 'unavailable'; // Source not configured (missing API key, credentials or datastore)

export interface FetchError {
  readonly type: FetchErrorType;
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

/**
 * Source-specific loader run inside a worker.
 *
 * Implementations may take as long as their I/O needs but must not touch coordinator state;
 * their only output is the returned result.
 */
export interface Fetcher<K, V> {
  /** Source name used in log output */
  readonly name: string;
  fetch(key: K): Promise<Result<V, FetchError>>;
}

/**
 * Build a fetcher from a plain function.
 */
export const createFetcher = <K, V>(
  name: string,
  fetch: (key: K) => Promise<Result<V, FetchError>>
): Fetcher<K, V> => ({ name, fetch });

export const isFetchError = (value: unknown): value is FetchError => {
  return typeof value === 'object' && value !== null &&
    'type' in value && typeof value.type === 'string' &&
    'message' in value && typeof value.message === 'string';
};

/**
 * Convert anything a fetcher threw into a FetchError.
 */
export const toFetchError = (error: unknown): FetchError => {
  if (isFetchError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return { type: 'network', message: error.message, cause: error };
  }
  if (typeof error === 'string') {
    return { type: 'network', message: error };
  }
  return { type: 'network', message: safeStringify(error), cause: error };
};

/**
 * Human-readable rendering used for `lastError()`.
 */
export const describeFetchError = (error: FetchError): string => {
  switch (error.type) {
    case 'blocked':
      return error.message || 'API blocked by network. Try using a VPN.';
    case 'timeout':
      return error.message || 'Request timed out';
    default:
      return error.message || `Fetch failed (${error.type})`;
  }
};
