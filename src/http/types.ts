import type { Result } from 'neverthrow';
import type { FetchError } from '../fetchers/types';

export interface HttpRequest {
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface HttpResponse<T> {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Minimal HTTP client used by the remote fetchers
 */
export interface HttpClient {
  /** Parsed but unvalidated JSON body; callers validate it against their own schema */
  json(request: HttpRequest): Promise<Result<HttpResponse<unknown>, FetchError>>;
  text(request: HttpRequest): Promise<Result<HttpResponse<string>, FetchError>>;
  bytes(request: HttpRequest): Promise<Result<HttpResponse<Uint8Array>, FetchError>>;
}

export interface HttpClientOptions {
  /** Abort requests after this many milliseconds (default: 15000) */
  readonly timeoutMs?: number;
  /** Headers sent with every request */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
