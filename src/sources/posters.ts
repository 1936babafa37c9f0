import type { Result } from 'neverthrow';
import { createFetcher } from '../fetchers/types';
import type { Fetcher, FetchError } from '../fetchers/types';
import { createHttpClient } from '../http/HttpClient';
import type { HttpClient } from '../http/types';

export const POSTER_TIMEOUT_MS = 15_000;

export interface Poster {
  url: string;
  /** `content-type` response header, empty when the server sent none */
  contentType: string;
  bytes: Uint8Array;
}

/** Poster URLs worth requesting; empty and blank URLs are never fetched */
export const isPosterUrl = (url: string): boolean => url.trim() !== '';

export interface PosterFetcherOptions {
  http?: HttpClient;
}

export const createPosterFetcher = (options: PosterFetcherOptions = {}): Fetcher<string, Poster> => {
  const http = options.http ?? createHttpClient({ timeoutMs: POSTER_TIMEOUT_MS });

  return createFetcher('posters', async (url): Promise<Result<Poster, FetchError>> => {
    const response = await http.bytes({ url });
    return response.map(({ headers, body }) => ({
      url,
      contentType: headers['content-type'] ?? '',
      bytes: body
    }));
  });
};
