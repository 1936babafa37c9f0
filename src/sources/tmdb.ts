import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';
import { createFetcher } from '../fetchers/types';
import type { Fetcher, FetchError } from '../fetchers/types';
import { createHttpClient } from '../http/HttpClient';
import type { HttpClient } from '../http/types';
import LibLogger from '../logger';
import { parseBody } from './parse';

const logger = LibLogger.get('sources', 'tmdb');

export const TMDB_API_BASE = 'https://api.themoviedb.org/3';
export const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p';
export const TMDB_TIMEOUT_MS = 10_000;

const MAX_ITEMS = 20;

export const TMDB_CATEGORIES = [
  'trending-all',
  'trending-movies',
  'trending-tv',
  'popular-movies',
  'popular-tv',
  'top-rated-movies',
  'top-rated-tv',
  'now-playing-movies',
  'airing-today-tv'
] as const;

export type TmdbCategory = typeof TMDB_CATEGORIES[number];

export type ContentType = 'movie' | 'tv';

/**
 * A movie or TV show from TMDB, normalized for display
 */
export interface DiscoverItem {
  id: number;
  title: string;
  overview: string;
  posterUrl: string | null;
  backdropUrl: string | null;
  releaseDate: string;
  voteAverage: number;
  contentType: ContentType;
}

type MediaKind = ContentType | 'mixed';

const ENDPOINTS: Record<TmdbCategory, { path: string; kind: MediaKind }> = {
  'trending-all': { path: 'trending/all/day', kind: 'mixed' },
  'trending-movies': { path: 'trending/movie/day', kind: 'movie' },
  'trending-tv': { path: 'trending/tv/day', kind: 'tv' },
  'popular-movies': { path: 'movie/popular', kind: 'movie' },
  'popular-tv': { path: 'tv/popular', kind: 'tv' },
  'top-rated-movies': { path: 'movie/top_rated', kind: 'movie' },
  'top-rated-tv': { path: 'tv/top_rated', kind: 'tv' },
  'now-playing-movies': { path: 'movie/now_playing', kind: 'movie' },
  'airing-today-tv': { path: 'tv/airing_today', kind: 'tv' }
};

const movieSchema = z.object({
  id: z.number(),
  title: z.string(),
  overview: z.string().default(''),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  release_date: z.string().default(''),
  vote_average: z.number().default(0)
});

const tvSchema = z.object({
  id: z.number(),
  name: z.string(),
  overview: z.string().default(''),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  first_air_date: z.string().default(''),
  vote_average: z.number().default(0)
});

const pageSchema = z.object({
  results: z.array(z.unknown())
});

const errorBodySchema = z.object({ status_message: z.string() });

const imageUrl = (size: string, path: string | null | undefined): string | null =>
  path ? `${TMDB_IMAGE_BASE}/${size}${path}` : null;

const movieToItem = (movie: z.output<typeof movieSchema>): DiscoverItem => ({
  id: movie.id,
  title: movie.title,
  overview: movie.overview,
  posterUrl: imageUrl('w342', movie.poster_path),
  backdropUrl: imageUrl('w780', movie.backdrop_path),
  releaseDate: movie.release_date,
  voteAverage: movie.vote_average,
  contentType: 'movie'
});

const tvToItem = (show: z.output<typeof tvSchema>): DiscoverItem => ({
  id: show.id,
  title: show.name,
  overview: show.overview,
  posterUrl: imageUrl('w342', show.poster_path),
  backdropUrl: imageUrl('w780', show.backdrop_path),
  releaseDate: show.first_air_date,
  voteAverage: show.vote_average,
  contentType: 'tv'
});

/**
 * Convert one raw result. Entries that do not match their media type (people in a multi search,
 * malformed rows) yield null and are skipped.
 */
const toItem = (raw: unknown, kind: MediaKind): DiscoverItem | null => {
  let type: string | undefined = kind;
  if (kind === 'mixed') {
    const tagged = z.object({ media_type: z.string() }).safeParse(raw);
    type = tagged.success ? tagged.data.media_type : undefined;
  }
  if (type === 'movie') {
    const movie = movieSchema.safeParse(raw);
    return movie.success ? movieToItem(movie.data) : null;
  }
  if (type === 'tv') {
    const show = tvSchema.safeParse(raw);
    return show.success ? tvToItem(show.data) : null;
  }
  return null;
};

/** Year part of a release date, when it has one */
export const releaseYear = (item: DiscoverItem): string | null =>
  item.releaseDate.length >= 4 ? item.releaseDate.slice(0, 4) : null;

export const contentTypeName = (item: DiscoverItem): string =>
  item.contentType === 'movie' ? 'Movie' : 'TV Show';

export interface TmdbSourceOptions {
  apiKey: string | null;
  http?: HttpClient;
}

/**
 * Thin TMDB API wrapper shared by the discover and search fetchers
 */
export class TmdbSource {
  private apiKey: string | null = null;
  private readonly http: HttpClient;

  public constructor(options: TmdbSourceOptions) {
    this.setApiKey(options.apiKey);
    this.http = options.http ?? createHttpClient({ timeoutMs: TMDB_TIMEOUT_MS });
  }

  /**
   * Blank keys count as no key.
   */
  public setApiKey(apiKey: string | null): void {
    this.apiKey = apiKey && apiKey.trim() !== '' ? apiKey : null;
  }

  public get isConfigured(): boolean {
    return this.apiKey !== null;
  }

  private async getResults(path: string, params: Record<string, string>): Promise<Result<unknown[], FetchError>> {
    if (this.apiKey === null) {
      return err({ type: 'unavailable', message: 'TMDB API key not configured' });
    }
    const query = new URLSearchParams({ ...params, api_key: this.apiKey });
    const response = await this.http.json({ url: `${TMDB_API_BASE}/${path}?${query.toString()}` });
    if (response.isErr()) {
      return err(upstreamError(response.error));
    }
    return parseBody(pageSchema, response.value.body, 'TMDB').map(page => page.results);
  }

  public async discover(category: TmdbCategory): Promise<Result<DiscoverItem[], FetchError>> {
    const endpoint = ENDPOINTS[category];
    const results = await this.getResults(endpoint.path, { page: '1' });
    return results.map(raw => {
      const items = collectItems(raw.slice(0, MAX_ITEMS), endpoint.kind);
      logger.debug('Discover loaded', { category, count: items.length });
      return items;
    });
  }

  /**
   * Multi search across movies and TV; people are skipped.
   */
  public async search(query: string): Promise<Result<DiscoverItem[], FetchError>> {
    const results = await this.getResults('search/multi', { query, page: '1' });
    return results.map(raw => collectItems(raw, 'mixed'));
  }
}

const collectItems = (raw: unknown[], kind: MediaKind): DiscoverItem[] => {
  const items: DiscoverItem[] = [];
  for (const entry of raw) {
    const item = toItem(entry, kind);
    if (item) {
      items.push(item);
    }
  }
  return items;
};

/**
 * TMDB reports problems as `{ status_message }`; surface that text instead of the bare status.
 */
const upstreamError = (error: FetchError): FetchError => {
  if (error.type !== 'http' || typeof error.cause !== 'string') {
    return error;
  }
  let body: unknown;
  try {
    body = JSON.parse(error.cause);
  } catch {
    return error;
  }
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) {
    return error;
  }
  return { type: 'upstream', message: `TMDB: ${parsed.data.status_message}`, status: error.status };
};

export const createDiscoverFetcher = (source: TmdbSource): Fetcher<TmdbCategory, DiscoverItem[]> =>
  createFetcher('tmdb-discover', category => source.discover(category));

export const createDiscoverSearchFetcher = (source: TmdbSource): Fetcher<string, DiscoverItem[]> =>
  createFetcher('tmdb-search', query => source.search(query.trim()));
