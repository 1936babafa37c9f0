import type { Result } from 'neverthrow';
import { z } from 'zod';
import { createFetcher } from '../fetchers/types';
import type { Fetcher, FetchError } from '../fetchers/types';
import { createHttpClient } from '../http/HttpClient';
import type { HttpClient } from '../http/types';
import LibLogger from '../logger';
import { parseBody } from './parse';

const logger = LibLogger.get('sources', 'tvmaze');

export const TVMAZE_API_BASE = 'https://api.tvmaze.com';
export const TVMAZE_TIMEOUT_MS = 15_000;

const MAX_ITEMS = 20;
const MIN_GENRE_MATCHES = 10;
const TOP_RATED_MIN_RATING = 7;

export const SHOW_CATEGORIES = [
  'airing-today',
  'popular',
  'top-rated',
  'sci-fi',
  'drama',
  'comedy',
  'action'
] as const;

export type ShowCategory = typeof SHOW_CATEGORIES[number];

const GENRES: Partial<Record<ShowCategory, string>> = {
  'sci-fi': 'science-fiction',
  drama: 'drama',
  comedy: 'comedy',
  action: 'action'
};

/**
 * A TV show from TVMaze, normalized for display
 */
export interface ShowItem {
  id: number;
  title: string;
  /** Summary with its HTML markup removed */
  overview: string;
  posterUrl: string | null;
  rating: number | null;
  year: string | null;
  genres: string[];
}

const showSchema = z.object({
  id: z.number(),
  name: z.string(),
  summary: z.string().nullish(),
  image: z.object({ medium: z.string().nullish() }).nullish(),
  rating: z.object({ average: z.number().nullish() }).nullish(),
  genres: z.array(z.string()).default([]),
  premiered: z.string().nullish()
});

const scheduleSchema = z.array(z.object({ show: showSchema }));
const searchSchema = z.array(z.object({ score: z.number().optional(), show: showSchema }));

type TvMazeShow = z.output<typeof showSchema>;

/**
 * Turn a TVMaze summary into plain text.
 */
export const stripHtml = (html: string): string => {
  return html
    .replace(/<p>/g, '')
    .replace(/<\/p>/g, '\n')
    .replace(/<\/?[bi]>/g, '')
    .replace(/<br\/?>/g, '\n')
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/<[^>]*>/g, '')
    .trim();
};

export const toShowItem = (show: TvMazeShow): ShowItem => ({
  id: show.id,
  title: show.name,
  overview: show.summary ? stripHtml(show.summary) : '',
  posterUrl: show.image?.medium ?? null,
  rating: show.rating?.average ?? null,
  year: show.premiered ? show.premiered.split('-')[0] ?? null : null,
  genres: show.genres
});

const byRatingDesc = (a: ShowItem, b: ShowItem): number => (b.rating ?? 0) - (a.rating ?? 0);

export interface TvMazeSourceOptions {
  http?: HttpClient;
}

/**
 * TVMaze API wrapper. TVMaze needs no API key.
 */
export class TvMazeSource {
  private readonly http: HttpClient;

  public constructor(options: TvMazeSourceOptions = {}) {
    this.http = options.http ?? createHttpClient({ timeoutMs: TVMAZE_TIMEOUT_MS });
  }

  private async searchShows(query: string): Promise<Result<TvMazeShow[], FetchError>> {
    const url = `${TVMAZE_API_BASE}/search/shows?${new URLSearchParams({ q: query }).toString()}`;
    const response = await this.http.json({ url });
    return response
      .andThen(({ body }) => parseBody(searchSchema, body, 'TVMaze'))
      .map(results => results.map(result => result.show));
  }

  public async airingToday(): Promise<Result<ShowItem[], FetchError>> {
    const response = await this.http.json({ url: `${TVMAZE_API_BASE}/schedule` });
    return response
      .andThen(({ body }) => parseBody(scheduleSchema, body, 'TVMaze'))
      .map(entries => {
        const seen = new Set<number>();
        const items: ShowItem[] = [];
        for (const entry of entries) {
          if (items.length >= MAX_ITEMS) {
            break;
          }
          if (seen.has(entry.show.id)) {
            continue;
          }
          seen.add(entry.show.id);
          items.push(toShowItem(entry.show));
        }
        return items;
      });
  }

  public async popular(): Promise<Result<ShowItem[], FetchError>> {
    const shows = await this.searchShows('the');
    return shows.map(list => list.slice(0, MAX_ITEMS).map(toShowItem).sort(byRatingDesc));
  }

  public async topRated(): Promise<Result<ShowItem[], FetchError>> {
    const shows = await this.searchShows('best');
    return shows.map(list => list
      .map(toShowItem)
      .filter(item => (item.rating ?? 0) >= TOP_RATED_MIN_RATING)
      .sort(byRatingDesc)
      .slice(0, MAX_ITEMS));
  }

  /**
   * Shows whose genres contain `genre`. Sparse matches fall back to the unfiltered results.
   */
  public async byGenre(genre: string): Promise<Result<ShowItem[], FetchError>> {
    const shows = await this.searchShows(genre);
    const needle = genre.toLowerCase();
    return shows.map(list => {
      const items = list.map(toShowItem);
      let selected = items
        .filter(item => item.genres.some(name => name.toLowerCase().includes(needle)))
        .slice(0, MAX_ITEMS);
      if (selected.length < MIN_GENRE_MATCHES) {
        logger.debug('Few genre matches, using unfiltered results', { genre, matches: selected.length });
        selected = items.slice(0, MAX_ITEMS);
      }
      return selected.sort(byRatingDesc);
    });
  }

  public async category(category: ShowCategory): Promise<Result<ShowItem[], FetchError>> {
    const genre = GENRES[category];
    if (genre) {
      return this.byGenre(genre);
    }
    switch (category) {
      case 'airing-today':
        return this.airingToday();
      case 'top-rated':
        return this.topRated();
      default:
        return this.popular();
    }
  }

  public async search(query: string): Promise<Result<ShowItem[], FetchError>> {
    const shows = await this.searchShows(query);
    return shows.map(list => list.slice(0, MAX_ITEMS).map(toShowItem));
  }
}

export const createShowsFetcher = (source: TvMazeSource): Fetcher<ShowCategory, ShowItem[]> =>
  createFetcher('tvmaze-shows', category => source.category(category));

export const createShowSearchFetcher = (source: TvMazeSource): Fetcher<string, ShowItem[]> =>
  createFetcher('tvmaze-search', query => source.search(query.trim()));
