import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { EpgProgram } from '../epg/types';
import { withRetry } from '../fetchers/retry';
import { createFetcher } from '../fetchers/types';
import type { Fetcher, FetchError } from '../fetchers/types';
import { createHttpClient } from '../http/HttpClient';
import type { HttpClient } from '../http/types';
import LibLogger from '../logger';
import { parseBody } from './parse';

const logger = LibLogger.get('sources', 'xtream');

export const XTREAM_TIMEOUT_MS = 120_000;
export const EPG_LISTING_LIMIT = 4;
export const EPG_RETRY = { attempts: 2, delayMs: 500 } as const;

export interface XtreamCredentials {
  /** Provider base URL, e.g. `http://provider.example:8080` */
  baseUrl: string;
  username: string;
  password: string;
}

const stringish = z.union([z.string(), z.number()]).transform(value => String(value));

const listingSchema = z.object({
  id: stringish.default(''),
  epg_id: stringish.optional(),
  channel_id: stringish.optional(),
  title: z.string().default(''),
  lang: z.string().default(''),
  start: stringish,
  end: stringish.optional(),
  stop: stringish.optional(),
  description: z.string().default(''),
  has_archive: z.union([z.number(), z.string(), z.boolean()]).optional()
});

const shortEpgSchema = z.object({
  epg_listings: z.array(z.unknown()).optional()
});

const toSeconds = (value: string | undefined): number | null => {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : null;
};

/**
 * Convert one `epg_listings` entry. Entries without usable start and end times yield null.
 */
export const toEpgProgram = (raw: unknown): EpgProgram | null => {
  const parsed = listingSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const listing = parsed.data;
  const start = toSeconds(listing.start);
  const end = toSeconds(listing.end ?? listing.stop);
  if (start === null || end === null) {
    return null;
  }
  return {
    id: listing.id,
    channelId: listing.epg_id ?? listing.channel_id ?? '',
    title: listing.title,
    description: listing.description,
    language: listing.lang,
    start,
    end,
    hasArchive: listing.has_archive !== undefined && Number(listing.has_archive) > 0
  };
};

const trimSlash = (url: string): string => url.replace(/\/+$/, '');

export interface XtreamEpgSourceOptions {
  credentials?: XtreamCredentials | null;
  http?: HttpClient;
}

/**
 * Short EPG lookups against an Xtream Codes provider. Credentials can change at run time;
 * each fetch reads the current ones.
 */
export class XtreamEpgSource {
  private credentials: XtreamCredentials | null;
  private readonly http: HttpClient;

  public constructor(options: XtreamEpgSourceOptions = {}) {
    this.credentials = options.credentials ?? null;
    this.http = options.http ?? createHttpClient({ timeoutMs: XTREAM_TIMEOUT_MS });
  }

  public setCredentials(credentials: XtreamCredentials | null): void {
    this.credentials = credentials;
  }

  public get hasCredentials(): boolean {
    return this.credentials !== null;
  }

  public shortEpgUrl(streamId: string): string | null {
    if (!this.credentials) {
      return null;
    }
    const { baseUrl, username, password } = this.credentials;
    const query = new URLSearchParams({
      username,
      password,
      action: 'get_short_epg',
      stream_id: streamId,
      limit: String(EPG_LISTING_LIMIT)
    });
    return `${trimSlash(baseUrl)}/player_api.php?${query.toString()}`;
  }

  public async shortEpg(streamId: string): Promise<Result<EpgProgram[], FetchError>> {
    const url = this.shortEpgUrl(streamId);
    if (url === null) {
      return err({ type: 'unavailable', message: 'No Xtream credentials configured' });
    }
    const response = await this.http.json({ url });
    return response
      .andThen(({ body }) => parseBody(shortEpgSchema, body, 'EPG'))
      .map(({ epg_listings: listings = [] }) => {
        const programs: EpgProgram[] = [];
        for (const listing of listings) {
          const program = toEpgProgram(listing);
          if (program) {
            programs.push(program);
          }
        }
        if (programs.length < listings.length) {
          logger.debug('Skipped unparseable EPG entries', { streamId, skipped: listings.length - programs.length });
        }
        return programs;
      });
  }
}

/**
 * EPG fetcher keyed by stream id, retried once after a short pause.
 */
export const createEpgFetcher = (source: XtreamEpgSource): Fetcher<string, EpgProgram[]> =>
  withRetry(createFetcher('xtream-epg', streamId => source.shortEpg(streamId)), {
    ...EPG_RETRY,
    shouldRetry: error => error.type !== 'unavailable'
  });
