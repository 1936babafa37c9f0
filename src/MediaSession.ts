import { EpgGuide } from './epg/EpgGuide';
import type { HttpClient } from './http/types';
import LibLogger from './logger';
import { createPresetOptions } from './Options';
import { RequestCoordinator } from './RequestCoordinator';
import { createFixturesFetcher } from './sources/fixtures';
import type { Fixture, FixtureCategory, FixturesRepository } from './sources/fixtures';
import { createPosterFetcher, isPosterUrl } from './sources/posters';
import type { Poster } from './sources/posters';
import { createDiscoverFetcher, createDiscoverSearchFetcher, TmdbSource } from './sources/tmdb';
import type { DiscoverItem, TmdbCategory } from './sources/tmdb';
import { createShowSearchFetcher, createShowsFetcher, TvMazeSource } from './sources/tvmaze';
import type { ShowItem, ShowCategory } from './sources/tvmaze';
import { XtreamEpgSource } from './sources/xtream';
import type { XtreamCredentials } from './sources/xtream';

const logger = LibLogger.get('MediaSession');

/**
 * Session-level settings
 */
export interface SessionConfig {
  /** TMDB v3 API key; discover and discover search requests are ignored until one is set */
  tmdbApiKey: string | null;
  /** Xtream provider for the EPG; EPG requests are ignored until set */
  xtream: XtreamCredentials | null;
  /** Fixtures datastore; fixtures fail as unavailable without one */
  fixtures: FixturesRepository | null;
  /** Clock in milliseconds shared by every instance */
  now: () => number;
  discardStaleDeliveries: boolean;
  /** HTTP client shared by every remote source; each source builds its own when unset */
  http?: HttpClient;
}

export const createSessionConfig = (config: Partial<SessionConfig> = {}): SessionConfig => ({
  tmdbApiKey: null,
  xtream: null,
  fixtures: null,
  now: Date.now,
  discardStaleDeliveries: false,
  ...config
});

const hasQuery = (query: string): boolean => query.trim() !== '';

/**
 * Every cache of one client session. The render loop calls {@link tick} once per frame.
 */
export class MediaSession {
  public readonly discover: RequestCoordinator<TmdbCategory, DiscoverItem[]>;
  public readonly discoverSearch: RequestCoordinator<string, DiscoverItem[]>;
  public readonly shows: RequestCoordinator<ShowCategory, ShowItem[]>;
  public readonly showSearch: RequestCoordinator<string, ShowItem[]>;
  public readonly fixtures: RequestCoordinator<FixtureCategory, Fixture[]>;
  public readonly posters: RequestCoordinator<string, Poster>;
  public readonly epg: EpgGuide;

  private readonly tmdb: TmdbSource;

  public constructor(public readonly config: SessionConfig) {
    const { now, discardStaleDeliveries, http } = config;
    const shared = { now, discardStaleDeliveries };

    const tmdb = new TmdbSource({ apiKey: config.tmdbApiKey, http });
    this.tmdb = tmdb;
    const hasApiKey = (): boolean => tmdb.isConfigured;
    const tvmaze = new TvMazeSource({ http });

    this.discover = new RequestCoordinator(createPresetOptions('discover', {
      ...shared,
      name: 'discover',
      fetcher: createDiscoverFetcher(tmdb),
      accepts: hasApiKey
    }));
    this.discoverSearch = new RequestCoordinator(createPresetOptions('search', {
      ...shared,
      name: 'discover-search',
      fetcher: createDiscoverSearchFetcher(tmdb),
      accepts: query => hasApiKey() && hasQuery(query)
    }));
    this.shows = new RequestCoordinator(createPresetOptions('shows', {
      ...shared,
      name: 'shows',
      fetcher: createShowsFetcher(tvmaze)
    }));
    this.showSearch = new RequestCoordinator(createPresetOptions('search', {
      ...shared,
      name: 'show-search',
      fetcher: createShowSearchFetcher(tvmaze),
      accepts: hasQuery
    }));
    this.fixtures = new RequestCoordinator(createPresetOptions('fixtures', {
      ...shared,
      name: 'fixtures',
      fetcher: createFixturesFetcher({ repository: config.fixtures, now })
    }));
    this.posters = new RequestCoordinator(createPresetOptions('posters', {
      ...shared,
      name: 'posters',
      fetcher: createPosterFetcher({ http }),
      accepts: isPosterUrl
    }));
    this.epg = new EpgGuide({
      ...shared,
      source: new XtreamEpgSource({ credentials: config.xtream, http })
    });

    logger.debug('Session created', {
      tmdb: tmdb.isConfigured,
      xtream: config.xtream !== null,
      fixtures: config.fixtures !== null
    });
  }

  /**
   * Change the TMDB key. Discover results fetched with the previous key are dropped.
   */
  public setTmdbApiKey(apiKey: string | null): void {
    this.tmdb.setApiKey(apiKey);
    this.discover.clear({ discardInFlight: true });
    this.discoverSearch.clear({ discardInFlight: true });
    logger.info('TMDB API key changed', { configured: this.tmdb.isConfigured });
  }

  public get hasTmdbApiKey(): boolean {
    return this.tmdb.isConfigured;
  }

  private coordinators(): Array<{ processPending(): number; isAnyLoading(): boolean; clear(): void; close(): void }> {
    return [
      this.discover,
      this.discoverSearch,
      this.shows,
      this.showSearch,
      this.fixtures,
      this.posters,
      this.epg.coordinator
    ];
  }

  /**
   * Apply every finished fetch. Returns how many results were applied.
   */
  public tick(): number {
    let processed = 0;
    for (const coordinator of this.coordinators()) {
      processed += coordinator.processPending();
    }
    if (processed > 0) {
      logger.trace('tick', { processed });
    }
    return processed;
  }

  public isAnyLoading(): boolean {
    return this.coordinators().some(coordinator => coordinator.isAnyLoading());
  }

  public clearAll(): void {
    for (const coordinator of this.coordinators()) {
      coordinator.clear();
    }
    logger.debug('All caches cleared');
  }

  public close(): void {
    for (const coordinator of this.coordinators()) {
      coordinator.close();
    }
    logger.debug('Session closed');
  }
}

export const createMediaSession = (config: Partial<SessionConfig> = {}): MediaSession =>
  new MediaSession(createSessionConfig(config));
