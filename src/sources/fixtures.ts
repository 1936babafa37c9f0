import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { createFetcher } from '../fetchers/types';
import type { Fetcher, FetchError } from '../fetchers/types';
import LibLogger from '../logger';

const logger = LibLogger.get('sources', 'fixtures');

export interface Broadcaster {
  country: string;
  channel: string;
}

export interface Fixture {
  id: number;
  homeTeam: string;
  awayTeam: string;
  competition: string;
  /** Local date, `YYYY-MM-DD` */
  date: string;
  /** Kick-off time, `HH:MM`, when announced */
  time: string | null;
  venue: string | null;
  broadcasters: Broadcaster[];
}

/**
 * Selection passed to the fixtures datastore. Dates are inclusive `YYYY-MM-DD` strings.
 */
export interface FixtureFilter {
  from: string;
  to?: string;
  /** Case-insensitive substring of the competition name */
  competition?: string;
}

/**
 * The fixtures datastore. Results come back ordered by date, then time.
 */
export interface FixturesRepository {
  query(filter: FixtureFilter): Promise<Fixture[]>;
}

export const COMPETITIONS = {
  'premier-league': 'Premier League',
  'la-liga': 'La Liga',
  'serie-a': 'Serie A',
  'bundesliga': 'Bundesliga',
  'ligue-1': 'Ligue 1',
  'champions-league': 'Champions League'
} as const;

export type CompetitionCategory = keyof typeof COMPETITIONS;

export type FixtureCategory = 'today' | 'tomorrow' | 'this-week' | 'upcoming' | CompetitionCategory;

export const FIXTURE_CATEGORIES: readonly FixtureCategory[] = [
  'today',
  'tomorrow',
  'this-week',
  'upcoming',
  'premier-league',
  'la-liga',
  'serie-a',
  'bundesliga',
  'ligue-1',
  'champions-league'
];

const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local calendar date of a millisecond timestamp, `YYYY-MM-DD`.
 */
export const localDate = (ms: number): string => {
  const date = new Date(ms);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};

const isCompetition = (category: FixtureCategory): category is CompetitionCategory =>
  category in COMPETITIONS;

/**
 * Map a category to the datastore filter for the day containing `now`.
 */
export const filterForCategory = (category: FixtureCategory, now: number): FixtureFilter => {
  const today = localDate(now);
  if (isCompetition(category)) {
    return { from: today, competition: COMPETITIONS[category] };
  }
  switch (category) {
    case 'today':
      return { from: today, to: today };
    case 'tomorrow': {
      const tomorrow = localDate(now + DAY_MS);
      return { from: tomorrow, to: tomorrow };
    }
    case 'this-week':
      return { from: today, to: localDate(now + 7 * DAY_MS) };
    case 'upcoming':
      return { from: today };
  }
};

export const matchTitle = (fixture: Fixture): string => `${fixture.homeTeam} vs ${fixture.awayTeam}`;

export const displayTime = (fixture: Fixture): string => fixture.time ?? 'TBD';

export const channelNames = (fixture: Fixture): string[] =>
  fixture.broadcasters.map(broadcaster => broadcaster.channel);

/**
 * Channels per country, in broadcaster order.
 */
export const channelsByCountry = (fixture: Fixture): Map<string, string[]> => {
  const byCountry = new Map<string, string[]>();
  for (const { country, channel } of fixture.broadcasters) {
    const channels = byCountry.get(country);
    if (channels) {
      channels.push(channel);
    } else {
      byCountry.set(country, [channel]);
    }
  }
  return byCountry;
};

const matchesFilter = (fixture: Fixture, filter: FixtureFilter): boolean => {
  if (fixture.date < filter.from) {
    return false;
  }
  if (filter.to !== undefined && fixture.date > filter.to) {
    return false;
  }
  if (filter.competition !== undefined &&
    !fixture.competition.toLowerCase().includes(filter.competition.toLowerCase())) {
    return false;
  }
  return true;
};

const byKickoff = (a: Fixture, b: Fixture): number => {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  const aTime = a.time ?? '';
  const bTime = b.time ?? '';
  if (aTime === bTime) {
    return 0;
  }
  return aTime < bTime ? -1 : 1;
};

/**
 * Repository over fixtures already held in memory (tests, bundled data, a pre-loaded export).
 */
export const createInMemoryFixturesRepository = (fixtures: readonly Fixture[]): FixturesRepository => ({
  query: async (filter) => fixtures.filter(fixture => matchesFilter(fixture, filter)).sort(byKickoff)
});

export interface FixturesFetcherOptions {
  /** `null` when no fixtures database is available */
  repository: FixturesRepository | null;
  /** Clock in milliseconds used to resolve relative categories (default: Date.now) */
  now?: () => number;
}

export const createFixturesFetcher = (
  options: FixturesFetcherOptions
): Fetcher<FixtureCategory, Fixture[]> => {
  const { repository, now = Date.now } = options;

  return createFetcher('fixtures', async (category): Promise<Result<Fixture[], FetchError>> => {
    if (!repository) {
      return err({ type: 'unavailable', message: 'Fixtures database not found' });
    }
    const filter = filterForCategory(category, now());
    try {
      const fixtures = await repository.query(filter);
      logger.debug('Fixtures loaded', { category, filter, count: fixtures.length });
      return ok(fixtures);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ type: 'upstream', message: `Fixtures query failed: ${message}`, cause: error });
    }
  });
};
