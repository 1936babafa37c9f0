/**
 * Render Loop Example
 *
 * Drives a MediaSession the way a UI does: every frame requests what is on screen, applies
 * finished fetches with tick() and draws whatever is cached. The remote services are answered by
 * an in-process client so the example runs offline.
 */

import { fileURLToPath } from 'node:url';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import {
  createInMemoryFixturesRepository,
  createMediaSession,
  formatClock,
  matchTitle
} from '../src';
import type { Fixture, FetchError, HttpClient, HttpRequest, HttpResponse } from '../src';

export const NOW_MS = new Date(2025, 2, 10, 12, 0, 0).getTime();
const NOW_S = NOW_MS / 1000;
const MAX_FRAMES = 10;
const CHANNELS = ['101', '102'];

const fixtures: Fixture[] = [
  {
    id: 1,
    homeTeam: 'Harbour City',
    awayTeam: 'Northgate United',
    competition: 'English Premier League',
    date: '2025-03-10',
    time: '20:00',
    venue: 'Harbour Park',
    broadcasters: [{ country: 'UK', channel: 'Sport One' }]
  }
];

const cannedBody = (url: string): unknown => {
  if (url.includes('/trending/all/day')) {
    return {
      results: [
        { id: 1, media_type: 'movie', title: 'Glass Orchard', release_date: '2024-11-02', vote_average: 7.4 },
        { id: 2, media_type: 'tv', name: 'Low Tide', first_air_date: '2023-05-20', vote_average: 8.1 }
      ]
    };
  }
  if (url.includes('api.tvmaze.com/search/shows')) {
    return [
      { score: 1, show: { id: 10, name: 'Signal Lost', genres: ['Drama'], rating: { average: 7.9 } } },
      { score: 1, show: { id: 11, name: 'Quiet Streets', genres: ['Comedy'], rating: { average: 8.4 } } }
    ];
  }
  if (url.includes('action=get_short_epg')) {
    const streamId = new URL(url).searchParams.get('stream_id') ?? '';
    return {
      epg_listings: [
        { id: `${streamId}-1`, title: `Channel ${streamId} Live`, start: String(NOW_S - 600), end: String(NOW_S + 1200) },
        { id: `${streamId}-2`, title: `Channel ${streamId} Late`, start: String(NOW_S + 1200), end: String(NOW_S + 4800) }
      ]
    };
  }
  return undefined;
};

/**
 * HttpClient answering from canned bodies
 */
class OfflineHttpClient implements HttpClient {
  private answer<T>(body: T | undefined): Result<HttpResponse<T>, FetchError> {
    if (body === undefined) {
      return err({ type: 'http', message: 'API error: 404 Not Found', status: 404 });
    }
    return ok({ status: 200, headers: {}, body });
  }

  public async json(request: HttpRequest): Promise<Result<HttpResponse<unknown>, FetchError>> {
    return this.answer(cannedBody(request.url));
  }

  public async text(request: HttpRequest): Promise<Result<HttpResponse<string>, FetchError>> {
    const body = cannedBody(request.url);
    return this.answer(body === undefined ? undefined : JSON.stringify(body));
  }

  public async bytes(request: HttpRequest): Promise<Result<HttpResponse<Uint8Array>, FetchError>> {
    return this.answer(new TextEncoder().encode(request.url));
  }
}

const nextFrame = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

export interface RenderLoopSummary {
  frames: number;
  discover: string[];
  shows: string[];
  fixtures: string[];
  onNow: string[];
}

export const runRenderLoopExample = async (): Promise<RenderLoopSummary> => {
  console.log('Render Loop Example');
  console.log('===================\n');

  const session = createMediaSession({
    tmdbApiKey: 'test-key',
    xtream: { baseUrl: 'http://provider.test', username: 'viewer', password: 'test-secret' },
    fixtures: createInMemoryFixturesRepository(fixtures),
    now: () => NOW_MS,
    http: new OfflineHttpClient()
  });

  let frames = 0;
  while (frames < MAX_FRAMES) {
    frames++;
    session.discover.request('trending-all');
    session.shows.request('popular');
    session.fixtures.request('today');
    session.epg.requestBatch(CHANNELS);

    const applied = session.tick();
    console.log(`Frame ${frames}: applied ${applied}, loading: ${session.isAnyLoading()}`);

    if (!session.isAnyLoading() && session.discover.get('trending-all') !== null) {
      break;
    }
    await nextFrame();
  }

  const summary: RenderLoopSummary = {
    frames,
    discover: (session.discover.get('trending-all') ?? []).map(item => item.title),
    shows: (session.shows.get('popular') ?? []).map(item => item.title),
    fixtures: (session.fixtures.get('today') ?? []).map(matchTitle),
    onNow: CHANNELS.map(channel => {
      const program = session.epg.currentProgram(channel);
      return program ? `${channel}: ${program.title} until ${formatClock(program.end)}` : `${channel}: -`;
    })
  };

  console.log(`\nDiscover: ${summary.discover.join(', ')}`);
  console.log(`Shows: ${summary.shows.join(', ')}`);
  console.log(`Fixtures: ${summary.fixtures.join(', ')}`);
  for (const line of summary.onNow) {
    console.log(`On now ${line}`);
  }

  session.close();
  console.log('\nRender Loop Example Complete!');
  return summary;
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runRenderLoopExample().catch(console.error);
}
