import { describe, expect, it } from 'vitest';
import { err, ok } from 'neverthrow';
import {
  contentTypeName,
  createDiscoverFetcher,
  createDiscoverSearchFetcher,
  releaseYear,
  TmdbSource
} from '@/sources/tmdb';
import { always, FakeHttpClient } from './fakeHttp';

const movie = (id: number, title: string) => ({
  id,
  title,
  overview: `${title} overview`,
  poster_path: `/poster-${id}.jpg`,
  backdrop_path: null,
  release_date: '2021-10-22',
  vote_average: 7.8,
  media_type: 'movie'
});

const tvShow = (id: number, name: string) => ({
  id,
  name,
  poster_path: null,
  backdrop_path: `/backdrop-${id}.jpg`,
  first_air_date: '2019-03-01',
  vote_average: 8.1,
  media_type: 'tv'
});

describe('TmdbSource', () => {
  it('should call the category endpoint with the API key', async () => {
    const http = new FakeHttpClient(always({ results: [] }));
    const source = new TmdbSource({ apiKey: 'test-key', http });

    await source.discover('trending-movies');
    await source.discover('airing-today-tv');

    expect(http.urls).toEqual([
      'https://api.themoviedb.org/3/trending/movie/day?page=1&api_key=test-key',
      'https://api.themoviedb.org/3/tv/airing_today?page=1&api_key=test-key'
    ]);
  });

  it('should normalize movies with image URLs', async () => {
    const source = new TmdbSource({
      apiKey: 'test-key',
      http: new FakeHttpClient(always({ results: [movie(1, 'Dune')] }))
    });

    const items = (await source.discover('popular-movies'))._unsafeUnwrap();

    expect(items).toEqual([{
      id: 1,
      title: 'Dune',
      overview: 'Dune overview',
      posterUrl: 'https://image.tmdb.org/t/p/w342/poster-1.jpg',
      backdropUrl: null,
      releaseDate: '2021-10-22',
      voteAverage: 7.8,
      contentType: 'movie'
    }]);
    expect(releaseYear(items[0])).toBe('2021');
    expect(contentTypeName(items[0])).toBe('Movie');
  });

  it('should normalize TV shows, defaulting missing fields', async () => {
    const source = new TmdbSource({
      apiKey: 'test-key',
      http: new FakeHttpClient(always({ results: [tvShow(2, 'Lighthouse Keepers')] }))
    });

    const [item] = (await source.discover('top-rated-tv'))._unsafeUnwrap();

    expect(item).toEqual({
      id: 2,
      title: 'Lighthouse Keepers',
      overview: '',
      posterUrl: null,
      backdropUrl: 'https://image.tmdb.org/t/p/w780/backdrop-2.jpg',
      releaseDate: '2019-03-01',
      voteAverage: 8.1,
      contentType: 'tv'
    });
    expect(contentTypeName(item)).toBe('TV Show');
  });

  it('should keep movies and shows from trending-all and skip people', async () => {
    const source = new TmdbSource({
      apiKey: 'test-key',
      http: new FakeHttpClient(always({
        results: [movie(1, 'Dune'), { id: 3, name: 'Some Actor', media_type: 'person' }, tvShow(2, 'Lighthouse Keepers')]
      }))
    });

    const items = (await source.discover('trending-all'))._unsafeUnwrap();

    expect(items.map(item => [item.id, item.contentType])).toEqual([[1, 'movie'], [2, 'tv']]);
  });

  it('should skip malformed rows and keep at most twenty items', async () => {
    const rows: unknown[] = [{ id: 'not-a-number', title: 'Broken' }];
    for (let id = 1; id <= 25; id++) {
      rows.push(movie(id, `Movie ${id}`));
    }
    const source = new TmdbSource({ apiKey: 'test-key', http: new FakeHttpClient(always({ results: rows })) });

    const items = (await source.discover('now-playing-movies'))._unsafeUnwrap();

    // The malformed row counts towards the first twenty
    expect(items).toHaveLength(19);
    expect(items[0].id).toBe(1);
    expect(items[18].id).toBe(19);
  });

  it('should fail as unavailable without an API key', async () => {
    const http = new FakeHttpClient(always({ results: [] }));
    const source = new TmdbSource({ apiKey: '  ', http });

    const result = await source.discover('trending-all');

    expect(source.isConfigured).toBe(false);
    expect(result._unsafeUnwrapErr()).toEqual({ type: 'unavailable', message: 'TMDB API key not configured' });
    expect(http.urls).toEqual([]);
  });

  it('should surface the TMDB status message', async () => {
    const source = new TmdbSource({
      apiKey: 'test-key',
      http: new FakeHttpClient(() => err({
        type: 'http',
        message: 'API error: 401 Unauthorized',
        status: 401,
        cause: '{"status_code":7,"status_message":"Invalid API key: You must be granted a valid key."}'
      }))
    });

    const result = await source.discover('trending-all');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'upstream',
      message: 'TMDB: Invalid API key: You must be granted a valid key.',
      status: 401
    });
  });

  it('should pass other errors through unchanged', async () => {
    const source = new TmdbSource({
      apiKey: 'test-key',
      http: new FakeHttpClient(() => err({ type: 'http', message: 'API error: 502 Bad Gateway', status: 502, cause: 'upstream down' }))
    });

    const result = await source.discover('trending-all');

    expect(result._unsafeUnwrapErr().type).toBe('http');
    expect(result._unsafeUnwrapErr().message).toBe('API error: 502 Bad Gateway');
  });

  it('should reject a body without results', async () => {
    const source = new TmdbSource({ apiKey: 'test-key', http: new FakeHttpClient(always({ page: 1 })) });

    const result = await source.discover('trending-all');

    expect(result._unsafeUnwrapErr().type).toBe('parse');
    expect(result._unsafeUnwrapErr().message).toBe('Failed to parse TMDB response at results: Required');
  });
});

describe('TMDB fetchers', () => {
  it('should fetch a discover category', async () => {
    const source = new TmdbSource({ apiKey: 'test-key', http: new FakeHttpClient(always({ results: [movie(1, 'Dune')] })) });
    const fetcher = createDiscoverFetcher(source);

    const result = await fetcher.fetch('trending-movies');

    expect(fetcher.name).toBe('tmdb-discover');
    expect(result._unsafeUnwrap()).toHaveLength(1);
  });

  it('should run a trimmed multi search', async () => {
    const http = new FakeHttpClient(() => ok({ results: [movie(1, 'The Matrix'), tvShow(2, 'Matrix Tales')] }));
    const fetcher = createDiscoverSearchFetcher(new TmdbSource({ apiKey: 'test-key', http }));

    const result = await fetcher.fetch('  the matrix ');

    expect(http.urls).toEqual(['https://api.themoviedb.org/3/search/multi?query=the+matrix&page=1&api_key=test-key']);
    expect(result._unsafeUnwrap().map(item => item.title)).toEqual(['The Matrix', 'Matrix Tales']);
  });
});
