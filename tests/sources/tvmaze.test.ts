import { describe, expect, it } from 'vitest';
import { ok } from 'neverthrow';
import { createShowSearchFetcher, createShowsFetcher, stripHtml, toShowItem, TvMazeSource } from '@/sources/tvmaze';
import { always, FakeHttpClient } from './fakeHttp';

interface ShowOptions {
  rating?: number | null;
  genres?: string[];
}

const show = (id: number, name: string, options: ShowOptions = {}) => ({
  id,
  name,
  summary: null,
  image: null,
  rating: { average: options.rating ?? null },
  genres: options.genres ?? [],
  premiered: null
});

const searchResults = (...shows: ReturnType<typeof show>[]) => shows.map(entry => ({ score: 0.9, show: entry }));

describe('stripHtml', () => {
  it('should turn markup into plain text', () => {
    expect(stripHtml('<p>A <b>bold</b> &amp; <i>brave</i> show.<br>Second &quot;line&quot;</p>'))
      .toBe('A bold & brave show.\nSecond "line"');
  });

  it('should drop tags it does not know', () => {
    expect(stripHtml('<span class="note">Hi</span> there')).toBe('Hi there');
  });
});

describe('toShowItem', () => {
  it('should take the poster, rating and premiere year', () => {
    expect(toShowItem({
      id: 5,
      name: 'Harbour Lights',
      summary: '<p>Fishing village drama.</p>',
      image: { medium: 'https://static.tvmaze.test/medium/5.jpg' },
      rating: { average: 7.4 },
      genres: ['Drama'],
      premiered: '2014-09-21'
    })).toEqual({
      id: 5,
      title: 'Harbour Lights',
      overview: 'Fishing village drama.',
      posterUrl: 'https://static.tvmaze.test/medium/5.jpg',
      rating: 7.4,
      year: '2014',
      genres: ['Drama']
    });
  });
});

describe('TvMazeSource', () => {
  it('should deduplicate the schedule by show and keep the first twenty', async () => {
    const entries = [];
    for (let id = 1; id <= 30; id++) {
      entries.push({ id: id * 100, show: show(id, `Show ${id}`) });
      entries.push({ id: id * 100 + 1, show: show(id, `Show ${id}`) });
    }
    const http = new FakeHttpClient(always(entries));

    const items = (await new TvMazeSource({ http }).category('airing-today'))._unsafeUnwrap();

    expect(http.urls).toEqual(['https://api.tvmaze.com/schedule']);
    expect(items).toHaveLength(20);
    expect(items.map(item => item.id).slice(0, 3)).toEqual([1, 2, 3]);
  });

  it('should sort popular shows by rating with unrated shows last', async () => {
    const http = new FakeHttpClient(always(searchResults(
      show(1, 'Low', { rating: 5.1 }),
      show(2, 'Unrated'),
      show(3, 'High', { rating: 8.9 })
    )));

    const items = (await new TvMazeSource({ http }).category('popular'))._unsafeUnwrap();

    expect(http.urls).toEqual(['https://api.tvmaze.com/search/shows?q=the']);
    expect(items.map(item => item.title)).toEqual(['High', 'Low', 'Unrated']);
  });

  it('should keep only shows rated seven or more for top-rated', async () => {
    const http = new FakeHttpClient(always(searchResults(
      show(1, 'Fine', { rating: 6.9 }),
      show(2, 'Good', { rating: 7 }),
      show(3, 'Great', { rating: 9.2 })
    )));

    const items = (await new TvMazeSource({ http }).category('top-rated'))._unsafeUnwrap();

    expect(http.urls).toEqual(['https://api.tvmaze.com/search/shows?q=best']);
    expect(items.map(item => item.title)).toEqual(['Great', 'Good']);
  });

  it('should filter a genre category by genre', async () => {
    const shows = [];
    for (let id = 1; id <= 12; id++) {
      shows.push(show(id, `Space ${id}`, { rating: id, genres: ['Science-Fiction'] }));
    }
    shows.push(show(99, 'Cooking', { rating: 10, genres: ['Food'] }));
    const http = new FakeHttpClient(always(searchResults(...shows)));

    const items = (await new TvMazeSource({ http }).category('sci-fi'))._unsafeUnwrap();

    expect(http.urls).toEqual(['https://api.tvmaze.com/search/shows?q=science-fiction']);
    expect(items).toHaveLength(12);
    expect(items[0].title).toBe('Space 12');
    expect(items.some(item => item.title === 'Cooking')).toBe(false);
  });

  it('should fall back to unfiltered results when few shows match the genre', async () => {
    const http = new FakeHttpClient(always(searchResults(
      show(1, 'Comedy Hour', { rating: 6, genres: ['Comedy'] }),
      show(2, 'Comedy Store Documentary', { rating: 8, genres: ['Documentary'] })
    )));

    const items = (await new TvMazeSource({ http }).category('comedy'))._unsafeUnwrap();

    expect(items.map(item => item.title)).toEqual(['Comedy Store Documentary', 'Comedy Hour']);
  });

  it('should reject a body that is not a list', async () => {
    const http = new FakeHttpClient(always({ message: 'nope' }));

    const result = await new TvMazeSource({ http }).category('popular');

    expect(result._unsafeUnwrapErr().type).toBe('parse');
  });
});

describe('TVMaze fetchers', () => {
  it('should fetch categories', async () => {
    const fetcher = createShowsFetcher(new TvMazeSource({ http: new FakeHttpClient(always([])) }));
    expect(fetcher.name).toBe('tvmaze-shows');
    expect((await fetcher.fetch('airing-today'))._unsafeUnwrap()).toEqual([]);
  });

  it('should search with a trimmed, encoded query', async () => {
    const http = new FakeHttpClient(() => ok(searchResults(show(1, 'Night Shift'))));
    const fetcher = createShowSearchFetcher(new TvMazeSource({ http }));

    const result = await fetcher.fetch(' night shift ');

    expect(http.urls).toEqual(['https://api.tvmaze.com/search/shows?q=night+shift']);
    expect(result._unsafeUnwrap().map(item => item.title)).toEqual(['Night Shift']);
  });
});
