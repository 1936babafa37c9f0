export * from './tmdb';
export * from './tvmaze';
export * from './fixtures';
export * from './xtream';
export * from './posters';
export { parseBody } from './parse';
