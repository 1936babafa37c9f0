export { createHttpClient, looksLikeHtml } from './HttpClient';
export type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse } from './types';
