import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { FetchError } from '../fetchers/types';
import type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse } from './types';
import LibLogger from '../logger';

const logger = LibLogger.get('HttpClient');

const DEFAULT_TIMEOUT_MS = 15_000;

const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

/**
 * Proxies and captive portals answer API calls with an HTML page.
 */
export const looksLikeHtml = (body: string): boolean => {
  const head = body.slice(0, 512).toLowerCase();
  return head.includes('<!doctype') || head.includes('<html');
};

const describeConnectionError = (error: unknown): string => {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : '';
  const detail = `${message} ${cause}`.toLowerCase();
  if (detail.includes('certificate')) {
    return 'Network proxy blocking connection. Try using a VPN.';
  }
  if (detail.includes('connect') || detail.includes('enotfound') || detail.includes('econnrefused')) {
    return 'Unable to connect. Check your internet connection.';
  }
  return `Connection error: ${message}`;
};

const isAbort = (error: unknown): boolean => error instanceof Error && error.name === 'AbortError';

/**
 * Creates an HTTP client on top of the global fetch API.
 * Every failure comes back as an `err` result; nothing throws.
 */
export const createHttpClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  const timedOut = (cause: unknown): Result<never, FetchError> =>
    err({ type: 'timeout', message: `Request timed out after ${timeoutMs}ms`, cause });

  /**
   * The timeout covers the whole exchange: connecting, headers and reading the body.
   */
  const execute = async <T>(
    request: HttpRequest,
    read: (response: Response) => Promise<T>,
    readFailure: string
  ): Promise<Result<HttpResponse<T>, FetchError>> => {
    const controller = new AbortController();
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const init: RequestInit = {
        method: request.method ?? 'GET',
        headers: { ...baseHeaders, ...request.headers },
        signal: controller.signal
      };
      if (request.body !== undefined) {
        init.body = request.body;
      }

      logger.trace('request', { method: init.method, url: request.url });
      let response: Response;
      try {
        response = await Promise.race([fetch(request.url, init), aborted]);
      } catch (error) {
        if (isAbort(error)) {
          return timedOut(error);
        }
        return err({ type: 'network', message: describeConnectionError(error), cause: error });
      }

      if (!response.ok) {
        let body = '';
        try {
          body = await Promise.race([response.text(), aborted]);
        } catch (error) {
          if (isAbort(error)) {
            return timedOut(error);
          }
          logger.debug('Unreadable error body', { url: request.url, status: response.status });
        }
        if (looksLikeHtml(body)) {
          return err({
            type: 'blocked',
            message: 'API blocked by network. Try using a VPN.',
            status: response.status
          });
        }
        return err({
          type: 'http',
          message: `API error: ${response.status} ${response.statusText}`.trim(),
          status: response.status,
          cause: body
        });
      }

      try {
        const body = await Promise.race([read(response), aborted]);
        return ok({ status: response.status, headers: extractHeaders(response.headers), body });
      } catch (error) {
        if (isAbort(error)) {
          return timedOut(error);
        }
        return err({ type: 'parse', message: readFailure, status: response.status, cause: error });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const text = (request: HttpRequest): Promise<Result<HttpResponse<string>, FetchError>> =>
    execute(request, response => response.text(), 'Failed to read response text');

  const json = async (request: HttpRequest): Promise<Result<HttpResponse<unknown>, FetchError>> => {
    const fetched = await text({
      ...request,
      headers: { Accept: 'application/json', ...request.headers }
    });
    if (fetched.isErr()) {
      return err(fetched.error);
    }
    const { status, headers, body } = fetched.value;
    if (looksLikeHtml(body)) {
      return err({ type: 'blocked', message: 'API blocked by network. Try using a VPN.', status });
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return ok({ status, headers, body: parsed });
    } catch (error) {
      return err({
        type: 'parse',
        message: `Failed to parse response: ${error instanceof Error ? error.message : String(error)}`,
        status,
        cause: error
      });
    }
  };

  const bytes = (request: HttpRequest): Promise<Result<HttpResponse<Uint8Array>, FetchError>> =>
    execute(request, async response => new Uint8Array(await response.arrayBuffer()), 'Failed to read response body');

  return { json, text, bytes };
};
