/**
 * HTTP layer shared by all judges.
 *
 * Plain GET and JSON requests, plus authenticated GETs that inject the
 * domain's browser cookies and run the one-retry authentication protocol.
 */

import got from 'got';
import { getLogger } from '../shared/logger.js';
import { NetworkError, ParseError, PlatformError } from '../shared/errors.js';
import { eventBus } from '../shared/events.js';
import { withNetworkRetry } from '../shared/retry.js';
import { API_TIMEOUT_MS, DEFAULT_HEADERS, PAGE_TIMEOUT_MS } from '../shared/constants.js';
import { extractDomain } from '../shared/utils.js';
import type { CookieCache } from '../cookies/cookie-cache.js';
import type {
  AuthFetchOptions,
  CookieMap,
  HttpTransport,
  PageFetcher,
  TransportResponse,
} from '../types/http.types.js';

const log = getLogger('http', { component: 'http-client' });

/**
 * State of an authenticated fetch: `cached` uses whatever the cookie cache
 * holds, `refreshed` forces a new browser extraction first.
 */
type AuthState = 'cached' | 'refreshed';

export const gotTransport: HttpTransport = async ({ url, headers, timeoutMs }) => {
  const response = await got.get(url, {
    headers,
    responseType: 'text',
    timeout: { request: timeoutMs },
    followRedirect: true,
    throwHttpErrors: false,
    retry: { limit: 0 },
  });
  return { statusCode: response.statusCode, body: response.body };
};

export interface HttpClientOptions {
  cookieCache: CookieCache;
  transport?: HttpTransport;
  /** Attempts for connection resets and refusals. Default: 2 */
  maxAttempts?: number;
  /** First backoff delay in ms. Default: 500 */
  retryDelayMs?: number;
}

export function toCookieHeader(cookies: CookieMap): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * True when the body matches any of the judge's login-page markers.
 * Heuristic by nature, which is why retries are bounded.
 */
export function looksLikeLoginPage(body: string, markers: readonly RegExp[]): boolean {
  return markers.some((marker) => body.search(marker) !== -1);
}

export class HttpClient implements PageFetcher {
  private readonly cookieCache: CookieCache;
  private readonly transport: HttpTransport;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpClientOptions) {
    this.cookieCache = options.cookieCache;
    this.transport = options.transport ?? gotTransport;
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  /**
   * Unauthenticated GET. Rejects with NetworkError on timeout, transport
   * failure or a non-2xx status.
   */
  async fetchUrl(url: string, timeoutMs: number = PAGE_TIMEOUT_MS): Promise<string> {
    return this.request(url, timeoutMs);
  }

  async fetchJson(url: string, timeoutMs: number = API_TIMEOUT_MS): Promise<unknown> {
    const body = await this.request(url, timeoutMs);
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new ParseError(
        `Invalid JSON response from ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
      );
    }
  }

  /**
   * GET with the domain's browser cookies. A response that looks like a
   * login page earns exactly one retry with freshly extracted cookies; a
   * second login page fails with PlatformError("AUTH_FAILED").
   */
  async fetchUrlWithAuth(url: string, options: AuthFetchOptions = {}): Promise<string> {
    const domain = options.domain ?? extractDomain(url);
    const markers = options.loginMarkers ?? [];
    const timeoutMs = options.timeoutMs ?? PAGE_TIMEOUT_MS;
    const states: readonly AuthState[] = options.forceRefresh ? ['refreshed'] : ['cached', 'refreshed'];

    for (const state of states) {
      const cookies = await this.cookieCache.getCookies(domain, { forceRefresh: state === 'refreshed' });
      const body = await this.request(url, timeoutMs, cookies);

      if (!looksLikeLoginPage(body, markers)) {
        return body;
      }

      this.cookieCache.invalidate(domain);
      if (state === 'cached') {
        log.info({ url, domain }, 'Login page returned, refreshing cookies');
        eventBus.emit('auth:retry', { url, domain });
      }
    }

    log.warn({ url, domain }, 'Still not logged in after refreshing cookies');
    throw new PlatformError(
      `Authentication failed for ${domain}. Make sure you are logged in to ${domain} in your browser.`,
      'AUTH_FAILED',
      domain,
    );
  }

  private async request(url: string, timeoutMs: number, cookies?: CookieMap): Promise<string> {
    const headers: Record<string, string> = { ...DEFAULT_HEADERS };
    if (cookies && Object.keys(cookies).length > 0) {
      headers['Cookie'] = toCookieHeader(cookies);
    }

    let response: TransportResponse;
    try {
      response = await withNetworkRetry(() => this.transport({ url, headers, timeoutMs }), {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
      });
    } catch (error) {
      throw toNetworkError(error, url, timeoutMs);
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new NetworkError(`HTTP ${response.statusCode} fetching ${url}`, 'HTTP_STATUS', url, response.statusCode);
    }

    log.debug({ url, statusCode: response.statusCode, bytes: response.body.length }, 'Fetched');
    return response.body;
  }
}

function toNetworkError(error: unknown, url: string, timeoutMs: number): NetworkError {
  const code = error instanceof Error && 'code' in error ? String(error.code) : '';
  if (code === 'ETIMEDOUT') {
    return new NetworkError(`Timed out after ${timeoutMs}ms fetching ${url}`, 'TIMEOUT', url);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Network error fetching ${url}: ${message}`, 'NETWORK_ERROR', url);
}
