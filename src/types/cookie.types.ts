import type { BrowserName } from '../shared/constants.js';
import type { CookieMap } from './http.types.js';

export interface CookieCacheEntry {
  domain: string;
  cookies: CookieMap;
  /** Browser the cookies were read from */
  browser: string;
  /** Epoch milliseconds */
  fetchedAt: number;
}

export interface ExtractedCookies {
  cookies: CookieMap;
  browser: string;
}

/**
 * Reads session cookies for a domain from wherever the user is logged in.
 * Rejects with PlatformError when nothing yields cookies.
 */
export interface CookieSource {
  extract(domain: string): Promise<ExtractedCookies>;
}

/** Persistence for cache entries between runs. */
export interface CookieCacheStore {
  load(): CookieCacheEntry[];
  save(entries: CookieCacheEntry[]): void;
}

/** One browser cookie row, before it is narrowed to a CookieMap. */
export interface BrowserCookie {
  host: string;
  name: string;
  value: string;
}

/**
 * Reads cookie rows for a domain from one browser's on-disk store.
 * Returns [] when the browser is not installed.
 */
export interface BrowserCookieReader {
  readonly browser: BrowserName;
  read(domain: string): Promise<BrowserCookie[]>;
}
