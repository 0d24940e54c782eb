/**
 * Per-domain cache of browser session cookies.
 *
 * One entry per domain, overwritten in place. An entry is stale once it is
 * older than `maxAgeHours`; `-1` disables time-based expiry so only an
 * explicit `invalidate` (after an authentication failure) drops it.
 * Constructed once per process and handed to the fetch layer.
 */

import { getLogger } from '../shared/logger.js';
import { eventBus } from '../shared/events.js';
import { MS_PER_HOUR, NEVER_EXPIRE } from '../shared/constants.js';
import type { CookieMap } from '../types/http.types.js';
import type { CookieCacheEntry, CookieCacheStore, CookieSource } from '../types/cookie.types.js';

const logger = getLogger('cookies', { component: 'cookie-cache' });

export interface CookieCacheOptions {
  source: CookieSource;
  /** When false every lookup re-extracts and nothing is stored. */
  enabled?: boolean;
  maxAgeHours?: number;
  store?: CookieCacheStore;
  /** Epoch milliseconds; injectable for tests. */
  now?: () => number;
}

export interface GetCookiesOptions {
  forceRefresh?: boolean;
}

export function isStale(entry: CookieCacheEntry, maxAgeHours: number, now: number): boolean {
  if (maxAgeHours === NEVER_EXPIRE) {
    return false;
  }
  return now - entry.fetchedAt > maxAgeHours * MS_PER_HOUR;
}

export class CookieCache {
  private readonly source: CookieSource;
  private readonly enabled: boolean;
  private readonly maxAgeHours: number;
  private readonly store?: CookieCacheStore;
  private readonly now: () => number;
  private entries: Map<string, CookieCacheEntry> | null = null;

  constructor(options: CookieCacheOptions) {
    this.source = options.source;
    this.enabled = options.enabled ?? true;
    this.maxAgeHours = options.maxAgeHours ?? 24;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns cookies for `domain`, extracting from the browser when there is
   * no entry, the entry is stale, caching is off or a refresh is forced.
   */
  async getCookies(domain: string, options: GetCookiesOptions = {}): Promise<CookieMap> {
    const forced = options.forceRefresh ?? false;

    if (this.enabled && !forced) {
      const entry = this.getEntries().get(domain);
      if (entry && !isStale(entry, this.maxAgeHours, this.now())) {
        logger.debug({ domain, browser: entry.browser }, 'Cookie cache hit');
        eventBus.emit('cookies:cache-hit', { domain });
        return entry.cookies;
      }
      if (entry) {
        logger.debug({ domain, fetchedAt: entry.fetchedAt }, 'Cached cookies are stale');
      }
    }

    const extracted = await this.source.extract(domain);
    eventBus.emit('cookies:extracted', { domain, browser: extracted.browser, forced });
    logger.info(
      { domain, browser: extracted.browser, cookieCount: Object.keys(extracted.cookies).length, forced },
      'Cookies extracted from browser',
    );

    if (this.enabled) {
      this.getEntries().set(domain, {
        domain,
        cookies: extracted.cookies,
        browser: extracted.browser,
        fetchedAt: this.now(),
      });
      this.persist();
    }

    return extracted.cookies;
  }

  /**
   * Drops the entry for `domain`. Returns whether one existed.
   */
  invalidate(domain: string): boolean {
    const deleted = this.getEntries().delete(domain);
    if (deleted) {
      logger.debug({ domain }, 'Cookie cache entry invalidated');
      this.persist();
    }
    return deleted;
  }

  clear(): void {
    this.getEntries().clear();
    this.persist();
    logger.debug('Cookie cache cleared');
  }

  /** Returns all cached domains. */
  domains(): string[] {
    return Array.from(this.getEntries().keys());
  }

  peek(domain: string): CookieCacheEntry | undefined {
    return this.getEntries().get(domain);
  }

  // A disabled cache never touches the store, in either direction.
  private getEntries(): Map<string, CookieCacheEntry> {
    if (!this.entries) {
      this.entries = new Map();
      const persisted = this.enabled ? this.store?.load() : undefined;
      for (const entry of persisted ?? []) {
        this.entries.set(entry.domain, entry);
      }
    }
    return this.entries;
  }

  private persist(): void {
    if (this.enabled && this.store && this.entries) {
      this.store.save(Array.from(this.entries.values()));
    }
  }
}
