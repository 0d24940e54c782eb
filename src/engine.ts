/**
 * Fetch engine - wires settings, the cookie cache, the HTTP client and the
 * judge registry together. One instance per process.
 */

import {
  BrowserCookieExtractor,
  CookieCache,
  FileCookieCacheStore,
  createBrowserReaders,
  detectDefaultBrowser,
} from './cookies/index.js';
import { HttpClient } from './http/index.js';
import { createJudges, detectJudge } from './judges/index.js';
import { eventBus } from './shared/events.js';
import { getLogger } from './shared/logger.js';
import type { Settings } from './config/settings.js';
import type { CookieSource } from './types/cookie.types.js';
import type { HttpTransport } from './types/http.types.js';
import type { ContestProblems, Judge, SampleTest } from './types/judge.types.js';

const log = getLogger('judges', { component: 'engine' });

export interface FetchEngineOptions {
  settings: Settings;
  /** Where the cookie cache is persisted; in-memory only when omitted. */
  cacheDir?: string;
  /** Overrides for tests. */
  cookieSource?: CookieSource;
  transport?: HttpTransport;
  now?: () => number;
}

export interface SampleResult {
  judge: Judge | null;
  samples: SampleTest[] | null;
}

export class FetchEngine {
  readonly cookieCache: CookieCache;
  readonly judges: readonly Judge[];

  constructor(options: FetchEngineOptions) {
    const { settings } = options;
    const source =
      options.cookieSource ??
      new BrowserCookieExtractor({
        readers: createBrowserReaders(),
        preferredBrowser: settings.preferredBrowser,
        detectDefault: () => detectDefaultBrowser(),
      });

    this.cookieCache = new CookieCache({
      source,
      enabled: settings.cookieCacheEnabled,
      maxAgeHours: settings.cookieCacheMaxAgeHours,
      store: options.cacheDir ? new FileCookieCacheStore(options.cacheDir) : undefined,
      now: options.now,
    });

    const client = new HttpClient({ cookieCache: this.cookieCache, transport: options.transport });
    this.judges = createJudges(client);
  }

  resolve(url: string): Judge | null {
    return detectJudge(url, this.judges);
  }

  /**
   * Routes `url` and fetches its samples. `judge` is null for unsupported
   * platforms; `samples` is null when the judge could not provide them.
   */
  async fetchSamples(url: string): Promise<SampleResult> {
    const judge = this.resolve(url);
    if (!judge) {
      return { judge: null, samples: null };
    }

    const samples = await judge.fetchSamples(url);
    if (samples) {
      log.info({ url, platform: judge.platformName, count: samples.length }, 'Samples fetched');
      eventBus.emit('samples:fetched', { url, platform: judge.platformName, count: samples.length });
    }
    return { judge, samples };
  }

  async fetchContestProblems(url: string, contestId: string): Promise<ContestProblems | null> {
    const judge = this.resolve(url);
    return judge ? judge.fetchContestProblems(contestId) : null;
  }
}
