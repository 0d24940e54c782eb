/**
 * Picks the browser to read session cookies from.
 *
 * Order: configured preference, then the system default browser, then the
 * fixed priority list. The first browser holding at least one cookie for
 * the domain wins.
 */

import { getLogger } from '../shared/logger.js';
import { PlatformError } from '../shared/errors.js';
import { BROWSER_PRIORITY } from '../shared/constants.js';
import type { BrowserName } from '../shared/constants.js';
import { hostMatches } from '../shared/utils.js';
import type { CookieMap } from '../types/http.types.js';
import type { BrowserCookie, BrowserCookieReader, CookieSource, ExtractedCookies } from '../types/cookie.types.js';

const logger = getLogger('cookies', { component: 'browser-extractor' });

export interface BrowserCookieExtractorOptions {
  readers: Partial<Record<BrowserName, BrowserCookieReader>>;
  preferredBrowser?: BrowserName | null;
  detectDefault?: () => Promise<BrowserName | null>;
}

const bareHost = (host: string): string => host.replace(/^\./, '').toLowerCase();

/**
 * Collapses cookie rows into the name -> value map a browser would send to
 * `domain`. When a name is set on both a parent domain and the host itself,
 * the more specific host wins.
 */
export function toCookieMap(rows: readonly BrowserCookie[], domain: string): CookieMap {
  const applicable = rows
    .filter((row) => hostMatches(domain, bareHost(row.host)))
    .sort((a, b) => bareHost(a.host).length - bareHost(b.host).length);

  const map: CookieMap = {};
  for (const row of applicable) {
    map[row.name] = row.value;
  }
  return map;
}

export class BrowserCookieExtractor implements CookieSource {
  private readonly readers: Partial<Record<BrowserName, BrowserCookieReader>>;
  private readonly preferredBrowser: BrowserName | null;
  private readonly detectDefault: () => Promise<BrowserName | null>;

  constructor(options: BrowserCookieExtractorOptions) {
    this.readers = options.readers;
    this.preferredBrowser = options.preferredBrowser ?? null;
    this.detectDefault = options.detectDefault ?? (async () => null);
  }

  async extract(domain: string): Promise<ExtractedCookies> {
    for (const browser of await this.candidates()) {
      const reader = this.readers[browser];
      if (!reader) {
        continue;
      }

      const cookies = toCookieMap(await this.readSafely(reader, domain), domain);
      if (Object.keys(cookies).length > 0) {
        logger.debug({ browser, domain }, 'Browser cookies found');
        return { cookies, browser };
      }
    }

    throw new PlatformError(
      `No browser cookies found for ${domain}. Log in to ${domain} in your browser and try again.`,
      'NO_BROWSER_COOKIES',
      domain,
    );
  }

  private async candidates(): Promise<BrowserName[]> {
    const ordered: BrowserName[] = [];
    if (this.preferredBrowser) {
      ordered.push(this.preferredBrowser);
    }
    const detected = await this.detectDefault();
    if (detected) {
      ordered.push(detected);
    }
    ordered.push(...BROWSER_PRIORITY);
    return [...new Set(ordered)];
  }

  /** A broken or locked store for one browser must not stop the probe. */
  private async readSafely(reader: BrowserCookieReader, domain: string): Promise<BrowserCookie[]> {
    try {
      return await reader.read(domain);
    } catch (error) {
      logger.debug({ browser: reader.browser, domain, err: error }, 'Browser cookie store unreadable');
      return [];
    }
  }
}
