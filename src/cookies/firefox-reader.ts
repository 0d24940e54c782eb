/**
 * Cookie reader for Firefox-family browsers (Firefox, Zen, LibreWolf).
 * Values in `moz_cookies` are stored in plain text.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { eq, like, or } from 'drizzle-orm';
import { getLogger } from '../shared/logger.js';
import type { BrowserName } from '../shared/constants.js';
import type { BrowserCookie, BrowserCookieReader } from '../types/cookie.types.js';
import { mozCookies } from './browser-schema.js';
import { hasTable, withSnapshot } from './sqlite-snapshot.js';

const logger = getLogger('cookies', { component: 'firefox-reader' });

const COOKIE_DB = 'cookies.sqlite';

/**
 * Returns the most recently modified `<profile>/cookies.sqlite` under any
 * of the given profile roots.
 */
export function findNewestCookieDb(profileRoots: readonly string[]): string | null {
  let newest: { path: string; mtimeMs: number } | null = null;

  for (const root of profileRoots) {
    if (!existsSync(root)) {
      continue;
    }
    for (const entry of readdirSync(root, { withFileTypes: true })) {
      if (!entry.isDirectory()) {
        continue;
      }
      const candidate = join(root, entry.name, COOKIE_DB);
      if (!existsSync(candidate)) {
        continue;
      }
      const { mtimeMs } = statSync(candidate);
      if (!newest || mtimeMs > newest.mtimeMs) {
        newest = { path: candidate, mtimeMs };
      }
    }
  }

  return newest?.path ?? null;
}

export class FirefoxCookieReader implements BrowserCookieReader {
  constructor(
    readonly browser: BrowserName,
    private readonly profileRoots: readonly string[],
  ) {}

  async read(domain: string): Promise<BrowserCookie[]> {
    const dbPath = findNewestCookieDb(this.profileRoots);
    if (!dbPath) {
      logger.debug({ browser: this.browser }, 'No cookie database found');
      return [];
    }

    logger.debug({ browser: this.browser, dbPath, domain }, 'Reading cookies');

    return withSnapshot(dbPath, (db) => {
      if (!hasTable(db, 'moz_cookies')) {
        return [];
      }
      return db
        .select({ host: mozCookies.host, name: mozCookies.name, value: mozCookies.value })
        .from(mozCookies)
        .where(or(eq(mozCookies.host, domain), eq(mozCookies.host, `.${domain}`), like(mozCookies.host, `%.${domain}`)))
        .all();
    });
  }
}
