import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import type { CookieCacheEntry, CookieCacheStore } from '../types/cookie.types.js';

const logger = getLogger('cookies', { component: 'cache-store' });

const CACHE_FILE = 'cookies.json';

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(
    z.object({
      domain: z.string(),
      cookies: z.record(z.string()),
      browser: z.string(),
      fetchedAt: z.number(),
    }),
  ),
});

/**
 * Keeps cookie cache entries in a JSON file so separate CLI runs share them.
 * The file holds session secrets and is written with mode 0600.
 */
export class FileCookieCacheStore implements CookieCacheStore {
  readonly path: string;

  constructor(cacheDir: string) {
    this.path = join(cacheDir, CACHE_FILE);
  }

  load(): CookieCacheEntry[] {
    if (!existsSync(this.path)) {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf8'));
    } catch (error) {
      logger.warn({ path: this.path, err: error }, 'Cookie cache file unreadable, starting empty');
      return [];
    }

    const result = cacheFileSchema.safeParse(raw);
    if (!result.success) {
      logger.warn({ path: this.path, issues: result.error.issues.length }, 'Cookie cache file malformed, starting empty');
      return [];
    }
    return result.data.entries;
  }

  save(entries: CookieCacheEntry[]): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify({ version: 1, entries }, null, 2), { mode: 0o600 });
    logger.debug({ path: this.path, entryCount: entries.length }, 'Cookie cache saved');
  }
}
