/**
 * Cookie reader for Chromium-family browsers (Chrome, Chromium, Edge,
 * Brave, Opera, Vivaldi).
 *
 * Values are encrypted with AES-128-CBC under a key derived from a
 * per-platform password ("v10" prefix). Linux uses a fixed password,
 * macOS keeps it in the Keychain. "v11" (libsecret) and Windows DPAPI
 * values are not supported and are skipped.
 */

import { execFile } from 'node:child_process';
import { createDecipheriv, pbkdf2Sync } from 'node:crypto';
import { existsSync } from 'node:fs';
import { promisify } from 'node:util';
import { eq, like, or } from 'drizzle-orm';
import { getLogger } from '../shared/logger.js';
import type { BrowserName } from '../shared/constants.js';
import type { BrowserCookie, BrowserCookieReader } from '../types/cookie.types.js';
import { chromiumCookies, chromiumMeta } from './browser-schema.js';
import { hasTable, withSnapshot } from './sqlite-snapshot.js';

const execFileAsync = promisify(execFile);
const logger = getLogger('cookies', { component: 'chromium-reader' });

const SALT = 'saltysalt';
const KEY_LENGTH = 16;
const IV = Buffer.alloc(16, ' ');
const LINUX_PASSWORD = 'peanuts';
const LINUX_ITERATIONS = 1;
const MACOS_ITERATIONS = 1003;
/** From this schema version on, plaintext starts with SHA-256(host). */
const DOMAIN_HASH_VERSION = 24;
const DOMAIN_HASH_BYTES = 32;

interface ChromiumSnapshot {
  rows: Array<{ host: string; name: string; value: string; encryptedValue: Buffer | null }>;
  schemaVersion: number;
}

/** Resolves the AES key, or null when it cannot be obtained. */
export type KeyProvider = () => Promise<Buffer | null>;

export function deriveKey(password: string, iterations: number): Buffer {
  return pbkdf2Sync(password, SALT, iterations, KEY_LENGTH, 'sha1');
}

export function linuxKeyProvider(): KeyProvider {
  const key = deriveKey(LINUX_PASSWORD, LINUX_ITERATIONS);
  return async () => key;
}

/**
 * Reads "<Browser> Safe Storage" from the login Keychain. macOS may show
 * an access prompt the first time.
 */
export function macKeychainKeyProvider(service: string): KeyProvider {
  let cached: Buffer | null | undefined;
  return async () => {
    if (cached !== undefined) {
      return cached;
    }
    try {
      const { stdout } = await execFileAsync('security', ['find-generic-password', '-w', '-s', service], {
        timeout: 10_000,
      });
      cached = deriveKey(stdout.trim(), MACOS_ITERATIONS);
    } catch (error) {
      logger.debug({ service, err: error }, 'Keychain password unavailable');
      cached = null;
    }
    return cached;
  };
}

/**
 * Decrypts one "v10" value. Returns null for other formats.
 * Throws when the key is wrong (bad padding).
 */
export function decryptValue(encrypted: Buffer, key: Buffer, hasDomainHash: boolean): string | null {
  if (encrypted.subarray(0, 3).toString('latin1') !== 'v10') {
    return null;
  }
  const decipher = createDecipheriv('aes-128-cbc', key, IV);
  const plain = Buffer.concat([decipher.update(encrypted.subarray(3)), decipher.final()]);
  return (hasDomainHash ? plain.subarray(DOMAIN_HASH_BYTES) : plain).toString('utf8');
}

export class ChromiumCookieReader implements BrowserCookieReader {
  constructor(
    readonly browser: BrowserName,
    private readonly cookieFiles: readonly string[],
    private readonly keyProvider: KeyProvider,
  ) {}

  async read(domain: string): Promise<BrowserCookie[]> {
    const dbPath = this.cookieFiles.find((file) => existsSync(file));
    if (!dbPath) {
      logger.debug({ browser: this.browser }, 'No cookie database found');
      return [];
    }

    const { rows, schemaVersion } = withSnapshot<ChromiumSnapshot>(dbPath, (db) => {
      if (!hasTable(db, 'cookies')) {
        return { rows: [], schemaVersion: 0 };
      }
      const meta = hasTable(db, 'meta')
        ? db.select({ value: chromiumMeta.value }).from(chromiumMeta).where(eq(chromiumMeta.key, 'version')).get()
        : undefined;
      const rows = db
        .select({
          host: chromiumCookies.hostKey,
          name: chromiumCookies.name,
          value: chromiumCookies.value,
          encryptedValue: chromiumCookies.encryptedValue,
        })
        .from(chromiumCookies)
        .where(
          or(
            eq(chromiumCookies.hostKey, domain),
            eq(chromiumCookies.hostKey, `.${domain}`),
            like(chromiumCookies.hostKey, `%.${domain}`),
          ),
        )
        .all();
      return { rows, schemaVersion: Number(meta?.value ?? 0) || 0 };
    });

    const encrypted = rows.filter((row) => !row.value && row.encryptedValue && row.encryptedValue.length > 0);
    const key = encrypted.length > 0 ? await this.keyProvider() : null;
    const hasDomainHash = schemaVersion >= DOMAIN_HASH_VERSION;

    const cookies: BrowserCookie[] = [];
    for (const row of rows) {
      if (row.value) {
        cookies.push({ host: row.host, name: row.name, value: row.value });
        continue;
      }
      if (!row.encryptedValue || !key) {
        continue;
      }
      const value = this.decrypt(row.encryptedValue, key, hasDomainHash, row.name);
      if (value !== null) {
        cookies.push({ host: row.host, name: row.name, value });
      }
    }

    logger.debug(
      { browser: this.browser, domain, rows: rows.length, decoded: cookies.length },
      'Chromium cookies read',
    );
    return cookies;
  }

  private decrypt(encrypted: Buffer, key: Buffer, hasDomainHash: boolean, name: string): string | null {
    try {
      return decryptValue(encrypted, key, hasDomainHash);
    } catch (error) {
      logger.debug({ browser: this.browser, name, err: error }, 'Cookie value could not be decrypted');
      return null;
    }
  }
}
