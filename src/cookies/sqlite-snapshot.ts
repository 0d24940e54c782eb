import Database from 'better-sqlite3';
import { sql } from 'drizzle-orm';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { copyFileSync, existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import * as schema from './browser-schema.js';

export type BrowserDb = BetterSQLite3Database<typeof schema>;

/**
 * Runs `fn` against a private copy of a browser's SQLite store. A running
 * browser keeps the live file locked, and recent writes may still sit in
 * the -wal file, so both are copied.
 */
export function withSnapshot<T>(path: string, fn: (db: BrowserDb) => T): T {
  const dir = mkdtempSync(join(tmpdir(), 'cpfetch-'));
  const copy = join(dir, basename(path));

  try {
    copyFileSync(path, copy);
    for (const suffix of ['-wal', '-shm']) {
      if (existsSync(`${path}${suffix}`)) {
        copyFileSync(`${path}${suffix}`, `${copy}${suffix}`);
      }
    }

    const sqlite = new Database(copy, { fileMustExist: true });
    try {
      return fn(drizzle(sqlite, { schema }));
    } finally {
      sqlite.close();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function hasTable(db: BrowserDb, table: string): boolean {
  const row = db.get(sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ${table}`);
  return row !== undefined;
}
