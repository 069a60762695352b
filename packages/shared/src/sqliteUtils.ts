/**
 * @parley-module: SqliteUtils
 * @parley-risk: moderate
 * @parley-scope: storage
 *
 * @description
 * Shared helpers for the SQLite-backed stores: opening a database in WAL mode
 * and retrying statements that hit SQLITE_BUSY / SQLITE_LOCKED with linear backoff.
 */
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

const BUSY_MAX_ATTEMPTS = 5;
const BUSY_RETRY_DELAY_MS = 50;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Opens (and creates when missing) a SQLite database. `:memory:` is passed through untouched.
 */
export function openSqliteDatabase(dbPath: string): Database.Database {
  if (dbPath === ':memory:') {
    return new Database(dbPath);
  }

  const resolvedPath = path.resolve(dbPath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

export function isBusyError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  const code = 'code' in error ? error.code : undefined;
  return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
}

export async function withRetry<T>(operation: () => T): Promise<T> {
  for (let attempt = 1; attempt <= BUSY_MAX_ATTEMPTS; attempt++) {
    try {
      return operation();
    } catch (error) {
      if (isBusyError(error) && attempt < BUSY_MAX_ATTEMPTS) {
        await sleep(BUSY_RETRY_DELAY_MS * attempt);
        continue;
      }
      throw error;
    }
  }

  throw new Error('Failed to execute SQLite operation after retries.');
}
