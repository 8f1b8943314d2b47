import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreInitializationError, VANTAGE_DB_FILE, errorMessage } from '@vantage/shared';
import { runMigrations } from './migrations/index.js';

export type Database = BetterSqlite3.Database;

/**
 * Open (creating if needed) the snapshot database and bring its schema up
 * to date. Each call returns a new connection owned by the caller.
 */
export function openDatabase(dbPath: string = VANTAGE_DB_FILE): Database {
  let db: Database | null = null;
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    db = new BetterSqlite3(dbPath);

    // WAL lets aggregate reads proceed while the writer appends
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');

    runMigrations(db);
    return db;
  } catch (err) {
    db?.close();
    throw new StoreInitializationError(dbPath, errorMessage(err));
  }
}

export function closeDatabase(db: Database): void {
  if (db.open) {
    db.close();
  }
}
