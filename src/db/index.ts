import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import path from 'path';
import fs from 'fs';

export type ExchangeDatabase = BetterSQLite3Database<typeof schema>;

export interface OpenDatabase {
  sqlite: Database.Database;
  db: ExchangeDatabase;
}

export function openDatabase(file: string): OpenDatabase {
  // Ensure data directory exists
  fs.mkdirSync(path.dirname(file), { recursive: true });

  const sqlite = new Database(file);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

// ─── Initialize tables ───
export function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS account_stats (
      id TEXT PRIMARY KEY,
      label TEXT NOT NULL,
      total_converted INTEGER NOT NULL DEFAULT 0,
      last_updated INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS trade_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      trade_id TEXT NOT NULL UNIQUE,
      account_id TEXT NOT NULL,
      label TEXT NOT NULL,
      direction TEXT NOT NULL,
      quantity INTEGER NOT NULL,
      amount REAL NOT NULL,
      unit_price REAL NOT NULL,
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS account_stats_total_idx ON account_stats(total_converted);
    CREATE INDEX IF NOT EXISTS trade_log_account_idx ON trade_log(account_id);
    CREATE INDEX IF NOT EXISTS trade_log_timestamp_idx ON trade_log(timestamp);
  `);
}

export { schema };
