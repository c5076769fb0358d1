import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseConfig, type ExchangeConfig } from '../config.js';
import type { PoolFactory, SqlPool } from '../storage/postgres.js';

export function tempDir(prefix = 'emerald-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(dataDir: string, raw: Record<string, unknown> = {}): ExchangeConfig {
  return parseConfig(raw, { DATA_DIR: dataDir });
}

export interface ManualClock {
  now: () => number;
  advance(ms: number): void;
}

export function manualClock(start = 1_700_000_000_000): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ─── In-process stand-in for a PostgreSQL server ───

export interface StatsRowData {
  id: string;
  label: string;
  total_converted: string;
  last_updated: string;
}

/**
 * Shared state behind every pool the fake factory hands out, so a reconnect
 * sees the same rows. Flip `up` to simulate an outage.
 */
export class FakeNetworkStore {
  up = true;
  rows = new Map<string, StatsRowData>();
  trades: unknown[][] = [];
  queries: string[] = [];
}

export function fakePoolFactory(store: FakeNetworkStore): PoolFactory {
  return (): SqlPool => ({
    async query(text: string, values: unknown[] = []) {
      if (!store.up) throw new Error('connect ECONNREFUSED 127.0.0.1:5432');

      const sql = text.replace(/\s+/g, ' ').trim();
      store.queries.push(sql);

      if (sql === 'SELECT 1' || sql.startsWith('CREATE')) {
        return { rows: [] };
      }
      if (sql.startsWith('INSERT INTO account_stats')) {
        const [id, label, total, updated] = values;
        const existing = store.rows.get(String(id));
        const increments = sql.includes('account_stats.total_converted + EXCLUDED.total_converted');
        const base = existing && increments ? Number(existing.total_converted) : 0;
        store.rows.set(String(id), {
          id: String(id),
          label: String(label),
          total_converted: String(base + Number(total)),
          last_updated: String(updated),
        });
        return { rows: [] };
      }
      if (sql.startsWith('INSERT INTO trade_log')) {
        store.trades.push(values);
        return { rows: [] };
      }
      if (sql.startsWith('SELECT total_converted FROM account_stats WHERE id = $1')) {
        const row = store.rows.get(String(values[0]));
        return { rows: row ? [{ total_converted: row.total_converted }] : [] };
      }
      if (sql.endsWith('FROM account_stats WHERE id = $1')) {
        const row = store.rows.get(String(values[0]));
        return { rows: row ? [row] : [] };
      }
      if (sql.includes('ORDER BY total_converted DESC')) {
        const sorted = [...store.rows.values()].sort((a, b) => Number(b.total_converted) - Number(a.total_converted));
        return { rows: sorted.slice(0, Number(values[0])) };
      }
      if (sql.endsWith('FROM account_stats')) {
        return { rows: [...store.rows.values()] };
      }
      throw new Error(`Unexpected query: ${sql}`);
    },
    async end() {},
  });
}
