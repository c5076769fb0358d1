import pg from 'pg';
import PQueue from 'p-queue';
import { z } from 'zod';
import type { StorageConfig } from '../config.js';
import { describeError } from '../errors.js';
import type { AccountStats, Clock, TradeRecord } from '../types.js';
import type { StorageBackend } from './types.js';

export type PostgresConfig = StorageConfig['postgres'];

// The slice of pg.Pool this backend uses
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export type PoolFactory = (config: PostgresConfig) => SqlPool;

export function createPgPool(config: PostgresConfig): SqlPool {
  const pool = new pg.Pool({
    connectionString: config.url,
    max: config.poolSize,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.connectionTimeout,
  });

  pool.on('error', (err: Error) => {
    console.error('[Storage] PostgreSQL pool error:', err.message);
  });

  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

// ─── Schema ───

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS account_stats (
    id TEXT PRIMARY KEY,
    label TEXT NOT NULL,
    total_converted BIGINT NOT NULL DEFAULT 0,
    last_updated BIGINT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS account_stats_total_idx ON account_stats (total_converted)`,
  `CREATE TABLE IF NOT EXISTS trade_log (
    id BIGSERIAL PRIMARY KEY,
    trade_id TEXT NOT NULL UNIQUE,
    account_id TEXT NOT NULL,
    label TEXT NOT NULL,
    direction TEXT NOT NULL,
    quantity INTEGER NOT NULL,
    amount NUMERIC(14, 2) NOT NULL,
    unit_price NUMERIC(14, 2) NOT NULL,
    timestamp BIGINT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS trade_log_account_idx ON trade_log (account_id)`,
];

const STATS_COLUMNS = 'id, label, total_converted, last_updated';

// BIGINT columns arrive as strings
const StatsRow = z.object({
  id: z.string(),
  label: z.string(),
  total_converted: z.coerce.number(),
  last_updated: z.coerce.number(),
});

const TotalRow = z.object({ total_converted: z.coerce.number() });

function toStats(row: unknown): AccountStats {
  const parsed = StatsRow.parse(row);
  return {
    id: parsed.id,
    label: parsed.label,
    totalConverted: parsed.total_converted,
    lastUpdated: parsed.last_updated,
  };
}

/**
 * Networked stats store. Writes share the pool through a queue bounded by
 * the pool size; any failed query marks the backend unavailable until the
 * next successful ping.
 */
export class PostgresStorage implements StorageBackend {
  readonly kind = 'postgres' as const;
  private pool: SqlPool | null = null;
  private writer: PQueue;
  private available = false;

  constructor(
    private readonly config: PostgresConfig,
    private readonly createPool: PoolFactory = createPgPool,
    private readonly now: Clock = Date.now,
  ) {
    this.writer = new PQueue({ concurrency: config.poolSize });
  }

  async initialize(): Promise<boolean> {
    const pool = this.createPool(this.config);
    try {
      for (const statement of SCHEMA) {
        await pool.query(statement);
      }
      this.pool = pool;
      this.available = true;
      console.log(`[Storage] PostgreSQL storage ready (pool size ${this.config.poolSize})`);
      return true;
    } catch (err) {
      console.error('[Storage] PostgreSQL unavailable:', describeError(err));
      await pool.end().catch((endErr: unknown) => {
        console.warn('[Storage] Failed to release PostgreSQL pool:', describeError(endErr));
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.writer.onIdle();
    const pool = this.pool;
    this.pool = null;
    this.available = false;
    if (pool) await pool.end();
  }

  async ping(): Promise<boolean> {
    if (!this.pool) return false;
    try {
      await this.pool.query('SELECT 1');
      this.available = true;
    } catch (err) {
      if (this.available) console.warn('[Storage] PostgreSQL ping failed:', describeError(err));
      this.available = false;
    }
    return this.available;
  }

  async getStats(accountId: string): Promise<AccountStats | null> {
    const { rows } = await this.query(`SELECT ${STATS_COLUMNS} FROM account_stats WHERE id = $1`, [accountId]);
    return rows.length > 0 ? toStats(rows[0]) : null;
  }

  async saveStats(stats: AccountStats): Promise<void> {
    await this.write(
      `INSERT INTO account_stats (${STATS_COLUMNS}) VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE SET
         label = EXCLUDED.label,
         total_converted = EXCLUDED.total_converted,
         last_updated = EXCLUDED.last_updated`,
      [stats.id, stats.label, stats.totalConverted, stats.lastUpdated],
    );
  }

  async incrementConverted(accountId: string, label: string, amount: number): Promise<void> {
    await this.write(
      `INSERT INTO account_stats (${STATS_COLUMNS}) VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE SET
         label = EXCLUDED.label,
         total_converted = account_stats.total_converted + EXCLUDED.total_converted,
         last_updated = EXCLUDED.last_updated`,
      [accountId, label, amount, this.now()],
    );
  }

  async recordTrade(trade: TradeRecord): Promise<void> {
    await this.write(
      `INSERT INTO trade_log (trade_id, account_id, label, direction, quantity, amount, unit_price, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (trade_id) DO NOTHING`,
      [trade.id, trade.accountId, trade.label, trade.direction, trade.quantity, trade.amount, trade.unitPrice, trade.timestamp],
    );
  }

  async getTotalConverted(accountId: string): Promise<number> {
    const { rows } = await this.query('SELECT total_converted FROM account_stats WHERE id = $1', [accountId]);
    return rows.length > 0 ? TotalRow.parse(rows[0]).total_converted : 0;
  }

  async listStats(): Promise<AccountStats[]> {
    const { rows } = await this.query(`SELECT ${STATS_COLUMNS} FROM account_stats`);
    return rows.map(toStats);
  }

  async topStats(limit: number): Promise<AccountStats[]> {
    const { rows } = await this.query(
      `SELECT ${STATS_COLUMNS} FROM account_stats ORDER BY total_converted DESC LIMIT $1`,
      [limit],
    );
    return rows.map(toStats);
  }

  async saveAll(): Promise<void> {
    await this.writer.onIdle();
  }

  isAvailable(): boolean {
    return this.available;
  }

  // ─── Query Helpers ───

  private async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    if (!this.pool) throw new Error('PostgreSQL storage is not open');
    try {
      return await this.pool.query(text, values);
    } catch (err) {
      this.markUnavailable(err);
      throw err;
    }
  }

  private async write(text: string, values: unknown[]): Promise<void> {
    await this.writer.add(async () => {
      await this.query(text, values);
    });
  }

  private markUnavailable(err: unknown): void {
    if (this.available) {
      console.error('[Storage] PostgreSQL query failed, marking unavailable:', describeError(err));
    }
    this.available = false;
  }
}
