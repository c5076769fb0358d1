import { desc, eq, sql } from 'drizzle-orm';
import PQueue from 'p-queue';
import { initializeDatabase, openDatabase, type ExchangeDatabase, type OpenDatabase } from '../db/index.js';
import { accountStats, tradeLog } from '../db/schema.js';
import { describeError } from '../errors.js';
import type { AccountStats, Clock, TradeRecord } from '../types.js';
import type { StorageBackend } from './types.js';

export class SqliteStorage implements StorageBackend {
  readonly kind = 'sqlite' as const;
  private handle: OpenDatabase | null = null;
  // better-sqlite3 is synchronous; the queue keeps write order stable across awaits
  private writer = new PQueue({ concurrency: 1 });

  constructor(readonly file: string, private readonly now: Clock = Date.now) {}

  async initialize(): Promise<boolean> {
    try {
      const handle = openDatabase(this.file);
      initializeDatabase(handle.sqlite);
      this.handle = handle;
      console.log(`[Storage] SQLite storage ready (${this.file})`);
      return true;
    } catch (err) {
      console.error(`[Storage] SQLite storage failed to open ${this.file}:`, describeError(err));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.writer.onIdle();
    if (this.handle) {
      this.handle.sqlite.close();
      this.handle = null;
    }
  }

  async ping(): Promise<boolean> {
    if (!this.handle) return false;
    try {
      this.handle.sqlite.prepare('SELECT 1').get();
      return true;
    } catch (err) {
      console.warn('[Storage] SQLite ping failed:', describeError(err));
      return false;
    }
  }

  async getStats(accountId: string): Promise<AccountStats | null> {
    const row = this.db.select().from(accountStats).where(eq(accountStats.id, accountId)).get();
    return row ?? null;
  }

  async saveStats(stats: AccountStats): Promise<void> {
    await this.writer.add(async () => {
      this.db
        .insert(accountStats)
        .values(stats)
        .onConflictDoUpdate({
          target: accountStats.id,
          set: { label: stats.label, totalConverted: stats.totalConverted, lastUpdated: stats.lastUpdated },
        })
        .run();
    });
  }

  async incrementConverted(accountId: string, label: string, amount: number): Promise<void> {
    await this.writer.add(async () => {
      const now = this.now();
      this.db
        .insert(accountStats)
        .values({ id: accountId, label, totalConverted: amount, lastUpdated: now })
        .onConflictDoUpdate({
          target: accountStats.id,
          set: {
            label,
            totalConverted: sql`${accountStats.totalConverted} + ${amount}`,
            lastUpdated: now,
          },
        })
        .run();
    });
  }

  async recordTrade(trade: TradeRecord): Promise<void> {
    await this.writer.add(async () => {
      this.db
        .insert(tradeLog)
        .values({
          tradeId: trade.id,
          accountId: trade.accountId,
          label: trade.label,
          direction: trade.direction,
          quantity: trade.quantity,
          amount: trade.amount,
          unitPrice: trade.unitPrice,
          timestamp: trade.timestamp,
        })
        .onConflictDoNothing()
        .run();
    });
  }

  async getTotalConverted(accountId: string): Promise<number> {
    const row = this.db
      .select({ total: accountStats.totalConverted })
      .from(accountStats)
      .where(eq(accountStats.id, accountId))
      .get();
    return row?.total ?? 0;
  }

  async listStats(): Promise<AccountStats[]> {
    return this.db.select().from(accountStats).all();
  }

  async topStats(limit: number): Promise<AccountStats[]> {
    return this.db.select().from(accountStats).orderBy(desc(accountStats.totalConverted)).limit(limit).all();
  }

  // Every write is committed as it happens
  async saveAll(): Promise<void> {
    await this.writer.onIdle();
  }

  isAvailable(): boolean {
    return this.handle !== null && this.handle.sqlite.open;
  }

  private get db(): ExchangeDatabase {
    if (!this.handle) throw new Error('SQLite storage is not open');
    return this.handle.db;
  }
}
