import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import PQueue from 'p-queue';
import { z } from 'zod';
import { describeError } from '../errors.js';
import type { AccountStats, Clock, TradeRecord } from '../types.js';
import type { StorageBackend } from './types.js';
import { YamlStorage } from './yaml.js';

const TradeEntry = z.object({
  id: z.string(),
  accountId: z.string(),
  label: z.string(),
  direction: z.enum(['BUY', 'SELL']),
  quantity: z.number().int().positive(),
  amount: z.number(),
  unitPrice: z.number(),
  timestamp: z.number(),
});

/**
 * Reads held trade rows out of a YAML list. Malformed entries are skipped.
 */
export function parseTradeDocument(text: string): TradeRecord[] {
  const document: unknown = yaml.load(text) ?? [];
  if (!Array.isArray(document)) {
    throw new Error('Expected a list of trades');
  }

  const trades: TradeRecord[] = [];
  for (const item of document) {
    const entry = TradeEntry.safeParse(item);
    if (entry.success) {
      trades.push(entry.data);
    } else {
      console.warn('[Storage] Skipping malformed held trade');
    }
  }
  return trades;
}

/**
 * Local stand-in for a networked backend while it is down. Stats go to a
 * YAML store; trade rows are held in a second file until they can be replayed.
 */
export class EmergencyCache implements StorageBackend {
  readonly kind = 'yaml' as const;
  private readonly stats: YamlStorage;
  private trades = new Map<string, TradeRecord>();
  private writer = new PQueue({ concurrency: 1 });

  constructor(
    readonly statsFile: string,
    readonly tradesFile: string,
    now: Clock = Date.now,
  ) {
    this.stats = new YamlStorage(statsFile, now);
  }

  async initialize(): Promise<boolean> {
    if (!(await this.stats.initialize())) return false;
    try {
      if (fs.existsSync(this.tradesFile)) {
        for (const trade of parseTradeDocument(fs.readFileSync(this.tradesFile, 'utf-8'))) {
          this.trades.set(trade.id, trade);
        }
      }
      return true;
    } catch (err) {
      console.error(`[Storage] Could not read held trades from ${this.tradesFile}:`, describeError(err));
      await this.stats.close();
      return false;
    }
  }

  async close(): Promise<void> {
    await this.writer.onIdle();
    await this.stats.close();
  }

  // Closes and deletes both files once everything has been replayed
  async discard(): Promise<void> {
    await this.close();
    await fs.promises.rm(this.statsFile, { force: true });
    await fs.promises.rm(this.tradesFile, { force: true });
  }

  ping(): Promise<boolean> {
    return this.stats.ping();
  }

  getStats(accountId: string): Promise<AccountStats | null> {
    return this.stats.getStats(accountId);
  }

  saveStats(stats: AccountStats): Promise<void> {
    return this.stats.saveStats(stats);
  }

  incrementConverted(accountId: string, label: string, amount: number): Promise<void> {
    return this.stats.incrementConverted(accountId, label, amount);
  }

  deduct(accountId: string, amount: number): Promise<void> {
    return this.stats.deduct(accountId, amount);
  }

  async recordTrade(trade: TradeRecord): Promise<void> {
    this.trades.set(trade.id, trade);
    await this.persistTrades();
  }

  async removeTrade(tradeId: string): Promise<void> {
    if (this.trades.delete(tradeId)) await this.persistTrades();
  }

  heldTrades(): TradeRecord[] {
    return [...this.trades.values()];
  }

  getTotalConverted(accountId: string): Promise<number> {
    return this.stats.getTotalConverted(accountId);
  }

  listStats(): Promise<AccountStats[]> {
    return this.stats.listStats();
  }

  topStats(limit: number): Promise<AccountStats[]> {
    return this.stats.topStats(limit);
  }

  async saveAll(): Promise<void> {
    await this.stats.saveAll();
    // Every trade change is already queued for writing
    await this.writer.onIdle();
  }

  isAvailable(): boolean {
    return this.stats.isAvailable();
  }

  get isEmpty(): boolean {
    return this.stats.size === 0 && this.trades.size === 0;
  }

  // ─── Persistence ───

  private async persistTrades(): Promise<void> {
    await this.writer.add(() => this.writeTrades());
  }

  private async writeTrades(): Promise<void> {
    const tmp = `${this.tradesFile}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.tradesFile), { recursive: true });
      await fs.promises.writeFile(tmp, yaml.dump([...this.trades.values()]), 'utf-8');
      await fs.promises.rename(tmp, this.tradesFile);
    } catch (err) {
      console.error(`[Storage] Failed to write ${path.basename(this.tradesFile)}:`, describeError(err));
      throw err;
    }
  }
}
