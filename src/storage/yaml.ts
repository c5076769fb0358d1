import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import PQueue from 'p-queue';
import { z } from 'zod';
import { describeError } from '../errors.js';
import type { AccountStats, Clock } from '../types.js';
import type { StorageBackend } from './types.js';

// Older files used player_name / total_converted / last_transaction
const EntrySchema = z.object({
  name: z.string().optional(),
  player_name: z.string().optional(),
  total: z.number().int().nonnegative().optional(),
  total_converted: z.number().int().nonnegative().optional(),
  updated: z.number().optional(),
  last_transaction: z.number().optional(),
});

const DocumentSchema = z.record(z.string(), z.unknown()).nullable();

interface StoredEntry {
  name: string;
  total: number;
  updated: number;
}

/**
 * Reads account stats out of a YAML document. Malformed entries are skipped.
 */
export function parseStatsDocument(text: string, now: Clock = Date.now): AccountStats[] {
  const document = DocumentSchema.parse(yaml.load(text) ?? null) ?? {};
  const stats: AccountStats[] = [];

  for (const [id, value] of Object.entries(document)) {
    const entry = EntrySchema.safeParse(value);
    if (!entry.success) {
      console.warn(`[Storage] Skipping malformed YAML entry: ${id}`);
      continue;
    }
    stats.push({
      id,
      label: entry.data.name ?? entry.data.player_name ?? 'Unknown',
      totalConverted: entry.data.total ?? entry.data.total_converted ?? 0,
      lastUpdated: entry.data.updated ?? entry.data.last_transaction ?? now(),
    });
  }
  return stats;
}

/**
 * File-backed stats store. The in-memory map is authoritative; every change
 * rewrites the whole file through a single writer.
 */
export class YamlStorage implements StorageBackend {
  readonly kind = 'yaml' as const;
  private stats = new Map<string, AccountStats>();
  private writer = new PQueue({ concurrency: 1 });
  private available = false;

  constructor(readonly file: string, private readonly now: Clock = Date.now) {}

  async initialize(): Promise<boolean> {
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      if (fs.existsSync(this.file)) {
        for (const entry of parseStatsDocument(fs.readFileSync(this.file, 'utf-8'), this.now)) {
          this.stats.set(entry.id, entry);
        }
      }
      this.available = true;
      console.log(`[Storage] YAML storage ready (${path.basename(this.file)}, ${this.stats.size} account(s))`);
      return true;
    } catch (err) {
      console.error(`[Storage] YAML storage failed to open ${this.file}:`, describeError(err));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.writer.onIdle();
    this.available = false;
  }

  async ping(): Promise<boolean> {
    return this.available;
  }

  async getStats(accountId: string): Promise<AccountStats | null> {
    const entry = this.stats.get(accountId);
    return entry ? { ...entry } : null;
  }

  async saveStats(stats: AccountStats): Promise<void> {
    this.stats.set(stats.id, { ...stats });
    await this.persist();
  }

  async incrementConverted(accountId: string, label: string, amount: number): Promise<void> {
    const current = this.stats.get(accountId);
    this.stats.set(accountId, {
      id: accountId,
      label,
      totalConverted: (current?.totalConverted ?? 0) + amount,
      lastUpdated: this.now(),
    });
    await this.persist();
  }

  // Takes back `amount` after it was copied elsewhere; the entry goes once nothing is left
  async deduct(accountId: string, amount: number): Promise<void> {
    const current = this.stats.get(accountId);
    if (!current) return;

    const remaining = current.totalConverted - amount;
    if (remaining > 0) {
      this.stats.set(accountId, { ...current, totalConverted: remaining });
    } else {
      this.stats.delete(accountId);
    }
    await this.persist();
  }

  // Trades are journaled by the recorder's file sink
  async recordTrade(): Promise<void> {}

  async getTotalConverted(accountId: string): Promise<number> {
    return this.stats.get(accountId)?.totalConverted ?? 0;
  }

  async listStats(): Promise<AccountStats[]> {
    return [...this.stats.values()].map((entry) => ({ ...entry }));
  }

  async topStats(limit: number): Promise<AccountStats[]> {
    return (await this.listStats())
      .sort((a, b) => b.totalConverted - a.totalConverted)
      .slice(0, limit);
  }

  async saveAll(): Promise<void> {
    await this.persist();
  }

  isAvailable(): boolean {
    return this.available;
  }

  get size(): number {
    return this.stats.size;
  }

  // ─── Persistence ───

  private async persist(): Promise<void> {
    await this.writer.add(() => this.writeFile());
  }

  private async writeFile(): Promise<void> {
    const document: Record<string, StoredEntry> = {};
    for (const entry of this.stats.values()) {
      document[entry.id] = { name: entry.label, total: entry.totalConverted, updated: entry.lastUpdated };
    }

    const tmp = `${this.file}.tmp`;
    try {
      await fs.promises.writeFile(tmp, yaml.dump(document), 'utf-8');
      await fs.promises.rename(tmp, this.file);
    } catch (err) {
      console.error(`[Storage] Failed to write ${path.basename(this.file)}:`, describeError(err));
      throw err;
    }
  }
}
