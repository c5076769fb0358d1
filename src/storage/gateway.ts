import fs from 'fs';
import path from 'path';
import type { StorageConfig } from '../config.js';
import { StorageUnavailableError, describeError } from '../errors.js';
import type { AccountStats, Clock, StorageKind, TradeRecord } from '../types.js';
import { PostgresStorage } from './postgres.js';
import { SqliteStorage } from './sqlite.js';
import type { StorageBackend } from './types.js';
import { EmergencyCache } from './emergency.js';
import { YamlStorage, parseStatsDocument } from './yaml.js';

// Highest rank first; startup walks down from the preferred kind
export const STORAGE_RANKING: readonly StorageKind[] = ['postgres', 'sqlite', 'yaml'];

export const YAML_STATS_FILE = 'account_stats.yml';
export const EMERGENCY_CACHE_FILE = 'emergency_cache.yml';
export const EMERGENCY_TRADES_FILE = 'emergency_trades.yml';
export const MIGRATION_STAMP = '.migrated';

export type BackendFactory = (kind: StorageKind) => StorageBackend;

export interface GatewayOptions {
  preferred: StorageKind;
  dataDir: string;
  healthCheckInterval: number; // seconds
  shutdownTimeout: number; // seconds
  createBackend: BackendFactory;
  now?: Clock;
}

export function createBackendFactory(config: StorageConfig): BackendFactory {
  return (kind) => {
    switch (kind) {
      case 'postgres':
        return new PostgresStorage(config.postgres);
      case 'sqlite':
        return new SqliteStorage(config.sqliteFile);
      case 'yaml':
        return new YamlStorage(path.join(config.dataDir, YAML_STATS_FILE));
    }
  };
}

export function gatewayOptions(config: StorageConfig): GatewayOptions {
  return {
    preferred: config.type,
    dataDir: config.dataDir,
    healthCheckInterval: config.healthCheckInterval,
    shutdownTimeout: config.shutdownTimeout,
    createBackend: createBackendFactory(config),
  };
}

// Resolves true if `work` settled before the deadline
async function withTimeout(work: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([work.then(() => true), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Owns the active stats backend. Picks one at startup by rank, migrates the
 * legacy YAML file into SQL backends once, and substitutes a local emergency
 * cache while a networked backend is down.
 */
export class StorageGateway {
  private primary: StorageBackend | null = null;
  private emergency: EmergencyCache | null = null;
  // Detached while its contents are replayed; re-attached if the primary fails again
  private flushing: EmergencyCache | null = null;
  private activating: Promise<EmergencyCache | null> | null = null;
  private monitor: NodeJS.Timeout | null = null;
  private checking = false;
  private migration: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;
  private readonly now: Clock;

  constructor(private readonly options: GatewayOptions) {
    this.now = options.now ?? Date.now;
  }

  static async open(options: GatewayOptions): Promise<StorageGateway> {
    const gateway = new StorageGateway(options);
    await gateway.initialize();
    return gateway;
  }

  async initialize(): Promise<void> {
    const start = Math.max(0, STORAGE_RANKING.indexOf(this.options.preferred));
    const attempted: StorageKind[] = [];

    for (const kind of STORAGE_RANKING.slice(start)) {
      attempted.push(kind);
      const backend = this.options.createBackend(kind);
      if (await this.tryInitialize(backend)) {
        this.primary = backend;
        break;
      }
      console.warn(`[Storage] ${kind} backend unavailable, trying next`);
    }

    const primary = this.primary;
    if (!primary) throw new StorageUnavailableError(attempted);

    if (primary.kind !== this.options.preferred) {
      console.warn(`[Storage] Running on ${primary.kind} instead of ${this.options.preferred}`);
    }

    if (primary.kind !== 'yaml') {
      this.migration = this.migrateFromYaml(primary);
    }

    if (primary.kind === 'postgres') {
      // Leftovers from an outage that outlived the last run
      if (fs.existsSync(this.cachePath()) || fs.existsSync(this.tradesPath())) {
        await this.activateEmergencyCache();
      }
      this.startMonitor();
    }
  }

  // ─── Accessors ───

  getStorage(): StorageBackend {
    if (this.emergency) return this.emergency;
    if (!this.primary) throw new Error('Storage gateway is not initialized');
    return this.primary;
  }

  isUsingEmergencyCache(): boolean {
    return this.emergency !== null;
  }

  get activeKind(): StorageKind | null {
    return this.primary?.kind ?? null;
  }

  // Settles once the startup migration (if any) has finished or failed
  migrationDone(): Promise<void> {
    return this.migration;
  }

  // ─── Stats ───

  async incrementConverted(accountId: string, label: string, amount: number): Promise<void> {
    // The migration overwrites totals; increments land after it
    await this.migration;

    const target = this.getStorage();
    try {
      await target.incrementConverted(accountId, label, amount);
    } catch (err) {
      const cache = await this.divert(target, err, `stats for ${label}`);
      await cache.incrementConverted(accountId, label, amount);
    }
  }

  async recordTrade(trade: TradeRecord): Promise<void> {
    const target = this.getStorage();
    try {
      await target.recordTrade(trade);
    } catch (err) {
      const cache = await this.divert(target, err, `trade ${trade.id}`);
      await cache.recordTrade(trade);
    }
  }

  // Picks the emergency cache for a write the networked primary refused; rethrows otherwise
  private async divert(target: StorageBackend, err: unknown, what: string): Promise<EmergencyCache> {
    if (target.kind !== 'postgres') throw err;

    console.warn(`[Storage] Write of ${what} failed, diverting to emergency cache:`, describeError(err));
    const cache = this.emergency ?? (await this.activateEmergencyCache());
    if (!cache) throw err;
    return cache;
  }

  async getStats(accountId: string): Promise<AccountStats | null> {
    return this.getStorage().getStats(accountId);
  }

  async topStats(limit: number): Promise<AccountStats[]> {
    return this.getStorage().topStats(limit);
  }

  // ─── Migration ───

  private async migrateFromYaml(target: StorageBackend): Promise<void> {
    const source = path.join(this.options.dataDir, YAML_STATS_FILE);
    const stamp = path.join(this.options.dataDir, MIGRATION_STAMP);

    if (fs.existsSync(stamp) || !fs.existsSync(source) || fs.statSync(source).size === 0) return;

    console.log(`[Storage] Found ${YAML_STATS_FILE}, migrating to ${target.kind}...`);
    try {
      const records = parseStatsDocument(await fs.promises.readFile(source, 'utf-8'), this.now);
      for (const record of records) {
        await target.saveStats(record);
      }
      await fs.promises.writeFile(stamp, `${new Date(this.now()).toISOString()}\n`, 'utf-8');
      console.log(`[Storage] Migrated ${records.length} account(s) to ${target.kind}`);
    } catch (err) {
      console.error(`[Storage] Migration failed, ${YAML_STATS_FILE} kept:`, describeError(err));
      return;
    }

    try {
      await fs.promises.unlink(source);
    } catch (err) {
      console.warn(`[Storage] Could not delete ${YAML_STATS_FILE}, remove it manually:`, describeError(err));
    }
  }

  // ─── Degradation Monitor ───

  private startMonitor(): void {
    this.monitor = setInterval(() => {
      this.checkHealth().catch((err: unknown) => {
        console.error('[Storage] Health check error:', describeError(err));
      });
    }, this.options.healthCheckInterval * 1000);
    this.monitor.unref();
    console.log(`[Storage] Health monitor every ${this.options.healthCheckInterval}s`);
  }

  /**
   * One monitor cycle: divert to the emergency cache and reconnect while the
   * primary is down; flush the cache back once it answers again.
   */
  async checkHealth(): Promise<void> {
    const primary = this.primary;
    if (!primary || this.checking || this.closing) return;

    this.checking = true;
    try {
      if (!(await primary.ping())) {
        if (!this.emergency) await this.activateEmergencyCache();
        await this.reconnect(primary);
      } else if (this.emergency) {
        await this.flushEmergencyCache(primary);
      }
    } finally {
      this.checking = false;
    }
  }

  private cachePath(): string {
    return path.join(this.options.dataDir, EMERGENCY_CACHE_FILE);
  }

  private tradesPath(): string {
    return path.join(this.options.dataDir, EMERGENCY_TRADES_FILE);
  }

  private activateEmergencyCache(): Promise<EmergencyCache | null> {
    // Mid-flush: the detached cache still owns the files
    if (this.flushing) {
      this.emergency = this.flushing;
      return Promise.resolve(this.flushing);
    }
    if (!this.activating) {
      this.activating = this.openEmergencyCache().finally(() => {
        this.activating = null;
      });
    }
    return this.activating;
  }

  private async openEmergencyCache(): Promise<EmergencyCache | null> {
    const cache = new EmergencyCache(this.cachePath(), this.tradesPath(), this.now);
    if (!(await cache.initialize())) {
      console.error('[Storage] Emergency cache could not be opened');
      return null;
    }
    this.emergency = cache;
    console.warn(`[Storage] Emergency cache active (${EMERGENCY_CACHE_FILE})`);
    return cache;
  }

  private async reconnect(stale: StorageBackend): Promise<void> {
    console.log(`[Storage] Reconnecting to ${stale.kind}...`);
    const fresh = this.options.createBackend(stale.kind);
    if (!(await this.tryInitialize(fresh))) {
      console.warn(`[Storage] Reconnect to ${stale.kind} failed`);
      return;
    }

    this.primary = fresh;
    console.log(`[Storage] Reconnected to ${stale.kind}`);
    await stale.close().catch((err: unknown) => {
      console.warn('[Storage] Failed to close stale backend:', describeError(err));
    });
  }

  private async flushEmergencyCache(primary: StorageBackend): Promise<void> {
    const cache = this.emergency;
    if (!cache) return;

    await this.migration;

    // New writes go to the primary while the detached cache drains
    this.emergency = null;
    this.flushing = cache;
    console.log('[Storage] Primary back online, flushing emergency cache...');

    let flushed: number;
    try {
      flushed = await this.replay(cache, primary);
    } catch (err) {
      console.error('[Storage] Emergency cache flush failed, keeping cache:', describeError(err));
      this.emergency = cache;
      return;
    } finally {
      this.flushing = null;
    }

    if (this.emergency === cache || !cache.isEmpty) {
      // A write was diverted back into the cache during the flush
      this.emergency = cache;
      console.warn('[Storage] Emergency cache received writes during flush, keeping it');
      return;
    }

    await cache.discard();
    console.log(`[Storage] Flushed ${flushed} record(s) from emergency cache`);
  }

  // Copies each cached entry to the primary, then takes exactly that much out of the cache
  private async replay(cache: EmergencyCache, primary: StorageBackend): Promise<number> {
    const records = await cache.listStats();
    for (const record of records) {
      // The cache only holds what was written during the outage
      await primary.incrementConverted(record.id, record.label, record.totalConverted);
      await cache.deduct(record.id, record.totalConverted);
    }

    const trades = cache.heldTrades();
    for (const trade of trades) {
      // Trade ids are unique on the primary, so a repeat is ignored
      await primary.recordTrade(trade);
      await cache.removeTrade(trade.id);
    }
    return records.length + trades.length;
  }

  private async tryInitialize(backend: StorageBackend): Promise<boolean> {
    try {
      return await backend.initialize();
    } catch (err) {
      console.error(`[Storage] ${backend.kind} initialization error:`, describeError(err));
      return false;
    }
  }

  // ─── Shutdown ───

  shutdown(): Promise<void> {
    if (!this.closing) this.closing = this.close();
    return this.closing;
  }

  private async close(): Promise<void> {
    if (this.monitor) {
      clearInterval(this.monitor);
      this.monitor = null;
    }

    const work = async (): Promise<void> => {
      await this.migration;
      const cache = this.emergency ?? this.flushing;
      if (cache) {
        // Kept on disk; the next start flushes it
        await cache.saveAll();
        await cache.close();
      }
      const primary = this.primary;
      if (primary) {
        console.log(`[Storage] Closing ${primary.kind}...`);
        await primary.saveAll();
        await primary.close();
      }
    };

    const finished = await withTimeout(
      work().catch((err: unknown) => {
        console.warn('[Storage] Error during shutdown:', describeError(err));
      }),
      this.options.shutdownTimeout * 1000,
    );
    if (!finished) {
      console.warn(`[Storage] Shutdown exceeded ${this.options.shutdownTimeout}s, forcing close`);
    }
  }
}
