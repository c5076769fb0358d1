import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { StorageUnavailableError } from '../errors.js';
import { StorageTradeSink, TransactionRecorder } from '../services/recorder.js';
import { parseTradeDocument } from '../storage/emergency.js';
import {
  EMERGENCY_CACHE_FILE,
  EMERGENCY_TRADES_FILE,
  MIGRATION_STAMP,
  StorageGateway,
  YAML_STATS_FILE,
  createBackendFactory,
  gatewayOptions,
  type GatewayOptions,
} from '../storage/gateway.js';
import { PostgresStorage } from '../storage/postgres.js';
import { SqliteStorage } from '../storage/sqlite.js';
import { YamlStorage, parseStatsDocument } from '../storage/yaml.js';
import type { StorageKind, TradeRecord } from '../types.js';
import { FakeNetworkStore, fakePoolFactory, removeDir, tempDir, testConfig } from './helpers.js';

function trade(id: string): TradeRecord {
  return {
    id,
    accountId: 'acc-1',
    label: 'Alice',
    direction: 'SELL',
    quantity: 2,
    amount: 19,
    unitPrice: 10,
    timestamp: 1000,
  };
}

function tradeIds(store: FakeNetworkStore): unknown[] {
  return store.trades.map((values) => values[0]);
}

describe('StorageGateway', () => {
  let dir: string;
  let store: FakeNetworkStore;
  let gateway: StorageGateway | null;

  beforeEach(() => {
    dir = tempDir();
    store = new FakeNetworkStore();
    gateway = null;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await gateway?.shutdown();
    vi.restoreAllMocks();
    removeDir(dir);
  });

  // Real sqlite and yaml backends under `dir`, postgres against the fake server
  function options(preferred: StorageKind, overrides: Partial<GatewayOptions> = {}): GatewayOptions {
    const config = testConfig(dir, { storage: { type: preferred } });
    const local = createBackendFactory(config.storage);
    return {
      ...gatewayOptions(config.storage),
      createBackend: (kind) =>
        kind === 'postgres' ? new PostgresStorage(config.storage.postgres, fakePoolFactory(store)) : local(kind),
      ...overrides,
    };
  }

  async function open(opts: GatewayOptions): Promise<StorageGateway> {
    gateway = await StorageGateway.open(opts);
    return gateway;
  }

  describe('startup', () => {
    it('uses the preferred backend when it opens', async () => {
      const g = await open(options('postgres'));

      expect(g.activeKind).toBe('postgres');
      expect(g.getStorage()).toBeInstanceOf(PostgresStorage);
      expect(g.isUsingEmergencyCache()).toBe(false);
    });

    it('falls back to sqlite while postgres is down', async () => {
      store.up = false;
      const g = await open(options('postgres'));

      expect(g.activeKind).toBe('sqlite');
      expect(g.getStorage()).toBeInstanceOf(SqliteStorage);
    });

    it('never tries a backend ranked above the preferred one', async () => {
      const createBackend = vi.fn(createBackendFactory(testConfig(dir).storage));
      const g = await open(options('yaml', { createBackend }));

      expect(g.activeKind).toBe('yaml');
      expect(createBackend.mock.calls).toEqual([['yaml']]);
    });

    it('throws with every attempted backend when none opens', async () => {
      store.up = false;
      // A regular file where the data directory should be
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, '');
      const config = testConfig(dir).storage;

      const attempt = StorageGateway.open({
        ...gatewayOptions(config),
        preferred: 'postgres',
        createBackend: (kind) => {
          switch (kind) {
            case 'postgres':
              return new PostgresStorage(config.postgres, fakePoolFactory(store));
            case 'sqlite':
              return new SqliteStorage(path.join(blocker, 'emeralds.db'));
            case 'yaml':
              return new YamlStorage(path.join(blocker, YAML_STATS_FILE));
          }
        },
      });

      await expect(attempt).rejects.toBeInstanceOf(StorageUnavailableError);
      await expect(attempt).rejects.toMatchObject({ attempted: ['postgres', 'sqlite', 'yaml'] });
    });
  });

  describe('migration', () => {
    const legacy = 'acc-1:\n  name: Alice\n  total: 12\n  updated: 1000\nacc-2:\n  name: Bob\n  total: 4\n  updated: 2000\n';

    it('copies the yaml file into sql storage once, then removes it', async () => {
      fs.writeFileSync(path.join(dir, YAML_STATS_FILE), legacy);

      const g = await open(options('sqlite'));
      await g.migrationDone();

      expect(await g.getStats('acc-1')).toEqual({ id: 'acc-1', label: 'Alice', totalConverted: 12, lastUpdated: 1000 });
      expect(await g.getStats('acc-2')).toEqual({ id: 'acc-2', label: 'Bob', totalConverted: 4, lastUpdated: 2000 });
      expect(fs.existsSync(path.join(dir, MIGRATION_STAMP))).toBe(true);
      expect(fs.existsSync(path.join(dir, YAML_STATS_FILE))).toBe(false);
    });

    it('does not run again once stamped', async () => {
      fs.writeFileSync(path.join(dir, YAML_STATS_FILE), legacy);
      const first = await open(options('sqlite'));
      await first.migrationDone();
      await first.shutdown();

      fs.writeFileSync(path.join(dir, YAML_STATS_FILE), 'acc-1:\n  name: Alice\n  total: 500\n  updated: 3000\n');
      const second = await open(options('sqlite'));
      await second.migrationDone();

      expect((await second.getStats('acc-1'))?.totalConverted).toBe(12);
      expect(fs.existsSync(path.join(dir, YAML_STATS_FILE))).toBe(true);
    });

    it('adds increments made during the copy on top of the migrated total', async () => {
      fs.writeFileSync(path.join(dir, YAML_STATS_FILE), 'acc-1:\n  name: Alice\n  total: 10\n  updated: 1000\n');

      const g = await open(options('sqlite'));
      const increment = g.incrementConverted('acc-1', 'Alice', 5);
      await g.migrationDone();
      await increment;

      expect((await g.getStats('acc-1'))?.totalConverted).toBe(15);
    });

    it('leaves the yaml backend alone', async () => {
      fs.writeFileSync(path.join(dir, YAML_STATS_FILE), legacy);

      const g = await open(options('yaml'));
      await g.migrationDone();

      expect(fs.existsSync(path.join(dir, MIGRATION_STAMP))).toBe(false);
      expect((await g.getStats('acc-2'))?.totalConverted).toBe(4);
    });
  });

  describe('emergency cache', () => {
    it('holds writes during an outage and flushes them on recovery', async () => {
      const g = await open(options('postgres'));
      const cacheFile = path.join(dir, EMERGENCY_CACHE_FILE);

      await g.incrementConverted('acc-1', 'Alice', 5);
      expect(store.rows.get('acc-1')?.total_converted).toBe('5');

      store.up = false;
      await g.incrementConverted('acc-1', 'Alice', 3);

      expect(g.isUsingEmergencyCache()).toBe(true);
      expect(fs.existsSync(cacheFile)).toBe(true);
      expect((await g.getStats('acc-1'))?.totalConverted).toBe(3);
      expect(store.rows.get('acc-1')?.total_converted).toBe('5');

      // Still down: reconnect fails, cache stays
      await g.checkHealth();
      expect(g.isUsingEmergencyCache()).toBe(true);

      store.up = true;
      await g.checkHealth();

      expect(g.isUsingEmergencyCache()).toBe(false);
      expect(store.rows.get('acc-1')?.total_converted).toBe('8');
      expect(fs.existsSync(cacheFile)).toBe(false);
      expect((await g.getStats('acc-1'))?.totalConverted).toBe(8);
    });

    it('switches to the cache when a health check finds the primary down', async () => {
      const g = await open(options('postgres'));

      store.up = false;
      await g.checkHealth();

      expect(g.isUsingEmergencyCache()).toBe(true);
      await g.incrementConverted('acc-1', 'Alice', 2);
      expect(store.rows.has('acc-1')).toBe(false);
    });

    it('flushes a cache left over from a previous run', async () => {
      fs.writeFileSync(path.join(dir, EMERGENCY_CACHE_FILE), 'acc-1:\n  name: Alice\n  total: 6\n  updated: 1000\n');

      const g = await open(options('postgres'));
      expect(g.isUsingEmergencyCache()).toBe(true);

      await g.checkHealth();

      expect(g.isUsingEmergencyCache()).toBe(false);
      expect(store.rows.get('acc-1')?.total_converted).toBe('6');
    });

    it('holds trade rows during an outage and replays them on recovery', async () => {
      const g = await open(options('postgres'));
      const tradesFile = path.join(dir, EMERGENCY_TRADES_FILE);

      store.up = false;
      await g.checkHealth();
      const recorder = new TransactionRecorder(new StorageTradeSink(g));
      recorder.log(trade('ec_TEST_000001'));
      await recorder.close();

      expect(parseTradeDocument(fs.readFileSync(tradesFile, 'utf-8'))).toEqual([trade('ec_TEST_000001')]);
      expect(store.trades).toEqual([]);

      store.up = true;
      await g.checkHealth();

      expect(tradeIds(store)).toEqual(['ec_TEST_000001']);
      expect(fs.existsSync(tradesFile)).toBe(false);
      expect(g.isUsingEmergencyCache()).toBe(false);
    });

    it('diverts a trade row the primary refuses before the outage is noticed', async () => {
      const g = await open(options('postgres'));

      store.up = false;
      await g.recordTrade(trade('ec_TEST_000002'));

      expect(g.isUsingEmergencyCache()).toBe(true);

      store.up = true;
      await g.checkHealth();

      expect(tradeIds(store)).toEqual(['ec_TEST_000002']);
    });

    it('flushes held trades left over from a previous run', async () => {
      fs.writeFileSync(
        path.join(dir, EMERGENCY_TRADES_FILE),
        '- id: ec_TEST_000009\n  accountId: acc-1\n  label: Alice\n  direction: SELL\n  quantity: 2\n  amount: 19\n  unitPrice: 10\n  timestamp: 1000\n',
      );

      const g = await open(options('postgres'));
      expect(g.isUsingEmergencyCache()).toBe(true);

      await g.checkHealth();

      expect(tradeIds(store)).toEqual(['ec_TEST_000009']);
      expect(g.isUsingEmergencyCache()).toBe(false);
    });

    it('keeps one cache and counts nothing twice when the primary fails mid-flush', async () => {
      const g = await open(options('postgres'));
      const primary = g.getStorage();
      const cacheFile = path.join(dir, EMERGENCY_CACHE_FILE);

      store.up = false;
      await g.incrementConverted('acc-1', 'Alice', 3);
      await g.incrementConverted('acc-2', 'Bob', 4);

      // The second copy finds the server gone again, and a trade lands meanwhile
      const original = primary.incrementConverted.bind(primary);
      let calls = 0;
      vi.spyOn(primary, 'incrementConverted').mockImplementation(async (id, label, amount) => {
        calls += 1;
        if (calls === 2) {
          store.up = false;
          await g.incrementConverted('acc-3', 'Carol', 1);
        }
        return original(id, label, amount);
      });

      store.up = true;
      await g.checkHealth();

      expect(g.isUsingEmergencyCache()).toBe(true);
      expect(store.rows.get('acc-1')?.total_converted).toBe('3');
      expect(store.rows.has('acc-2')).toBe(false);
      expect(parseStatsDocument(fs.readFileSync(cacheFile, 'utf-8')).map((s) => [s.id, s.totalConverted])).toEqual([
        ['acc-2', 4],
        ['acc-3', 1],
      ]);

      store.up = true;
      await g.checkHealth();

      expect(g.isUsingEmergencyCache()).toBe(false);
      expect(store.rows.get('acc-1')?.total_converted).toBe('3');
      expect(store.rows.get('acc-2')?.total_converted).toBe('4');
      expect(store.rows.get('acc-3')?.total_converted).toBe('1');
      expect(fs.existsSync(cacheFile)).toBe(false);
    });

    it('keeps the cache on disk when shutting down mid-outage', async () => {
      const g = await open(options('postgres'));
      store.up = false;
      await g.incrementConverted('acc-1', 'Alice', 4);

      await g.shutdown();

      expect(fs.readFileSync(path.join(dir, EMERGENCY_CACHE_FILE), 'utf-8')).toMatch(/^acc-1:\n {2}name: Alice\n {2}total: 4\n/);
    });

    it('rethrows write errors from local backends', async () => {
      const g = await open(options('sqlite'));
      vi.spyOn(g.getStorage(), 'incrementConverted').mockRejectedValue(new Error('disk I/O error'));

      await expect(g.incrementConverted('acc-1', 'Alice', 1)).rejects.toThrow('disk I/O error');
      expect(g.isUsingEmergencyCache()).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('closes the backend once however often it is called', async () => {
      const g = await open(options('yaml'));
      const close = vi.spyOn(g.getStorage(), 'close');

      await Promise.all([g.shutdown(), g.shutdown()]);
      await g.shutdown();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('gives up on a hung backend after the timeout', async () => {
      const g = await open(options('yaml', { shutdownTimeout: 0.05 }));
      vi.spyOn(g.getStorage(), 'close').mockReturnValue(new Promise<void>(() => {}));

      await g.shutdown();

      expect(console.warn).toHaveBeenCalledWith('[Storage] Shutdown exceeded 0.05s, forcing close');
    });
  });
});
