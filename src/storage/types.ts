import type { AccountStats, StorageKind, TradeRecord } from '../types.js';

/**
 * A durable home for per-account statistics (and, for SQL backends, trade rows).
 */
export interface StorageBackend {
  readonly kind: StorageKind;

  // Resolves false (never rejects) when the backend cannot be opened
  initialize(): Promise<boolean>;
  close(): Promise<void>;
  // Liveness check; updates isAvailable()
  ping(): Promise<boolean>;

  getStats(accountId: string): Promise<AccountStats | null>;
  saveStats(stats: AccountStats): Promise<void>;
  incrementConverted(accountId: string, label: string, amount: number): Promise<void>;
  recordTrade(trade: TradeRecord): Promise<void>;
  getTotalConverted(accountId: string): Promise<number>;

  listStats(): Promise<AccountStats[]>;
  topStats(limit: number): Promise<AccountStats[]>;
  saveAll(): Promise<void>;
  isAvailable(): boolean;
}
