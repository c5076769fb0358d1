import type { ExchangeConfig } from './config.js';
import { PriceEngine } from './engine/pricing.js';
import { RateLimiter } from './engine/rate-limit.js';
import { SettlementCoordinator } from './engine/settlement.js';
import { createTradeSink, TransactionRecorder } from './services/recorder.js';
import { StorageGateway, gatewayOptions, type BackendFactory } from './storage/gateway.js';
import type { Account, Clock, Inventory, Ledger } from './types.js';

export interface Collaborators {
  inventory: Inventory;
  ledger: Ledger;
}

export interface OpenOptions {
  createBackend?: BackendFactory;
  now?: Clock;
}

export interface ReloadResult {
  restartRequired: boolean;
  reasons: string[];
}

/**
 * Wires the pricing, rate limiting, settlement, storage and journaling parts
 * into one running exchange.
 */
export class Exchange {
  readonly prices: PriceEngine;
  readonly limiter: RateLimiter;
  readonly coordinator: SettlementCoordinator;
  private stopping: Promise<void> | null = null;

  private constructor(
    private current: ExchangeConfig,
    readonly gateway: StorageGateway,
    readonly recorder: TransactionRecorder,
    collaborators: Collaborators,
    now: Clock,
  ) {
    this.prices = new PriceEngine(current.pricing, now);
    this.limiter = new RateLimiter(current.rateLimit, now);
    this.coordinator = new SettlementCoordinator(current.trading, {
      prices: this.prices,
      limiter: this.limiter,
      inventory: collaborators.inventory,
      ledger: collaborators.ledger,
      stats: gateway,
      journal: recorder,
      now,
    });
  }

  static async open(config: ExchangeConfig, collaborators: Collaborators, options: OpenOptions = {}): Promise<Exchange> {
    const defaults = gatewayOptions(config.storage);
    const gateway = await StorageGateway.open({
      ...defaults,
      createBackend: options.createBackend ?? defaults.createBackend,
      now: options.now,
    });
    const recorder = new TransactionRecorder(createTradeSink(config.recorder, gateway), config.recorder.consoleLog);
    return new Exchange(config, gateway, recorder, collaborators, options.now ?? Date.now);
  }

  get config(): ExchangeConfig {
    return this.current;
  }

  // Applies the configured groups and limit exemption for this id
  resolveAccount(id: string, label: string): Account {
    const policy = this.current.accounts[id];
    return {
      id,
      label,
      groups: policy?.groups ?? [],
      bypassLimits: policy?.bypassLimits ?? false,
    };
  }

  /**
   * Apply a reloaded configuration. Storage and journal destinations are
   * fixed for the life of the process and only take effect after a restart.
   */
  reload(next: ExchangeConfig): ReloadResult {
    const reasons: string[] = [];
    if (next.storage.type !== this.current.storage.type) {
      reasons.push(`storage.type ${this.current.storage.type} -> ${next.storage.type}`);
    }
    if (
      next.recorder.destination !== this.current.recorder.destination ||
      next.recorder.logFile !== this.current.recorder.logFile
    ) {
      reasons.push('transaction log destination');
    }

    this.prices.reconfigure(next.pricing);
    this.limiter.reconfigure(next.rateLimit);
    this.coordinator.reconfigure(next.trading);
    this.current = { ...next, storage: this.current.storage, recorder: this.current.recorder };

    console.log(`[Exchange] Configuration reloaded${reasons.length > 0 ? ` (restart needed: ${reasons.join(', ')})` : ''}`);
    return { restartRequired: reasons.length > 0, reasons };
  }

  start(): void {
    this.prices.start();
    this.limiter.start();
  }

  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.prices.stop();
    this.limiter.stop();
    await this.recorder.close();
    await this.gateway.shutdown();
  }
}
