// ─── Trade Settlement ───
// Validates a trade, swaps units for money against the external inventory and
// ledger, and compensates if the second leg of the swap fails.

import type { TradingConfig } from '../config.js';
import { describeError } from '../errors.js';
import type { Account, Clock, Inventory, Ledger, TradeRecord, TradeResult } from '../types.js';
import { KeyedLock } from './locks.js';
import type { PriceEngine } from './pricing.js';
import type { RateLimiter } from './rate-limit.js';
import { failure, success } from './result.js';
import { createTradeRecord, roundMoney } from './trade.js';

// Where settled trades are counted (StorageGateway)
export interface StatsSink {
  incrementConverted(accountId: string, label: string, amount: number): Promise<void>;
}

// Where settled trades are journaled (TransactionRecorder)
export interface TradeSink {
  log(trade: TradeRecord): void;
}

export interface SettlementDeps {
  prices: PriceEngine;
  limiter: RateLimiter;
  inventory: Inventory;
  ledger: Ledger;
  stats: StatsSink;
  journal: TradeSink;
  now?: Clock;
}

function isValidQuantity(quantity: number): boolean {
  return Number.isSafeInteger(quantity) && quantity > 0;
}

export class SettlementCoordinator {
  private readonly prices: PriceEngine;
  private readonly limiter: RateLimiter;
  private readonly inventory: Inventory;
  private readonly ledger: Ledger;
  private readonly stats: StatsSink;
  private readonly journal: TradeSink;
  private readonly now: Clock;
  private readonly locks = new KeyedLock();
  private trading: TradingConfig;

  constructor(trading: TradingConfig, deps: SettlementDeps) {
    this.trading = trading;
    this.prices = deps.prices;
    this.limiter = deps.limiter;
    this.inventory = deps.inventory;
    this.ledger = deps.ledger;
    this.stats = deps.stats;
    this.journal = deps.journal;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Trader sells `quantity` units and receives money at the current sell price, minus tax.
   */
  async sell(account: Account, quantity: number): Promise<TradeResult> {
    const rejected = this.precheck(account, quantity);
    if (rejected) return rejected;

    return this.exclusive(account, () => this.settleSell(account, quantity));
  }

  /**
   * Trader buys `quantity` units and pays the current buy price, plus tax.
   */
  async buy(account: Account, quantity: number): Promise<TradeResult> {
    const rejected = this.precheck(account, quantity);
    if (rejected) return rejected;

    return this.exclusive(account, () => this.settleBuy(account, quantity));
  }

  async sellAll(account: Account): Promise<TradeResult> {
    let available: number;
    try {
      available = await this.inventory.count(account.id);
    } catch (err) {
      console.error(`[Settlement] Inventory count failed for ${account.label}:`, describeError(err));
      return failure('error.transaction_failed');
    }

    if (available <= 0) {
      return failure('error.not_enough_resource', { required: '1', current: '0' });
    }
    return this.sell(account, available);
  }

  // Lowest rate among the account's tax groups, else the global rate
  taxRateFor(account: Account): number {
    let lowest: number | null = null;
    for (const group of account.groups ?? []) {
      const rate = this.trading.taxGroups[group];
      if (typeof rate === 'number' && (lowest === null || rate < lowest)) {
        lowest = rate;
      }
    }
    return lowest ?? this.trading.taxRate;
  }

  reconfigure(trading: TradingConfig): void {
    this.trading = trading;
  }

  // Accounts with a trade running or queued behind another
  get accountsInFlight(): number {
    return this.locks.activeKeys;
  }

  // ─── Preconditions ───

  private precheck(account: Account, quantity: number): TradeResult | null {
    if (!isValidQuantity(quantity)) {
      return failure('error.invalid_amount');
    }
    if (!this.limiter.checkCooldown(account)) {
      return failure('error.cooldown', { seconds: String(this.limiter.cooldownRemaining(account)) });
    }
    if (!this.limiter.checkRateLimit(account)) {
      return failure('error.rate_limit');
    }
    return null;
  }

  // One trade per account at a time; anything thrown before the swap has no side effects
  private async exclusive(account: Account, settle: () => Promise<TradeResult>): Promise<TradeResult> {
    try {
      return await this.locks.run(account.id, settle);
    } catch (err) {
      console.error(`[Settlement] Trade error for ${account.label}:`, describeError(err));
      return failure('error.transaction_failed');
    }
  }

  // ─── Sell: units out, money in ───

  private async settleSell(account: Account, quantity: number): Promise<TradeResult> {
    const available = await this.inventory.count(account.id);
    if (available < quantity) {
      return failure('error.not_enough_resource', {
        required: String(quantity),
        current: String(available),
      });
    }

    const unitPrice = this.prices.getSellPrice();
    const gross = unitPrice * quantity;
    const tax = this.prices.getTransactionTax(gross, this.taxRateFor(account));
    const payout = roundMoney(gross - tax);

    if (!(await this.ledger.hasAccount(account.id))) {
      await this.ledger.createAccount(account.id);
    }

    if (!(await this.step(account, 'debit units', () => this.inventory.debit(account.id, quantity)))) {
      return failure('error.transaction_failed');
    }

    if (!(await this.step(account, 'credit money', () => this.ledger.credit(account.id, payout)))) {
      await this.compensate(account, `return ${quantity} unit(s)`, () => this.inventory.credit(account.id, quantity));
      return failure('error.transaction_failed');
    }

    return this.commit(account, 'SELL', quantity, payout, unitPrice);
  }

  // ─── Buy: money out, units in ───

  private async settleBuy(account: Account, quantity: number): Promise<TradeResult> {
    const unitPrice = this.prices.getBuyPrice();
    const cost = unitPrice * quantity;
    const tax = this.prices.getTransactionTax(cost, this.taxRateFor(account));
    const total = roundMoney(cost + tax);

    const balance = await this.ledger.balance(account.id);
    if (balance < total) {
      return failure('error.not_enough_money', {
        required: total.toFixed(2),
        current: balance.toFixed(2),
      });
    }

    // Checked right before the swap: capacity can change while waiting on the ledger
    if (!(await this.inventory.hasCapacity(account.id, quantity))) {
      return failure('error.inventory_full');
    }

    if (!(await this.step(account, 'debit money', () => this.ledger.debit(account.id, total)))) {
      return failure('error.transaction_failed');
    }

    if (!(await this.step(account, 'credit units', () => this.inventory.credit(account.id, quantity)))) {
      await this.compensate(account, `refund ${total.toFixed(2)}`, () => this.ledger.credit(account.id, total));
      return failure('error.transaction_failed');
    }

    return this.commit(account, 'BUY', quantity, total, unitPrice);
  }

  // ─── Exchange Helpers ───

  private async step(account: Account, name: string, run: () => Promise<boolean>): Promise<boolean> {
    try {
      const ok = await run();
      if (!ok) console.warn(`[Settlement] ${name} refused for ${account.label}`);
      return ok;
    } catch (err) {
      console.error(`[Settlement] ${name} failed for ${account.label}:`, describeError(err));
      return false;
    }
  }

  private async compensate(account: Account, name: string, run: () => Promise<boolean>): Promise<void> {
    const restored = await this.step(account, name, run);
    if (!restored) {
      console.error(`[Settlement] ROLLBACK FAILED (${name}) for ${account.label} (${account.id}), manual correction needed`);
    }
  }

  // Past this point the swap is done: bookkeeping failures are logged, never surfaced
  private commit(
    account: Account,
    direction: TradeRecord['direction'],
    quantity: number,
    amount: number,
    unitPrice: number,
  ): TradeResult {
    const trade = createTradeRecord(
      { accountId: account.id, label: account.label, direction, quantity, amount, unitPrice },
      this.now,
    );

    this.bookkeep(account, 'rate limiter', () => this.limiter.record(account));
    this.bookkeep(account, 'price engine', () => this.prices.recordTrade(direction, quantity, unitPrice));
    this.bookkeep(account, 'stats', () => {
      this.stats.incrementConverted(account.id, account.label, quantity).catch((err: unknown) => {
        console.warn(`[Settlement] Stats update failed for ${account.label}:`, describeError(err));
      });
    });
    this.bookkeep(account, 'journal', () => this.journal.log(trade));

    return success(trade, this.trading.currencySymbol);
  }

  private bookkeep(account: Account, name: string, run: () => void): void {
    try {
      run();
    } catch (err) {
      console.warn(`[Settlement] Failed to record ${name} for ${account.label}:`, describeError(err));
    }
  }
}
