// ─── Dynamic Pricing ───
// Supply/demand pressure (EWMA over a rolling window) plus a depletion model.
//
// Prices are named from the trader's side of the counter:
//   buy  = what a trader pays per unit
//   sell = what a trader receives per unit
// After every publish: buy >= sell + minSpread, both within [minPrice, maxPrice].

import type { PricingConfig } from '../config.js';
import type { Clock, TradeDirection } from '../types.js';

const EWMA_ALPHA = 0.3;
const MIN_DEPLETION = 0.1;
const MAX_DEPLETION = 1.0;

export type PriceSide = 'buy' | 'sell';

export interface PricePair {
  readonly buy: number;
  readonly sell: number;
}

export interface PriceSnapshot {
  enabled: boolean;
  baseBuy: number;
  baseSell: number;
  buy: number;
  sell: number;
  demandEWMA: number;
  supplyEWMA: number;
  depletionFactor: number;
  totalConverted: number;
  recentVolume: number;
  windowSize: number;
}

interface WindowEntry {
  direction: TradeDirection;
  quantity: number; // capped at maxImpactPerTransaction
  price: number;
  timestamp: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class PriceEngine {
  private config: PricingConfig;
  private baseBuy: number;
  private baseSell: number;

  // Replaced wholesale on publish, so readers never see a half-updated pair
  private published: PricePair;

  private window: WindowEntry[] = [];
  private demandEWMA = 0;
  private supplyEWMA = 0;
  private totalConverted = 0;
  private depletionFactor = 1;
  private readonly startedAt: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(config: PricingConfig, private readonly now: Clock = Date.now) {
    this.config = config;
    this.baseBuy = config.baseBuy;
    this.baseSell = config.baseSell;
    this.startedAt = now();
    this.published = this.enforceSpread(this.baseBuy, this.baseSell);
  }

  /**
   * Feed a settled trade into the pressure window. Price pressure uses the
   * capped quantity; depletion uses the real one.
   */
  recordTrade(direction: TradeDirection, quantity: number, priceAtTime: number): void {
    if (!this.config.enabled) return;

    this.window.push({
      direction,
      quantity: Math.min(quantity, this.config.maxImpactPerTransaction),
      price: priceAtTime,
      timestamp: this.now(),
    });
    this.totalConverted += quantity;
  }

  /**
   * One pricing cycle. Runs on the update timer; never re-entered.
   */
  recompute(): void {
    if (!this.config.enabled) return;

    this.evictExpired();

    let rawDemand = 0; // units bought by traders
    let rawSupply = 0; // units sold by traders
    for (const entry of this.window) {
      if (entry.direction === 'BUY') {
        rawDemand += entry.quantity;
      } else {
        rawSupply += entry.quantity;
      }
    }

    this.demandEWMA = EWMA_ALPHA * rawDemand + (1 - EWMA_ALPHA) * this.demandEWMA;
    this.supplyEWMA = EWMA_ALPHA * rawSupply + (1 - EWMA_ALPHA) * this.supplyEWMA;
    this.depletionFactor = this.computeDepletion();

    // Demand raises what traders pay; oversupply lowers what they receive
    const candidateBuy = this.baseBuy + this.demandEWMA * this.config.demandSensitivity * this.depletionFactor;
    const candidateSell = this.baseSell - this.supplyEWMA * this.config.supplySensitivity;

    this.published = this.enforceSpread(candidateBuy, candidateSell);
  }

  getBuyPrice(): number {
    return this.published.buy;
  }

  getSellPrice(): number {
    return this.published.sell;
  }

  // Both sides from the same publish
  getPrices(): PricePair {
    return this.published;
  }

  getTransactionTax(amount: number, rate: number): number {
    return amount * rate;
  }

  /**
   * Admin override of a base price. Applied on the next cycle, or right away
   * when dynamic pricing is off (no cycle would pick it up).
   */
  setBasePrice(side: PriceSide, price: number): boolean {
    if (!Number.isFinite(price) || price <= 0) return false;

    if (side === 'buy') {
      this.baseBuy = price;
    } else {
      this.baseSell = price;
    }

    if (!this.config.enabled) {
      this.published = this.enforceSpread(this.baseBuy, this.baseSell);
    }
    console.log(`[Pricing] Base ${side} price set to ${price.toFixed(2)}`);
    return true;
  }

  /**
   * Apply reloaded configuration. Base prices reset to the configured values;
   * accumulated pressure and depletion carry over.
   */
  reconfigure(config: PricingConfig): void {
    const wasRunning = this.timer !== null;
    this.stop();

    this.config = config;
    this.baseBuy = config.baseBuy;
    this.baseSell = config.baseSell;
    this.published = this.enforceSpread(this.baseBuy, this.baseSell);

    if (wasRunning) this.start();
  }

  snapshot(): PriceSnapshot {
    const prices = this.published;
    let recentVolume = 0;
    for (const entry of this.window) recentVolume += entry.quantity;

    return {
      enabled: this.config.enabled,
      baseBuy: this.baseBuy,
      baseSell: this.baseSell,
      buy: prices.buy,
      sell: prices.sell,
      demandEWMA: this.demandEWMA,
      supplyEWMA: this.supplyEWMA,
      depletionFactor: this.depletionFactor,
      totalConverted: this.totalConverted,
      recentVolume,
      windowSize: this.window.length,
    };
  }

  start(): void {
    if (!this.config.enabled) {
      console.log('[Pricing] Dynamic pricing disabled, serving base prices');
      return;
    }
    if (this.timer) clearInterval(this.timer);

    // Fixed period; a slow cycle never shifts the next one
    this.timer = setInterval(() => this.recompute(), this.config.updateInterval * 1000);
    this.timer.unref();
    console.log(`[Pricing] Dynamic pricing started (every ${this.config.updateInterval}s)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  // ─── Internals ───

  private evictExpired(): void {
    const cutoff = this.now() - this.config.windowSeconds * 1000;
    let expired = 0;
    while (expired < this.window.length && this.window[expired].timestamp < cutoff) {
      expired++;
    }
    if (expired > 0) this.window.splice(0, expired);
  }

  private computeDepletion(): number {
    const elapsedSeconds = (this.now() - this.startedAt) / 1000;
    const recovery =
      this.config.depletionRecoveryMax * Math.min(1, elapsedSeconds / this.config.depletionRecoverySeconds);
    const depleted = this.totalConverted * this.config.depletionRate;
    return clamp(1 - depleted + recovery, MIN_DEPLETION, MAX_DEPLETION);
  }

  // Clamp to bounds, then recenter around the midpoint if the spread collapsed
  private enforceSpread(candidateBuy: number, candidateSell: number): PricePair {
    const { minPrice, maxPrice, minSpread, spreadRatio } = this.config;

    let buy = clamp(candidateBuy, minPrice, maxPrice);
    let sell = clamp(candidateSell, minPrice, maxPrice);

    if (buy < sell + minSpread) {
      const mid = (buy + sell) / 2;
      const half = Math.max(mid * spreadRatio, minSpread / 2);
      buy = mid + half;
      sell = mid - half;

      // Keep the gap, slide the pair back inside the bounds
      if (buy > maxPrice) {
        sell -= buy - maxPrice;
        buy = maxPrice;
      }
      if (sell < minPrice) {
        buy += minPrice - sell;
        sell = minPrice;
      }
      buy = Math.min(buy, maxPrice);
    }

    return Object.freeze({ buy, sell });
  }
}
