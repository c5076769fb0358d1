import { describe, it, expect, vi } from 'vitest';
import { parseConfig, type PricingConfig } from '../config.js';
import { PriceEngine } from '../engine/pricing.js';
import { manualClock } from './helpers.js';

function pricing(overrides: Record<string, unknown> = {}, prices?: { buy: number; sell: number }): PricingConfig {
  return parseConfig({ prices, dynamic_pricing: overrides }).pricing;
}

// Deterministic pseudo-random sequence (LCG)
function sequence(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe('PriceEngine', () => {
  describe('initial publish', () => {
    it('serves the configured base prices when they already satisfy the spread', () => {
      const engine = new PriceEngine(pricing());
      expect(engine.getBuyPrice()).toBe(10.5);
      expect(engine.getSellPrice()).toBe(10);
    });

    it('recenters inverted base prices around their midpoint', () => {
      const engine = new PriceEngine(pricing({}, { buy: 9.5, sell: 10.0 }));
      // mid 9.75, half-spread 9.75 * 0.05
      expect(engine.getBuyPrice()).toBeCloseTo(10.2375, 10);
      expect(engine.getSellPrice()).toBeCloseTo(9.2625, 10);
    });

    it('slides a recentered pair back inside the bounds', () => {
      const engine = new PriceEngine(pricing({ min_price: 1, max_price: 10 }, { buy: 10, sell: 10 }));
      // mid 10, half 0.5: buy 10.5 is pulled down to 10, sell follows to 9
      expect(engine.getBuyPrice()).toBe(10);
      expect(engine.getSellPrice()).toBeCloseTo(9, 10);
    });
  });

  describe('reads', () => {
    it('returns identical values with no intervening update', () => {
      const engine = new PriceEngine(pricing());
      engine.recordTrade('BUY', 40, 10.5);
      engine.recompute();

      expect(engine.getBuyPrice()).toBe(engine.getBuyPrice());
      expect(engine.getSellPrice()).toBe(engine.getSellPrice());
      expect(engine.getPrices()).toBe(engine.getPrices());
    });

    it('publishes the pair as one frozen object', () => {
      const engine = new PriceEngine(pricing());
      const before = engine.getPrices();
      engine.recordTrade('BUY', 10, 10.5);
      engine.recompute();

      expect(Object.isFrozen(engine.getPrices())).toBe(true);
      expect(engine.getPrices()).not.toBe(before);
      expect(before).toEqual({ buy: 10.5, sell: 10 });
    });
  });

  describe('recompute', () => {
    it('raises the buy price under demand', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing(), clock.now);
      engine.recordTrade('BUY', 100, 10.5);
      engine.recompute();

      // EWMA 30, depletion 1 - 100 * 0.0001 = 0.99
      expect(engine.snapshot().demandEWMA).toBeCloseTo(30, 10);
      expect(engine.getBuyPrice()).toBeCloseTo(10.5 + 30 * 0.02 * 0.99, 10);
      expect(engine.getSellPrice()).toBe(10);
    });

    it('lowers the sell price under supply', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing(), clock.now);
      engine.recordTrade('SELL', 100, 10);
      engine.recompute();

      expect(engine.getSellPrice()).toBeCloseTo(9.4, 10);
      expect(engine.getBuyPrice()).toBe(10.5);
    });

    it('caps window pressure per trade but counts the full quantity toward depletion', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing({ max_impact_per_transaction: 100 }), clock.now);
      engine.recordTrade('BUY', 500, 10.5);

      expect(engine.snapshot().totalConverted).toBe(500);
      expect(engine.snapshot().recentVolume).toBe(100);

      engine.recompute();
      // demand EWMA from 100 units; depletion 1 - 500 * 0.0001 = 0.95
      expect(engine.snapshot().demandEWMA).toBeCloseTo(30, 10);
      expect(engine.snapshot().depletionFactor).toBeCloseTo(0.95, 10);
      expect(engine.getBuyPrice()).toBeCloseTo(11.07, 10);
    });

    it('never lets the depletion factor fall below 0.1', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing(), clock.now);
      engine.recordTrade('SELL', 1_000_000_000, 10);
      engine.recompute();

      expect(engine.snapshot().totalConverted).toBe(1_000_000_000);
      expect(engine.snapshot().depletionFactor).toBe(0.1);
    });

    it('recovers depletion over time since start', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing({ depletion_rate: 0.001 }), clock.now);
      engine.recordTrade('BUY', 600, 10.5);
      engine.recompute();
      expect(engine.snapshot().depletionFactor).toBeCloseTo(0.4, 10);

      clock.advance(1800 * 1000);
      engine.recompute();
      // recovery 0.5 * (1800 / 3600)
      expect(engine.snapshot().depletionFactor).toBeCloseTo(0.65, 10);
    });

    it('evicts trades older than the window and decays the EWMA', () => {
      const clock = manualClock();
      const engine = new PriceEngine(pricing({ window_seconds: 300 }), clock.now);
      engine.recordTrade('BUY', 100, 10.5);
      engine.recompute();

      clock.advance(301 * 1000);
      engine.recompute();

      const snapshot = engine.snapshot();
      expect(snapshot.windowSize).toBe(0);
      expect(snapshot.demandEWMA).toBeCloseTo(21, 10);
    });

    it('does nothing when dynamic pricing is disabled', () => {
      const engine = new PriceEngine(pricing({ enabled: false }));
      engine.recordTrade('BUY', 100, 10.5);
      engine.recompute();

      expect(engine.snapshot().totalConverted).toBe(0);
      expect(engine.getBuyPrice()).toBe(10.5);
    });
  });

  describe('invariants', () => {
    it('keeps buy >= sell + minSpread and both prices in bounds for any trade mix', () => {
      const config = pricing({
        min_price: 1,
        max_price: 20,
        demand_sensitivity: 0.5,
        supply_sensitivity: 0.5,
        min_spread: 0.25,
      });
      const clock = manualClock();
      const engine = new PriceEngine(config, clock.now);
      const random = sequence(42);

      for (let cycle = 0; cycle < 500; cycle++) {
        const trades = Math.floor(random() * 5);
        for (let i = 0; i < trades; i++) {
          engine.recordTrade(random() < 0.5 ? 'BUY' : 'SELL', 1 + Math.floor(random() * 400), 10);
        }
        if (random() < 0.1) {
          engine.setBasePrice(random() < 0.5 ? 'buy' : 'sell', 0.5 + random() * 25);
        }
        clock.advance(5000);
        engine.recompute();

        const { buy, sell } = engine.getPrices();
        expect(buy).toBeGreaterThanOrEqual(sell + config.minSpread - 1e-9);
        expect(buy).toBeLessThanOrEqual(config.maxPrice);
        expect(sell).toBeGreaterThanOrEqual(config.minPrice);
        expect(buy).toBeGreaterThanOrEqual(config.minPrice);
        expect(sell).toBeLessThanOrEqual(config.maxPrice);
      }
    });
  });

  describe('setBasePrice', () => {
    it('applies on the next cycle when dynamic pricing is on', () => {
      const engine = new PriceEngine(pricing());
      expect(engine.setBasePrice('buy', 12)).toBe(true);
      expect(engine.getBuyPrice()).toBe(10.5);

      engine.recompute();
      expect(engine.getBuyPrice()).toBe(12);
      expect(engine.snapshot().baseBuy).toBe(12);
    });

    it('applies immediately when dynamic pricing is off', () => {
      const engine = new PriceEngine(pricing({ enabled: false }));
      engine.setBasePrice('sell', 9);
      expect(engine.getSellPrice()).toBe(9);
    });

    it('rejects non-positive and non-finite prices', () => {
      const engine = new PriceEngine(pricing());
      expect(engine.setBasePrice('buy', 0)).toBe(false);
      expect(engine.setBasePrice('sell', -3)).toBe(false);
      expect(engine.setBasePrice('buy', Number.NaN)).toBe(false);
      expect(engine.snapshot().baseBuy).toBe(10.5);
    });
  });

  it('computes tax as amount times rate', () => {
    const engine = new PriceEngine(pricing());
    expect(engine.getTransactionTax(640, 0.05)).toBe(32);
  });

  it('reconfigure resets base prices and keeps the timer running', () => {
    vi.useFakeTimers();
    try {
      const engine = new PriceEngine(pricing());
      const recompute = vi.spyOn(engine, 'recompute');
      engine.start();
      engine.reconfigure(pricing({ update_interval: 2 }, { buy: 11, sell: 10 }));

      expect(engine.getBuyPrice()).toBe(11);
      vi.advanceTimersByTime(2000);
      expect(recompute).toHaveBeenCalledTimes(1);
      engine.stop();
    } finally {
      vi.useRealTimers();
    }
  });
});
