import type { RateLimitConfig } from '../config.js';
import type { Account, Clock } from '../types.js';

const COUNT_WINDOW_MS = 60_000;
const IDLE_AFTER_MS = COUNT_WINDOW_MS * 2;

interface RateEntry {
  lastTradeAt: number;
  count: number;
  windowStart: number;
}

/**
 * Per-account cooldown and trades-per-minute gate. Entries are created on the
 * first recorded trade and swept once idle for two counting windows.
 */
export class RateLimiter {
  private config: RateLimitConfig;
  private entries = new Map<string, RateEntry>();
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(config: RateLimitConfig, private readonly now: Clock = Date.now) {
    this.config = config;
  }

  checkCooldown(account: Account): boolean {
    if (account.bypassLimits) return true;
    if (this.config.cooldownSeconds <= 0) return true;

    const entry = this.entries.get(account.id);
    if (!entry) return true;

    return this.now() - entry.lastTradeAt >= this.config.cooldownSeconds * 1000;
  }

  checkRateLimit(account: Account): boolean {
    if (!this.config.enabled) return true;
    if (account.bypassLimits) return true;

    const entry = this.entries.get(account.id);
    if (!entry) return true;

    this.resetIfElapsed(entry);
    return entry.count < this.config.maxPerMinute;
  }

  record(account: Account): void {
    if (account.bypassLimits) return;

    const now = this.now();
    let entry = this.entries.get(account.id);
    if (!entry) {
      entry = { lastTradeAt: now, count: 0, windowStart: now };
      this.entries.set(account.id, entry);
    }

    this.resetIfElapsed(entry);
    entry.lastTradeAt = now;
    entry.count++;
  }

  // Whole seconds left on the cooldown, 0 when free to trade
  cooldownRemaining(account: Account): number {
    if (account.bypassLimits || this.config.cooldownSeconds <= 0) return 0;

    const entry = this.entries.get(account.id);
    if (!entry) return 0;

    const remainingMs = this.config.cooldownSeconds * 1000 - (this.now() - entry.lastTradeAt);
    return remainingMs > 0 ? Math.ceil(remainingMs / 1000) : 0;
  }

  /**
   * Drop entries with no activity for two counting windows.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [accountId, entry] of this.entries) {
      if (now - Math.max(entry.lastTradeAt, entry.windowStart) >= IDLE_AFTER_MS) {
        this.entries.delete(accountId);
        removed++;
      }
    }
    return removed;
  }

  reconfigure(config: RateLimitConfig): void {
    this.config = config;
  }

  get size(): number {
    return this.entries.size;
  }

  start(): void {
    if (this.sweepInterval) clearInterval(this.sweepInterval);
    this.sweepInterval = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) console.log(`[RateLimit] Swept ${removed} idle account(s)`);
    }, COUNT_WINDOW_MS);
    this.sweepInterval.unref();
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  private resetIfElapsed(entry: RateEntry): void {
    const now = this.now();
    if (now - entry.windowStart >= COUNT_WINDOW_MS) {
      entry.count = 0;
      entry.windowStart = now;
    }
  }
}
