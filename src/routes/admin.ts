import { Hono } from 'hono';
import { z } from 'zod';
import { loadConfig, type ExchangeConfig } from '../config.js';
import { ConfigError, describeError } from '../errors.js';
import type { Exchange } from '../exchange.js';

const DEFAULT_TOP_LIMIT = 10;
const MAX_TOP_LIMIT = 100;

const PriceBody = z.object({
  side: z.enum(['buy', 'sell']),
  price: z.number().positive(),
});

export interface AdminOptions {
  // Unset means the admin routes are open
  token?: string;
  reloadConfig?: () => ExchangeConfig;
}

export function adminRoutes(exchange: Exchange, options: AdminOptions = {}): Hono {
  const admin = new Hono();
  const reloadConfig = options.reloadConfig ?? (() => loadConfig());

  admin.use('*', async (c, next) => {
    if (options.token && c.req.header('X-Admin-Token') !== options.token) {
      return c.json({ error: 'Admin token required' }, 401);
    }
    await next();
  });

  // GET /admin/info: Pricing internals and storage state
  admin.get('/info', (c) => {
    const { trading, rateLimit } = exchange.config;
    return c.json({
      pricing: exchange.prices.snapshot(),
      trading: {
        taxRate: trading.taxRate,
        taxGroups: trading.taxGroups,
        currency: trading.currencyName,
      },
      rateLimit: {
        cooldownSeconds: rateLimit.cooldownSeconds,
        enabled: rateLimit.enabled,
        maxPerMinute: rateLimit.maxPerMinute,
        trackedAccounts: exchange.limiter.size,
      },
      storage: {
        kind: exchange.gateway.activeKind,
        emergencyCache: exchange.gateway.isUsingEmergencyCache(),
      },
      settlement: { accountsInFlight: exchange.coordinator.accountsInFlight },
      recorder: { pending: exchange.recorder.pending() },
    });
  });

  // POST /admin/prices: Override a base price
  admin.post('/prices', async (c) => {
    const parsed = PriceBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'Expected { side: "buy" | "sell", price: number > 0 }' }, 400);
    }

    const { side, price } = parsed.data;
    if (!exchange.prices.setBasePrice(side, price)) {
      return c.json({ error: `Invalid ${side} price` }, 400);
    }
    return c.json({ side, price, prices: exchange.prices.getPrices() });
  });

  // POST /admin/reload: Re-read config/config.yml
  admin.post('/reload', (c) => {
    let next: ExchangeConfig;
    try {
      next = reloadConfig();
    } catch (err) {
      if (err instanceof ConfigError) {
        return c.json({ error: err.message }, 400);
      }
      throw err;
    }

    const result = exchange.reload(next);
    return c.json({ reloaded: true, ...result });
  });

  // GET /admin/stats/:id: Lifetime totals for one account
  admin.get('/stats/:id', async (c) => {
    const id = c.req.param('id');
    try {
      const stats = await exchange.gateway.getStats(id);
      if (!stats) {
        return c.json({ error: `No stats for ${id}` }, 404);
      }
      return c.json(stats);
    } catch (err) {
      console.error('[Admin] Stats lookup failed:', describeError(err));
      return c.json({ error: 'Storage unavailable' }, 503);
    }
  });

  // GET /admin/top?limit=10: Accounts by units converted
  admin.get('/top', async (c) => {
    const requested = parseInt(c.req.query('limit') || String(DEFAULT_TOP_LIMIT), 10);
    const limit = Number.isNaN(requested) ? DEFAULT_TOP_LIMIT : Math.min(Math.max(requested, 1), MAX_TOP_LIMIT);
    try {
      const top = await exchange.gateway.topStats(limit);
      return c.json({
        limit,
        accounts: top.map((stats, i) => ({ rank: i + 1, ...stats })),
      });
    } catch (err) {
      console.error('[Admin] Leaderboard lookup failed:', describeError(err));
      return c.json({ error: 'Storage unavailable' }, 503);
    }
  });

  return admin;
}
