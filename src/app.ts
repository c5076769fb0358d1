import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { Exchange } from './exchange.js';
import { adminRoutes, type AdminOptions } from './routes/admin.js';
import { marketRoutes } from './routes/market.js';

export interface AppOptions {
  admin?: AdminOptions;
  // Request logging; off in tests
  requestLog?: boolean;
}

export function createApp(exchange: Exchange, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.requestLog ?? true) app.use('*', logger());

  // ─── Routes ───

  app.get('/', (c) => {
    return c.json({
      name: 'Emerald Exchange',
      version: '0.1.0',
      description: 'Dynamic-price exchange between emerald units and money.',
      endpoints: {
        'GET /market/prices': 'Current buy/sell quote',
        'POST /market/sell': 'Sell units (accountId, label, quantity)',
        'POST /market/buy': 'Buy units (accountId, label, quantity)',
        'POST /market/sell-all': 'Sell every unit held (accountId, label)',
        'GET /admin/info': 'Pricing internals and storage state',
        'POST /admin/prices': 'Set a base price (side, price)',
        'POST /admin/reload': 'Reload configuration',
        'GET /admin/stats/:id': 'Lifetime totals for one account',
        'GET /admin/top': 'Top accounts by units converted',
      },
    });
  });

  app.route('/market', marketRoutes(exchange));
  app.route('/admin', adminRoutes(exchange, options.admin));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'Not found. Try GET / for available endpoints.' }, 404);
  });

  // ─── Error Handler ───
  app.onError((err, c) => {
    console.error('🔥 Error:', err.message);
    if (exchange.config.debug) console.error('Stack:', err.stack);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
