import { Hono } from 'hono';
import { z } from 'zod';
import type { Exchange } from '../exchange.js';
import type { TradeResult } from '../types.js';

const AccountBody = z.object({
  accountId: z.string().trim().min(1).max(64),
  label: z.string().trim().min(1).max(64),
});

// Non-positive or fractional quantities reach the coordinator and come back as invalid_amount
const TradeBody = AccountBody.extend({
  quantity: z.number(),
});

type TradeStatus = 200 | 400 | 409 | 429 | 502;

export function statusFor(result: TradeResult): TradeStatus {
  if (result.success) return 200;
  switch (result.reason) {
    case 'InvalidAmount':
      return 400;
    case 'Cooldown':
    case 'RateLimitExceeded':
      return 429;
    case 'TransactionFailed':
      return 502;
    default:
      return 409;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function marketRoutes(exchange: Exchange): Hono {
  const market = new Hono();

  // GET /market/prices: Current quote
  market.get('/prices', (c) => {
    const { buy, sell } = exchange.prices.getPrices();
    const { taxRate, currencyName, currencySymbol } = exchange.config.trading;
    return c.json({
      buy: Number(buy.toFixed(2)),
      sell: Number(sell.toFixed(2)),
      currency: { name: currencyName, symbol: currencySymbol },
      taxRate,
    });
  });

  // POST /market/sell: Trader sells units for money
  market.post('/sell', async (c) => {
    const parsed = TradeBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: describeIssues(parsed.error) }, 400);
    }

    const { accountId, label, quantity } = parsed.data;
    const result = await exchange.coordinator.sell(exchange.resolveAccount(accountId, label), quantity);
    return c.json(result, statusFor(result));
  });

  // POST /market/buy: Trader buys units with money
  market.post('/buy', async (c) => {
    const parsed = TradeBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: describeIssues(parsed.error) }, 400);
    }

    const { accountId, label, quantity } = parsed.data;
    const result = await exchange.coordinator.buy(exchange.resolveAccount(accountId, label), quantity);
    return c.json(result, statusFor(result));
  });

  // POST /market/sell-all: Sell every unit the account holds
  market.post('/sell-all', async (c) => {
    const parsed = AccountBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: describeIssues(parsed.error) }, 400);
    }

    const { accountId, label } = parsed.data;
    const result = await exchange.coordinator.sellAll(exchange.resolveAccount(accountId, label));
    return c.json(result, statusFor(result));
  });

  return market;
}
