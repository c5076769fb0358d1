import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { MemoryInventory, MemoryLedger } from './adapters/memory.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { Exchange } from './exchange.js';

// ─── Initialize ───
console.log('💎 Initializing Emerald Exchange...');

const config = loadConfig();
const exchange = await Exchange.open(config, {
  inventory: new MemoryInventory(),
  ledger: new MemoryLedger(),
});
exchange.start();

const { buy, sell } = exchange.prices.getPrices();
console.log(`📈 Prices: buy ${buy.toFixed(2)} / sell ${sell.toFixed(2)} ${config.trading.currencySymbol}`);
console.log(`🗄️  Storage: ${exchange.gateway.activeKind}`);

if (!process.env.ADMIN_TOKEN) {
  console.log('⚠️  ADMIN_TOKEN not set, admin routes are open');
}

// ─── App ───
const app = createApp(exchange, { admin: { token: process.env.ADMIN_TOKEN } });

// ─── Start ───
const port = parseInt(process.env.PORT || '3000', 10);
const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(`\n💎 Emerald Exchange is live at http://localhost:${info.port}\n`);
});

// ─── Shutdown ───
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n🛑 ${signal} received, shutting down...`);

  server.close();
  try {
    await exchange.stop();
    console.log('👋 Bye.');
    process.exit(0);
  } catch (err) {
    console.error('Shutdown failed:', describeError(err));
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
