import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

// ─── Account Stats ───
export const accountStats = sqliteTable('account_stats', {
  id: text('id').primaryKey(),
  label: text('label').notNull(),
  totalConverted: integer('total_converted').notNull().default(0),
  lastUpdated: integer('last_updated').notNull(), // Unix timestamp (ms)
}, (table) => ({
  totalIdx: index('account_stats_total_idx').on(table.totalConverted),
}));

// ─── Trade Log ───
export const tradeLog = sqliteTable('trade_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  tradeId: text('trade_id').notNull().unique(),
  accountId: text('account_id').notNull(),
  label: text('label').notNull(),
  direction: text('direction').notNull(), // BUY | SELL
  quantity: integer('quantity').notNull(),
  amount: real('amount').notNull(),
  unitPrice: real('unit_price').notNull(),
  timestamp: integer('timestamp').notNull(),
}, (table) => ({
  accountIdx: index('trade_log_account_idx').on(table.accountId),
  timestampIdx: index('trade_log_timestamp_idx').on(table.timestamp),
}));
