import type { Clock, TradeRecord } from '../types.js';

// Base-36 token of the process start second, wrapping every 36^4 seconds (~19 days)
const SESSION_TOKEN = (Math.floor(Date.now() / 1000) % 1_679_616).toString(36).toUpperCase();

let sequence = 0;

export function nextTradeId(): string {
  sequence += 1;
  return `ec_${SESSION_TOKEN}_${String(sequence).padStart(6, '0')}`;
}

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export type TradeDraft = Omit<TradeRecord, 'id' | 'timestamp'>;

export function createTradeRecord(draft: TradeDraft, now: Clock = Date.now): TradeRecord {
  return Object.freeze({
    id: nextTradeId(),
    accountId: draft.accountId,
    label: draft.label,
    direction: draft.direction,
    quantity: draft.quantity,
    amount: draft.amount,
    unitPrice: draft.unitPrice,
    timestamp: now(),
  });
}

// ─── Trade Log Format ───
// External tooling parses these lines: keep field order stable.

export const TRADE_LOG_FORMAT =
  'Timestamp | ID=<account> | name=<label> | TYPE=<BUY|SELL> | QTY=<units> | MONEY=<amount> | PRICE=<unit price> | TXID=<id>';

export function formatTradeLine(trade: TradeRecord): string {
  return [
    new Date(trade.timestamp).toISOString(),
    `ID=${trade.accountId}`,
    `name=${trade.label}`,
    `TYPE=${trade.direction}`,
    `QTY=${trade.quantity}`,
    `MONEY=${trade.amount.toFixed(2)}`,
    `PRICE=${trade.unitPrice.toFixed(2)}`,
    `TXID=${trade.id}`,
  ].join(' | ');
}

export function tradeLogHeader(startedAt: Date): string[] {
  return [
    '# Emerald Exchange trade log',
    `# Started: ${startedAt.toISOString()}`,
    `# Format: ${TRADE_LOG_FORMAT}`,
    `#${'='.repeat(120)}`,
  ];
}
