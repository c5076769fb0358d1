import type { MessageId, RejectReason, TradeRecord, TradeResult } from '../types.js';

const REASONS: Partial<Record<MessageId, RejectReason>> = {
  'error.invalid_amount': 'InvalidAmount',
  'error.cooldown': 'Cooldown',
  'error.rate_limit': 'RateLimitExceeded',
  'error.not_enough_resource': 'InsufficientResource',
  'error.not_enough_money': 'InsufficientFunds',
  'error.inventory_full': 'CapacityExceeded',
  'error.transaction_failed': 'TransactionFailed',
};

export function success(trade: TradeRecord, currency: string): TradeResult {
  return {
    success: true,
    messageId: trade.direction === 'SELL' ? 'success.convert_sell' : 'success.convert_buy',
    values: {
      quantity: String(trade.quantity),
      amount: trade.amount.toFixed(2),
      currency,
    },
    trade,
  };
}

export function failure(messageId: MessageId, values: Record<string, string> = {}): TradeResult {
  return {
    success: false,
    messageId,
    reason: REASONS[messageId],
    values,
  };
}
