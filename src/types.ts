// ─── Core Types ───

export type TradeDirection = 'BUY' | 'SELL';

export type StorageKind = 'postgres' | 'sqlite' | 'yaml';

export type Clock = () => number;

// A trading identity as seen by the exchange
export interface Account {
  id: string;
  label: string;
  groups?: readonly string[];
  bypassLimits?: boolean;
}

export interface AccountStats {
  id: string;
  label: string;
  totalConverted: number;
  lastUpdated: number; // Unix timestamp (ms)
}

export interface TradeRecord {
  readonly id: string;
  readonly accountId: string;
  readonly label: string;
  readonly direction: TradeDirection;
  readonly quantity: number;
  readonly amount: number; // SELL: net payout, BUY: total cost (tax included)
  readonly unitPrice: number;
  readonly timestamp: number; // Unix timestamp (ms)
}

// ─── Trade Results ───

export type MessageId =
  | 'success.convert_sell'
  | 'success.convert_buy'
  | 'error.invalid_amount'
  | 'error.cooldown'
  | 'error.rate_limit'
  | 'error.not_enough_resource'
  | 'error.not_enough_money'
  | 'error.inventory_full'
  | 'error.transaction_failed';

export type RejectReason =
  | 'InvalidAmount'
  | 'Cooldown'
  | 'RateLimitExceeded'
  | 'InsufficientResource'
  | 'InsufficientFunds'
  | 'CapacityExceeded'
  | 'TransactionFailed';

export interface TradeResult {
  success: boolean;
  messageId: MessageId;
  reason?: RejectReason;
  values: Record<string, string>;
  trade?: TradeRecord;
}

// ─── External Collaborators ───

// Unit store (e.g. a player's inventory). Must be safe to call concurrently for different accounts.
export interface Inventory {
  count(accountId: string): Promise<number>;
  debit(accountId: string, quantity: number): Promise<boolean>;
  credit(accountId: string, quantity: number): Promise<boolean>;
  hasCapacity(accountId: string, quantity: number): Promise<boolean>;
}

// Money balances
export interface Ledger {
  balance(accountId: string): Promise<number>;
  debit(accountId: string, amount: number): Promise<boolean>;
  credit(accountId: string, amount: number): Promise<boolean>;
  hasAccount(accountId: string): Promise<boolean>;
  createAccount(accountId: string): Promise<boolean>;
}
