import { roundMoney } from '../engine/trade.js';
import type { Inventory, Ledger } from '../types.js';

// Default per-account unit capacity: 36 slots of 64
export const DEFAULT_CAPACITY = 36 * 64;

/**
 * Unit counts held in process. Stands in for a game inventory.
 */
export class MemoryInventory implements Inventory {
  private units = new Map<string, number>();

  constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

  async count(accountId: string): Promise<number> {
    return this.units.get(accountId) ?? 0;
  }

  async debit(accountId: string, quantity: number): Promise<boolean> {
    const current = this.units.get(accountId) ?? 0;
    if (quantity <= 0 || current < quantity) return false;
    this.units.set(accountId, current - quantity);
    return true;
  }

  async credit(accountId: string, quantity: number): Promise<boolean> {
    if (quantity <= 0) return false;
    const current = this.units.get(accountId) ?? 0;
    if (current + quantity > this.capacity) return false;
    this.units.set(accountId, current + quantity);
    return true;
  }

  async hasCapacity(accountId: string, quantity: number): Promise<boolean> {
    return (this.units.get(accountId) ?? 0) + quantity <= this.capacity;
  }

  set(accountId: string, quantity: number): void {
    this.units.set(accountId, quantity);
  }
}

/**
 * Money balances held in process, rounded to cents.
 */
export class MemoryLedger implements Ledger {
  private balances = new Map<string, number>();

  async balance(accountId: string): Promise<number> {
    return this.balances.get(accountId) ?? 0;
  }

  async debit(accountId: string, amount: number): Promise<boolean> {
    const current = this.balances.get(accountId);
    if (current === undefined || amount < 0 || current < amount) return false;
    this.balances.set(accountId, roundMoney(current - amount));
    return true;
  }

  async credit(accountId: string, amount: number): Promise<boolean> {
    const current = this.balances.get(accountId);
    if (current === undefined || amount < 0) return false;
    this.balances.set(accountId, roundMoney(current + amount));
    return true;
  }

  async hasAccount(accountId: string): Promise<boolean> {
    return this.balances.has(accountId);
  }

  async createAccount(accountId: string): Promise<boolean> {
    if (this.balances.has(accountId)) return false;
    this.balances.set(accountId, 0);
    return true;
  }

  // Opens the account if needed
  deposit(accountId: string, amount: number): void {
    this.balances.set(accountId, roundMoney((this.balances.get(accountId) ?? 0) + amount));
  }
}
