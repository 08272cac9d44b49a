/**
 * Token Ledger
 *
 * The staking pool only sees the narrow TokenLedger interface, bound to
 * its custody account. InMemoryTokenLedger is the in-process ledger the
 * server and the tests run against.
 */

import type { Address } from '../staking/address';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('token-ledger');

// ============ Types ============

/**
 * Ledger handle acting as one account (the implicit sender / spender)
 */
export interface TokenLedger {
  transfer(to: Address, amount: bigint): Promise<boolean>;
  transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean>;
  balanceOf(account: Address): Promise<bigint>;
}

export interface TransferRecord {
  from: Address;
  to: Address;
  amount: bigint;
  spender?: Address;
}

/**
 * Runs inside a transfer, after balances move and before the call returns
 */
export type TransferHook = (transfer: TransferRecord) => Promise<void> | void;

// ============ In-memory ledger ============

export class InMemoryTokenLedger {
  private balances: Map<Address, bigint> = new Map();
  private allowances: Map<Address, Map<Address, bigint>> = new Map();
  private hooks: Set<TransferHook> = new Set();
  private history: TransferRecord[] = [];

  constructor(readonly token: Address) {}

  /**
   * Credit new units to `account`
   */
  mint(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Mint amount must not be negative');
    }
    this.balances.set(account, this.balanceOfSync(account) + amount);
  }

  balanceOfSync(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Allowance must not be negative');
    }
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  /**
   * Register a hook fired on every successful transfer; returns the remover
   */
  onTransfer(hook: TransferHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }

  transfers(): TransferRecord[] {
    return [...this.history];
  }

  /**
   * Move `amount` from `sender` to `to`; false when the balance is short
   */
  async transferAs(sender: Address, to: Address, amount: bigint): Promise<boolean> {
    if (amount < 0n || this.balanceOfSync(sender) < amount) {
      log.debug({ from: sender, to, amount: amount.toString() }, 'Transfer refused');
      return false;
    }
    await this.settle({ from: sender, to, amount });
    return true;
  }

  /**
   * Move `amount` from `from` to `to` on `spender`'s allowance
   */
  async transferFromAs(spender: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    const allowed = this.allowance(from, spender);
    if (amount < 0n || allowed < amount || this.balanceOfSync(from) < amount) {
      log.debug(
        { spender, from, to, amount: amount.toString(), allowance: allowed.toString() },
        'TransferFrom refused'
      );
      return false;
    }
    this.approve(from, spender, allowed - amount);
    await this.settle({ from, to, amount, spender });
    return true;
  }

  /**
   * Handle acting as `account`
   */
  connect(account: Address): TokenLedger {
    return {
      transfer: (to, amount) => this.transferAs(account, to, amount),
      transferFrom: (from, to, amount) => this.transferFromAs(account, from, to, amount),
      balanceOf: async (holder) => this.balanceOfSync(holder),
    };
  }

  /**
   * Move balances, then run hooks; a throwing hook reverts the transfer
   */
  private async settle(transfer: TransferRecord): Promise<void> {
    this.move(transfer.from, transfer.to, transfer.amount);
    this.history.push(transfer);

    try {
      for (const hook of this.hooks) {
        await hook(transfer);
      }
    } catch (error) {
      this.move(transfer.to, transfer.from, transfer.amount);
      if (transfer.spender) {
        this.approve(transfer.from, transfer.spender, this.allowance(transfer.from, transfer.spender) + transfer.amount);
      }
      this.history.splice(this.history.indexOf(transfer), 1);
      log.warn({ err: error, from: transfer.from, to: transfer.to }, 'Transfer hook failed, transfer reverted');
      throw error;
    }
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.balances.set(from, this.balanceOfSync(from) - amount);
    this.balances.set(to, this.balanceOfSync(to) + amount);
  }
}
