/**
 * Stake Ledger
 *
 * Per-account records for the current stake cycle. Unknown accounts read
 * as the zero record; a record that returns to zero is dropped.
 */

import type { Address } from './address';

export interface StakeRecord {
  stakedAmount: bigint;
  stakingStartTime: number;     // Seconds; 0 = no active cycle
  hasClaimedInterest: boolean;
}

export interface RecordSnapshot {
  account: Address;
  record: StakeRecord;
}

export const EMPTY_RECORD: Readonly<StakeRecord> = Object.freeze({
  stakedAmount: 0n,
  stakingStartTime: 0,
  hasClaimedInterest: false,
});

export class StakeLedger {
  private records: Map<Address, StakeRecord> = new Map();
  private total = 0n;

  /**
   * Copy of the account's record
   */
  get(account: Address): StakeRecord {
    const record = this.records.get(account);
    return record ? { ...record } : { ...EMPTY_RECORD };
  }

  stakedAmount(account: Address): bigint {
    return this.records.get(account)?.stakedAmount ?? 0n;
  }

  stakingStartTime(account: Address): number {
    return this.records.get(account)?.stakingStartTime ?? 0;
  }

  hasClaimedInterest(account: Address): boolean {
    return this.records.get(account)?.hasClaimedInterest ?? false;
  }

  isActive(account: Address): boolean {
    return this.stakedAmount(account) > 0n;
  }

  /**
   * Open a new cycle. Any previous cycle must already be settled.
   */
  open(account: Address, amount: bigint, startTime: number): void {
    if (amount <= 0n) {
      throw new RangeError('Cycle amount must be positive');
    }
    if (this.isActive(account)) {
      throw new Error(`Account ${account} already has an active cycle`);
    }
    this.write(account, { stakedAmount: amount, stakingStartTime: startTime, hasClaimedInterest: false });
  }

  markClaimed(account: Address): void {
    const record = this.get(account);
    if (record.stakedAmount === 0n) return;
    this.write(account, { ...record, hasClaimedInterest: true });
  }

  /**
   * Take `amount` off the principal; ends the cycle when nothing is left
   */
  decrease(account: Address, amount: bigint): StakeRecord {
    const record = this.get(account);
    if (amount > record.stakedAmount) {
      throw new RangeError('Decrease exceeds staked amount');
    }
    const stakedAmount = record.stakedAmount - amount;
    const next: StakeRecord = stakedAmount === 0n
      ? { ...EMPTY_RECORD }
      : { ...record, stakedAmount };
    this.write(account, next);
    return { ...next };
  }

  reset(account: Address): void {
    this.write(account, { ...EMPTY_RECORD });
  }

  snapshot(account: Address): RecordSnapshot {
    return { account, record: this.get(account) };
  }

  restore(snapshot: RecordSnapshot): void {
    this.write(snapshot.account, { ...snapshot.record });
  }

  totalStaked(): bigint {
    return this.total;
  }

  activeStakers(): number {
    return this.records.size;
  }

  private write(account: Address, record: StakeRecord): void {
    this.total += record.stakedAmount - this.stakedAmount(account);
    if (record.stakedAmount === 0n) {
      this.records.delete(account);
      return;
    }
    this.records.set(account, record);
  }
}
