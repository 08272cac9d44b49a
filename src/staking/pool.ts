/**
 * Staking Pool
 *
 * Single-asset staking with a one-off interest payout per cycle.
 *
 * - stake():          open a cycle; an active cycle is settled first
 * - redeem():         withdraw principal, forfeiting unclaimed interest
 * - claimInterest():  take the cycle's interest, principal untouched
 * - sweep():          owner-only, currently a no-op
 *
 * Every mutating operation runs under the pool's reentrancy lock. Each
 * step writes its bookkeeping before calling the token ledger and rolls
 * the account record back if that call fails.
 */

import type { Logger } from 'pino';
import { AccessControl } from './access';
import { isNullAddress, type Address } from './address';
import { StakingError } from './errors';
import { StakingEventLog, StakingEventType, type StakingEventInput } from './events';
import { ReentrancyGuard } from './guard';
import { interestAt, tierFor, type InterestTier } from './interest';
import { StakeLedger, type StakeRecord } from './ledger';
import type { TokenLedger } from '../token/ledger';
import { createModuleLogger, logLedgerOperation, logLedgerRejection } from '../core/logger';

// ============ Types ============

/**
 * Current time in whole seconds
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface StakingPoolOptions {
  owner: Address;
  token: Address;
  custody: Address;     // Account holding staked principal on the token ledger
  ledger: TokenLedger;  // Handle acting as `custody`
  clock?: Clock;
  logger?: Logger;
}

export interface StakeReceipt {
  account: Address;
  amount: bigint;
  stakingStartTime: number;
  settledInterest: bigint;   // Interest paid for the superseded cycle
  settledPrincipal: bigint;  // Principal returned from the superseded cycle
}

export interface RedeemReceipt {
  account: Address;
  amount: bigint;
  remaining: bigint;
  interestForfeited: bigint;
}

export interface ClaimReceipt {
  account: Address;
  interest: bigint;
}

export interface StakePosition extends StakeRecord {
  account: Address;
  active: boolean;
  accruedInterest: bigint;
  tier: InterestTier;
}

// ============ Pool ============

export class StakingPool {
  readonly events: StakingEventLog;

  private readonly access: AccessControl;
  private readonly guard = new ReentrancyGuard();
  private readonly stakes = new StakeLedger();
  private readonly ledger: TokenLedger;
  private readonly tokenId: Address;
  private readonly custodyAccount: Address;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: StakingPoolOptions) {
    if (isNullAddress(options.token) || isNullAddress(options.custody)) {
      throw new StakingError('InvalidAddress');
    }
    this.access = new AccessControl(options.owner);
    this.tokenId = options.token;
    this.custodyAccount = options.custody;
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createModuleLogger('staking-pool');
    this.events = new StakingEventLog(this.log);
  }

  // ============ Operations ============

  /**
   * Stake `amount`, settling any active cycle first
   */
  async stake(caller: Address, amount: bigint): Promise<StakeReceipt> {
    return this.run('stake', caller, async () => {
      if (amount <= 0n) {
        throw new StakingError('InvalidAmount');
      }

      let settledInterest = 0n;
      let settledPrincipal = 0n;

      // Old cycle pays out before the new deposit is pulled in
      const previous = this.stakes.get(caller);
      if (previous.stakedAmount > 0n) {
        const interest = previous.hasClaimedInterest
          ? 0n
          : interestAt(previous.stakedAmount, previous.stakingStartTime, this.clock());

        // Settlement payouts cannot be taken back, so refuse a deposit the
        // caller could not cover even after being paid out
        const available = (await this.balanceOf(caller)) + interest + previous.stakedAmount;
        if (available < amount) {
          throw new StakingError('TransferFailed');
        }

        if (interest > 0n) {
          await this.payInterest(caller, interest);
          settledInterest = interest;
        }
        await this.withdraw(caller, previous.stakedAmount);
        settledPrincipal = previous.stakedAmount;
      }

      const now = this.clock();
      await this.atomically(caller, async () => {
        this.stakes.open(caller, amount, now);
        await this.pull(caller, amount);
      });

      this.emit({ type: StakingEventType.STAKED, account: caller, amount });
      logLedgerOperation(this.log, 'staked', {
        account: caller,
        amount: amount.toString(),
        stakingStartTime: now,
      });

      return { account: caller, amount, stakingStartTime: now, settledInterest, settledPrincipal };
    });
  }

  /**
   * Withdraw `amount` of principal. Unclaimed interest for the cycle is forfeited.
   */
  async redeem(caller: Address, amount: bigint): Promise<RedeemReceipt> {
    return this.run('redeem', caller, async () => {
      if (amount <= 0n) {
        throw new StakingError('InvalidAmount');
      }
      if (amount > this.stakes.stakedAmount(caller)) {
        throw new StakingError('InsufficientBalance');
      }

      const { remaining, interestForfeited } = await this.withdraw(caller, amount);
      return { account: caller, amount, remaining, interestForfeited };
    });
  }

  /**
   * Pay out the current cycle's interest
   */
  async claimInterest(caller: Address): Promise<ClaimReceipt> {
    return this.run('claimInterest', caller, async () => {
      const record = this.stakes.get(caller);
      if (record.stakedAmount === 0n) {
        throw new StakingError('NoActiveStake');
      }
      if (record.hasClaimedInterest) {
        throw new StakingError('AlreadyClaimed');
      }
      const interest = interestAt(record.stakedAmount, record.stakingStartTime, this.clock());
      if (interest === 0n) {
        throw new StakingError('NoInterestDue');
      }

      await this.payInterest(caller, interest);
      return { account: caller, interest };
    });
  }

  /**
   * Owner-only. Moves nothing: the destination and amount of a sweep are
   * not defined, so the call only enforces its guards and returns 0.
   */
  async sweep(caller: Address): Promise<bigint> {
    return this.run('sweep', caller, () =>
      this.access.onlyOwner(caller, async () => {
        this.log.info({ owner: caller, event: 'sweep_noop' }, 'Sweep called; nothing to move');
        return 0n;
      })
    );
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    let previousOwner: Address;
    try {
      previousOwner = this.access.transferOwnership(caller, newOwner);
    } catch (error) {
      if (error instanceof StakingError) {
        logLedgerRejection(this.log, 'transferOwnership', error.code, { account: caller });
      }
      throw error;
    }

    this.emit({ type: StakingEventType.OWNERSHIP_TRANSFERRED, previousOwner, newOwner });
    logLedgerOperation(this.log, 'ownership_transferred', { previousOwner, newOwner });
  }

  // ============ Queries ============

  /**
   * Interest the account could claim right now
   */
  getAccruedInterest(account: Address): bigint {
    const record = this.stakes.get(account);
    if (record.stakedAmount === 0n || record.hasClaimedInterest) return 0n;
    return interestAt(record.stakedAmount, record.stakingStartTime, this.clock());
  }

  getPosition(account: Address): StakePosition {
    const record = this.stakes.get(account);
    const active = record.stakedAmount > 0n;
    return {
      account,
      ...record,
      active,
      accruedInterest: this.getAccruedInterest(account),
      tier: active ? tierFor(this.clock() - record.stakingStartTime) : 'none',
    };
  }

  stakedAmount(account: Address): bigint {
    return this.stakes.stakedAmount(account);
  }

  stakingStartTime(account: Address): number {
    return this.stakes.stakingStartTime(account);
  }

  hasClaimedInterest(account: Address): boolean {
    return this.stakes.hasClaimedInterest(account);
  }

  owner(): Address {
    return this.access.owner();
  }

  token(): Address {
    return this.tokenId;
  }

  custody(): Address {
    return this.custodyAccount;
  }

  totalStaked(): bigint {
    return this.stakes.totalStaked();
  }

  activeStakers(): number {
    return this.stakes.activeStakers();
  }

  /**
   * Tokens held by the custody account (principal plus interest reserve)
   */
  async custodyBalance(): Promise<bigint> {
    return this.ledger.balanceOf(this.custodyAccount);
  }

  isLocked(): boolean {
    return this.guard.isLocked();
  }

  // ============ Steps ============

  private async payInterest(account: Address, interest: bigint): Promise<void> {
    await this.atomically(account, async () => {
      this.stakes.markClaimed(account);
      await this.pay(account, interest);
    });

    this.emit({ type: StakingEventType.INTEREST_CLAIMED, account, interest });
    logLedgerOperation(this.log, 'interest_claimed', { account, interest: interest.toString() });
  }

  private async withdraw(
    account: Address,
    amount: bigint
  ): Promise<{ remaining: bigint; interestForfeited: bigint }> {
    const record = this.stakes.get(account);
    const interestForfeited = record.hasClaimedInterest
      ? 0n
      : interestAt(record.stakedAmount, record.stakingStartTime, this.clock());

    const remaining = await this.atomically(account, async () => {
      this.stakes.markClaimed(account);
      const next = this.stakes.decrease(account, amount);
      await this.pay(account, amount);
      return next.stakedAmount;
    });

    this.emit({ type: StakingEventType.REDEEMED, account, amount });
    logLedgerOperation(this.log, 'redeemed', {
      account,
      amount: amount.toString(),
      remaining: remaining.toString(),
      interestForfeited: interestForfeited.toString(),
    });
    return { remaining, interestForfeited };
  }

  // ============ Plumbing ============

  private async run<T>(operation: string, caller: Address, body: () => Promise<T>): Promise<T> {
    try {
      return await this.guard.nonReentrant(body);
    } catch (error) {
      if (error instanceof StakingError) {
        logLedgerRejection(this.log, operation, error.code, { account: caller });
      }
      throw error;
    }
  }

  /**
   * Run `body`, restoring the account's record if it throws
   */
  private async atomically<T>(account: Address, body: () => Promise<T>): Promise<T> {
    const snapshot = this.stakes.snapshot(account);
    try {
      return await body();
    } catch (error) {
      this.stakes.restore(snapshot);
      throw error;
    }
  }

  private async pay(to: Address, amount: bigint): Promise<void> {
    await this.expectSuccess(() => this.ledger.transfer(to, amount));
  }

  private async pull(from: Address, amount: bigint): Promise<void> {
    await this.expectSuccess(() => this.ledger.transferFrom(from, this.custodyAccount, amount));
  }

  private async balanceOf(account: Address): Promise<bigint> {
    try {
      return await this.ledger.balanceOf(account);
    } catch (error) {
      throw new StakingError('TransferFailed', { cause: error });
    }
  }

  private async expectSuccess(call: () => Promise<boolean>): Promise<void> {
    let success: boolean;
    try {
      success = await call();
    } catch (error) {
      if (error instanceof StakingError) throw error;
      throw new StakingError('TransferFailed', { cause: error });
    }
    if (!success) {
      throw new StakingError('TransferFailed');
    }
  }

  private emit(input: StakingEventInput): void {
    this.events.append(input, this.clock());
  }
}
