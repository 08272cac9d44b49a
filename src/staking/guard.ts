/**
 * Reentrancy guard
 *
 * One lock per pool. A guarded body that is still running (including one
 * suspended on a token ledger call) blocks every other guarded entry.
 */

import { StakingError } from './errors';

export class ReentrancyGuard {
  private locked = false;

  isLocked(): boolean {
    return this.locked;
  }

  async nonReentrant<T>(body: () => Promise<T>): Promise<T> {
    if (this.locked) {
      throw new StakingError('ReentrantCall');
    }
    this.locked = true;
    try {
      return await body();
    } finally {
      this.locked = false;
    }
  }
}
