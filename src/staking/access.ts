/**
 * Single-owner access control
 */

import { isNullAddress, type Address } from './address';
import { StakingError } from './errors';

export class AccessControl {
  private currentOwner: Address;

  constructor(owner: Address) {
    if (isNullAddress(owner)) {
      throw new StakingError('InvalidAddress');
    }
    this.currentOwner = owner;
  }

  owner(): Address {
    return this.currentOwner;
  }

  /**
   * Throws UnauthorizedCaller unless `caller` is the owner
   */
  assertOwner(caller: Address): void {
    if (caller !== this.currentOwner) {
      throw new StakingError('UnauthorizedCaller');
    }
  }

  /**
   * Wrap `body` so it only runs for the owner
   */
  async onlyOwner<T>(caller: Address, body: () => Promise<T>): Promise<T> {
    this.assertOwner(caller);
    return body();
  }

  /**
   * Hand ownership to `newOwner`; returns the previous owner
   */
  transferOwnership(caller: Address, newOwner: Address): Address {
    this.assertOwner(caller);
    if (isNullAddress(newOwner)) {
      throw new StakingError('InvalidAddress');
    }
    const previousOwner = this.currentOwner;
    this.currentOwner = newOwner;
    return previousOwner;
  }
}
