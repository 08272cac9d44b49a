/**
 * Staking events
 *
 * Appended to the log after an operation commits. Listeners are notified
 * synchronously and not awaited; a throwing or rejecting listener is logged
 * and skipped.
 */

import type { Logger } from 'pino';
import type { Address } from './address';

export enum StakingEventType {
  STAKED = 'Staked',
  REDEEMED = 'Redeemed',
  INTEREST_CLAIMED = 'InterestClaimed',
  SWEPT = 'Swept',
  OWNERSHIP_TRANSFERRED = 'OwnershipTransferred',
}

interface EventBase {
  sequence: number;
  timestamp: number;
}

export interface StakedEvent extends EventBase {
  type: StakingEventType.STAKED;
  account: Address;
  amount: bigint;
}

export interface RedeemedEvent extends EventBase {
  type: StakingEventType.REDEEMED;
  account: Address;
  amount: bigint;
}

export interface InterestClaimedEvent extends EventBase {
  type: StakingEventType.INTEREST_CLAIMED;
  account: Address;
  interest: bigint;
}

export interface SweptEvent extends EventBase {
  type: StakingEventType.SWEPT;
  owner: Address;
  amount: bigint;
}

export interface OwnershipTransferredEvent extends EventBase {
  type: StakingEventType.OWNERSHIP_TRANSFERRED;
  previousOwner: Address;
  newOwner: Address;
}

export type StakingEvent =
  | StakedEvent
  | RedeemedEvent
  | InterestClaimedEvent
  | SweptEvent
  | OwnershipTransferredEvent;

// Distributes Omit over the union so each member keeps its own fields
type DistributiveOmit<T, K extends keyof EventBase> = T extends unknown ? Omit<T, K> : never;

export type StakingEventInput = DistributiveOmit<StakingEvent, keyof EventBase>;

export type StakingEventListener = (event: StakingEvent) => void | Promise<void>;

/**
 * Indexed subject of an event: the account, or the owner for admin events
 */
export function eventSubject(event: StakingEvent): Address {
  switch (event.type) {
    case StakingEventType.SWEPT:
      return event.owner;
    case StakingEventType.OWNERSHIP_TRANSFERRED:
      return event.previousOwner;
    default:
      return event.account;
  }
}

export class StakingEventLog {
  private events: StakingEvent[] = [];
  private listeners: Set<StakingEventListener> = new Set();

  constructor(private readonly log?: Logger) {}

  append(input: StakingEventInput, timestamp: number): StakingEvent {
    const event: StakingEvent = {
      ...input,
      sequence: this.events.length + 1,
      timestamp,
    };
    Object.freeze(event);
    this.events.push(event);

    for (const listener of this.listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportListenerFailure(error, event));
        }
      } catch (error) {
        this.reportListenerFailure(error, event);
      }
    }
    return event;
  }

  private reportListenerFailure(error: unknown, event: StakingEvent): void {
    this.log?.error({ err: error, eventType: event.type }, 'Staking event listener failed');
  }

  /**
   * Register a listener; returns the unsubscribe function
   */
  subscribe(listener: StakingEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Events in append order, optionally only those involving `account`
   */
  list(account?: Address): StakingEvent[] {
    if (!account) return [...this.events];
    return this.events.filter((event) =>
      eventSubject(event) === account ||
      (event.type === StakingEventType.OWNERSHIP_TRANSFERRED && event.newOwner === account)
    );
  }

  size(): number {
    return this.events.length;
  }
}
