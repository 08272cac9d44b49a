import { Keypair } from '@solana/web3.js';
import { StakingPool } from '../src/staking';
import { InMemoryTokenLedger, type TokenLedger } from '../src/token/ledger';

export const T0 = 1_700_000_000;
export const DAY = 86_400;

export function newAddress(): string {
  return Keypair.generate().publicKey.toBase58();
}

export interface TestClock {
  now: () => number;
  /** Move to `offset` seconds after T0 */
  at: (offset: number) => void;
}

export function createClock(): TestClock {
  let current = T0;
  return {
    now: () => current,
    at: (offset) => {
      current = T0 + offset;
    },
  };
}

export interface PoolFixture {
  pool: StakingPool;
  tokens: InMemoryTokenLedger;
  clock: TestClock;
  owner: string;
  token: string;
  custody: string;
  alice: string;
  bob: string;
}

/**
 * Pool over an in-memory ledger. Alice and Bob hold 10_000 each and have
 * approved the custody account for the same; custody holds a 5_000 reserve.
 */
export function createPoolFixture(options: { allowance?: bigint } = {}): PoolFixture {
  const owner = newAddress();
  const token = newAddress();
  const custody = newAddress();
  const alice = newAddress();
  const bob = newAddress();
  const clock = createClock();

  const tokens = new InMemoryTokenLedger(token);
  for (const account of [alice, bob]) {
    tokens.mint(account, 10_000n);
    tokens.approve(account, custody, options.allowance ?? 10_000n);
  }
  tokens.mint(custody, 5_000n);

  const pool = new StakingPool({
    owner,
    token,
    custody,
    ledger: tokens.connect(custody),
    clock: clock.now,
  });

  return { pool, tokens, clock, owner, token, custody, alice, bob };
}

/**
 * Pool over a scripted ledger: transferFrom always succeeds, transfer
 * answers from `transferResults` in order (true once exhausted).
 */
export function createScriptedPool(transferResults: boolean[]) {
  const clock = createClock();
  const results = [...transferResults];

  const ledger: TokenLedger = {
    transfer: async () => {
      return results.length > 0 ? Boolean(results.shift()) : true;
    },
    transferFrom: async () => true,
    balanceOf: async () => 0n,
  };

  const pool = new StakingPool({
    owner: newAddress(),
    token: newAddress(),
    custody: newAddress(),
    ledger,
    clock: clock.now,
  });

  return { pool, clock, alice: newAddress() };
}
