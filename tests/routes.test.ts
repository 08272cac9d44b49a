/**
 * HTTP surface, exercised in-process through app.request()
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createApp } from '../src/app';
import { NULL_ADDRESS } from '../src/staking';
import { T0, createPoolFixture, type PoolFixture } from './helpers';

const ADMIN_KEY = 'test-admin-key';

describe('staking routes', () => {
  let f: PoolFixture;
  let app: ReturnType<typeof createApp>;

  const post = (path: string, body: unknown, headers: Record<string, string> = {}) =>
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });

  beforeEach(() => {
    f = createPoolFixture();
    app = createApp({ pool: f.pool, tokens: f.tokens, adminApiKey: ADMIN_KEY });
  });

  it('should list the interest tiers', async () => {
    const res = await app.request('/staking/tiers');
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.tiers).toEqual([
      { id: 'weekly', name: 'Weekly', minElapsedSeconds: 604_800, minElapsedDays: 7, ratePercent: 10 },
      { id: 'daily', name: 'Daily', minElapsedSeconds: 86_400, minElapsedDays: 1, ratePercent: 1 },
      { id: 'none', name: 'None', minElapsedSeconds: 0, minElapsedDays: 0, ratePercent: 0 },
    ]);
  });

  describe('POST /staking/stake', () => {
    it('should stake and return a receipt with string amounts', async () => {
      const res = await post('/staking/stake', { account: f.alice, amount: '1000' });
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json.message).toBe('Staked 1000 tokens');
      expect(json.receipt).toEqual({
        account: f.alice,
        amount: '1000',
        stakingStartTime: T0,
        settledInterest: '0',
        settledPrincipal: '0',
      });
    });

    it('should accept a numeric amount', async () => {
      const res = await post('/staking/stake', { account: f.alice, amount: 250 });
      expect(res.status).toBe(200);
      expect(f.pool.stakedAmount(f.alice)).toBe(250n);
    });

    it('should report settlement on a re-stake', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      f.clock.at(700_000);

      const json = await (await post('/staking/stake', { account: f.alice, amount: '500' })).json();

      expect(json.message).toBe('Previous stake settled; staked 500 tokens');
      expect(json.receipt.settledInterest).toBe('100');
      expect(json.receipt.settledPrincipal).toBe('1000');
    });

    it('should map a zero amount to InvalidAmount', async () => {
      const res = await post('/staking/stake', { account: f.alice, amount: '0' });
      const json = await res.json();

      expect(res.status).toBe(400);
      expect(json).toEqual({ success: false, error: 'Amount must be greater than zero', code: 'InvalidAmount' });
    });

    it('should reject malformed bodies', async () => {
      const res = await post('/staking/stake', { account: 'not-a-key', amount: '-5' });
      const json = await res.json();

      expect(res.status).toBe(400);
      expect(json.error).toBe('Invalid request');
    });

    it('should map a failed pull to 502', async () => {
      f.tokens.approve(f.alice, f.custody, 0n);

      const res = await post('/staking/stake', { account: f.alice, amount: '1000' });

      expect(res.status).toBe(502);
      expect((await res.json()).code).toBe('TransferFailed');
    });
  });

  describe('POST /staking/redeem', () => {
    it('should redeem and report forfeited interest', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      f.clock.at(90_000);

      const res = await post('/staking/redeem', { account: f.alice, amount: '400' });
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json.message).toBe('Redeemed 400 tokens; 10 unclaimed interest forfeited');
      expect(json.receipt).toEqual({
        account: f.alice,
        amount: '400',
        remaining: '600',
        interestForfeited: '10',
      });
    });

    it('should map an oversized redemption to InsufficientBalance', async () => {
      const res = await post('/staking/redeem', { account: f.alice, amount: '1' });
      const json = await res.json();

      expect(res.status).toBe(400);
      expect(json).toEqual({ success: false, error: 'Insufficient staked balance', code: 'InsufficientBalance' });
    });
  });

  describe('POST /staking/claim', () => {
    it('should claim interest once', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      f.clock.at(700_000);

      const first = await post('/staking/claim', { account: f.alice });
      expect(first.status).toBe(200);
      expect((await first.json()).receipt).toEqual({ account: f.alice, interest: '100' });

      const second = await post('/staking/claim', { account: f.alice });
      expect(second.status).toBe(409);
      expect((await second.json()).code).toBe('AlreadyClaimed');
    });

    it('should map a claim without a stake to NoActiveStake', async () => {
      const res = await post('/staking/claim', { account: f.alice });
      expect(res.status).toBe(400);
      expect((await res.json()).code).toBe('NoActiveStake');
    });
  });

  describe('queries', () => {
    it('should return the position with accrued interest', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      f.clock.at(700_000);

      const json = await (await app.request(`/staking/position/${f.alice}`)).json();

      expect(json.position).toEqual({
        account: f.alice,
        stakedAmount: '1000',
        stakingStartTime: T0,
        hasClaimedInterest: false,
        active: true,
        accruedInterest: '100',
        tier: 'weekly',
      });
    });

    it('should return a null position for an account without a stake', async () => {
      const json = await (await app.request(`/staking/position/${f.bob}`)).json();
      expect(json.position).toBeNull();
    });

    it('should reject an invalid account parameter', async () => {
      const res = await app.request('/staking/interest/nope');
      expect(res.status).toBe(400);
    });

    it('should return accrued interest', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      f.clock.at(90_000);

      const json = await (await app.request(`/staking/interest/${f.alice}`)).json();
      expect(json.accruedInterest).toBe('10');
    });

    it('should summarise the pool', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });

      const json = await (await app.request('/staking/stats')).json();

      expect(json.overview).toEqual({
        token: f.token,
        owner: f.owner,
        custody: f.custody,
        totalStaked: '1000',
        activeStakers: 1,
        custodyBalance: '6000',
        interestReserve: '5000',
      });
    });

    it('should list events for an account', async () => {
      await post('/staking/stake', { account: f.alice, amount: '1000' });
      await post('/staking/stake', { account: f.bob, amount: '300' });

      const json = await (await app.request(`/staking/events?account=${f.bob}`)).json();

      expect(json.events).toEqual([
        { type: 'Staked', account: f.bob, amount: '300', sequence: 2, timestamp: T0 },
      ]);
    });
  });

  describe('administration', () => {
    it('should require the admin key', async () => {
      const res = await post('/staking/admin/sweep', { caller: f.owner });
      expect(res.status).toBe(403);
      expect((await res.json()).error).toBe('Invalid admin API key');
    });

    it('should reject a non-owner with a valid key', async () => {
      const res = await post('/staking/admin/sweep', { caller: f.alice }, { 'X-Admin-Key': ADMIN_KEY });
      expect(res.status).toBe(403);
      expect((await res.json()).code).toBe('UnauthorizedCaller');
    });

    it('should sweep nothing for the owner', async () => {
      const res = await post('/staking/admin/sweep', { caller: f.owner }, { 'X-Admin-Key': ADMIN_KEY });
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json.swept).toBe('0');
    });

    it('should transfer ownership', async () => {
      const res = await post(
        '/staking/admin/transfer-ownership',
        { caller: f.owner, newOwner: f.bob },
        { 'X-Admin-Key': ADMIN_KEY }
      );

      expect(res.status).toBe(200);
      expect((await res.json()).owner).toBe(f.bob);
      expect(f.pool.owner()).toBe(f.bob);
    });

    it('should map a null new owner to InvalidAddress', async () => {
      const res = await post(
        '/staking/admin/transfer-ownership',
        { caller: f.owner, newOwner: NULL_ADDRESS },
        { 'X-Admin-Key': ADMIN_KEY }
      );

      expect(res.status).toBe(400);
      expect((await res.json()).code).toBe('InvalidAddress');
    });

    it('should answer 500 when no admin key is configured', async () => {
      const open = createApp({ pool: f.pool, tokens: f.tokens });
      const res = await open.request('/staking/admin/sweep', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Admin-Key': ADMIN_KEY },
        body: JSON.stringify({ caller: f.owner }),
      });
      expect(res.status).toBe(500);
    });
  });
});

describe('token routes', () => {
  let f: PoolFixture;
  let app: ReturnType<typeof createApp>;

  const post = (path: string, body: unknown, headers: Record<string, string> = {}) =>
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });

  beforeEach(() => {
    f = createPoolFixture();
    app = createApp({ pool: f.pool, tokens: f.tokens, adminApiKey: ADMIN_KEY });
  });

  it('should return a balance', async () => {
    const json = await (await app.request(`/token/balance/${f.alice}`)).json();
    expect(json).toEqual({ success: true, token: f.token, account: f.alice, balance: '10000' });
  });

  it('should set an allowance with the admin key', async () => {
    const res = await post(
      '/token/approve',
      { owner: f.alice, spender: f.bob, amount: '42' },
      { 'X-Admin-Key': ADMIN_KEY }
    );

    expect((await res.json()).allowance).toBe('42');
    expect(f.tokens.allowance(f.alice, f.bob)).toBe(42n);
  });

  it('should refuse an allowance without the admin key', async () => {
    const res = await post('/token/approve', { owner: f.alice, spender: f.bob, amount: '42' });

    expect(res.status).toBe(403);
    expect(f.tokens.allowance(f.alice, f.bob)).toBe(0n);
  });

  it('should refuse to move custody funds without the admin key', async () => {
    await post('/staking/stake', { account: f.alice, amount: '1000' });

    const res = await post('/token/transfer', { from: f.custody, to: f.bob, amount: '6000' });

    expect(res.status).toBe(403);
    expect((await res.json()).error).toBe('Invalid admin API key');
    expect(f.tokens.balanceOfSync(f.custody)).toBe(6_000n);

    const redeem = await post('/staking/redeem', { account: f.alice, amount: '1000' });
    expect(redeem.status).toBe(200);
    expect(f.tokens.balanceOfSync(f.alice)).toBe(10_000n);
  });

  it('should refuse a transfer with the wrong admin key', async () => {
    const res = await post(
      '/token/transfer',
      { from: f.alice, to: f.bob, amount: '1' },
      { 'X-Admin-Key': 'wrong-key' }
    );

    expect(res.status).toBe(403);
    expect(f.tokens.balanceOfSync(f.alice)).toBe(10_000n);
  });

  it('should transfer with the admin key', async () => {
    const res = await post(
      '/token/transfer',
      { from: f.alice, to: f.bob, amount: '250' },
      { 'X-Admin-Key': ADMIN_KEY }
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, from: '9750', to: '10250' });
  });

  it('should refuse a transfer beyond the balance', async () => {
    const res = await post(
      '/token/transfer',
      { from: f.alice, to: f.bob, amount: '10001' },
      { 'X-Admin-Key': ADMIN_KEY }
    );

    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe('Insufficient balance');
  });
});

describe('health', () => {
  it('should answer ok', async () => {
    const f = createPoolFixture();
    const res = await createApp({ pool: f.pool, tokens: f.tokens }).request('/health');
    expect(await res.json()).toEqual({ success: true, status: 'ok' });
  });
});
