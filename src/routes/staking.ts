/**
 * Staking API Routes
 *
 * Endpoints for staking, interest and pool administration.
 * Amounts are exchanged as decimal strings of token units.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import {
  INTEREST_TIERS,
  SECONDS_PER_DAY,
  type StakingPool,
} from '../staking';
import { requireAdminApiKey } from '../middleware/adminApiKey';
import { addressSchema, amountSchema, toJson } from './schemas';

export interface StakingRoutesOptions {
  pool: StakingPool;
  adminApiKey?: string;
}

export function createStakingRoutes({ pool, adminApiKey }: StakingRoutesOptions) {
  const staking = new Hono();

  // ============ Tier Info ============

  staking.get('/tiers', (c) => {
    return c.json({
      success: true,
      tiers: Object.entries(INTEREST_TIERS).map(([id, tier]) => ({
        id,
        name: tier.name,
        minElapsedSeconds: tier.minElapsed,
        minElapsedDays: tier.minElapsed / SECONDS_PER_DAY,
        ratePercent: Number(tier.ratePercent),
      })),
    });
  });

  // ============ Staking Operations ============

  staking.post('/stake', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      account: addressSchema,
      amount: amountSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    const { account, amount } = parsed.data;
    const receipt = await pool.stake(account, amount);

    return c.json({
      success: true,
      message: receipt.settledPrincipal > 0n
        ? `Previous stake settled; staked ${amount} tokens`
        : `Staked ${amount} tokens`,
      receipt: toJson(receipt),
    });
  });

  staking.post('/redeem', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      account: addressSchema,
      amount: amountSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    const { account, amount } = parsed.data;
    const receipt = await pool.redeem(account, amount);

    return c.json({
      success: true,
      message: receipt.interestForfeited > 0n
        ? `Redeemed ${amount} tokens; ${receipt.interestForfeited} unclaimed interest forfeited`
        : `Redeemed ${amount} tokens`,
      receipt: toJson(receipt),
    });
  });

  staking.post('/claim', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      account: addressSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    const receipt = await pool.claimInterest(parsed.data.account);

    return c.json({
      success: true,
      message: `Claimed ${receipt.interest} tokens of interest`,
      receipt: toJson(receipt),
    });
  });

  // ============ Queries ============

  staking.get('/position/:account', (c) => {
    const parsed = addressSchema.safeParse(c.req.param('account'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid address' }, 400);
    }

    const position = pool.getPosition(parsed.data);

    if (!position.active) {
      return c.json({
        success: true,
        position: null,
        message: 'No active stake.',
      });
    }

    return c.json({
      success: true,
      position: toJson(position),
    });
  });

  staking.get('/interest/:account', (c) => {
    const parsed = addressSchema.safeParse(c.req.param('account'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid address' }, 400);
    }

    return c.json({
      success: true,
      account: parsed.data,
      accruedInterest: pool.getAccruedInterest(parsed.data).toString(),
    });
  });

  staking.get('/stats', async (c) => {
    const custodyBalance = await pool.custodyBalance();
    const totalStaked = pool.totalStaked();

    return c.json({
      success: true,
      overview: {
        token: pool.token(),
        owner: pool.owner(),
        custody: pool.custody(),
        totalStaked: totalStaked.toString(),
        activeStakers: pool.activeStakers(),
        custodyBalance: custodyBalance.toString(),
        interestReserve: (custodyBalance > totalStaked ? custodyBalance - totalStaked : 0n).toString(),
      },
    });
  });

  staking.get('/events', (c) => {
    const account = c.req.query('account');
    if (account !== undefined && !addressSchema.safeParse(account).success) {
      return c.json({ success: false, error: 'Invalid address' }, 400);
    }

    return c.json({
      success: true,
      events: pool.events.list(account).map((event) => toJson(event)),
    });
  });

  // ============ Administration ============

  staking.use('/admin/*', requireAdminApiKey(adminApiKey));

  staking.post('/admin/transfer-ownership', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      caller: addressSchema,
      newOwner: z.string(),
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    pool.transferOwnership(parsed.data.caller, parsed.data.newOwner);

    return c.json({
      success: true,
      message: 'Ownership transferred',
      owner: pool.owner(),
    });
  });

  staking.post('/admin/sweep', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      caller: addressSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    const swept = await pool.sweep(parsed.data.caller);

    return c.json({
      success: true,
      message: 'Sweep is not enabled for this pool; nothing was moved',
      swept: swept.toString(),
    });
  });

  return staking;
}
