/**
 * Token Ledger Routes
 *
 * Balance lookups, allowances and plain transfers on the in-process ledger.
 * Approvals and transfers move other people's funds, so they sit behind
 * the admin key.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { InMemoryTokenLedger } from '../token/ledger';
import { requireAdminApiKey } from '../middleware/adminApiKey';
import { addressSchema, amountSchema } from './schemas';

export interface TokenRoutesOptions {
  tokens: InMemoryTokenLedger;
  adminApiKey?: string;
}

export function createTokenRoutes({ tokens, adminApiKey }: TokenRoutesOptions) {
  const token = new Hono();

  token.get('/balance/:account', (c) => {
    const parsed = addressSchema.safeParse(c.req.param('account'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid address' }, 400);
    }

    return c.json({
      success: true,
      token: tokens.token,
      account: parsed.data,
      balance: tokens.balanceOfSync(parsed.data).toString(),
    });
  });

  token.use('/approve', requireAdminApiKey(adminApiKey));
  token.use('/transfer', requireAdminApiKey(adminApiKey));

  token.post('/approve', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      owner: addressSchema,
      spender: addressSchema,
      amount: amountSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    const { owner, spender, amount } = parsed.data;
    tokens.approve(owner, spender, amount);

    return c.json({
      success: true,
      owner,
      spender,
      allowance: tokens.allowance(owner, spender).toString(),
    });
  });

  token.post('/transfer', async (c) => {
    const body = await c.req.json();

    const schema = z.object({
      from: addressSchema,
      to: addressSchema,
      amount: amountSchema,
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    const { from, to, amount } = parsed.data;
    const ok = await tokens.transferAs(from, to, amount);
    if (!ok) {
      return c.json({ success: false, error: 'Insufficient balance' }, 400);
    }

    return c.json({
      success: true,
      from: tokens.balanceOfSync(from).toString(),
      to: tokens.balanceOfSync(to).toString(),
    });
  });

  return token;
}
