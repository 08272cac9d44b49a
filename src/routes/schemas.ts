import { z } from 'zod';
import { isValidAddress } from '../staking/address';

export const addressSchema = z.string().refine(isValidAddress, 'Invalid address');

// Whole token units, as a decimal string or a safe integer
export const amountSchema = z
  .union([
    z.string().regex(/^\d+$/, 'Amount must be a whole number of token units'),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((val) => BigInt(val));

export type JsonScalar = string | number | boolean;

/**
 * Flatten a record for JSON, writing bigints as decimal strings
 */
export function toJson(record: object): Record<string, JsonScalar> {
  const out: Record<string, JsonScalar> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'bigint') {
      out[key] = value.toString();
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      out[key] = value;
    }
  }
  return out;
}
