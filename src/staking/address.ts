/**
 * Account identities are base58 Solana public keys.
 * The all-zero key (System Program id) is the null identity.
 */

import { PublicKey } from '@solana/web3.js';

export type Address = string;

export const NULL_ADDRESS: Address = PublicKey.default.toBase58();

export function isValidAddress(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * True for the null identity and for anything that does not parse as a key
 */
export function isNullAddress(value: string): boolean {
  if (!isValidAddress(value)) return true;
  return new PublicKey(value).equals(PublicKey.default);
}
