/**
 * Environment configuration with Zod validation
 *
 * Validated on first use; every invalid key is reported at once.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { isValidAddress } from '../staking/address';

dotenv.config();

const address = (label: string) =>
  z.string().refine(isValidAddress, `Invalid ${label} address`);

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  STAKING_OWNER: address('owner'),
  STAKING_TOKEN: address('token'),
  STAKING_CUSTODY: address('custody'),

  TOKEN_GENESIS_SUPPLY: z
    .string()
    .regex(/^\d+$/, 'Genesis supply must be a whole number of token units')
    .default('0')
    .transform((val) => BigInt(val)),

  ADMIN_API_KEY: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

/**
 * Load and validate configuration from an environment map
 * @throws {Error} If validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (config) {
    return config;
  }

  const result = configSchema.safeParse(env);
  if (!result.success) {
    const messages = result.error.errors.map(
      (err) => `${err.path.join('.')}: ${err.message}`
    );
    throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
  }

  config = result.data;
  return config;
}

/**
 * Drop the cached configuration (tests reload with a different env)
 */
export function resetConfig(): void {
  config = null;
}

/**
 * Staking pool identities
 */
export function getStakingConfig(cfg: Config = loadConfig()) {
  return {
    owner: cfg.STAKING_OWNER,
    token: cfg.STAKING_TOKEN,
    custody: cfg.STAKING_CUSTODY,
    genesisSupply: cfg.TOKEN_GENESIS_SUPPLY,
  };
}
