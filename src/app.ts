/**
 * HTTP application wiring
 */

import { Hono } from 'hono';
import { createStakingRoutes } from './routes/staking';
import { createTokenRoutes } from './routes/token';
import { errorHandler } from './middleware/error';
import { StakingPool, type Clock } from './staking';
import { InMemoryTokenLedger } from './token/ledger';
import { getStakingConfig, type Config } from './core/config';
import { createModuleLogger } from './core/logger';

const log = createModuleLogger('app');

export interface AppServices {
  pool: StakingPool;
  tokens: InMemoryTokenLedger;
  adminApiKey?: string;
}

export function createApp(services: AppServices) {
  const app = new Hono();

  app.get('/health', (c) => c.json({ success: true, status: 'ok' }));
  app.route('/staking', createStakingRoutes({ pool: services.pool, adminApiKey: services.adminApiKey }));
  app.route('/token', createTokenRoutes({ tokens: services.tokens, adminApiKey: services.adminApiKey }));
  app.onError(errorHandler);

  return app;
}

/**
 * Build the token ledger and staking pool from configuration
 */
export function createServices(config: Config, clock?: Clock): AppServices {
  const { owner, token, custody, genesisSupply } = getStakingConfig(config);

  const tokens = new InMemoryTokenLedger(token);
  if (genesisSupply > 0n) {
    tokens.mint(owner, genesisSupply);
  }

  const pool = new StakingPool({
    owner,
    token,
    custody,
    ledger: tokens.connect(custody),
    clock,
  });

  log.info(
    { owner, token, custody, genesisSupply: genesisSupply.toString() },
    'Staking pool initialised'
  );

  return { pool, tokens, adminApiKey: config.ADMIN_API_KEY };
}
