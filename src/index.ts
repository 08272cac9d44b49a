import { serve } from '@hono/node-server';
import { createApp, createServices } from './app';
import { loadConfig } from './core/config';
import { logger } from './core/logger';

const config = loadConfig();
const app = createApp(createServices(config));

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info({ port: info.port }, `Staking API listening on :${info.port}`);
});
