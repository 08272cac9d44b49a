import type { MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';

/**
 * Admin API key authentication middleware
 * Checks the X-Admin-Key header against the configured key
 */
export const requireAdminApiKey = (expectedKey: string | undefined): MiddlewareHandler => {
  return async (c, next) => {
    const providedKey = c.req.header('X-Admin-Key');

    if (!expectedKey) {
      throw new HTTPException(500, { message: 'Admin authentication not configured' });
    }

    if (!providedKey || providedKey !== expectedKey) {
      throw new HTTPException(403, { message: 'Invalid admin API key' });
    }

    await next();
  };
};
