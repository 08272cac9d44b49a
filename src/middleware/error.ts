import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { StakingError, type StakingErrorCode } from '../staking/errors';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('http');

export const STATUS_BY_CODE: Record<StakingErrorCode, 400 | 403 | 409 | 502> = {
  InvalidAmount: 400,
  InsufficientBalance: 400,
  UnauthorizedCaller: 403,
  InvalidAddress: 400,
  ReentrantCall: 409,
  AlreadyClaimed: 409,
  NoActiveStake: 400,
  NoInterestDue: 400,
  TransferFailed: 502,
};

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof StakingError) {
    return c.json({
      success: false,
      error: err.message,
      code: err.code,
    }, STATUS_BY_CODE[err.code]);
  }

  if (err instanceof HTTPException) {
    return c.json({
      success: false,
      error: err.message,
      statusCode: err.status,
    }, err.status);
  }

  if (err instanceof ZodError) {
    return c.json({
      success: false,
      error: 'Validation Error',
      details: err.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    }, 400);
  }

  log.error({ err, path: c.req.path, method: c.req.method }, 'Unhandled request error');

  return c.json({
    success: false,
    error: 'Internal Server Error',
    message: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
  }, 500);
};
