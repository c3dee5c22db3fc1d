/**
 * Rate Limiting Middleware
 *
 * Redis-backed limits so that every instance shares one budget.
 *
 * Environment-based configuration:
 * - Production: Strict limits to prevent abuse
 * - Development: Relaxed limits for easier testing
 * - Test: Very lenient limits, in-memory store
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting (load testing only).
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { Store } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { config } from '../config';
import { getRedisClient } from '../config/redis';
import { createServiceLogger } from '../observability';
import { ErrorCode } from '../types/errors';

const log = createServiceLogger('rate-limiter');

type ScriptReply = number | string | Array<number | string>;

/**
 * Narrow an ioredis reply to what the store's Lua scripts return
 */
const toScriptReply = (reply: unknown): ScriptReply => {
  if (typeof reply === 'number' || typeof reply === 'string') {
    return reply;
  }
  if (Array.isArray(reply)) {
    return reply.map((item: unknown) => (typeof item === 'number' ? item : String(item)));
  }
  throw new Error(`Unexpected Redis reply: ${String(reply)}`);
};

/**
 * Redis store for one limiter; the default memory store in tests
 */
const createStore = (prefix: string): Store | undefined => {
  if (config.isTest) {
    return undefined;
  }

  const client = getRedisClient();
  return new RedisStore({
    sendCommand: async (command: string, ...args: string[]) =>
      toScriptReply(await client.call(command, ...args)),
    prefix,
  });
};

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const limitMessage = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

const createLimiter = (limiter: () => RequestHandler): RequestHandler => {
  if (config.rateLimit.disabled) {
    log.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter();
};

/**
 * Global rate limiter, applied to all routes except health and metrics
 */
export const globalLimiter: RequestHandler = createLimiter(() =>
  rateLimit({
    store: createStore('rl:global:'),
    windowMs: config.rateLimit.global.windowMs,
    limit: config.rateLimit.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Limiter for money-moving endpoints, keyed by the user in the path
 */
export const paymentLimiter: RequestHandler = createLimiter(() =>
  rateLimit({
    store: createStore('rl:payment:'),
    windowMs: config.rateLimit.payment.windowMs,
    limit: config.rateLimit.payment.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_TRANSACTIONS,
      'Too many transactions, please try again later'
    ),
    keyGenerator: (req) => req.params.userId || req.ip || 'unknown',
    validate: false,
  })
);
