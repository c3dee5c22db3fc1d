/**
 * Idempotency Middleware
 *
 * Replays the first response of a money-moving request when the client
 * retries it with the same X-Idempotency-Key header. Responses are cached
 * in Redis; without a connection the request is processed normally.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { createServiceLogger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

const log = createServiceLogger('idempotency');

export const IDEMPOTENCY_HEADER = 'X-Idempotency-Key';

/**
 * Cached response structure
 */
interface CachedResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  cachedAt: string;
}

const isCachedResponse = (value: unknown): value is CachedResponse =>
  typeof value === 'object' &&
  value !== null &&
  'statusCode' in value &&
  typeof value.statusCode === 'number' &&
  'headers' in value &&
  typeof value.headers === 'object' &&
  'body' in value;

/**
 * A 502 carries a provider outcome the ledger has already recorded, so a
 * retry must get it back rather than run the payment again. Other server
 * errors are left uncached so that a retry can go through.
 */
const isReplayable = (statusCode: number): boolean => statusCode < 500 || statusCode === 502;

/**
 * Keys are scoped to the user in the path, falling back to the client IP
 */
export const idempotencyCacheKey = (req: Request, idempotencyKey: string): string => {
  const scope = req.params.userId || req.ip || 'anonymous';
  return `idempotency:${scope}:${req.method}:${req.baseUrl}${req.path}:${idempotencyKey}`;
};

/**
 * Idempotency middleware
 *
 * - First request: processed normally, response cached
 * - Retries with the same key: cached response returned with
 *   `X-Idempotent-Replayed: true`
 */
export const idempotencyMiddleware = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = req.get(IDEMPOTENCY_HEADER);

  if (!idempotencyKey) {
    next();
    return;
  }

  if (!config.idempotency.enabled || !isRedisConnected()) {
    next();
    return;
  }

  const cacheKey = idempotencyCacheKey(req, idempotencyKey);

  try {
    const redis = getRedisClient();
    const cached = await redis.get(cacheKey);

    if (cached) {
      const cachedResponse: unknown = JSON.parse(cached);

      if (isCachedResponse(cachedResponse)) {
        log.info({ idempotencyKey, cachedAt: cachedResponse.cachedAt }, 'Returning cached idempotent response');

        Object.entries(cachedResponse.headers).forEach(([key, value]) => {
          res.setHeader(key, value);
        });
        res.setHeader('X-Idempotent-Replayed', 'true');
        res.status(cachedResponse.statusCode).json(cachedResponse.body);
        return;
      }

      log.warn({ idempotencyKey }, 'Ignoring malformed idempotency cache entry');
    }

    const originalJson = res.json.bind(res);

    res.json = function (body: unknown) {
      const responseToCache: CachedResponse = {
        statusCode: res.statusCode,
        body,
        headers: {
          'content-type': String(res.getHeader('content-type') ?? 'application/json'),
        },
        cachedAt: new Date().toISOString(),
      };

      if (isReplayable(res.statusCode)) {
        redis
          .setex(cacheKey, config.idempotency.ttlSeconds, JSON.stringify(responseToCache))
          .then(() => {
            log.debug({ idempotencyKey, statusCode: res.statusCode }, 'Cached idempotent response');
          })
          .catch((err: unknown) => {
            log.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
          });
      }

      return originalJson(body);
    };

    next();
  } catch (error) {
    log.error({ err: error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Validate idempotency key format
 * Keys should be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const idempotencyKey = req.get(IDEMPOTENCY_HEADER);

  if (idempotencyKey === undefined) {
    next();
    return;
  }

  if (!/^[a-zA-Z0-9_-]{1,64}$/.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
