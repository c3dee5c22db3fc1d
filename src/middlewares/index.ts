/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError, AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, paymentLimiter } from './rateLimiter';

// Idempotency
export {
  IDEMPOTENCY_HEADER,
  idempotencyMiddleware,
  idempotencyCacheKey,
  validateIdempotencyKey,
} from './idempotency';
