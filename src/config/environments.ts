/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app instead of reading process.env directly.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, STRIPE_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/cardledger'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/cardledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/cardledger';

/**
 * MongoDB connection settings
 *
 * Ledger writes are acknowledged only once journaled on a majority of nodes.
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
  writeConcern: {
    w: 'majority' as const,
    journal: true,
  },
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(process.env.REDIS_PORT || (isTest ? '6380' : '6379'), 10);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

export const REDIS_CONFIG = {
  host: REDIS_HOST,
  port: REDIS_PORT,
  password: REDIS_PASSWORD,
  maxRetriesPerRequest: isProduction ? 5 : 3,
  connectTimeout: isProduction ? 10000 : 5000,
  lazyConnect: true,
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting (load testing only).
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Money-moving endpoints (transfers, deposits, confirmations)
  payment: {
    windowMs: parseInt(process.env.PAYMENT_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.PAYMENT_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.PAYMENT_RATE_LIMIT_MAX || '100', 10),
  },
};

// =============================================================================
// IDEMPOTENCY CONFIGURATION
// =============================================================================

export const IDEMPOTENCY_CONFIG = {
  ttlSeconds: parseInt(process.env.IDEMPOTENCY_TTL_SECONDS || '86400', 10), // 24 hours
  enabled: !isTest || process.env.IDEMPOTENCY_ENABLED === 'true',
};

// =============================================================================
// PAYMENT PROVIDERS
// =============================================================================

/**
 * Card-transfer provider (HTTP API)
 */
export const CARD_PROVIDER_CONFIG = {
  baseUrl: process.env.CARD_PROVIDER_URL || 'http://localhost:4000',
  apiKey: process.env.CARD_PROVIDER_API_KEY || '',
  timeoutMs: parseInt(process.env.CARD_PROVIDER_TIMEOUT_MS || '15000', 10),
};

/**
 * Stripe gateway. Deposits are refused when no secret key is configured.
 */
export const STRIPE_CONFIG = {
  secretKey: process.env.STRIPE_SECRET_KEY || '',
  currency: (process.env.STRIPE_CURRENCY || 'usd').toLowerCase(),
  timeoutMs: parseInt(process.env.STRIPE_TIMEOUT_MS || '30000', 10),
  productName: process.env.STRIPE_PRODUCT_NAME || 'Balance top-up',
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING / OBSERVABILITY
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

/**
 * OpenTelemetry configuration
 */
export const OTEL_CONFIG = {
  enabled: isProduction || process.env.OTEL_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'cardledger-api',
  exporterEndpoint:
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'MONGODB_URI',
    'REDIS_HOST',
    'REDIS_PASSWORD',
    'CORS_ORIGINS',
    'CARD_PROVIDER_URL',
    'CARD_PROVIDER_API_KEY',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.STRIPE_SECRET_KEY && !process.env.STRIPE_SECRET_KEY.startsWith('sk_')) {
    throw new Error('STRIPE_SECRET_KEY must be a Stripe secret key (sk_...)');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  stripeConfigured: Boolean(STRIPE_CONFIG.secretKey),
});
