import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_CONFIG,
  RATE_LIMIT_CONFIG,
  IDEMPOTENCY_CONFIG,
  CARD_PROVIDER_CONFIG,
  STRIPE_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Consolidates all environment-specific settings.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis
  redis: REDIS_CONFIG,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Idempotency
  idempotency: IDEMPOTENCY_CONFIG,

  // Payment providers
  cardProvider: CARD_PROVIDER_CONFIG,
  stripe: STRIPE_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,
};
