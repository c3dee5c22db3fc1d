import pino from 'pino';

import { config } from '../config';

import { currentLogFields } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Silent unless LOG_LEVEL says otherwise
 *
 * Request-scoped fields (correlation id, user, transaction) are mixed into
 * every line.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'cardledger',
    env: config.nodeEnv,
  },
  mixin: currentLogFields,
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for component-specific logging
export const createServiceLogger = (serviceName: string) => {
  return logger.child({ component: serviceName });
};
