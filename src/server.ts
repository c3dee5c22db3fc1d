import { initTracing, shutdownTracing, createServiceLogger } from './observability';

// Tracing must patch modules before express, mongoose and ioredis load
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createPaymentServices } from './container';
import { HttpCardTransferClient, StripeGateway } from './providers';
import { MongoLedgerStore } from './services/ledger/ledger.repository';

const log = createServiceLogger('server');

const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();

    try {
      await connectRedis();
    } catch (error) {
      // Rate limits and idempotency replay degrade without Redis; the ledger does not
      log.warn({ err: error }, 'Redis unavailable, continuing without it');
    }

    const gateway = StripeGateway.fromConfig();

    const services = createPaymentServices({
      store: new MongoLedgerStore(),
      cardProvider: new HttpCardTransferClient(),
      gateway,
      currency: config.stripe.currency,
    });

    const app = createApp(services);

    const server = app.listen(config.port, () => {
      log.info({ port: config.port, ...getEnvironmentInfo() }, 'Server started');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      log.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        log.info('HTTP server closed');

        Promise.all([disconnectDatabase(), disconnectRedis(), shutdownTracing()])
          .then(() => {
            log.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
