import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { PaymentServices } from './container';
import { errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import { createHealthRoutes, defaultHealthChecks, HealthChecks } from './routes/health';
import { PaymentController, createPaymentRoutes } from './services/payment';
import {
  correlationMiddleware,
  createServiceLogger,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

const log = createServiceLogger('app');

export interface AppOptions {
  health?: HealthChecks;
}

export const createApp = (services: PaymentServices, options: AppOptions = {}): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  app.use(globalLimiter);

  // Routes
  const health =
    options.health ?? defaultHealthChecks(() => services.orchestrator.isGatewayConfigured());
  app.use('/health', createHealthRoutes(health));
  app.use('/payments', createPaymentRoutes(new PaymentController(services)));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      log.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'CardLedger API',
      version: '1.0.0',
      description: 'Transaction ledger and payment orchestration',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
