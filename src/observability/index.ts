// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  addLogContext,
  currentLogFields,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerTransactionsTotal,
  ledgerTransactionAmount,
  ledgerRejectedTransitionsTotal,
  providerCallDuration,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export { initTracing, shutdownTracing, getTracer, withSpan, traceProviderCall } from './tracing';
