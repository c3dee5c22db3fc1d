import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'cardledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger writes by transaction kind and resulting status
 */
export const ledgerTransactionsTotal = new Counter({
  name: 'ledger_transactions_total',
  help: 'Ledger records written, by kind and status',
  labelNames: ['kind', 'status'] as const,
  registers: [registry],
});

/**
 * Gross amounts of newly logged transactions
 */
export const ledgerTransactionAmount = new Histogram({
  name: 'ledger_transaction_amount',
  help: 'Gross amount of logged transactions',
  labelNames: ['kind'] as const,
  buckets: [1, 10, 50, 100, 500, 1000, 5000, 10000],
  registers: [registry],
});

/**
 * Rejected status transitions (lost races and misuse)
 */
export const ledgerRejectedTransitionsTotal = new Counter({
  name: 'ledger_rejected_transitions_total',
  help: 'Status transitions rejected by the ledger state machine',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

// ============================================
// Provider Metrics
// ============================================

export const providerCallDuration = new Histogram({
  name: 'provider_call_duration_seconds',
  help: 'External payment provider call duration in seconds',
  labelNames: ['provider', 'operation', 'outcome'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
