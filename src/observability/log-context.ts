import { AsyncLocalStorage } from 'async_hooks';

/**
 * Fields stamped on every log line written while a request is handled.
 * The correlation middleware opens the scope; the payment orchestrator adds
 * the user and transaction once it knows them.
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  transactionId?: string;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined =>
  asyncLocalStorage.getStore()?.correlationId;

/**
 * Fields of the current request scope, empty outside a request
 */
export const currentLogFields = (): Partial<LogContext> => ({
  ...asyncLocalStorage.getStore(),
});

/**
 * Merge fields into the current request scope. Service calls made outside
 * a request (start-up, direct calls in tests) have no scope to merge into.
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const scope = asyncLocalStorage.getStore();
  if (scope) {
    Object.assign(scope, context);
  }
};
