/**
 * Ledger and orchestrator misuse errors.
 *
 * Each one is an operational ApiError so the central error handler maps it
 * to its own error code and HTTP status.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { TransactionStatus } from '../../types/ledger';

export class InvalidAmountError extends ApiError {
  constructor(message = 'Amount must be positive') {
    super(ErrorCode.INVALID_AMOUNT, message);
  }
}

export class InvalidCardsError extends ApiError {
  constructor(message = 'Source and destination cards must differ') {
    super(ErrorCode.INVALID_CARDS, message);
  }
}

export class UnknownTransactionKindError extends ApiError {
  readonly kind: string;

  constructor(kind: string) {
    super(ErrorCode.UNKNOWN_TRANSACTION_KIND, `Unknown transaction kind: ${kind}`);
    this.kind = kind;
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(ErrorCode.TRANSACTION_NOT_FOUND, message);
  }

  static transaction(transactionId: string): NotFoundError {
    return new NotFoundError(`Transaction not found: ${transactionId}`);
  }

  static reference(providerRef: string): NotFoundError {
    return new NotFoundError(`No transaction registered for provider reference: ${providerRef}`);
  }
}

export class DuplicateTransactionError extends ApiError {
  constructor(message: string) {
    super(ErrorCode.DUPLICATE_TRANSACTION, message);
  }
}

export class InvalidTransitionError extends ApiError {
  readonly from: TransactionStatus;
  readonly to: TransactionStatus;

  constructor(
    from: TransactionStatus,
    to: TransactionStatus,
    transactionId: string,
    message = `Invalid state transition from ${from} to ${to} for transaction ${transactionId}`
  ) {
    super(ErrorCode.INVALID_STATUS_TRANSITION, message);
    this.from = from;
    this.to = to;
  }
}
