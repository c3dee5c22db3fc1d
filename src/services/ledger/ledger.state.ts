import { TransactionStatus } from '../../types/ledger';
import { InvalidTransitionError } from './ledger.errors';

/**
 * Ledger record state machine
 *
 *              ┌──────► COMPLETED
 *              │
 * PENDING ─────┼──────► FAILED
 *              │
 *              └──────► CANCELLED
 *
 * PENDING is the only initial state; the other three are terminal.
 */

export const INITIAL_STATUS = TransactionStatus.PENDING;

/**
 * Get allowed next states for a given status
 */
export function getAllowedTransitions(status: TransactionStatus): TransactionStatus[] {
  switch (status) {
    case TransactionStatus.PENDING:
      return [TransactionStatus.COMPLETED, TransactionStatus.FAILED, TransactionStatus.CANCELLED];
    case TransactionStatus.COMPLETED:
    case TransactionStatus.FAILED:
    case TransactionStatus.CANCELLED:
      return [];
    default: {
      const unreachable: never = status;
      throw new Error(`Unhandled transaction status: ${String(unreachable)}`);
    }
  }
}

/**
 * Check if a state transition is valid
 */
export function isValidTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus
): boolean {
  return getAllowedTransitions(currentStatus).includes(newStatus);
}

/**
 * Throws InvalidTransitionError if the transition is not allowed
 */
export function validateTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus,
  transactionId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw new InvalidTransitionError(currentStatus, newStatus, transactionId);
  }
}

export function isTerminalState(status: TransactionStatus): boolean {
  return getAllowedTransitions(status).length === 0;
}
