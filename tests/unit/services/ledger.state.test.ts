/**
 * Unit tests for the Ledger State Machine
 *
 * Tests the pure functions that manage record status transitions.
 */

import {
  INITIAL_STATUS,
  getAllowedTransitions,
  isTerminalState,
  isValidTransition,
  validateTransition,
} from '../../../src/services/ledger/ledger.state';
import { InvalidTransitionError } from '../../../src/services/ledger/ledger.errors';
import { TransactionStatus } from '../../../src/types/ledger';

const TERMINAL = [TransactionStatus.COMPLETED, TransactionStatus.FAILED, TransactionStatus.CANCELLED];

describe('Ledger State Machine', () => {
  it('should start every record pending', () => {
    expect(INITIAL_STATUS).toBe(TransactionStatus.PENDING);
  });

  describe('from PENDING state', () => {
    it.each(TERMINAL)('should allow transition to %s', (status) => {
      expect(isValidTransition(TransactionStatus.PENDING, status)).toBe(true);
    });

    it('should not allow a pending to pending no-op', () => {
      expect(isValidTransition(TransactionStatus.PENDING, TransactionStatus.PENDING)).toBe(false);
    });

    it('should not be terminal', () => {
      expect(isTerminalState(TransactionStatus.PENDING)).toBe(false);
    });
  });

  describe.each(TERMINAL)('from terminal state %s', (terminal) => {
    it('should allow no transitions', () => {
      expect(getAllowedTransitions(terminal)).toEqual([]);
      expect(isTerminalState(terminal)).toBe(true);
    });

    it.each(Object.values(TransactionStatus))('should reject transition to %s', (target) => {
      expect(() => validateTransition(terminal, target, 'txn_test')).toThrow(InvalidTransitionError);
    });
  });

  describe('validateTransition', () => {
    it('should report the rejected edge on the error', () => {
      const attempt = () =>
        validateTransition(TransactionStatus.FAILED, TransactionStatus.COMPLETED, 'txn_abc');

      expect(attempt).toThrow(InvalidTransitionError);
      expect(attempt).toThrow(
        expect.objectContaining({
          from: TransactionStatus.FAILED,
          to: TransactionStatus.COMPLETED,
          message: 'Invalid state transition from failed to completed for transaction txn_abc',
          statusCode: 409,
        })
      );
    });
  });
});
