/**
 * Unit tests for the Fee Policy
 *
 * Pure functions, no mocking required.
 */

import { MAX_AMOUNT, assertValidAmount, buildAmounts, calculateFee } from '../../../src/services/fees';
import { InvalidAmountError, UnknownTransactionKindError } from '../../../src/services/ledger/ledger.errors';
import { TransactionKind } from '../../../src/types/ledger';
import { toCents } from '../../../src/utils/money';

describe('Fee Policy', () => {
  describe('calculateFee', () => {
    it('should charge 2% on card transfers', () => {
      expect(calculateFee(TransactionKind.CARD_TRANSFER, 100)).toBe(2);
    });

    it('should charge 2.9% plus 0.30 on stripe deposits', () => {
      expect(calculateFee(TransactionKind.STRIPE_DEPOSIT, 50)).toBe(1.75);
      expect(calculateFee(TransactionKind.STRIPE_DEPOSIT, 10)).toBe(0.59);
    });

    it('should round half cents up', () => {
      // 0.25 * 2% = 0.005
      expect(calculateFee(TransactionKind.CARD_TRANSFER, 0.25)).toBe(0.01);
    });

    it('should accept the kind as a plain string', () => {
      expect(calculateFee('card_transfer', 12.5)).toBe(0.25);
    });

    it('should reject an unknown kind', () => {
      expect(() => calculateFee('wire_transfer', 100)).toThrow(UnknownTransactionKindError);
    });

    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY, 1.234])(
      'should reject gross amount %p',
      (amount) => {
        expect(() => calculateFee(TransactionKind.CARD_TRANSFER, amount)).toThrow(InvalidAmountError);
      }
    );
  });

  describe('buildAmounts', () => {
    it('should split a card transfer of 100 into fee 2 and net 98', () => {
      expect(buildAmounts(TransactionKind.CARD_TRANSFER, 100)).toEqual({
        gross: 100,
        fee: 2,
        net: 98,
      });
    });

    it('should split a stripe deposit of 50 into fee 1.75 and net 48.25', () => {
      expect(buildAmounts(TransactionKind.STRIPE_DEPOSIT, 50)).toEqual({
        gross: 50,
        fee: 1.75,
        net: 48.25,
      });
    });

    it('should keep fee plus net equal to gross to the cent', () => {
      const grossAmounts = [0.01, 0.1 + 0.2, 1.99, 33.33, 99.95, 1234.56, 1000000];

      for (const kind of Object.values(TransactionKind)) {
        for (const gross of grossAmounts) {
          const { fee, net } = buildAmounts(kind, gross);
          expect(toCents(fee) + toCents(net)).toBe(toCents(gross));
        }
      }
    });

    it('should produce a negative net when the flat fee exceeds the deposit', () => {
      // 0.30 * 2.9% rounds to 0.01, plus the 0.30 flat fee
      expect(buildAmounts(TransactionKind.STRIPE_DEPOSIT, 0.3)).toEqual({
        gross: 0.3,
        fee: 0.31,
        net: -0.01,
      });
    });
  });

  describe('assertValidAmount', () => {
    it('should accept amounts with up to two decimals', () => {
      expect(() => assertValidAmount(19.99)).not.toThrow();
      expect(() => assertValidAmount(0.1 + 0.2)).not.toThrow();
    });

    it('should accept the ceiling and reject anything above it', () => {
      expect(() => assertValidAmount(MAX_AMOUNT)).not.toThrow();
      expect(() => assertValidAmount(1000000000)).toThrow(
        'Amount must not exceed 999999999.99, got 1000000000'
      );
      expect(() => assertValidAmount(9e15)).toThrow(
        expect.objectContaining({ errorCode: 2002 })
      );
    });

    it('should split the ceiling amount exactly', () => {
      expect(buildAmounts('card_transfer', MAX_AMOUNT)).toEqual({
        gross: 999999999.99,
        fee: 20000000,
        net: 979999999.99,
      });
    });

    it('should carry the INVALID_AMOUNT error code', () => {
      expect(() => assertValidAmount(-1)).toThrow(
        expect.objectContaining({ errorCode: 2002, statusCode: 400 })
      );
    });
  });
});
