/**
 * Fee Policy
 *
 * Maps a transaction kind and gross amount to the fee withheld from it.
 * New kinds are added to `feeTable`; the `Record` type forces every
 * `TransactionKind` to have an entry.
 */

import { AmountBreakdown, TransactionKind } from '../../types/ledger';
import { fromCents, hasMinorUnitPrecision, toCents } from '../../utils/money';
import { InvalidAmountError, UnknownTransactionKindError } from '../ledger/ledger.errors';

/**
 * Fee rule expressed on integer cents
 */
interface FeeRule {
  /** Percentage rate in basis points (1 bp = 0.01%) */
  rateBasisPoints: number;
  /** Flat fee added after the percentage, in cents */
  fixedCents: number;
}

export const feeTable: Readonly<Record<TransactionKind, FeeRule>> = {
  // 2%
  [TransactionKind.CARD_TRANSFER]: { rateBasisPoints: 200, fixedCents: 0 },
  // 2.9% + 0.30
  [TransactionKind.STRIPE_DEPOSIT]: { rateBasisPoints: 290, fixedCents: 30 },
};

/**
 * Largest accepted gross amount. Its value in cents stays far below 2^53,
 * so cent arithmetic on it and on its fee is exact.
 */
export const MAX_AMOUNT = 999999999.99;

const isTransactionKind = (kind: string): kind is TransactionKind =>
  Object.prototype.hasOwnProperty.call(feeTable, kind);

/**
 * Reject non-positive, non-finite, oversized or sub-cent amounts
 */
export const assertValidAmount = (gross: number): void => {
  if (!Number.isFinite(gross) || gross <= 0) {
    throw new InvalidAmountError(`Amount must be a positive number, got ${gross}`);
  }
  if (gross > MAX_AMOUNT) {
    throw new InvalidAmountError(`Amount must not exceed ${MAX_AMOUNT}, got ${gross}`);
  }
  if (!hasMinorUnitPrecision(gross)) {
    throw new InvalidAmountError(`Amount can have at most 2 decimal places, got ${gross}`);
  }
};

/**
 * Fee for `gross` under the rule for `kind`, rounded to the cent
 */
export const calculateFee = (kind: TransactionKind | string, gross: number): number => {
  if (!isTransactionKind(kind)) {
    throw new UnknownTransactionKindError(kind);
  }
  assertValidAmount(gross);

  const rule = feeTable[kind];
  const percentageCents = Math.round((toCents(gross) * rule.rateBasisPoints) / 10000);

  return fromCents(percentageCents + rule.fixedCents);
};

/**
 * Gross, fee and net for a new ledger record
 */
export const buildAmounts = (kind: TransactionKind | string, gross: number): AmountBreakdown => {
  const fee = calculateFee(kind, gross);
  return {
    gross: fromCents(toCents(gross)),
    fee,
    net: fromCents(toCents(gross) - toCents(fee)),
  };
};
