/**
 * Minor-unit helpers. Ledger amounts are decimals with 2 places; all
 * arithmetic on them happens in integer cents.
 */

const CENTS_PER_UNIT = 100;
const PRECISION_TOLERANCE = 1e-6;

/**
 * Convert a 2-decimal amount to integer cents
 */
export const toCents = (amount: number): number => Math.round(amount * CENTS_PER_UNIT);

export const fromCents = (cents: number): number => cents / CENTS_PER_UNIT;

/**
 * True when `amount` is finite and has no more than 2 decimal places
 */
export const hasMinorUnitPrecision = (amount: number): boolean =>
  Number.isFinite(amount) &&
  Math.abs(amount * CENTS_PER_UNIT - Math.round(amount * CENTS_PER_UNIT)) < PRECISION_TOLERANCE;

/**
 * Round to 2 decimals, half away from zero on the cent boundary
 */
export const roundMoney = (amount: number): number => fromCents(toCents(amount));

/**
 * Sum amounts without accumulating floating point drift
 */
export const sumMoney = (amounts: readonly number[]): number =>
  fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));
