export { calculateFee, buildAmounts, assertValidAmount, feeTable, MAX_AMOUNT } from './fee.policy';
