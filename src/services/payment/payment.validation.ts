/**
 * Payment API Validation Rules
 *
 * Shape checks only. Amount semantics (positive, at most 2 decimals,
 * covers the fee) belong to the fee policy and surface as INVALID_AMOUNT.
 */

import { body, param } from 'express-validator';

import { MAX_AMOUNT } from '../fees/fee.policy';

const userIdParam = param('userId')
  .isString()
  .trim()
  .notEmpty()
  .withMessage('User ID is required')
  .isLength({ max: 64 })
  .withMessage('User ID must be at most 64 characters');

const amountField = body('amount')
  .exists({ values: 'null' })
  .withMessage('Amount is required')
  .isFloat()
  .withMessage('Amount must be a number')
  .bail()
  .isFloat({ max: MAX_AMOUNT })
  .withMessage(`Amount must be at most ${MAX_AMOUNT}`)
  .toFloat();

const redirectUrl = (field: string) =>
  body(field)
    .optional()
    .isURL({ protocols: ['http', 'https'], require_protocol: true, require_tld: false })
    .withMessage(`${field} must be an http(s) URL`);

export const cardTransferValidation = [
  userIdParam,
  body('fromCardId')
    .isString()
    .withMessage('Source card ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Source card ID is required'),
  body('toCardId')
    .isString()
    .withMessage('Destination card ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Destination card ID is required'),
  amountField,
];

export const depositValidation = [
  userIdParam,
  amountField,
  redirectUrl('successUrl'),
  redirectUrl('cancelUrl'),
];

export const confirmValidation = [
  body('paymentIntentId')
    .isString()
    .withMessage('Payment intent ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Payment intent ID is required'),
];

export const cancelValidation = [
  param('transactionId')
    .matches(/^txn_[a-f0-9]{32}$/)
    .withMessage('Invalid transaction ID format'),
  body('reason')
    .optional()
    .isString()
    .withMessage('Reason must be a string')
    .isLength({ max: 200 })
    .withMessage('Reason must be at most 200 characters'),
];

export const userScopedValidation = [userIdParam];
