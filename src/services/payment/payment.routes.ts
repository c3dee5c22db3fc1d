/**
 * Payment API Routes
 *
 * Money-moving routes carry the payment rate limit and honour
 * X-Idempotency-Key; reads do neither.
 */

import { Router, Request, Response, NextFunction } from 'express';

import { idempotencyMiddleware, validateIdempotencyKey } from '../../middlewares/idempotency';
import { paymentLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { PaymentController } from './payment.controller';
import {
  cancelValidation,
  cardTransferValidation,
  confirmValidation,
  depositValidation,
  userScopedValidation,
} from './payment.validation';

export const createPaymentRoutes = (controller: PaymentController): Router => {
  const router = Router();

  // POST /payments/card-to-card/:userId - Card-to-card transfer
  router.post(
    '/card-to-card/:userId',
    paymentLimiter,
    validateIdempotencyKey,
    cardTransferValidation,
    validateRequest,
    idempotencyMiddleware,
    (req: Request, res: Response, next: NextFunction) => controller.createCardTransfer(req, res, next)
  );

  // POST /payments/deposit/:userId - Start a Stripe deposit
  router.post(
    '/deposit/:userId',
    paymentLimiter,
    validateIdempotencyKey,
    depositValidation,
    validateRequest,
    idempotencyMiddleware,
    (req: Request, res: Response, next: NextFunction) => controller.createDeposit(req, res, next)
  );

  // POST /payments/confirm - Resolve a pending deposit
  router.post(
    '/confirm',
    paymentLimiter,
    confirmValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.confirmPayment(req, res, next)
  );

  // POST /payments/transactions/:transactionId/cancel - Cancel a pending transaction
  router.post(
    '/transactions/:transactionId/cancel',
    cancelValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.cancelTransaction(req, res, next)
  );

  // GET /payments/transactions/:userId - Transaction history
  router.get(
    '/transactions/:userId',
    userScopedValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getTransactions(req, res, next)
  );

  // GET /payments/balance/:userId - Balance from completed transactions
  router.get(
    '/balance/:userId',
    userScopedValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getBalance(req, res, next)
  );

  // GET /payments/stats/:userId - Transaction statistics
  router.get(
    '/stats/:userId',
    userScopedValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getStats(req, res, next)
  );

  return router;
};
