/**
 * Payment Controller
 *
 * Maps orchestrator and aggregator results onto HTTP. Thrown errors go to
 * the central error handler; structured provider failures are answered
 * here with 502.
 */

import { Request, Response, NextFunction } from 'express';

import { PaymentServices } from '../../container';
import { getCorrelationId } from '../../observability';
import { ErrorCode } from '../../types/errors';
import { TransactionRecord, TransactionStatus } from '../../types/ledger';

interface CardTransferBody {
  fromCardId: string;
  toCardId: string;
  amount: number;
}

interface DepositBody {
  amount: number;
  successUrl?: string;
  cancelUrl?: string;
}

interface ConfirmBody {
  paymentIntentId: string;
}

interface CancelBody {
  reason?: string;
}

const providerFailure = (res: Response, message: string, transactionId?: string): void => {
  res.status(502).json({
    success: false,
    error: {
      code: ErrorCode.PROVIDER_ERROR,
      message,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId(),
    },
    ...(transactionId ? { data: { transactionId } } : {}),
  });
};

const toView = (record: TransactionRecord) => ({
  transactionId: record.transactionId,
  userId: record.userId,
  kind: record.kind,
  gross: record.gross,
  fee: record.fee,
  net: record.net,
  status: record.status,
  providerRef: record.providerRef,
  metadata: record.metadata,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class PaymentController {
  constructor(private readonly services: PaymentServices) {}

  /**
   * Card-to-card transfer
   * POST /payments/card-to-card/:userId
   */
  async createCardTransfer(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;
      const { fromCardId, toCardId, amount } = req.body as CardTransferBody;

      const result = await this.services.orchestrator.createTransaction(
        fromCardId,
        toCardId,
        amount,
        userId
      );

      if (!result.success) {
        providerFailure(res, result.error, result.transactionId);
        return;
      }

      res.status(201).json({
        success: true,
        data: {
          transactionId: result.transactionId,
          provider: result.data,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Start a Stripe deposit
   * POST /payments/deposit/:userId
   */
  async createDeposit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;
      const { amount, successUrl, cancelUrl } = req.body as DepositBody;

      const result = await this.services.orchestrator.depositViaStripe(
        userId,
        amount,
        successUrl,
        cancelUrl
      );

      if (!result.success) {
        providerFailure(res, result.error, result.transactionId);
        return;
      }

      const { success, ...session } = result;
      res.status(201).json({
        success,
        data: session,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Resolve a pending deposit
   * POST /payments/confirm
   */
  async confirmPayment(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { paymentIntentId } = req.body as ConfirmBody;

      const result = await this.services.orchestrator.confirmStripePayment(paymentIntentId);

      // 202 while the payment is still open; 409 when the record was closed meanwhile
      const status = result.success
        ? 200
        : result.status === TransactionStatus.PENDING
        ? 202
        : 409;

      res.status(status).json({
        success: result.success,
        data: {
          transactionId: result.transactionId,
          status: result.status,
          providerStatus: result.providerStatus,
          ...(result.transaction ? { transaction: toView(result.transaction) } : {}),
          ...(result.error ? { message: result.error } : {}),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /payments/transactions/:transactionId/cancel
   */
  async cancelTransaction(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { transactionId } = req.params;
      const { reason } = req.body as CancelBody;

      const record = await this.services.orchestrator.cancelTransaction(transactionId, reason);

      res.status(200).json({
        success: true,
        data: { transaction: toView(record) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /payments/transactions/:userId
   */
  async getTransactions(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const records = await this.services.orchestrator.getUserTransactions(req.params.userId);

      res.status(200).json({
        success: true,
        data: {
          transactions: records.map(toView),
          count: records.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /payments/balance/:userId
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const balance = await this.services.balances.getUserBalance(req.params.userId);

      res.status(200).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /payments/stats/:userId
   */
  async getStats(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const stats = await this.services.balances.getUserStats(req.params.userId);

      res.status(200).json({
        success: true,
        data: stats,
      });
    } catch (error) {
      next(error);
    }
  }
}
