/**
 * Payment Orchestrator
 *
 * Drives the two money flows through the ledger:
 *
 * Card transfer:  validate → log PENDING → provider call → COMPLETED | FAILED
 * Stripe deposit: validate → log PENDING → gateway session → (later) confirm
 *                 → COMPLETED | FAILED
 *
 * Provider calls happen between ledger writes, never inside one, and are
 * made exactly once. Provider rejections and transport errors come back as
 * `{ success: false }` results; misuse of the API (bad amount, same card,
 * unknown id, illegal transition) is thrown.
 *
 * A provider answer that finds its record already closed does not throw
 * either: it is kept under `metadata.lateOutcome` and reported as a failure.
 */

import {
  TransactionKind,
  TransactionMetadata,
  TransactionRecord,
  TransactionStatus,
} from '../../types/ledger';
import {
  addLogContext,
  createServiceLogger,
  providerCallDuration,
  traceProviderCall,
} from '../../observability';
import {
  CardTransferProvider,
  CardTransferResult,
  CheckoutSessionInfo,
  PaymentGateway,
} from '../../providers/types';
import { assertValidAmount, buildAmounts } from '../fees/fee.policy';
import { Ledger, buildPendingRecord } from '../ledger/ledger.service';
import {
  InvalidAmountError,
  InvalidCardsError,
  InvalidTransitionError,
  NotFoundError,
} from '../ledger/ledger.errors';

const log = createServiceLogger('payment-orchestrator');

export const GATEWAY_NOT_CONFIGURED = 'Payment gateway is not configured';
export const PAYMENT_NOT_SETTLED = 'Payment is not settled yet';

export type TransferResult =
  | { success: true; transactionId: string; data: Record<string, unknown> }
  | { success: false; transactionId: string; error: string };

export type DepositResult =
  | { success: true; transactionId: string; providerRef: string; clientSecret: string }
  | { success: true; transactionId: string; providerRef: string; url: string }
  | { success: false; transactionId?: string; error: string };

/**
 * `success` is true once the record has been resolved, to either
 * completed or failed; false leaves it pending.
 */
export interface ConfirmationResult {
  success: boolean;
  transactionId: string;
  status: TransactionStatus;
  providerStatus?: string;
  transaction?: TransactionRecord;
  error?: string;
}

export type DepositFlow = 'payment_intent' | 'checkout';

type DepositSession =
  | { flow: 'payment_intent'; id: string; clientSecret: string }
  | { flow: 'checkout'; id: string; url: string };

export type SettlementOutcome = 'settled' | 'abandoned' | 'in_progress';

/**
 * Map a PaymentIntent status to what it means for the ledger record
 */
export const classifyPaymentIntentStatus = (status: string): SettlementOutcome => {
  switch (status) {
    case 'succeeded':
      return 'settled';
    case 'canceled':
      return 'abandoned';
    default:
      return 'in_progress';
  }
};

export const classifyCheckoutSession = (session: CheckoutSessionInfo): SettlementOutcome => {
  if (session.paymentStatus === 'paid' || session.paymentStatus === 'no_payment_required') {
    return 'settled';
  }
  return session.status === 'expired' ? 'abandoned' : 'in_progress';
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown provider error';

export const alreadyClosed = (status: TransactionStatus): string =>
  `Transaction was already ${status} when the provider answered`;

type Settlement =
  | { settled: true; record: TransactionRecord }
  | { settled: false; current: TransactionStatus };

export interface PaymentOrchestratorDeps {
  ledger: Ledger;
  cardProvider: CardTransferProvider;
  /** null when no gateway is configured; deposits are then refused */
  gateway: PaymentGateway | null;
  currency: string;
}

export class PaymentOrchestrator {
  private readonly ledger: Ledger;
  private readonly cardProvider: CardTransferProvider;
  private readonly gateway: PaymentGateway | null;
  private readonly currency: string;

  constructor(deps: PaymentOrchestratorDeps) {
    this.ledger = deps.ledger;
    this.cardProvider = deps.cardProvider;
    this.gateway = deps.gateway;
    this.currency = deps.currency;
  }

  isGatewayConfigured(): boolean {
    return this.gateway !== null;
  }

  /**
   * Card-to-card transfer. The record always ends COMPLETED or FAILED.
   */
  async createTransaction(
    fromCardId: string,
    toCardId: string,
    amount: number,
    userId: string
  ): Promise<TransferResult> {
    assertValidAmount(amount);
    if (fromCardId === toCardId) {
      throw new InvalidCardsError();
    }

    const record = buildPendingRecord({
      userId,
      kind: TransactionKind.CARD_TRANSFER,
      amount,
      metadata: { fromCardId, toCardId },
    });
    const { transactionId } = record;
    addLogContext({ transactionId, userId });

    await this.ledger.logTransaction(record);

    let outcome: CardTransferResult;
    try {
      outcome = await this.callProvider('card', 'create_transfer', transactionId, () =>
        this.cardProvider.createTransfer({
          fromCardId,
          toCardId,
          amount: record.gross,
          idempotencyKey: `transfer:${transactionId}`,
        })
      );
    } catch (error) {
      outcome = { success: false, error: describeError(error) };
    }

    if (outcome.success) {
      const settlement = await this.settle(transactionId, TransactionStatus.COMPLETED, {
        provider: outcome.data,
      });
      if (!settlement.settled) {
        return { success: false, transactionId, error: alreadyClosed(settlement.current) };
      }
      log.info({ transactionId, userId, amount: record.gross }, 'Card transfer completed');
      return { success: true, transactionId, data: outcome.data };
    }

    const settlement = await this.settle(transactionId, TransactionStatus.FAILED, {
      error: outcome.error,
    });
    if (!settlement.settled) {
      return { success: false, transactionId, error: alreadyClosed(settlement.current) };
    }
    log.warn({ transactionId, userId, error: outcome.error }, 'Card transfer failed');
    return { success: false, transactionId, error: outcome.error };
  }

  /**
   * Start a Stripe deposit. The record stays PENDING until
   * confirmStripePayment resolves it, unless the gateway call itself fails.
   */
  async depositViaStripe(
    userId: string,
    amount: number,
    successUrl?: string,
    cancelUrl?: string
  ): Promise<DepositResult> {
    const amounts = buildAmounts(TransactionKind.STRIPE_DEPOSIT, amount);
    if (amounts.net <= 0) {
      throw new InvalidAmountError(
        `Deposit of ${amounts.gross} does not cover the processing fee of ${amounts.fee}`
      );
    }

    if (!this.gateway) {
      log.warn({ userId }, 'Deposit refused, gateway not configured');
      return { success: false, error: GATEWAY_NOT_CONFIGURED };
    }
    const gateway = this.gateway;

    const flow: DepositFlow = successUrl && cancelUrl ? 'checkout' : 'payment_intent';
    const record = buildPendingRecord({
      userId,
      kind: TransactionKind.STRIPE_DEPOSIT,
      amount,
      metadata: { flow },
    });
    const { transactionId } = record;
    addLogContext({ transactionId, userId });

    await this.ledger.logTransaction(record);

    const gatewayMetadata = { user_id: userId, transaction_id: transactionId };
    const idempotencyKey = `deposit:${transactionId}`;

    let session: DepositSession;
    try {
      if (successUrl && cancelUrl) {
        const checkout = await this.callProvider('stripe', 'create_checkout_session', transactionId, () =>
          gateway.createCheckoutSession({
            amount: record.gross,
            currency: this.currency,
            successUrl,
            cancelUrl,
            metadata: gatewayMetadata,
            idempotencyKey,
          })
        );
        session = { flow: 'checkout', ...checkout };
      } else {
        const intent = await this.callProvider('stripe', 'create_payment_intent', transactionId, () =>
          gateway.createPaymentIntent({
            amount: record.gross,
            currency: this.currency,
            metadata: gatewayMetadata,
            idempotencyKey,
          })
        );
        session = { flow: 'payment_intent', ...intent };
      }
    } catch (error) {
      const message = describeError(error);
      await this.settle(transactionId, TransactionStatus.FAILED, { error: message });
      log.warn({ transactionId, userId, error: message }, 'Deposit session could not be created');
      return { success: false, transactionId, error: message };
    }

    const sessionMetadata: TransactionMetadata =
      session.flow === 'checkout'
        ? { checkoutSessionId: session.id, url: session.url }
        : { paymentIntentId: session.id, clientSecret: session.clientSecret };

    try {
      await this.ledger.attachReference(transactionId, session.id, sessionMetadata);
    } catch (error) {
      if (!(error instanceof InvalidTransitionError)) {
        throw error;
      }
      // The session exists at the gateway but its record was closed meanwhile
      await this.ledger.annotateTransaction(transactionId, {
        orphanedProviderRef: session.id,
        ...sessionMetadata,
      });
      log.error(
        { transactionId, userId, providerRef: session.id, current: error.from },
        'Deposit session opened for a closed transaction'
      );
      return { success: false, transactionId, error: alreadyClosed(error.from) };
    }

    if (session.flow === 'checkout') {
      log.info({ transactionId, userId, providerRef: session.id }, 'Checkout deposit started');
      return { success: true, transactionId, providerRef: session.id, url: session.url };
    }

    log.info({ transactionId, userId, providerRef: session.id }, 'PaymentIntent deposit started');
    return {
      success: true,
      transactionId,
      providerRef: session.id,
      clientSecret: session.clientSecret,
    };
  }

  /**
   * Resolve a pending deposit from the gateway's view of its payment.
   * Accepts a PaymentIntent id or, for checkout deposits, the session id.
   */
  async confirmStripePayment(paymentIntentId: string): Promise<ConfirmationResult> {
    const record = await this.ledger.findByReference(paymentIntentId);
    if (record.status !== TransactionStatus.PENDING) {
      throw new NotFoundError(`No pending transaction for provider reference: ${paymentIntentId}`);
    }

    const { transactionId } = record;
    addLogContext({ transactionId, userId: record.userId });

    if (!this.gateway) {
      return {
        success: false,
        transactionId,
        status: record.status,
        error: GATEWAY_NOT_CONFIGURED,
      };
    }
    const gateway = this.gateway;

    let outcome: SettlementOutcome;
    let providerStatus: string;
    try {
      if (record.metadata.flow === 'checkout') {
        const session = await this.callProvider('stripe', 'retrieve_checkout_session', transactionId, () =>
          gateway.retrieveCheckoutSession(paymentIntentId)
        );
        outcome = classifyCheckoutSession(session);
        providerStatus = session.paymentStatus;
      } else {
        const intent = await this.callProvider('stripe', 'retrieve_payment_intent', transactionId, () =>
          gateway.retrievePaymentIntent(paymentIntentId)
        );
        outcome = classifyPaymentIntentStatus(intent.status);
        providerStatus = intent.status;
      }
    } catch (error) {
      const message = describeError(error);
      log.warn({ transactionId, error: message }, 'Could not query gateway for settlement');
      return { success: false, transactionId, status: record.status, error: message };
    }

    switch (outcome) {
      case 'settled': {
        const settlement = await this.settle(transactionId, TransactionStatus.COMPLETED, {
          providerStatus,
        });
        if (!settlement.settled) {
          return this.closedConfirmation(transactionId, settlement.current, providerStatus);
        }
        log.info({ transactionId, providerStatus }, 'Deposit confirmed');
        return {
          success: true,
          transactionId,
          status: settlement.record.status,
          providerStatus,
          transaction: settlement.record,
        };
      }
      case 'abandoned': {
        const settlement = await this.settle(transactionId, TransactionStatus.FAILED, {
          providerStatus,
          error: `Payment ${providerStatus}`,
        });
        if (!settlement.settled) {
          return this.closedConfirmation(transactionId, settlement.current, providerStatus);
        }
        log.warn({ transactionId, providerStatus }, 'Deposit abandoned at gateway');
        return {
          success: true,
          transactionId,
          status: settlement.record.status,
          providerStatus,
          transaction: settlement.record,
        };
      }
      case 'in_progress':
        return {
          success: false,
          transactionId,
          status: record.status,
          providerStatus,
          error: PAYMENT_NOT_SETTLED,
        };
    }
  }

  /**
   * Caller-initiated abandonment of a pending deposit.
   *
   * Only deposits whose gateway session is already open can be cancelled.
   * Card transfers and deposits still waiting on the gateway are resolved by
   * the call in flight.
   */
  async cancelTransaction(transactionId: string, reason?: string): Promise<TransactionRecord> {
    const record = await this.ledger.getTransaction(transactionId);

    if (record.kind !== TransactionKind.STRIPE_DEPOSIT) {
      throw new InvalidTransitionError(
        record.status,
        TransactionStatus.CANCELLED,
        transactionId,
        `Card transfer ${transactionId} cannot be cancelled`
      );
    }
    if (record.status === TransactionStatus.PENDING && !record.providerRef) {
      throw new InvalidTransitionError(
        record.status,
        TransactionStatus.CANCELLED,
        transactionId,
        `Deposit ${transactionId} is still opening its payment session`
      );
    }

    const updated = await this.ledger.updateTransactionStatus(
      transactionId,
      TransactionStatus.CANCELLED,
      reason ? { cancelReason: reason } : undefined
    );
    log.info({ transactionId, reason }, 'Transaction cancelled');
    return updated;
  }

  async getUserTransactions(userId: string): Promise<TransactionRecord[]> {
    return this.ledger.getTransactions(userId);
  }

  /**
   * Apply the status a provider answer calls for. If another writer closed
   * the record first, the answer goes to `metadata.lateOutcome` instead.
   */
  private async settle(
    transactionId: string,
    status: TransactionStatus,
    metadata: TransactionMetadata
  ): Promise<Settlement> {
    try {
      const record = await this.ledger.updateTransactionStatus(transactionId, status, metadata);
      return { settled: true, record };
    } catch (error) {
      if (!(error instanceof InvalidTransitionError)) {
        throw error;
      }
      await this.ledger.annotateTransaction(transactionId, {
        lateOutcome: { status, ...metadata },
      });
      log.error(
        { transactionId, requested: status, current: error.from },
        'Provider answer arrived for a closed transaction'
      );
      return { settled: false, current: error.from };
    }
  }

  private closedConfirmation(
    transactionId: string,
    current: TransactionStatus,
    providerStatus: string
  ): ConfirmationResult {
    return {
      success: false,
      transactionId,
      status: current,
      providerStatus,
      error: alreadyClosed(current),
    };
  }

  /**
   * Time and trace one provider call; errors are rethrown untouched
   */
  private async callProvider<T>(
    provider: string,
    operation: string,
    transactionId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    const endTimer = providerCallDuration.startTimer({ provider, operation });
    try {
      const result = await traceProviderCall(provider, operation, transactionId, fn);
      endTimer({ outcome: 'ok' });
      return result;
    } catch (error) {
      endTimer({ outcome: 'error' });
      throw error;
    }
  }
}
