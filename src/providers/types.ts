/**
 * Contracts of the external payment providers the orchestrator calls.
 * Implementations may throw on transport errors; the orchestrator turns
 * both thrown errors and `{ success: false }` answers into failed records.
 */

export interface CardTransferRequest {
  fromCardId: string;
  toCardId: string;
  amount: number;
  /** Stable per ledger transaction so a replayed call cannot execute twice */
  idempotencyKey: string;
}

export type CardTransferResult =
  | { success: true; data: Record<string, unknown> }
  | { success: false; error: string };

export interface CardTransferProvider {
  createTransfer(request: CardTransferRequest): Promise<CardTransferResult>;
}

export interface CreatePaymentIntentParams {
  amount: number;
  currency: string;
  metadata: Record<string, string>;
  idempotencyKey: string;
}

export interface CreateCheckoutSessionParams extends CreatePaymentIntentParams {
  successUrl: string;
  cancelUrl: string;
}

export interface PaymentIntentHandle {
  id: string;
  clientSecret: string;
}

export interface CheckoutSessionHandle {
  id: string;
  url: string;
}

export interface PaymentIntentInfo {
  id: string;
  /** Gateway status, e.g. `succeeded`, `processing`, `canceled` */
  status: string;
  amount: number;
  metadata: Record<string, string>;
}

export interface CheckoutSessionInfo {
  id: string;
  /** `open`, `complete` or `expired` */
  status: string | null;
  /** `paid`, `unpaid` or `no_payment_required` */
  paymentStatus: string;
  paymentIntentId: string | null;
}

export interface PaymentGateway {
  createPaymentIntent(params: CreatePaymentIntentParams): Promise<PaymentIntentHandle>;
  createCheckoutSession(params: CreateCheckoutSessionParams): Promise<CheckoutSessionHandle>;
  retrievePaymentIntent(paymentIntentId: string): Promise<PaymentIntentInfo>;
  retrieveCheckoutSession(sessionId: string): Promise<CheckoutSessionInfo>;
}
