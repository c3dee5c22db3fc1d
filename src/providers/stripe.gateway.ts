/**
 * Stripe payment gateway
 *
 * Deposits are collected either through a PaymentIntent (client-side
 * confirmation with the returned client secret) or a hosted Checkout
 * Session. The SDK is built without network retries: a deposit call is
 * attempted once and its idempotency key makes a caller-side retry safe.
 */

import Stripe from 'stripe';

import { config } from '../config';
import { createServiceLogger } from '../observability';
import { fromCents, toCents } from '../utils/money';
import {
  CheckoutSessionHandle,
  CheckoutSessionInfo,
  CreateCheckoutSessionParams,
  CreatePaymentIntentParams,
  PaymentGateway,
  PaymentIntentHandle,
  PaymentIntentInfo,
} from './types';

const log = createServiceLogger('stripe-gateway');

const API_VERSION = '2023-10-16';

export interface StripeGatewayOptions {
  secretKey: string;
  timeoutMs: number;
  productName: string;
}

export class StripeGateway implements PaymentGateway {
  private readonly stripe: Stripe;
  private readonly productName: string;

  constructor(options: StripeGatewayOptions) {
    this.stripe = new Stripe(options.secretKey, {
      apiVersion: API_VERSION,
      maxNetworkRetries: 0,
      timeout: options.timeoutMs,
      typescript: true,
    });
    this.productName = options.productName;
  }

  /**
   * Gateway from environment config, or null when no secret key is set
   */
  static fromConfig(stripeConfig: StripeGatewayOptions = config.stripe): StripeGateway | null {
    if (!stripeConfig.secretKey) {
      log.warn('STRIPE_SECRET_KEY is not set, deposits are disabled');
      return null;
    }
    return new StripeGateway(stripeConfig);
  }

  async createPaymentIntent(params: CreatePaymentIntentParams): Promise<PaymentIntentHandle> {
    const intent = await this.stripe.paymentIntents.create(
      {
        amount: toCents(params.amount),
        currency: params.currency,
        metadata: params.metadata,
        automatic_payment_methods: { enabled: true },
      },
      { idempotencyKey: params.idempotencyKey }
    );

    if (!intent.client_secret) {
      throw new Error(`PaymentIntent ${intent.id} was created without a client secret`);
    }

    log.info({ paymentIntentId: intent.id, status: intent.status }, 'PaymentIntent created');
    return { id: intent.id, clientSecret: intent.client_secret };
  }

  async createCheckoutSession(params: CreateCheckoutSessionParams): Promise<CheckoutSessionHandle> {
    const session = await this.stripe.checkout.sessions.create(
      {
        mode: 'payment',
        payment_method_types: ['card'],
        line_items: [
          {
            price_data: {
              currency: params.currency,
              product_data: { name: this.productName },
              unit_amount: toCents(params.amount),
            },
            quantity: 1,
          },
        ],
        success_url: params.successUrl,
        cancel_url: params.cancelUrl,
        metadata: params.metadata,
      },
      { idempotencyKey: params.idempotencyKey }
    );

    if (!session.url) {
      throw new Error(`Checkout session ${session.id} was created without a URL`);
    }

    log.info({ sessionId: session.id }, 'Checkout session created');
    return { id: session.id, url: session.url };
  }

  async retrievePaymentIntent(paymentIntentId: string): Promise<PaymentIntentInfo> {
    const intent = await this.stripe.paymentIntents.retrieve(paymentIntentId);
    return {
      id: intent.id,
      status: intent.status,
      amount: fromCents(intent.amount),
      metadata: { ...intent.metadata },
    };
  }

  async retrieveCheckoutSession(sessionId: string): Promise<CheckoutSessionInfo> {
    const session = await this.stripe.checkout.sessions.retrieve(sessionId);
    const paymentIntent = session.payment_intent;

    return {
      id: session.id,
      status: session.status,
      paymentStatus: session.payment_status,
      paymentIntentId: typeof paymentIntent === 'string' ? paymentIntent : paymentIntent?.id ?? null,
    };
  }
}
