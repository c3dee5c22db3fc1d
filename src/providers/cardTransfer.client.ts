/**
 * Card-transfer provider client
 *
 * Issues exactly one HTTP request per transfer. Retrying is left to the
 * caller; the idempotency key lets the provider drop a replayed request.
 */

import axios from 'axios';

import { config } from '../config';
import { createServiceLogger } from '../observability';
import { CardTransferProvider, CardTransferRequest, CardTransferResult } from './types';

const log = createServiceLogger('card-transfer-client');

export interface CardTransferClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Pull a readable error message out of a provider response body
 */
const describeRejection = (status: number, body: unknown): string => {
  if (isRecord(body)) {
    const { error, message } = body;
    if (typeof error === 'string') return error;
    if (isRecord(error) && typeof error.message === 'string') return error.message;
    if (typeof message === 'string') return message;
  }
  return `Card transfer rejected with status ${status}`;
};

export class HttpCardTransferClient implements CardTransferProvider {
  private readonly options: CardTransferClientOptions;

  constructor(options: CardTransferClientOptions = config.cardProvider) {
    this.options = options;
  }

  async createTransfer(request: CardTransferRequest): Promise<CardTransferResult> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/transfers`;

    const response = await axios.post(
      url,
      {
        from_card_id: request.fromCardId,
        to_card_id: request.toCardId,
        amount: request.amount,
      },
      {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
          'Idempotency-Key': request.idempotencyKey,
        },
        timeout: this.options.timeoutMs,
        // Non-2xx answers are provider decisions, not transport errors
        validateStatus: () => true,
      }
    );

    const body: unknown = response.data;

    if (response.status >= 200 && response.status < 300) {
      if (isRecord(body) && body.success === false) {
        return { success: false, error: describeRejection(response.status, body) };
      }
      log.debug({ idempotencyKey: request.idempotencyKey, status: response.status }, 'Card transfer accepted');
      return { success: true, data: isRecord(body) ? body : { result: body } };
    }

    log.warn(
      { idempotencyKey: request.idempotencyKey, status: response.status },
      'Card transfer rejected by provider'
    );
    return { success: false, error: describeRejection(response.status, body) };
  }
}
