export enum TransactionKind {
  CARD_TRANSFER = 'card_transfer',
  STRIPE_DEPOSIT = 'stripe_deposit',
}

export enum TransactionStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export type TransactionMetadata = Record<string, unknown>;

/**
 * A single ledger entry. Amounts are stored at 2-decimal precision and
 * `net` always equals `gross - fee`.
 */
export interface TransactionRecord {
  transactionId: string;
  userId: string;
  kind: TransactionKind;
  gross: number;
  fee: number;
  net: number;
  status: TransactionStatus;
  providerRef?: string;
  metadata: TransactionMetadata;
  createdAt: Date;
  updatedAt: Date;
}

export interface AmountBreakdown {
  gross: number;
  fee: number;
  net: number;
}
