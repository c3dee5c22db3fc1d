/**
 * Ledger
 *
 * Append-only audit trail of transaction records. The ledger is the only
 * writer of `status` and `updatedAt`; callers hand it records and status
 * requests and get back fresh copies.
 *
 * Indexes kept by the store:
 * - transactionId (primary)
 * - userId, in insertion order
 * - providerRef, for asynchronous deposit confirmation
 */

import crypto from 'crypto';

import {
  TransactionKind,
  TransactionMetadata,
  TransactionRecord,
  TransactionStatus,
} from '../../types/ledger';
import {
  createServiceLogger,
  ledgerRejectedTransitionsTotal,
  ledgerTransactionAmount,
  ledgerTransactionsTotal,
} from '../../observability';
import { hasMinorUnitPrecision, toCents } from '../../utils/money';
import { buildAmounts, feeTable } from '../fees/fee.policy';
import {
  DuplicateTransactionError,
  InvalidAmountError,
  InvalidTransitionError,
  NotFoundError,
  UnknownTransactionKindError,
} from './ledger.errors';
import { LedgerStore } from './ledger.repository';
import { INITIAL_STATUS, validateTransition } from './ledger.state';

const log = createServiceLogger('ledger');

/**
 * Generate a unique transaction ID
 */
export const generateTransactionId = (): string =>
  `txn_${crypto.randomUUID().replace(/-/g, '')}`;

export interface PendingRecordParams {
  userId: string;
  kind: TransactionKind;
  amount: number;
  metadata?: TransactionMetadata;
  providerRef?: string;
}

/**
 * Build a fresh `pending` record with its fee and net already computed
 */
export const buildPendingRecord = (
  params: PendingRecordParams,
  now: Date = new Date()
): TransactionRecord => {
  const amounts = buildAmounts(params.kind, params.amount);

  return {
    transactionId: generateTransactionId(),
    userId: params.userId,
    kind: params.kind,
    ...amounts,
    status: INITIAL_STATUS,
    ...(params.providerRef ? { providerRef: params.providerRef } : {}),
    metadata: { ...(params.metadata ?? {}) },
    createdAt: now,
    updatedAt: now,
  };
};

export class Ledger {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Append a new pending record. Resolves once the store has durably
   * written it.
   */
  async logTransaction(record: TransactionRecord): Promise<string> {
    this.assertWellFormed(record);

    const outcome = await this.store.insert(record);
    if (outcome === 'duplicate') {
      throw new DuplicateTransactionError(
        record.providerRef
          ? `Transaction ${record.transactionId} or provider reference ${record.providerRef} already exists`
          : `Transaction already exists: ${record.transactionId}`
      );
    }

    ledgerTransactionsTotal.inc({ kind: record.kind, status: record.status });
    ledgerTransactionAmount.observe({ kind: record.kind }, record.gross);
    log.info(
      {
        transactionId: record.transactionId,
        userId: record.userId,
        kind: record.kind,
        gross: record.gross,
        fee: record.fee,
        net: record.net,
      },
      'Transaction logged'
    );

    return record.transactionId;
  }

  /**
   * Records of one user in the order they were logged; empty for unknown users
   */
  async getTransactions(userId: string): Promise<TransactionRecord[]> {
    return this.store.findByUser(userId);
  }

  async getTransaction(transactionId: string): Promise<TransactionRecord> {
    const record = await this.store.findById(transactionId);
    if (!record) {
      throw NotFoundError.transaction(transactionId);
    }
    return record;
  }

  async findByReference(providerRef: string): Promise<TransactionRecord> {
    const record = await this.store.findByReference(providerRef);
    if (!record) {
      throw NotFoundError.reference(providerRef);
    }
    return record;
  }

  /**
   * Move a record to `newStatus`, optionally merging a metadata patch in the
   * same write. Of several concurrent callers on one record, exactly one
   * succeeds; the others get InvalidTransitionError.
   */
  async updateTransactionStatus(
    transactionId: string,
    newStatus: TransactionStatus,
    metadata?: TransactionMetadata
  ): Promise<TransactionRecord> {
    const current = await this.getTransaction(transactionId);

    try {
      validateTransition(current.status, newStatus, transactionId);
    } catch (error) {
      ledgerRejectedTransitionsTotal.inc({ from: current.status, to: newStatus });
      throw error;
    }

    const updated = await this.store.compareAndSetStatus({
      transactionId,
      from: current.status,
      to: newStatus,
      updatedAt: new Date(),
      metadata,
    });

    if (!updated) {
      // Another writer moved the record between our read and our write
      const latest = await this.getTransaction(transactionId);
      ledgerRejectedTransitionsTotal.inc({ from: latest.status, to: newStatus });
      log.warn(
        { transactionId, expected: current.status, actual: latest.status, requested: newStatus },
        'Concurrent status update rejected'
      );
      throw new InvalidTransitionError(latest.status, newStatus, transactionId);
    }

    ledgerTransactionsTotal.inc({ kind: updated.kind, status: updated.status });
    log.info(
      { transactionId, from: current.status, to: updated.status },
      'Transaction status updated'
    );

    return updated;
  }

  /**
   * Register the provider reference of a pending record created before the
   * provider call that produced the reference
   */
  async attachReference(
    transactionId: string,
    providerRef: string,
    metadata?: TransactionMetadata
  ): Promise<TransactionRecord> {
    const current = await this.getTransaction(transactionId);

    if (current.providerRef === providerRef) {
      return current;
    }
    if (current.providerRef) {
      throw new DuplicateTransactionError(
        `Transaction ${transactionId} already has provider reference ${current.providerRef}`
      );
    }

    const outcome = await this.store.attachReference(transactionId, providerRef, metadata);

    switch (outcome.status) {
      case 'attached':
        log.debug({ transactionId, providerRef }, 'Provider reference attached');
        return outcome.record;
      case 'duplicate':
        throw new DuplicateTransactionError(
          `Provider reference already registered: ${providerRef}`
        );
      case 'not_pending': {
        const latest = await this.getTransaction(transactionId);
        throw new InvalidTransitionError(
          latest.status,
          latest.status,
          transactionId,
          `Cannot attach provider reference to ${latest.status} transaction ${transactionId}`
        );
      }
    }
  }

  /**
   * Record facts learned after the record was closed, such as a provider
   * answer that arrived late. Status and `updatedAt` are left alone.
   */
  async annotateTransaction(
    transactionId: string,
    metadata: TransactionMetadata
  ): Promise<TransactionRecord> {
    const updated = await this.store.mergeMetadata(transactionId, metadata);
    if (!updated) {
      throw NotFoundError.transaction(transactionId);
    }
    log.debug({ transactionId, keys: Object.keys(metadata) }, 'Transaction annotated');
    return updated;
  }

  private assertWellFormed(record: TransactionRecord): void {
    if (!Object.prototype.hasOwnProperty.call(feeTable, record.kind)) {
      throw new UnknownTransactionKindError(record.kind);
    }

    if (record.status !== INITIAL_STATUS) {
      throw new InvalidTransitionError(
        record.status,
        record.status,
        record.transactionId,
        `New transactions must start ${INITIAL_STATUS}, got ${record.status}`
      );
    }

    const amounts = [record.gross, record.fee, record.net];
    if (!amounts.every(hasMinorUnitPrecision) || record.gross <= 0 || record.fee < 0) {
      throw new InvalidAmountError(
        `Invalid amounts for transaction ${record.transactionId}: gross ${record.gross}, fee ${record.fee}`
      );
    }

    if (toCents(record.net) !== toCents(record.gross) - toCents(record.fee)) {
      throw new InvalidAmountError(
        `Net ${record.net} does not equal gross ${record.gross} minus fee ${record.fee}`
      );
    }
  }
}
