/**
 * Ledger persistence
 *
 * `LedgerStore` is the durable storage contract behind the Ledger. Every
 * write is a single-document atomic operation; status changes are
 * compare-and-set on the expected current status so that concurrent
 * writers on one record cannot interleave.
 */

import { Transaction, ITransaction } from '../../models/Transaction';
import {
  TransactionMetadata,
  TransactionRecord,
  TransactionStatus,
} from '../../types/ledger';

export type InsertOutcome = 'inserted' | 'duplicate';

export type AttachReferenceOutcome =
  | { status: 'attached'; record: TransactionRecord }
  | { status: 'duplicate' }
  | { status: 'not_pending' };

export interface StatusChange {
  transactionId: string;
  from: TransactionStatus;
  to: TransactionStatus;
  updatedAt: Date;
  metadata?: TransactionMetadata;
}

export interface LedgerStore {
  /** Append a new record; `duplicate` if the id is already taken */
  insert(record: TransactionRecord): Promise<InsertOutcome>;
  findById(transactionId: string): Promise<TransactionRecord | null>;
  /** The user's records in insertion order */
  findByUser(userId: string): Promise<TransactionRecord[]>;
  findByReference(providerRef: string): Promise<TransactionRecord | null>;
  /** Set the provider reference on a pending record that has none yet */
  attachReference(
    transactionId: string,
    providerRef: string,
    metadata?: TransactionMetadata
  ): Promise<AttachReferenceOutcome>;
  /** Apply the change only if the record is still in `from`; null otherwise */
  compareAndSetStatus(change: StatusChange): Promise<TransactionRecord | null>;
  /** Merge metadata keys into a record of any status; null if it does not exist */
  mergeMetadata(transactionId: string, metadata: TransactionMetadata): Promise<TransactionRecord | null>;
}

const DUPLICATE_KEY_ERROR = 11000;

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === DUPLICATE_KEY_ERROR;

/**
 * Flatten a metadata patch into `$set` paths so existing keys survive
 */
const metadataSetPaths = (metadata: TransactionMetadata = {}): Record<string, unknown> =>
  Object.fromEntries(Object.entries(metadata).map(([key, value]) => [`metadata.${key}`, value]));

export const toTransactionRecord = (doc: ITransaction): TransactionRecord => ({
  transactionId: doc.transactionId,
  userId: doc.userId,
  kind: doc.kind,
  gross: doc.gross,
  fee: doc.fee,
  net: doc.net,
  status: doc.status,
  ...(doc.providerRef ? { providerRef: doc.providerRef } : {}),
  metadata: { ...(doc.metadata ?? {}) },
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

/**
 * MongoDB-backed ledger store
 *
 * Durability comes from the connection's write concern (majority, journaled),
 * see MONGODB_CONFIG.
 */
export class MongoLedgerStore implements LedgerStore {
  async insert(record: TransactionRecord): Promise<InsertOutcome> {
    try {
      await Transaction.create({
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
      return 'inserted';
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return 'duplicate';
      }
      throw error;
    }
  }

  async findById(transactionId: string): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOne({ transactionId });
    return doc ? toTransactionRecord(doc) : null;
  }

  async findByUser(userId: string): Promise<TransactionRecord[]> {
    const docs = await Transaction.find({ userId }).sort({ createdAt: 1, _id: 1 });
    return docs.map(toTransactionRecord);
  }

  async findByReference(providerRef: string): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOne({ providerRef });
    return doc ? toTransactionRecord(doc) : null;
  }

  async attachReference(
    transactionId: string,
    providerRef: string,
    metadata?: TransactionMetadata
  ): Promise<AttachReferenceOutcome> {
    try {
      const doc = await Transaction.findOneAndUpdate(
        {
          transactionId,
          status: TransactionStatus.PENDING,
          providerRef: { $exists: false },
        },
        { $set: { providerRef, ...metadataSetPaths(metadata) } },
        { new: true }
      );
      return doc ? { status: 'attached', record: toTransactionRecord(doc) } : { status: 'not_pending' };
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return { status: 'duplicate' };
      }
      throw error;
    }
  }

  async compareAndSetStatus(change: StatusChange): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOneAndUpdate(
      { transactionId: change.transactionId, status: change.from },
      {
        $set: {
          status: change.to,
          updatedAt: change.updatedAt,
          ...metadataSetPaths(change.metadata),
        },
      },
      { new: true }
    );
    return doc ? toTransactionRecord(doc) : null;
  }

  async mergeMetadata(
    transactionId: string,
    metadata: TransactionMetadata
  ): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOneAndUpdate(
      { transactionId },
      { $set: metadataSetPaths(metadata) },
      { new: true }
    );
    return doc ? toTransactionRecord(doc) : null;
  }
}
