import {
  AttachReferenceOutcome,
  InsertOutcome,
  LedgerStore,
  StatusChange,
} from '../../src/services/ledger/ledger.repository';
import { TransactionMetadata, TransactionRecord, TransactionStatus } from '../../src/types/ledger';

const copy = (record: TransactionRecord): TransactionRecord => ({
  ...record,
  metadata: { ...record.metadata },
  createdAt: new Date(record.createdAt.getTime()),
  updatedAt: new Date(record.updatedAt.getTime()),
});

/**
 * In-process LedgerStore. Every check-and-write runs without an await in
 * between, so each operation is atomic on the event loop.
 */
export class MemoryLedgerStore implements LedgerStore {
  private readonly records = new Map<string, TransactionRecord>();
  private readonly references = new Map<string, string>();

  async insert(record: TransactionRecord): Promise<InsertOutcome> {
    if (
      this.records.has(record.transactionId) ||
      (record.providerRef !== undefined && this.references.has(record.providerRef))
    ) {
      return 'duplicate';
    }

    this.records.set(record.transactionId, copy(record));
    if (record.providerRef !== undefined) {
      this.references.set(record.providerRef, record.transactionId);
    }
    return 'inserted';
  }

  async findById(transactionId: string): Promise<TransactionRecord | null> {
    const record = this.records.get(transactionId);
    return record ? copy(record) : null;
  }

  async findByUser(userId: string): Promise<TransactionRecord[]> {
    return [...this.records.values()].filter((record) => record.userId === userId).map(copy);
  }

  async findByReference(providerRef: string): Promise<TransactionRecord | null> {
    const transactionId = this.references.get(providerRef);
    return transactionId ? this.findById(transactionId) : null;
  }

  async attachReference(
    transactionId: string,
    providerRef: string,
    metadata?: TransactionMetadata
  ): Promise<AttachReferenceOutcome> {
    const record = this.records.get(transactionId);
    if (!record || record.status !== TransactionStatus.PENDING || record.providerRef) {
      return { status: 'not_pending' };
    }
    if (this.references.has(providerRef)) {
      return { status: 'duplicate' };
    }

    const updated = { ...record, providerRef, metadata: { ...record.metadata, ...metadata } };
    this.records.set(transactionId, updated);
    this.references.set(providerRef, transactionId);
    return { status: 'attached', record: copy(updated) };
  }

  async compareAndSetStatus(change: StatusChange): Promise<TransactionRecord | null> {
    const record = this.records.get(change.transactionId);
    if (!record || record.status !== change.from) {
      return null;
    }

    const updated: TransactionRecord = {
      ...record,
      status: change.to,
      updatedAt: change.updatedAt,
      metadata: { ...record.metadata, ...change.metadata },
    };
    this.records.set(change.transactionId, updated);
    return copy(updated);
  }

  async mergeMetadata(
    transactionId: string,
    metadata: TransactionMetadata
  ): Promise<TransactionRecord | null> {
    const record = this.records.get(transactionId);
    if (!record) {
      return null;
    }

    const updated = { ...record, metadata: { ...record.metadata, ...metadata } };
    this.records.set(transactionId, updated);
    return copy(updated);
  }

  get size(): number {
    return this.records.size;
  }
}
