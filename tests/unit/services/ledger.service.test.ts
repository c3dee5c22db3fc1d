/**
 * Ledger Unit Tests
 *
 * Runs the Ledger over the in-memory store.
 */

import {
  DuplicateTransactionError,
  InvalidAmountError,
  InvalidTransitionError,
  Ledger,
  NotFoundError,
  UnknownTransactionKindError,
  buildPendingRecord,
  generateTransactionId,
} from '../../../src/services/ledger';
import { TransactionKind, TransactionRecord, TransactionStatus } from '../../../src/types/ledger';
import { MemoryLedgerStore } from '../../helpers/memoryLedgerStore';

const CREATED_AT = new Date('2024-03-01T10:00:00.000Z');

const pendingTransfer = (userId = 'user_001', amount = 100): TransactionRecord =>
  buildPendingRecord(
    { userId, kind: TransactionKind.CARD_TRANSFER, amount, metadata: { fromCardId: 'card_123' } },
    CREATED_AT
  );

describe('Ledger', () => {
  let store: MemoryLedgerStore;
  let ledger: Ledger;

  beforeEach(() => {
    store = new MemoryLedgerStore();
    ledger = new Ledger(store);
  });

  describe('generateTransactionId', () => {
    it('should produce txn_ prefixed hex ids', () => {
      expect(generateTransactionId()).toMatch(/^txn_[a-f0-9]{32}$/);
    });
  });

  describe('buildPendingRecord', () => {
    it('should compute fee and net at creation', () => {
      const record = pendingTransfer();

      expect(record).toMatchObject({
        userId: 'user_001',
        kind: TransactionKind.CARD_TRANSFER,
        gross: 100,
        fee: 2,
        net: 98,
        status: TransactionStatus.PENDING,
        metadata: { fromCardId: 'card_123' },
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
      });
      expect(record.providerRef).toBeUndefined();
    });
  });

  describe('logTransaction', () => {
    it('should store the record and return its id', async () => {
      const record = pendingTransfer();

      await expect(ledger.logTransaction(record)).resolves.toBe(record.transactionId);
      await expect(ledger.getTransaction(record.transactionId)).resolves.toEqual(record);
    });

    it('should reject a second record with the same id and keep the first', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);

      const clash: TransactionRecord = { ...record, userId: 'user_002', metadata: { other: true } };

      await expect(ledger.logTransaction(clash)).rejects.toThrow(DuplicateTransactionError);
      await expect(ledger.getTransaction(record.transactionId)).resolves.toEqual(record);
      await expect(ledger.getTransactions('user_002')).resolves.toEqual([]);
    });

    it('should reject a record carrying an already registered provider reference', async () => {
      const first = { ...pendingTransfer(), providerRef: 'pi_test_1' };
      await ledger.logTransaction(first);

      const second = { ...pendingTransfer(), providerRef: 'pi_test_1' };

      await expect(ledger.logTransaction(second)).rejects.toThrow(DuplicateTransactionError);
      expect(store.size).toBe(1);
    });

    it('should index a provider reference supplied at creation', async () => {
      const record = { ...pendingTransfer(), providerRef: 'pi_test_9' };
      await ledger.logTransaction(record);

      await expect(ledger.findByReference('pi_test_9')).resolves.toEqual(record);
    });

    it('should reject a record that does not start pending', async () => {
      const record = { ...pendingTransfer(), status: TransactionStatus.COMPLETED };

      await expect(ledger.logTransaction(record)).rejects.toThrow(InvalidTransitionError);
      expect(store.size).toBe(0);
    });

    it('should reject a record whose net is not gross minus fee', async () => {
      const record = { ...pendingTransfer(), net: 99 };

      await expect(ledger.logTransaction(record)).rejects.toThrow(InvalidAmountError);
      expect(store.size).toBe(0);
    });

    it('should reject a record with a non-positive gross', async () => {
      const record = { ...pendingTransfer(), gross: 0, fee: 0, net: 0 };

      await expect(ledger.logTransaction(record)).rejects.toThrow(InvalidAmountError);
    });

    it('should reject a record of an unknown kind', async () => {
      const record = { ...pendingTransfer(), kind: 'wire_transfer' as TransactionKind };

      await expect(ledger.logTransaction(record)).rejects.toThrow(UnknownTransactionKindError);
    });
  });

  describe('getTransactions', () => {
    it('should return the records of a user in the order they were logged', async () => {
      const first = pendingTransfer('user_001', 10);
      const other = pendingTransfer('user_002', 20);
      const second = pendingTransfer('user_001', 30);

      await ledger.logTransaction(first);
      await ledger.logTransaction(other);
      await ledger.logTransaction(second);

      const records = await ledger.getTransactions('user_001');

      expect(records.map((record) => record.transactionId)).toEqual([
        first.transactionId,
        second.transactionId,
      ]);
    });

    it('should return an empty list for an unknown user', async () => {
      await expect(ledger.getTransactions('nobody')).resolves.toEqual([]);
    });

    it('should hand out copies that cannot change the stored record', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);

      const [copy] = await ledger.getTransactions('user_001');
      copy.metadata.tampered = true;

      const stored = await ledger.getTransaction(record.transactionId);
      expect(stored.metadata).toEqual({ fromCardId: 'card_123' });
    });
  });

  describe('getTransaction', () => {
    it('should throw NotFoundError for an unknown id', async () => {
      await expect(ledger.getTransaction('txn_missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('updateTransactionStatus', () => {
    it('should move a pending record to completed and refresh updatedAt', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);

      const updated = await ledger.updateTransactionStatus(
        record.transactionId,
        TransactionStatus.COMPLETED,
        { provider: { transferId: 'tr_1' } }
      );

      expect(updated.status).toBe(TransactionStatus.COMPLETED);
      expect(updated.updatedAt.getTime()).toBeGreaterThan(CREATED_AT.getTime());
      expect(updated.createdAt).toEqual(CREATED_AT);
      expect(updated.metadata).toEqual({
        fromCardId: 'card_123',
        provider: { transferId: 'tr_1' },
      });
      expect(updated).toMatchObject({ gross: 100, fee: 2, net: 98 });
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(
        ledger.updateTransactionStatus('txn_missing', TransactionStatus.COMPLETED)
      ).rejects.toThrow(NotFoundError);
    });

    it.each([TransactionStatus.COMPLETED, TransactionStatus.FAILED, TransactionStatus.CANCELLED])(
      'should refuse every update once the record is %s',
      async (terminal) => {
        const record = pendingTransfer();
        await ledger.logTransaction(record);
        const settled = await ledger.updateTransactionStatus(record.transactionId, terminal);

        for (const target of Object.values(TransactionStatus)) {
          await expect(
            ledger.updateTransactionStatus(record.transactionId, target, { late: true })
          ).rejects.toThrow(InvalidTransitionError);
        }

        await expect(ledger.getTransaction(record.transactionId)).resolves.toEqual(settled);
      }
    );

    it('should let exactly one of two racing updates win', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);

      const results = await Promise.allSettled([
        ledger.updateTransactionStatus(record.transactionId, TransactionStatus.COMPLETED),
        ledger.updateTransactionStatus(record.transactionId, TransactionStatus.CANCELLED),
      ]);

      const fulfilled = results.filter(
        (result): result is PromiseFulfilledResult<TransactionRecord> => result.status === 'fulfilled'
      );
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidTransitionError);

      const stored = await ledger.getTransaction(record.transactionId);
      expect(stored.status).toBe(fulfilled[0].value.status);
    });
  });

  describe('attachReference', () => {
    it('should register the reference without touching updatedAt', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);

      const attached = await ledger.attachReference(record.transactionId, 'pi_test_1', {
        clientSecret: 'pi_test_1_secret_test',
      });

      expect(attached.providerRef).toBe('pi_test_1');
      expect(attached.updatedAt).toEqual(CREATED_AT);
      await expect(ledger.findByReference('pi_test_1')).resolves.toEqual(attached);
    });

    it('should accept re-attaching the same reference', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);
      const attached = await ledger.attachReference(record.transactionId, 'pi_test_1');

      await expect(ledger.attachReference(record.transactionId, 'pi_test_1')).resolves.toEqual(
        attached
      );
    });

    it('should refuse a second, different reference', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);
      await ledger.attachReference(record.transactionId, 'pi_test_1');

      await expect(ledger.attachReference(record.transactionId, 'pi_test_2')).rejects.toThrow(
        DuplicateTransactionError
      );
    });

    it('should refuse a reference that belongs to another record', async () => {
      const first = pendingTransfer();
      const second = pendingTransfer();
      await ledger.logTransaction(first);
      await ledger.logTransaction(second);
      await ledger.attachReference(first.transactionId, 'pi_test_1');

      await expect(ledger.attachReference(second.transactionId, 'pi_test_1')).rejects.toThrow(
        DuplicateTransactionError
      );
    });

    it('should refuse a record that is no longer pending', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);
      await ledger.updateTransactionStatus(record.transactionId, TransactionStatus.FAILED);

      await expect(ledger.attachReference(record.transactionId, 'pi_test_1')).rejects.toThrow(
        InvalidTransitionError
      );
    });
  });

  describe('annotateTransaction', () => {
    it('should add metadata to a closed record without changing its status', async () => {
      const record = pendingTransfer();
      await ledger.logTransaction(record);
      const failed = await ledger.updateTransactionStatus(
        record.transactionId,
        TransactionStatus.FAILED,
        { error: 'Card declined' }
      );

      const annotated = await ledger.annotateTransaction(record.transactionId, {
        lateOutcome: { status: TransactionStatus.COMPLETED },
      });

      expect(annotated.status).toBe(TransactionStatus.FAILED);
      expect(annotated.updatedAt).toEqual(failed.updatedAt);
      expect(annotated.metadata).toEqual({
        fromCardId: 'card_123',
        error: 'Card declined',
        lateOutcome: { status: TransactionStatus.COMPLETED },
      });
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(ledger.annotateTransaction('txn_missing', { note: 'x' })).rejects.toThrow(
        NotFoundError
      );
    });
  });

  describe('findByReference', () => {
    it('should throw NotFoundError for an unknown reference', async () => {
      await expect(ledger.findByReference('pi_unknown')).rejects.toThrow(NotFoundError);
    });
  });
});
