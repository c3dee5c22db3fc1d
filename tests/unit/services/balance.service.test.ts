/**
 * Balance Aggregator Unit Tests
 */

import { BalanceAggregator } from '../../../src/services/balance';
import { Ledger, buildPendingRecord } from '../../../src/services/ledger';
import { TransactionKind, TransactionRecord, TransactionStatus } from '../../../src/types/ledger';
import { MemoryLedgerStore } from '../../helpers/memoryLedgerStore';

const at = (minute: number): Date => new Date(Date.UTC(2024, 2, 1, 10, minute));

describe('BalanceAggregator', () => {
  let store: MemoryLedgerStore;
  let balances: BalanceAggregator;

  // Records are written straight to the store so their timestamps are fixed
  const seed = async (
    kind: TransactionKind,
    amount: number,
    status: TransactionStatus,
    createdAt: Date,
    updatedAt: Date = createdAt,
    userId = 'user_001'
  ): Promise<TransactionRecord> => {
    const record = { ...buildPendingRecord({ userId, kind, amount }, createdAt), status, updatedAt };
    await store.insert(record);
    return record;
  };

  beforeEach(() => {
    store = new MemoryLedgerStore();
    balances = new BalanceAggregator(new Ledger(store));
  });

  describe('getUserBalance', () => {
    it('should report zero for a user without records', async () => {
      const before = Date.now();
      const summary = await balances.getUserBalance('user_001');

      expect(summary).toMatchObject({
        userId: 'user_001',
        balance: 0,
        totalDeposits: 0,
        totalTransfers: 0,
        transactionCount: 0,
      });
      expect(summary.asOf.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('should sum the net of completed records only', async () => {
      await seed(TransactionKind.CARD_TRANSFER, 100, TransactionStatus.COMPLETED, at(0), at(1));
      await seed(TransactionKind.STRIPE_DEPOSIT, 50, TransactionStatus.COMPLETED, at(2), at(5));
      await seed(TransactionKind.STRIPE_DEPOSIT, 10, TransactionStatus.PENDING, at(3));
      await seed(TransactionKind.CARD_TRANSFER, 20, TransactionStatus.FAILED, at(4), at(6));
      await seed(TransactionKind.CARD_TRANSFER, 5, TransactionStatus.CANCELLED, at(7), at(8));
      await seed(TransactionKind.CARD_TRANSFER, 999, TransactionStatus.COMPLETED, at(9), at(9), 'user_002');

      await expect(balances.getUserBalance('user_001')).resolves.toEqual({
        userId: 'user_001',
        balance: 146.25,
        asOf: at(5),
        totalDeposits: 48.25,
        totalTransfers: 98,
        transactionCount: 5,
      });
    });

    it('should date the balance at the latest creation when nothing completed', async () => {
      await seed(TransactionKind.STRIPE_DEPOSIT, 10, TransactionStatus.PENDING, at(3));
      await seed(TransactionKind.CARD_TRANSFER, 20, TransactionStatus.FAILED, at(4), at(20));

      const summary = await balances.getUserBalance('user_001');

      expect(summary.balance).toBe(0);
      expect(summary.asOf).toEqual(at(4));
    });

    it('should add amounts without floating point drift', async () => {
      for (let i = 0; i < 3; i += 1) {
        await seed(TransactionKind.CARD_TRANSFER, 0.1, TransactionStatus.COMPLETED, at(i));
      }

      const summary = await balances.getUserBalance('user_001');

      expect(summary.balance).toBe(0.3);
    });
  });

  describe('getUserStats', () => {
    it('should break records down by status and amount', async () => {
      await seed(TransactionKind.CARD_TRANSFER, 100, TransactionStatus.COMPLETED, at(0), at(1));
      await seed(TransactionKind.STRIPE_DEPOSIT, 50, TransactionStatus.COMPLETED, at(2), at(5));
      await seed(TransactionKind.STRIPE_DEPOSIT, 10, TransactionStatus.PENDING, at(3));
      await seed(TransactionKind.CARD_TRANSFER, 20, TransactionStatus.FAILED, at(4), at(6));
      await seed(TransactionKind.CARD_TRANSFER, 5, TransactionStatus.CANCELLED, at(7), at(8));

      const stats = await balances.getUserStats('user_001');

      expect(stats).toMatchObject({
        userId: 'user_001',
        byStatus: {
          [TransactionStatus.PENDING]: 1,
          [TransactionStatus.COMPLETED]: 2,
          [TransactionStatus.FAILED]: 1,
          [TransactionStatus.CANCELLED]: 1,
        },
        transactionCount: 5,
        successRate: 40,
        totalGross: 185,
        completedGross: 150,
        averageGross: 37,
      });
      expect(stats.balance.balance).toBe(146.25);
    });

    it('should report a zero success rate for a user without records', async () => {
      const stats = await balances.getUserStats('user_001');

      expect(stats.successRate).toBe(0);
      expect(stats.averageGross).toBe(0);
      expect(stats.transactionCount).toBe(0);
    });
  });
});
