/**
 * Balance Aggregator
 *
 * Derives a user's balance from the ledger. Every record is a credit to its
 * owning user; only `completed` records count.
 */

import { TransactionKind, TransactionRecord, TransactionStatus } from '../../types/ledger';
import { roundMoney, sumMoney } from '../../utils/money';
import { Ledger } from '../ledger/ledger.service';

export interface BalanceSummary {
  userId: string;
  balance: number;
  asOf: Date;
  totalDeposits: number;
  totalTransfers: number;
  transactionCount: number;
}

export interface UserStats {
  userId: string;
  byStatus: Record<TransactionStatus, number>;
  transactionCount: number;
  /** Percentage of records that completed, 0 when there are none */
  successRate: number;
  totalGross: number;
  completedGross: number;
  averageGross: number;
  balance: BalanceSummary;
}

const latest = (dates: Date[]): Date | undefined =>
  dates.reduce<Date | undefined>(
    (max, date) => (max === undefined || date.getTime() > max.getTime() ? date : max),
    undefined
  );

const netOf = (records: TransactionRecord[], kind?: TransactionKind): number =>
  sumMoney(records.filter((record) => !kind || record.kind === kind).map((record) => record.net));

export class BalanceAggregator {
  constructor(private readonly ledger: Ledger) {}

  async getUserBalance(userId: string): Promise<BalanceSummary> {
    const records = await this.ledger.getTransactions(userId);
    return this.summarize(userId, records);
  }

  async getUserStats(userId: string): Promise<UserStats> {
    const records = await this.ledger.getTransactions(userId);

    const byStatus: Record<TransactionStatus, number> = {
      [TransactionStatus.PENDING]: 0,
      [TransactionStatus.COMPLETED]: 0,
      [TransactionStatus.FAILED]: 0,
      [TransactionStatus.CANCELLED]: 0,
    };
    for (const record of records) {
      byStatus[record.status] += 1;
    }

    const total = records.length;
    const totalGross = sumMoney(records.map((record) => record.gross));
    const completedGross = sumMoney(
      records
        .filter((record) => record.status === TransactionStatus.COMPLETED)
        .map((record) => record.gross)
    );

    return {
      userId,
      byStatus,
      transactionCount: total,
      successRate: total === 0 ? 0 : roundMoney((byStatus[TransactionStatus.COMPLETED] / total) * 100),
      totalGross,
      completedGross,
      averageGross: total === 0 ? 0 : roundMoney(totalGross / total),
      balance: this.summarize(userId, records),
    };
  }

  private summarize(userId: string, records: TransactionRecord[]): BalanceSummary {
    const completed = records.filter((record) => record.status === TransactionStatus.COMPLETED);

    const asOf =
      latest(completed.map((record) => record.updatedAt)) ??
      latest(records.map((record) => record.createdAt)) ??
      new Date();

    return {
      userId,
      balance: netOf(completed),
      asOf,
      totalDeposits: netOf(completed, TransactionKind.STRIPE_DEPOSIT),
      totalTransfers: netOf(completed, TransactionKind.CARD_TRANSFER),
      transactionCount: records.length,
    };
  }
}
