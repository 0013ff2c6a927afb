import type { AmountDistribution, DailyStats, StatsByType, StatsOverview } from '../../domain/entities/Statistics.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { roundTo } from '../../domain/services/AmountRounding.js';
import type { TransactionStorePort } from '../ports/TransactionStorePort.js';

interface AmountBucket {
  min: number;
  max: number;
}

const amountBuckets: AmountBucket[] = [
  { min: 0, max: 100 },
  { min: 100, max: 500 },
  { min: 500, max: 1000 },
  { min: 1000, max: 5000 },
  { min: 5000, max: 10000 },
  { min: 10000, max: Number.POSITIVE_INFINITY },
];

interface AmountTotals {
  count: number;
  total: number;
}

const groupAmounts = <K>(transactions: Transaction[], keyOf: (txn: Transaction) => K): Map<K, AmountTotals> => {
  const groups = new Map<K, AmountTotals>();

  for (const txn of transactions) {
    const key = keyOf(txn);
    const bucket = groups.get(key) ?? { count: 0, total: 0 };
    bucket.count += 1;
    bucket.total += txn.amount;
    groups.set(key, bucket);
  }

  return groups;
};

const sumAmounts = (transactions: Transaction[]): number => transactions.reduce((sum, txn) => sum + txn.amount, 0);

export class StatsService {
  constructor(private readonly store: TransactionStorePort) {}

  getOverview(): StatsOverview {
    const transactions = this.store.visibleTransactions();
    const count = transactions.length;

    if (count === 0) {
      return {
        totalTransactions: 0,
        totalAmount: 0,
        averageAmount: 0,
        minAmount: 0,
        maxAmount: 0,
        uniqueCustomers: 0,
        transactionsByStatus: {},
      };
    }

    const totalAmount = sumAmounts(transactions);

    const statusCounts = new Map<string, number>();
    transactions.forEach((txn) => statusCounts.set(txn.status, (statusCounts.get(txn.status) ?? 0) + 1));

    const transactionsByStatus = Object.fromEntries(
      Array.from(statusCounts.entries()).sort(([, a], [, b]) => b - a),
    );

    return {
      totalTransactions: count,
      totalAmount,
      averageAmount: totalAmount / count,
      minAmount: transactions.reduce((min, txn) => Math.min(min, txn.amount), Number.POSITIVE_INFINITY),
      maxAmount: transactions.reduce((max, txn) => Math.max(max, txn.amount), Number.NEGATIVE_INFINITY),
      uniqueCustomers: new Set(transactions.map((txn) => txn.clientId)).size,
      transactionsByStatus,
    };
  }

  getAmountDistribution(): AmountDistribution[] {
    const transactions = this.store.visibleTransactions();
    const total = transactions.length;

    if (total === 0) {
      return [];
    }

    return amountBuckets.map(({ min, max }) => {
      const open = max === Number.POSITIVE_INFINITY;
      const count = transactions.filter((txn) => txn.amount >= min && (open || txn.amount < max)).length;

      return {
        range: open ? `${min}+` : `${min}-${max}`,
        count,
        percentage: roundTo((count / total) * 100, 2),
      };
    });
  }

  getStatsByType(): StatsByType[] {
    const transactions = this.store.visibleTransactions();
    const total = transactions.length;

    if (total === 0) {
      return [];
    }

    return Array.from(groupAmounts(transactions, (txn) => txn.type).entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([type, totals]) => ({
        type,
        count: totals.count,
        totalAmount: totals.total,
        averageAmount: totals.total / totals.count,
        percentage: roundTo((totals.count / total) * 100, 2),
      }))
      .sort((a, b) => b.count - a.count);
  }

  getDailyStats(): DailyStats[] {
    const transactions = this.store.visibleTransactions();

    // Dates are fixed-width YYYY-MM-DD, so string order is calendar order.
    return Array.from(groupAmounts(transactions, (txn) => txn.date).entries())
      .map(([date, totals]) => ({
        date,
        count: totals.count,
        totalAmount: totals.total,
        averageAmount: totals.total / totals.count,
      }))
      .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  }
}
