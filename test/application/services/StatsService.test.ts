import { describe, expect, it } from 'vitest';
import { StatsService } from '../../../src/application/services/StatsService.js';
import { TransactionQueryService } from '../../../src/application/services/TransactionQueryService.js';
import { InMemoryTransactionStore } from '../../../src/infrastructure/adapters/storage/InMemoryTransactionStore.js';
import { makeTransaction, sampleTransactions } from '../../helpers/fixtures.js';

const serviceFor = (store: InMemoryTransactionStore) => new StatsService(store);

describe('StatsService', () => {
  const service = serviceFor(new InMemoryTransactionStore(sampleTransactions()));

  it('summarises the visible transactions', () => {
    const overview = service.getOverview();

    expect(overview).toEqual({
      totalTransactions: 5,
      totalAmount: 1575.5,
      averageAmount: 315.1,
      minAmount: 0,
      maxAmount: 1200,
      uniqueCustomers: 4,
      transactionsByStatus: { COMPLETED: 4, PENDING: 1 },
    });
    expect(Object.keys(overview.transactionsByStatus)).toEqual(['COMPLETED', 'PENDING']);
  });

  it('buckets amounts into fixed ranges', () => {
    expect(service.getAmountDistribution()).toEqual([
      { range: '0-100', count: 3, percentage: 60 },
      { range: '100-500', count: 1, percentage: 20 },
      { range: '500-1000', count: 0, percentage: 0 },
      { range: '1000-5000', count: 1, percentage: 20 },
      { range: '5000-10000', count: 0, percentage: 0 },
      { range: '10000+', count: 0, percentage: 0 },
    ]);
  });

  it('puts a bucket boundary in the upper bucket', () => {
    const store = new InMemoryTransactionStore([makeTransaction({ id: 1, amount: 100 })]);

    expect(serviceFor(store).getAmountDistribution()[1]).toEqual({ range: '100-500', count: 1, percentage: 100 });
  });

  it('groups by type, most frequent first', () => {
    expect(service.getStatsByType()).toEqual([
      { type: 'PAYMENT', count: 2, totalAmount: 250, averageAmount: 125, percentage: 40 },
      { type: 'PURCHASE', count: 2, totalAmount: 125.5, averageAmount: 62.75, percentage: 40 },
      { type: 'TRANSFER', count: 1, totalAmount: 1200, averageAmount: 1200, percentage: 20 },
    ]);
  });

  it('groups by day, newest first', () => {
    expect(service.getDailyStats()).toEqual([
      { date: '2024-03-10', count: 1, totalAmount: 0, averageAmount: 0 },
      { date: '2024-03-05', count: 2, totalAmount: 1450, averageAmount: 725 },
      { date: '2024-03-01', count: 1, totalAmount: 50, averageAmount: 50 },
      { date: '2024-02-20', count: 1, totalAmount: 75.5, averageAmount: 75.5 },
    ]);
  });

  it('leaves deleted transactions out', () => {
    const store = new InMemoryTransactionStore(sampleTransactions());
    store.markDeleted(3);

    const overview = serviceFor(store).getOverview();

    expect(overview.totalTransactions).toBe(4);
    expect(overview.totalAmount).toBe(375.5);
    expect(overview.maxAmount).toBe(250);
  });

  it('counts the same transactions as an unfiltered listing after deletions', () => {
    const store = new InMemoryTransactionStore(sampleTransactions());
    const query = new TransactionQueryService(store);
    query.removeTransaction(1);
    query.removeTransaction(4);

    const overview = serviceFor(store).getOverview();

    expect(overview.totalTransactions).toBe(3);
    expect(overview.totalTransactions).toBe(query.listTransactions().total);
  });

  it('reports zeros when nothing is visible', () => {
    const store = new InMemoryTransactionStore([makeTransaction({ id: 1 })]);
    store.markDeleted(1);
    const empty = serviceFor(store);

    expect(empty.getOverview()).toEqual({
      totalTransactions: 0,
      totalAmount: 0,
      averageAmount: 0,
      minAmount: 0,
      maxAmount: 0,
      uniqueCustomers: 0,
      transactionsByStatus: {},
    });
    expect(empty.getAmountDistribution()).toEqual([]);
    expect(empty.getStatsByType()).toEqual([]);
    expect(empty.getDailyStats()).toEqual([]);
  });
});
