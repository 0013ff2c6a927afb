import { describe, expect, it } from 'vitest';
import { SystemService } from '../../../src/application/services/SystemService.js';
import { InMemoryTransactionStore } from '../../../src/infrastructure/adapters/storage/InMemoryTransactionStore.js';
import { sampleTransactions } from '../../helpers/fixtures.js';

const info = { version: '1.2.3', environment: 'dev', dataSource: 'memory://cards' };
const clock = () => new Date('2024-06-15T10:00:00.000Z');

describe('SystemService', () => {
  it('is healthy once transactions are loaded', () => {
    const service = new SystemService(new InMemoryTransactionStore(sampleTransactions()), info, clock);

    expect(service.getHealth()).toEqual({
      status: 'OK',
      timestamp: '2024-06-15T10:00:00.000Z',
      dataLoaded: true,
      transactionsCount: 5,
    });
  });

  it('reports an error without data', () => {
    const service = new SystemService(new InMemoryTransactionStore([]), info, clock);

    expect(service.getHealth()).toMatchObject({ status: 'ERROR', dataLoaded: false, transactionsCount: 0 });
  });

  it('describes the loaded dataset including deleted transactions', () => {
    const store = new InMemoryTransactionStore(sampleTransactions());
    store.markDeleted(5);

    expect(new SystemService(store, info, clock).getMetadata()).toEqual({
      version: '1.2.3',
      environment: 'dev',
      totalTransactions: 5,
      totalCustomers: 4,
      dataSource: 'memory://cards',
      lastUpdated: '2024-06-15T10:00:00.000Z',
    });
  });
});
