import type { TransactionStorePort } from '../ports/TransactionStorePort.js';

export interface SystemHealth {
  status: 'OK' | 'ERROR';
  timestamp: string;
  dataLoaded: boolean;
  transactionsCount: number;
}

export interface SystemMetadata {
  version: string;
  environment: string;
  totalTransactions: number;
  totalCustomers: number;
  dataSource: string;
  lastUpdated: string;
}

export interface SystemInfo {
  version: string;
  environment: string;
  dataSource: string;
}

export class SystemService {
  constructor(
    private readonly store: TransactionStorePort,
    private readonly info: SystemInfo,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  getHealth(): SystemHealth {
    const transactionsCount = this.store.size();
    const dataLoaded = transactionsCount > 0;

    return {
      status: dataLoaded ? 'OK' : 'ERROR',
      timestamp: this.clock().toISOString(),
      dataLoaded,
      transactionsCount,
    };
  }

  getMetadata(): SystemMetadata {
    const transactions = this.store.allTransactions();

    return {
      version: this.info.version,
      environment: this.info.environment,
      totalTransactions: transactions.length,
      totalCustomers: new Set(transactions.map((txn) => txn.clientId)).size,
      dataSource: this.info.dataSource,
      lastUpdated: this.clock().toISOString(),
    };
  }
}
