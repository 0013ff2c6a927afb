import { CustomerService } from '../../application/services/CustomerService.js';
import { DataLoadService } from '../../application/services/DataLoadService.js';
import type { LoadedDataset } from '../../application/services/DataLoadService.js';
import { FraudDetectionService } from '../../application/services/FraudDetectionService.js';
import { StatsService } from '../../application/services/StatsService.js';
import { SystemService } from '../../application/services/SystemService.js';
import { TransactionQueryService } from '../../application/services/TransactionQueryService.js';
import type { CardSourcePort } from '../../application/ports/CardSourcePort.js';
import type { TransactionStorePort } from '../../application/ports/TransactionStorePort.js';
import { CsvCardSource } from '../adapters/source/CsvCardSource.js';
import { InMemoryTransactionStore } from '../adapters/storage/InMemoryTransactionStore.js';
import { loadConfig } from '../config/Config.js';
import type { AppConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  cardSource?: CardSourcePort;
  now?: Date;
  clock?: () => Date;
}

export class AppContainer {
  readonly store: TransactionStorePort;
  readonly transactionQuery: TransactionQueryService;
  readonly statsService: StatsService;
  readonly fraudDetection: FraudDetectionService;
  readonly customerService: CustomerService;
  readonly systemService: SystemService;

  constructor(
    readonly config: AppConfig,
    readonly cardSource: CardSourcePort,
    dataset: LoadedDataset,
    clock?: () => Date,
  ) {
    this.store = new InMemoryTransactionStore(dataset.transactions);
    this.transactionQuery = new TransactionQueryService(this.store);
    this.statsService = new StatsService(this.store);
    this.fraudDetection = new FraudDetectionService(this.store);
    this.customerService = new CustomerService(this.store, dataset.cards);
    this.systemService = new SystemService(
      this.store,
      {
        version: config.app.version,
        environment: config.app.environment,
        dataSource: cardSource.location,
      },
      clock,
    );
  }

  /**
   * Loads and derives the dataset before anything is wired. Rejects with a
   * DataSourceError when the cards cannot be read.
   */
  static async create(overrides: AppContainerOverrides = {}): Promise<AppContainer> {
    const config = overrides.config ?? loadConfig();
    const cardSource = overrides.cardSource ?? new CsvCardSource(config.data.csvPath);

    const dataset = await new DataLoadService(cardSource).load(overrides.now);

    return new AppContainer(config, cardSource, dataset, overrides.clock);
  }
}
