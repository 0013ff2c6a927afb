import 'dotenv/config';
import { DataSourceError } from './domain/errors/DataSourceError.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createServer } from './server.js';

const start = async () => {
  console.log('🚀 Starting Banking Transactions API...');

  const container = await AppContainer.create();
  const app = createServer(container);
  const { port } = container.config.server;

  app.listen(port, () => {
    console.log(`🏦 ${container.config.app.title} v${container.config.app.version} listening on port ${port}`);
    console.log(`📊 Environment: ${container.config.app.environment}`);
    console.log(`📁 Data source: ${container.cardSource.location} (${container.store.size()} transactions)`);
  });
};

start().catch((error: unknown) => {
  if (error instanceof DataSourceError) {
    console.error(`❌ Failed to load transaction data [${error.kind}]: ${error.message}`);
  } else {
    console.error('❌ Failed to start Banking Transactions API:', error);
  }
  process.exit(1);
});
