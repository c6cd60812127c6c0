import { loadConfig } from './config';
import { MongoDatasetStore } from './services/dataset-store.service';
import { closeLogging, configureLogging, createLogger } from './utils/logger';

const logger = createLogger('backup');

/**
 * Dated copy of the stored dataset, taken outside of crawl runs
 */
async function main(): Promise<number> {
  const config = loadConfig();
  configureLogging(config.logging);

  const store = new MongoDatasetStore(config.mongodb);
  try {
    await store.connect();
    const name = await store.backupDataset();
    logger.info(`Backup written to ${config.mongodb.database}.${name}`);
    return 0;
  } finally {
    await store.close();
  }
}

main()
  .catch((error) => {
    logger.error('Backup failed:', error);
    return 1;
  })
  .then(async (code) => {
    await closeLogging();
    process.exit(code);
  });
