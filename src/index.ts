import { createServices } from './app';
import { loadConfig } from './config';
import type { MongoDatasetStore } from './services/dataset-store.service';
import { RunQueueService } from './services/run-queue.service';
import { closeLogging, configureLogging, createLogger } from './utils/logger';

const logger = createLogger('main');

async function main() {
  const config = loadConfig();
  const logFile = configureLogging(config.logging);

  logger.info('Starting listing tracker...');
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`MongoDB: ${config.mongodb.database}.${config.mongodb.collection}`);
  logger.info(`Redis: ${config.redis.host}:${config.redis.port}`);
  if (logFile) logger.info(`Logging to ${logFile}`);

  const { store, runner } = createServices(config);
  const runQueue = new RunQueueService(runner, config);

  try {
    await store.connect();
    await runQueue.start();

    if (config.run.schedule) {
      await runQueue.schedule(config.run.schedule);
    }
    if (config.run.runOnStart) {
      await runQueue.enqueueRun('startup');
    }

    const stats = await runQueue.getQueueStats();
    logger.info(`Queue: ${stats.waiting} waiting, ${stats.active} active, ${stats.failed} failed`);
    logger.info('Listing tracker is running');
  } catch (error) {
    logger.error('Fatal error:', error);
    await cleanup(store, runQueue);
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    cleanup(store, runQueue)
      .then(() => process.exit(0))
      .catch(() => process.exit(1));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

async function cleanup(store: MongoDatasetStore, runQueue: RunQueueService): Promise<void> {
  try {
    await runQueue.close();
    await store.close();
    logger.info('Cleanup completed');
  } catch (error) {
    logger.error('Error during cleanup:', error);
  } finally {
    await closeLogging();
  }
}

main().catch((error) => {
  logger.error('Unhandled error:', error);
  process.exit(1);
});
