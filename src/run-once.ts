import { createServices } from './app';
import { loadConfig } from './config';
import { errorMessage } from './utils/errors';
import { closeLogging, configureLogging, createLogger } from './utils/logger';
import { withRetry } from './utils/retry';

const logger = createLogger('run-once');

/**
 * Single crawl run without the queue, retried as a whole on failure
 */
async function main(): Promise<number> {
  const config = loadConfig();
  configureLogging(config.logging);

  const result = await withRetry(
    async (attempt) => {
      logger.info(`Run attempt ${attempt}/${config.run.maxAttempts}`);
      const { store, runner } = createServices(config);
      await store.connect();
      try {
        return await runner.run();
      } finally {
        await store.close();
      }
    },
    {
      attempts: config.run.maxAttempts,
      delayMs: config.run.retryDelayMs,
      onRetry: (error, attempt) => {
        logger.error(`Run attempt ${attempt} failed: ${errorMessage(error)}`);
      },
    }
  );

  if (!result.ok) {
    logger.error(`Run failed after ${result.attempts} attempts: ${errorMessage(result.error)}`);
    return 1;
  }

  const { stats } = result.value;
  logger.info(
    `Done: ${stats.inserted} new, ${stats.updated} updated, ${stats.relisted} relisted, ${stats.unlisted} unlisted`
  );
  return 0;
}

main()
  .catch((error) => {
    logger.error('Fatal error:', error);
    return 1;
  })
  .then(async (code) => {
    await closeLogging();
    process.exit(code);
  });
