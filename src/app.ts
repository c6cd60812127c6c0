import type { AppConfig } from './config';
import { PlaywrightSessionFactory } from './services/browser-session.service';
import { CrawlRunnerService } from './services/crawl-runner.service';
import { MongoDatasetStore } from './services/dataset-store.service';
import { ListingExtractorService } from './services/listing-extractor.service';
import { PageWalkerService } from './services/page-walker.service';
import { ReconciliationService } from './services/reconciliation.service';

export interface AppServices {
  store: MongoDatasetStore;
  runner: CrawlRunnerService;
}

/**
 * Wire the production collaborators for one process
 */
export function createServices(config: AppConfig): AppServices {
  const store = new MongoDatasetStore(config.mongodb);
  const sessions = new PlaywrightSessionFactory({
    ...config.browser,
    fetchTimeoutMs: config.crawl.fetchTimeoutMs,
  });
  const walker = new PageWalkerService(new ListingExtractorService(), {
    maxAttempts: config.crawl.linkMaxAttempts,
    retryDelayMs: config.crawl.linkRetryDelayMs,
    maxPages: config.crawl.maxPages,
  });

  const runner = new CrawlRunnerService(store, sessions, walker, new ReconciliationService(), {
    targets: config.targets,
    workers: config.crawl.workers,
    localCurrency: config.currency.local,
  });

  return { store, runner };
}
