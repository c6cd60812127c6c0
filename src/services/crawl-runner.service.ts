import type { BrowserSessionFactory, CrawlTarget, ListingRecord, RunSummary, TargetCrawlResult } from '../types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { CrawlSession } from './crawl-session';
import type { DatasetStore } from './dataset-store.service';
import type { PageWalkerService } from './page-walker.service';
import type { ReconciliationService } from './reconciliation.service';

const logger = createLogger('runner');

export interface CrawlRunnerOptions {
  targets: CrawlTarget[];
  workers: number;
  localCurrency: string;
}

/**
 * CrawlRunnerService
 * One run: read the stored dataset, crawl every target with a pool of
 * sessions, reconcile the complete batch once, write the result.
 * Only fatal errors (store, configuration, unreadable results pages) escape.
 */
export class CrawlRunnerService {
  constructor(
    private readonly store: DatasetStore,
    private readonly sessions: BrowserSessionFactory,
    private readonly walker: PageWalkerService,
    private readonly reconciler: ReconciliationService,
    private readonly options: CrawlRunnerOptions
  ) {}

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    logger.info(`Starting crawl run with ${this.options.targets.length} targets`);

    const prior = await this.store.readDataset();
    const results = await this.crawlAll();

    const batch: ListingRecord[] = results.flatMap((result) => result.records);
    const { dataset, stats } = this.reconciler.reconcile(prior, batch);

    await this.store.writeDataset(dataset);

    const summary: RunSummary = {
      startedAt,
      finishedAt: new Date(),
      targets: results.map(({ records: _records, ...rest }) => rest),
      freshRecords: batch.length,
      datasetSize: dataset.length,
      stats,
    };

    for (const target of summary.targets) {
      logger.info(
        `${target.target.propertyType}: ${target.recorded} recorded, ${target.redirected} withdrawn, ${target.failed} failed over ${target.pages} pages`
      );
    }
    logger.info(`✅ Run finished in ${summary.finishedAt.getTime() - startedAt.getTime()}ms, dataset has ${dataset.length} records`);

    return summary;
  }

  /**
   * Each worker owns one session for its lifetime and takes targets one at
   * a time, so a session's currency clicks never interleave with another's.
   */
  private async crawlAll(): Promise<TargetCrawlResult[]> {
    const { targets } = this.options;
    const results: TargetCrawlResult[] = new Array(targets.length);
    let next = 0;
    let aborted = false;

    const worker = async (): Promise<void> => {
      let session: CrawlSession | null = null;
      try {
        session = new CrawlSession(await this.sessions.openSession(), this.options.localCurrency);
        while (!aborted && next < targets.length) {
          const index = next++;
          results[index] = await this.walker.crawlTarget(session, targets[index]);
        }
      } catch (error) {
        aborted = true;
        throw error;
      } finally {
        await session?.close();
      }
    };

    const workerCount = Math.max(1, Math.min(this.options.workers, targets.length));
    try {
      const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
      const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
      if (failure) {
        logger.error(`Crawl aborted: ${errorMessage(failure.reason)}`);
        throw failure.reason;
      }
    } finally {
      await this.sessions.close();
    }

    return results;
  }
}
