import type { CrawlTarget, LinkOutcome, ListingRecord, PropertyType, TargetCrawlResult } from '../types';
import { ConfigurationError, errorMessage, IncompleteRecordError, ListingPageError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep, withRetry } from '../utils/retry';
import type { CrawlSession } from './crawl-session';
import { pageUrl, parseListingLinks, parsePageCount } from './extraction-strategies/listing-page';
import type { ListingExtractorService } from './listing-extractor.service';

const logger = createLogger('walker');

export interface PageWalkerOptions {
  maxAttempts: number;
  retryDelayMs: number;
  maxPages?: number;
  sleep?: (ms: number) => Promise<void>;
}

function sameUrl(a: string, b: string): boolean {
  const normalize = (url: string) => url.replace(/\/+$/, '').replace(/^http:/, 'https:');
  return normalize(a) === normalize(b);
}

/**
 * PageWalkerService
 * Walks the results pages of one target and extracts every detail link,
 * each under a bounded retry. A link that exhausts its attempts is
 * abandoned; the crawl carries on.
 */
export class PageWalkerService {
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly extractor: ListingExtractorService,
    private readonly options: PageWalkerOptions
  ) {
    this.wait = options.sleep ?? sleep;
  }

  private retry<T>(label: string, task: (attempt: number) => Promise<T>) {
    return withRetry(task, {
      attempts: this.options.maxAttempts,
      delayMs: this.options.retryDelayMs,
      sleep: this.wait,
      shouldRetry: (error) => !(error instanceof ConfigurationError),
      onRetry: (error, attempt) => {
        logger.info(`${label}: FAIL (attempt ${attempt}/${this.options.maxAttempts}) ${errorMessage(error)}, retrying...`);
      },
    });
  }

  async discoverPageCount(session: CrawlSession, url: string): Promise<number> {
    const result = await this.retry(url, async () => {
      const page = await session.fetchScoped(url, '#pagination');
      return parsePageCount(page.html);
    });

    if (!result.ok) {
      throw new ListingPageError(url, { cause: result.error });
    }

    let count = result.value;
    if (count === null) {
      logger.warn(`⚠️  Pagination not readable on ${url}, assuming a single page`);
      count = 1;
    }

    const { maxPages } = this.options;
    return maxPages !== undefined ? Math.min(count, maxPages) : count;
  }

  async discoverLinks(session: CrawlSession, baseUrl: string, page: number): Promise<string[]> {
    const url = pageUrl(baseUrl, page);
    const result = await this.retry(url, async () => {
      const rendered = await session.fetchScoped(url, '#box');
      return parseListingLinks(rendered.html, url);
    });

    if (!result.ok) {
      throw new ListingPageError(url, { cause: result.error });
    }
    return result.value;
  }

  /**
   * pending → USD view → local view → extracting → recorded | failed.
   * A redirect away from the link means the listing was withdrawn.
   */
  async processLink(session: CrawlSession, link: string, propertyType: PropertyType): Promise<LinkOutcome> {
    const result = await this.retry(link, async (attempt): Promise<LinkOutcome> => {
      const usdView = await session.fetchInCurrency(link, 'usd');
      if (!sameUrl(usdView.finalUrl, link)) {
        return { state: 'redirected', link, finalUrl: usdView.finalUrl };
      }

      const localView = await session.fetchInCurrency(link, 'local');
      const extraction = this.extractor.extractListing({ usd: usdView.html, local: localView.html }, link, propertyType);
      if (!extraction) {
        throw new ConfigurationError(`No extraction strategy for ${propertyType}`);
      }
      if (!extraction.record.code) {
        throw new IncompleteRecordError(link);
      }

      return { state: 'recorded', link, record: extraction.record, attempts: attempt };
    });

    if (!result.ok) {
      logger.error(`${link}: FAIL after ${result.attempts} attempts, max retries reached (${errorMessage(result.error)})`);
      return { state: 'failed', link, attempts: result.attempts, reason: errorMessage(result.error) };
    }

    if (result.value.state === 'redirected') {
      logger.info(`${link}: redirected to ${result.value.finalUrl}, listing withdrawn`);
    } else {
      logger.info(`${link}: PASS`);
    }
    return result.value;
  }

  /**
   * Crawl every results page of a target with one session
   */
  async crawlTarget(session: CrawlSession, target: CrawlTarget): Promise<TargetCrawlResult> {
    const pages = await this.discoverPageCount(session, target.url);
    logger.info(`[${session.id}] ${target.propertyType}: ${pages} pages at ${target.url}`);

    const records: ListingRecord[] = [];
    const visited = new Set<string>();
    let redirected = 0;
    let failed = 0;

    for (let page = 1; page <= pages; page++) {
      const links = await this.discoverLinks(session, target.url, page);
      logger.info(`[${session.id}] ${target.propertyType} page ${page}/${pages}: ${links.length} links`);

      for (const link of links) {
        // Listings shift between pages while the crawl runs
        if (visited.has(link)) continue;
        visited.add(link);

        const outcome = await this.processLink(session, link, target.propertyType);
        if (outcome.state === 'recorded') records.push(outcome.record);
        else if (outcome.state === 'redirected') redirected++;
        else failed++;
      }
    }

    return { target, pages, records, recorded: records.length, redirected, failed };
  }
}
