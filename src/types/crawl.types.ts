import type { ListingRecord, PropertyType, ReconciliationStats } from './listing.types';

/**
 * One step of a simulated UI interaction, e.g. opening the currency
 * selector or clicking the n-th option matching a text locator.
 */
export interface InteractionStep {
  selector: string;
  action: 'click';
  nth?: number;
}

export type InteractionScript = InteractionStep[];

export interface FetchOptions {
  interaction?: InteractionScript;
  // Only return the inner HTML of this element (defaults to body)
  scope?: string;
}

export interface RenderedPage {
  requestedUrl: string;
  finalUrl: string;
  html: string;
}

/**
 * A browser session owned by exactly one worker for its lifetime.
 * UI state (the selected currency) is scoped to the session.
 */
export interface BrowserSession {
  readonly id: string;
  fetchRendered(url: string, options?: FetchOptions): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface BrowserSessionFactory {
  openSession(): Promise<BrowserSession>;
  close(): Promise<void>;
}

export interface CrawlTarget {
  propertyType: PropertyType;
  url: string;
}

export type LinkOutcome =
  | { state: 'recorded'; link: string; record: ListingRecord; attempts: number }
  | { state: 'redirected'; link: string; finalUrl: string }
  | { state: 'failed'; link: string; attempts: number; reason: string };

export interface TargetCrawlResult {
  target: CrawlTarget;
  pages: number;
  records: ListingRecord[];
  recorded: number;
  redirected: number;
  failed: number;
}

export interface RunSummary {
  startedAt: Date;
  finishedAt: Date;
  targets: Array<Omit<TargetCrawlResult, 'records'>>;
  freshRecords: number;
  datasetSize: number;
  stats: ReconciliationStats;
}
