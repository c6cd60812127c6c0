import type {
  Dataset,
  ListingRecord,
  ReconciledRecord,
  ReconciliationResult,
  ReconciliationStats,
} from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('reconcile');

function createRecord(fresh: ListingRecord, now: Date): ReconciledRecord {
  return {
    ...fresh,
    listedState: 'listed',
    firstSeenAt: now,
    lastSeenAt: now,
    originalPriceLocal: fresh.priceLocal.amount,
    originalPriceUsd: fresh.priceUsd.amount,
  };
}

function updateRecord(existing: ReconciledRecord, fresh: ListingRecord, now: Date): ReconciledRecord {
  return {
    ...fresh,
    listedState: 'listed',
    firstSeenAt: existing.firstSeenAt,
    lastSeenAt: now,
    originalPriceLocal: existing.originalPriceLocal,
    originalPriceUsd: existing.originalPriceUsd,
  };
}

/**
 * First occurrence of each code wins; records without a code are dropped.
 */
function dedupeBatch(batch: ListingRecord[], stats: ReconciliationStats): ListingRecord[] {
  const seen = new Set<string>();
  const unique: ListingRecord[] = [];

  for (const record of batch) {
    const code = record.code.trim();
    if (!code) {
      logger.warn(`Dropping record without code (url: ${record.url})`);
      stats.dropped++;
      continue;
    }
    if (seen.has(code)) {
      logger.warn(`Duplicate code ${code} in batch, keeping first occurrence (ignored url: ${record.url})`);
      continue;
    }
    seen.add(code);
    unique.push(code === record.code ? record : { ...record, code });
  }

  return unique;
}

function indexDataset(dataset: Dataset): Map<string, ReconciledRecord> {
  const index = new Map<string, ReconciledRecord>();
  for (const record of dataset) {
    if (index.has(record.code)) {
      logger.warn(`Duplicate code ${record.code} in stored dataset, keeping first row`);
      continue;
    }
    index.set(record.code, record);
  }
  return index;
}

/**
 * Merge one crawl batch into the stored dataset.
 *
 * New codes start their provenance now. Known codes refresh every mutable
 * field and keep firstSeenAt and the original prices. Stored codes missing
 * from the batch are carried forward unchanged except for being unlisted.
 * The result is sorted by firstSeenAt, newest first.
 */
export function reconcile(prior: Dataset, batch: ListingRecord[], now: Date = new Date()): ReconciliationResult {
  const stats: ReconciliationStats = { inserted: 0, updated: 0, relisted: 0, unlisted: 0, dropped: 0 };
  const previous = indexDataset(prior);
  const fresh = dedupeBatch(batch, stats);

  const merged: ReconciledRecord[] = [];
  const seen = new Set<string>();

  for (const record of fresh) {
    seen.add(record.code);
    const existing = previous.get(record.code);

    if (!existing) {
      merged.push(createRecord(record, now));
      stats.inserted++;
      continue;
    }

    if (existing.listedState === 'unlisted') stats.relisted++;
    else stats.updated++;
    merged.push(updateRecord(existing, record, now));
  }

  for (const [code, existing] of previous) {
    if (seen.has(code)) continue;
    merged.push({ ...existing, listedState: 'unlisted' });
    stats.unlisted++;
  }

  // Array.prototype.sort is stable: ties keep batch order, then stored order
  merged.sort((a, b) => b.firstSeenAt.getTime() - a.firstSeenAt.getTime());

  return { dataset: merged, stats };
}

/**
 * ReconciliationService
 * Thin wrapper around reconcile() that logs the outcome of a run
 */
export class ReconciliationService {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  reconcile(prior: Dataset, batch: ListingRecord[]): ReconciliationResult {
    if (prior.length === 0) {
      logger.info('Stored dataset is empty, first run');
    }

    const result = reconcile(prior, batch, this.clock());
    const { inserted, updated, relisted, unlisted, dropped } = result.stats;

    logger.info(
      `✅ Reconciled ${batch.length} fresh records against ${prior.length} stored: ` +
        `${inserted} new, ${updated} updated, ${relisted} relisted, ${unlisted} unlisted, ${dropped} dropped`
    );

    return result;
  }
}
