/**
 * Listing Types
 */

export type PropertyType = 'villa-sale' | 'villa-rent' | 'land';

export type SaleType = 'freehold' | 'leasehold' | 'unknown';

export type FurnishedLevel =
  | 'unfurnished'
  | 'semi-furnished'
  | 'furnished'
  | 'fully-furnished'
  | 'unknown';

export type ListedState = 'listed' | 'unlisted';

export type PaymentPeriod =
  | { type: 'one-time' }
  | { type: 'periodic'; label: string }
  | { type: 'on-request' };

export interface ListingPrice {
  amount: number; // 0 means "on request"
  period: PaymentPeriod;
}

export interface ListingRecord {
  // Site-assigned identifier, the reconciliation key
  code: string;
  title: string;
  location: string;
  propertyType: PropertyType;
  saleType: SaleType;
  leaseYears: number | null; // only for leasehold
  url: string;
  yearBuilt: string | null;

  // Rooms and sizes (null when unknown or not applicable)
  bedrooms: number | null;
  bathrooms: number | null;
  landSize: number | null; // are
  buildingSize: number | null; // sqm

  pool: boolean;
  furnished: FurnishedLevel;

  priceLocal: ListingPrice;
  priceUsd: ListingPrice;

  listedState: ListedState;
}

export interface ReconciledRecord extends ListingRecord {
  firstSeenAt: Date;
  lastSeenAt: Date;
  originalPriceLocal: number;
  originalPriceUsd: number;
}

/**
 * Ordered by firstSeenAt descending, unique by code
 */
export type Dataset = ReconciledRecord[];

/**
 * Outcome of reading a single field from a listing document.
 * A degraded outcome carries the reason and the raw text it failed on.
 */
export type FieldOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string; raw?: string };

export interface FieldDiagnostic {
  field: string;
  reason: string;
  raw?: string;
}

export interface ListingExtractionResult {
  record: ListingRecord;
  diagnostics: FieldDiagnostic[];
  metadata: {
    source: string;
    extractedAt: Date;
    strategyUsed: string;
  };
}

/**
 * The two rendered views of one detail page
 */
export interface ListingViews {
  usd: string;
  local: string;
}

export interface ReconciliationStats {
  inserted: number;
  updated: number;
  relisted: number;
  unlisted: number;
  dropped: number;
}

export interface ReconciliationResult {
  dataset: Dataset;
  stats: ReconciliationStats;
}
