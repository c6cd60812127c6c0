import type { ListedState, PropertyType, ReconciledRecord, SaleType } from '../types';
import { formatFurnished, parseFurnished } from './normalizers/furnished.normalizer';
import { formatPeriod, parsePeriod } from './normalizers/price.normalizer';

export const DATASET_SCHEMA_VERSION = 1;

/**
 * Column order is a contract with downstream consumers of the sheet.
 */
export const DATASET_COLUMNS = [
  'Title',
  'Code',
  'First Scrape Date',
  'Last Scrape Date',
  'Listed',
  'Original Price (USD)',
  'Last Price (USD)',
  'Payment Period (USD)',
  'Original Price (IDR)',
  'Last Price (IDR)',
  'Payment Period (IDR)',
  'Location',
  'Type of Sale',
  'Lease Years',
  'URL',
  'Property Type',
  'Year Built',
  'Bedrooms',
  'Bathrooms',
  'Land Size (are)',
  'Building Size (sqm)',
  'Pool',
  'Furnished',
] as const;

export type DatasetColumn = (typeof DATASET_COLUMNS)[number];

export type Cell = string | number;

export type DatasetRow = Record<DatasetColumn, Cell>;

const PROPERTY_TYPE_LABELS: Record<PropertyType, string> = {
  'villa-sale': 'Villa for sale',
  'villa-rent': 'Villa for rent',
  land: 'Land',
};

const SALE_TYPE_LABELS: Record<SaleType, string> = {
  freehold: 'Freehold',
  leasehold: 'Leasehold',
  unknown: 'Unknown',
};

const LISTED_LABELS: Record<ListedState, string> = {
  listed: 'Listed',
  unlisted: 'Unlisted',
};

function findKey<K extends string>(labels: Record<K, string>, keys: readonly K[], text: string): K | undefined {
  const wanted = text.trim().toLowerCase();
  return keys.find((key) => labels[key].toLowerCase() === wanted || key === wanted);
}

const PROPERTY_TYPES: readonly PropertyType[] = ['villa-sale', 'villa-rent', 'land'];
const SALE_TYPES: readonly SaleType[] = ['freehold', 'leasehold', 'unknown'];
const LISTED_STATES: readonly ListedState[] = ['listed', 'unlisted'];

/**
 * "YYYY-MM-DD HH:mm:ss" in UTC
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function parseTimestamp(text: string): Date | null {
  const value = text.trim();
  if (!value) return null;
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value) ? `${value.replace(' ', 'T')}Z` : value;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

function optionalNumber(value: number | null): Cell {
  return value === null ? '' : value;
}

function readNumber(cell: Cell | undefined): number | null {
  if (cell === undefined || cell === '') return null;
  const value = typeof cell === 'number' ? cell : Number(cell.replace(/,/g, ''));
  return Number.isFinite(value) && value >= 0 ? value : null;
}

function readText(cell: Cell | undefined): string {
  return cell === undefined ? '' : String(cell).trim();
}

export function toRow(record: ReconciledRecord): DatasetRow {
  return {
    Title: record.title,
    Code: record.code,
    'First Scrape Date': formatTimestamp(record.firstSeenAt),
    'Last Scrape Date': formatTimestamp(record.lastSeenAt),
    Listed: LISTED_LABELS[record.listedState],
    'Original Price (USD)': record.originalPriceUsd,
    'Last Price (USD)': record.priceUsd.amount,
    'Payment Period (USD)': formatPeriod(record.priceUsd.period),
    'Original Price (IDR)': record.originalPriceLocal,
    'Last Price (IDR)': record.priceLocal.amount,
    'Payment Period (IDR)': formatPeriod(record.priceLocal.period),
    Location: record.location,
    'Type of Sale': SALE_TYPE_LABELS[record.saleType],
    'Lease Years': optionalNumber(record.leaseYears),
    URL: record.url,
    'Property Type': PROPERTY_TYPE_LABELS[record.propertyType],
    'Year Built': record.yearBuilt ?? '',
    Bedrooms: optionalNumber(record.bedrooms),
    Bathrooms: optionalNumber(record.bathrooms),
    'Land Size (are)': optionalNumber(record.landSize),
    'Building Size (sqm)': optionalNumber(record.buildingSize),
    Pool: record.pool ? 'Yes' : 'No',
    Furnished: formatFurnished(record.furnished),
  };
}

export type RowReadResult = { ok: true; record: ReconciledRecord } | { ok: false; reason: string };

/**
 * Read a stored row back into a record. Rows without a code or a first
 * scrape date cannot take part in reconciliation and are rejected.
 */
export function fromRow(row: Partial<Record<DatasetColumn, Cell>>): RowReadResult {
  const code = readText(row.Code);
  if (!code) return { ok: false, reason: 'missing Code' };

  const firstSeenAt = parseTimestamp(readText(row['First Scrape Date']));
  if (!firstSeenAt) return { ok: false, reason: `unreadable First Scrape Date for ${code}` };
  const lastSeenAt = parseTimestamp(readText(row['Last Scrape Date'])) ?? firstSeenAt;

  const priceUsd = readNumber(row['Last Price (USD)']) ?? 0;
  const priceLocal = readNumber(row['Last Price (IDR)']) ?? 0;
  const yearBuilt = readText(row['Year Built']);

  return {
    ok: true,
    record: {
      title: readText(row.Title),
      code,
      firstSeenAt,
      lastSeenAt,
      listedState: findKey(LISTED_LABELS, LISTED_STATES, readText(row.Listed)) ?? 'listed',
      originalPriceUsd: readNumber(row['Original Price (USD)']) ?? priceUsd,
      priceUsd: { amount: priceUsd, period: parsePeriod(readText(row['Payment Period (USD)'])) },
      originalPriceLocal: readNumber(row['Original Price (IDR)']) ?? priceLocal,
      priceLocal: { amount: priceLocal, period: parsePeriod(readText(row['Payment Period (IDR)'])) },
      location: readText(row.Location) || 'Unknown',
      saleType: findKey(SALE_TYPE_LABELS, SALE_TYPES, readText(row['Type of Sale'])) ?? 'unknown',
      leaseYears: readNumber(row['Lease Years']),
      url: readText(row.URL),
      propertyType: findKey(PROPERTY_TYPE_LABELS, PROPERTY_TYPES, readText(row['Property Type'])) ?? 'villa-sale',
      yearBuilt: yearBuilt && yearBuilt !== 'Unknown' ? yearBuilt : null,
      bedrooms: readNumber(row.Bedrooms),
      bathrooms: readNumber(row.Bathrooms),
      landSize: readNumber(row['Land Size (are)']),
      buildingSize: readNumber(row['Building Size (sqm)']),
      pool: readText(row.Pool).toLowerCase() === 'yes',
      furnished: parseFurnished(readText(row.Furnished)),
    },
  };
}
