import { readFileSync } from 'fs';
import { join } from 'path';
import type { ListingRecord, ReconciledRecord } from '../src/types';

export function fixture(name: string): string {
  return readFileSync(join(__dirname, 'fixtures', name), 'utf-8');
}

export function listing(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    code: 'V100',
    title: 'Test Villa',
    location: 'Canggu',
    propertyType: 'villa-sale',
    saleType: 'freehold',
    leaseYears: null,
    url: 'https://www.example-listings.com/villa/v100',
    yearBuilt: null,
    bedrooms: 3,
    bathrooms: 2,
    landSize: 4,
    buildingSize: 200,
    pool: true,
    furnished: 'furnished',
    priceLocal: { amount: 500000000, period: { type: 'one-time' } },
    priceUsd: { amount: 33000, period: { type: 'one-time' } },
    listedState: 'listed',
    ...overrides,
  };
}

export function stored(overrides: Partial<ReconciledRecord> = {}): ReconciledRecord {
  const base = listing(overrides);
  return {
    ...base,
    firstSeenAt: new Date('2024-01-01T00:00:00Z'),
    lastSeenAt: new Date('2024-01-01T00:00:00Z'),
    originalPriceLocal: base.priceLocal.amount,
    originalPriceUsd: base.priceUsd.amount,
    ...overrides,
  };
}
