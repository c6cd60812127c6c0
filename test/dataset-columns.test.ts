import { describe, expect, it } from 'vitest';
import { DATASET_COLUMNS, formatTimestamp, fromRow, parseTimestamp, toRow } from '../src/services/dataset-columns';
import { stored } from './helpers';

describe('toRow', () => {
  it('emits every column in contract order', () => {
    expect(Object.keys(toRow(stored()))).toEqual([...DATASET_COLUMNS]);
  });

  it('formats values for the sheet', () => {
    expect(toRow(stored())).toEqual({
      Title: 'Test Villa',
      Code: 'V100',
      'First Scrape Date': '2024-01-01 00:00:00',
      'Last Scrape Date': '2024-01-01 00:00:00',
      Listed: 'Listed',
      'Original Price (USD)': 33000,
      'Last Price (USD)': 33000,
      'Payment Period (USD)': 'one time',
      'Original Price (IDR)': 500000000,
      'Last Price (IDR)': 500000000,
      'Payment Period (IDR)': 'one time',
      Location: 'Canggu',
      'Type of Sale': 'Freehold',
      'Lease Years': '',
      URL: 'https://www.example-listings.com/villa/v100',
      'Property Type': 'Villa for sale',
      'Year Built': '',
      Bedrooms: 3,
      Bathrooms: 2,
      'Land Size (are)': 4,
      'Building Size (sqm)': 200,
      Pool: 'Yes',
      Furnished: 'Furnished',
    });
  });
});

describe('fromRow', () => {
  it('reads back what toRow wrote', () => {
    const record = stored({
      code: 'L-400',
      propertyType: 'land',
      saleType: 'leasehold',
      leaseYears: 20,
      yearBuilt: '2019',
      bedrooms: null,
      bathrooms: null,
      buildingSize: null,
      pool: false,
      furnished: 'unfurnished',
      listedState: 'unlisted',
      priceLocal: { amount: 150000000, period: { type: 'periodic', label: 'are' } },
      priceUsd: { amount: 0, period: { type: 'on-request' } },
      originalPriceLocal: 175000000,
      originalPriceUsd: 11000,
      lastSeenAt: new Date('2024-02-10T13:45:10Z'),
    });

    expect(fromRow(toRow(record))).toEqual({ ok: true, record });
  });

  it('rejects rows without a code', () => {
    expect(fromRow({ Title: 'Orphan row' })).toEqual({ ok: false, reason: 'missing Code' });
  });

  it('rejects rows with an unreadable first scrape date', () => {
    expect(fromRow({ Code: 'V1', 'First Scrape Date': 'yesterday' })).toEqual({
      ok: false,
      reason: 'unreadable First Scrape Date for V1',
    });
  });

  it('fills gaps in hand-edited rows', () => {
    const result = fromRow({
      Code: ' V9 ',
      'First Scrape Date': '2024-01-05 10:00:00',
      'Last Price (USD)': '165,000',
      'Year Built': 'Unknown',
      Pool: 'yes',
    });

    expect(result.ok && result.record).toMatchObject({
      code: 'V9',
      lastSeenAt: new Date('2024-01-05T10:00:00Z'),
      priceUsd: { amount: 165000, period: { type: 'one-time' } },
      originalPriceUsd: 165000,
      yearBuilt: null,
      location: 'Unknown',
      listedState: 'listed',
      pool: true,
      furnished: 'unknown',
    });
  });
});

describe('timestamps', () => {
  it('formats in UTC without milliseconds', () => {
    expect(formatTimestamp(new Date('2024-07-09T03:04:05.678Z'))).toBe('2024-07-09 03:04:05');
  });

  it('parses the sheet format as UTC', () => {
    expect(parseTimestamp('2024-07-09 03:04:05')).toEqual(new Date('2024-07-09T03:04:05Z'));
    expect(parseTimestamp('')).toBeNull();
  });
});
