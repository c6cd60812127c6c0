import type { FieldOutcome, FurnishedLevel, SaleType } from '../../types';
import { normalizeFurnished } from '../normalizers/furnished.normalizer';
import { parseAmount } from '../normalizers/price.normalizer';
import { lines, type ListingDocument } from './listing-document';

/**
 * A named extraction rule: a pure read from the document plus the
 * sentinel used when the read degrades.
 */
export interface FieldRule<T> {
  fallback: T;
  read: (doc: ListingDocument) => FieldOutcome<T>;
}

export const UNKNOWN_LOCATION = 'Unknown';

function ok<T>(value: T): FieldOutcome<T> {
  return { ok: true, value };
}

function degraded<T>(reason: string, raw?: string): FieldOutcome<T> {
  return { ok: false, reason, raw };
}

export function readInteger(text: string | undefined): number | null {
  const match = text?.match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

// Same separator rules as prices: "1,200" and "1.200" are 1200, "4.5" is 4.5
export function readDecimal(text: string | undefined): number | null {
  return text === undefined ? null : parseAmount(text);
}

/**
 * Value line of a "Label\nvalue" description item
 */
function labelledValue(item: string | undefined): string | undefined {
  return item === undefined ? undefined : lines(item)[1];
}

export function fixed<T>(value: T): FieldRule<T> {
  return { fallback: value, read: () => ok(value) };
}

export const titleRule: FieldRule<string> = {
  fallback: 'Unknown',
  read: (doc) => (doc.title ? ok(doc.title) : degraded('title element missing')),
};

export const codeRule: FieldRule<string> = {
  fallback: '',
  read: (doc) => (doc.code ? ok(doc.code) : degraded('code element missing')),
};

// Last line of the first summary block; a dash means the site has no location
export const locationRule: FieldRule<string> = {
  fallback: UNKNOWN_LOCATION,
  read: (doc) => {
    const block = doc.summaryBlocks[0];
    if (block === undefined) return degraded('location block missing');

    const value = lines(block).at(-1);
    if (!value || /^-+$/.test(value)) return ok(UNKNOWN_LOCATION);
    return ok(value);
  },
};

function saleKeyword(doc: ListingDocument): FieldOutcome<SaleType> {
  const block = doc.summaryBlocks[1];
  if (block === undefined) return degraded('sale block missing');

  const keywordLine = lines(block)[2];
  const keyword = keywordLine?.split(' ')[0]?.toLowerCase() ?? '';
  if (keyword.startsWith('lease')) return ok('leasehold');
  if (keyword.startsWith('free')) return ok('freehold');
  return degraded('unrecognized sale type keyword', keywordLine ?? block);
}

export const saleTypeRule: FieldRule<SaleType> = {
  fallback: 'unknown',
  read: saleKeyword,
};

// "... / 25 years" on the line after the sale keyword, leasehold only
export const leaseYearsRule: FieldRule<number | null> = {
  fallback: null,
  read: (doc) => {
    const saleType = saleKeyword(doc);
    if (!saleType.ok || saleType.value !== 'leasehold') return ok(null);

    const termLine = lines(doc.summaryBlocks[1])[3];
    const years = readInteger(termLine?.split('/ ')[1]);
    return years === null ? degraded('lease term missing', termLine) : ok(years);
  },
};

export const bedroomsRule: FieldRule<number | null> = {
  fallback: null,
  read: (doc) => {
    const token = doc.availableTokens[3];
    const value = readInteger(token?.split('\n')[1]);
    return value === null ? degraded('bedroom count missing', token) : ok(value);
  },
};

export const bathroomsRule: FieldRule<number | null> = {
  fallback: null,
  read: (doc) => {
    const token = doc.availableTokens[5];
    const value = readInteger(token);
    return value === null ? degraded('bathroom count missing', token) : ok(value);
  },
};

export const poolRule: FieldRule<boolean> = {
  fallback: false,
  read: (doc) => ok(doc.facilities.some((text) => /pool$/i.test(text.replace(/\s+/g, '')))),
};

export const YEAR_BUILT_OFFSET = 5;

/**
 * Markup discriminator: listings with a "Year Built" entry shift every
 * later description item by one.
 */
export function hasYearBuilt(doc: ListingDocument): boolean {
  return (doc.descriptionItems[YEAR_BUILT_OFFSET] ?? '').includes('Year Built');
}

export function yearBuiltRule(offset: number): FieldRule<string | null> {
  return {
    fallback: null,
    read: (doc) => {
      const item = doc.descriptionItems[offset];
      const value = item?.split(': ')[1]?.trim();
      return value ? ok(value) : degraded('year built value missing', item);
    },
  };
}

/**
 * Area from the first offset whose item carries a number
 */
export function sizeRule(label: string, offsets: number[]): FieldRule<number | null> {
  return {
    fallback: null,
    read: (doc) => {
      for (const offset of offsets) {
        const value = readDecimal(labelledValue(doc.descriptionItems[offset]));
        if (value !== null) return ok(value);
      }
      return degraded(`${label} missing`, doc.descriptionItems[offsets[0]]);
    },
  };
}

export function furnishedRule(offset: number): FieldRule<FurnishedLevel> {
  return {
    fallback: 'unknown',
    read: (doc) => {
      const item = doc.descriptionItems[offset];
      const raw = labelledValue(item);
      if (raw === undefined) return degraded('furnished value missing', item);

      const level = normalizeFurnished(raw);
      return level === 'unknown' ? degraded('unrecognized furnished text', raw) : ok(level);
    },
  };
}
