import type { ListingPrice, PaymentPeriod, PropertyType } from '../../types';

export interface NormalizedPrice extends ListingPrice {
  // Set when the text could not be read and the price fell back to "on request"
  degraded?: string;
}

const ON_REQUEST: PaymentPeriod = { type: 'on-request' };
const ONE_TIME: PaymentPeriod = { type: 'one-time' };

// Line of the raw price text carrying the "/period" label, by property type.
// Land markup puts the label one line earlier than villa rentals.
const PERIOD_LINE: Record<Exclude<PropertyType, 'villa-sale'>, number> = {
  'villa-rent': 1,
  land: 0,
};

/**
 * Read a numeric amount out of free price text.
 *
 * Digits, dots and commas are kept. A separator followed by groups of
 * exactly three digits is a thousands separator ("2.500.000.000",
 * "33,000"); when both appear the last one is the decimal point.
 */
export function parseAmount(text: string): number | null {
  const match = text.match(/\d[\d.,]*/);
  if (!match) return null;

  const token = match[0].replace(/[.,]+$/, '');
  const lastDot = token.lastIndexOf('.');
  const lastComma = token.lastIndexOf(',');

  let normalized: string;
  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    normalized = token.split(thousands).join('').replace(decimal, '.');
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ',';
    const groups = token.split(separator);
    const isGrouping = groups.slice(1).every((group) => group.length === 3);
    normalized = isGrouping ? groups.join('') : groups.slice(0, 2).join('.');
  } else {
    normalized = token;
  }

  const amount = Number(normalized);
  return Number.isFinite(amount) && amount >= 0 ? amount : null;
}

function onRequest(reason: string): NormalizedPrice {
  return { amount: 0, period: ON_REQUEST, degraded: reason };
}

function periodLabel(segment: string | undefined): PaymentPeriod | null {
  const label = segment?.trim();
  return label ? { type: 'periodic', label } : null;
}

function normalizeSalePrice(raw: string): NormalizedPrice {
  const amount = parseAmount(raw);
  if (amount === null) return onRequest('no digits in price text');
  return { amount, period: ONE_TIME };
}

function normalizeRentalPrice(raw: string, periodLine: number): NormalizedPrice {
  const lines = raw.split('\n');

  // Label on the layout's period line, else on whichever line carries one
  const labelLine = lines[periodLine]?.includes('/') ? lines[periodLine] : lines.find((line) => line.includes('/'));

  if (labelLine !== undefined) {
    // Amount comes from the text before the first "/" of the whole block
    const amount = parseAmount(raw.split('/')[0]);
    if (amount === null) return onRequest('no digits before period label');
    return { amount, period: periodLabel(labelLine.split('/')[1]) ?? ONE_TIME };
  }

  const amountText = periodLine === 0 ? lines[0] : raw;
  const amount = parseAmount(amountText);
  if (amount === null) return onRequest('no digits in price text');
  return { amount, period: ONE_TIME };
}

/**
 * Turn raw price text into an amount and a payment period.
 * Total: any input, including null, yields a valid pair.
 */
export function normalizePrice(raw: string | null | undefined, propertyType: PropertyType): NormalizedPrice {
  const text = (raw ?? '').trim();
  if (!text) return onRequest('price text missing');

  if (propertyType === 'villa-sale') {
    return normalizeSalePrice(text);
  }

  return normalizeRentalPrice(text, PERIOD_LINE[propertyType]);
}

/**
 * Column representation of a payment period
 */
export function formatPeriod(period: PaymentPeriod): string {
  switch (period.type) {
    case 'one-time':
      return 'one time';
    case 'on-request':
      return 'on request';
    case 'periodic':
      return period.label;
  }
}

export function parsePeriod(text: string): PaymentPeriod {
  const value = text.trim();
  const lower = value.toLowerCase();
  if (lower === 'one time' || lower === '') return ONE_TIME;
  if (lower === 'on request') return ON_REQUEST;
  return { type: 'periodic', label: value };
}
