import { describe, expect, it } from 'vitest';
import { formatFurnished, normalizeFurnished, parseFurnished } from '../src/services/normalizers/furnished.normalizer';

describe('normalizeFurnished', () => {
  it.each([
    ['Fully Furnished', 'fully-furnished'],
    ['full furnish', 'fully-furnished'],
    ['Semi Frunished', 'semi-furnished'],
    ['semi', 'semi-furnished'],
    ['Furnished', 'furnished'],
    ['UNFURNISHED', 'unfurnished'],
    ['no furnish', 'unfurnished'],
  ] as const)('maps "%s" to %s', (raw, level) => {
    expect(normalizeFurnished(raw)).toBe(level);
  });

  it('ignores surrounding and repeated whitespace', () => {
    expect(normalizeFurnished('  fully   furnished \n')).toBe('fully-furnished');
  });

  it('returns unknown for anything outside the vocabulary', () => {
    expect(normalizeFurnished('negotiable')).toBe('unknown');
    expect(normalizeFurnished('')).toBe('unknown');
    expect(normalizeFurnished(null)).toBe('unknown');
  });
});

describe('furnished column', () => {
  it('formats levels as title case words', () => {
    expect(formatFurnished('fully-furnished')).toBe('Fully Furnished');
    expect(formatFurnished('unknown')).toBe('Unknown');
  });

  it('parses formatted levels back', () => {
    expect(parseFurnished('Semi Furnished')).toBe('semi-furnished');
    expect(parseFurnished('Unknown')).toBe('unknown');
    expect(parseFurnished('full')).toBe('fully-furnished');
  });
});
