import type { FurnishedLevel } from '../../types';

const KNOWN_LEVELS = ['unfurnished', 'semi-furnished', 'furnished', 'fully-furnished'] as const;

// Vocabulary seen across listings, including the site's own misspellings
const FURNISHED_VOCABULARY: Record<(typeof KNOWN_LEVELS)[number], string[]> = {
  unfurnished: ['unfurnished', 'un-furnished', 'un-furnish', 'unfurnish', 'no furnish', 'no furnished', 'no', 'none'],
  'semi-furnished': ['semi', 'semi-furnished', 'semi furnished', 'semi furnish', 'semi frunished', 'semi-furnish', 'partly furnished'],
  furnished: ['furnished', 'furnish', 'yes'],
  'fully-furnished': ['fully furnished', 'full furnished', 'full furnish', 'fully', 'full', 'fully-furnished'],
};

const LOOKUP = new Map<string, FurnishedLevel>(
  KNOWN_LEVELS.flatMap((level) => FURNISHED_VOCABULARY[level].map((word) => [word, level] as const))
);

/**
 * Map raw furnishing text onto one of the four canonical levels.
 * Matching is case-insensitive; anything else is "unknown".
 */
export function normalizeFurnished(raw: string | null | undefined): FurnishedLevel {
  if (!raw) return 'unknown';
  const key = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  return LOOKUP.get(key) ?? 'unknown';
}

export function formatFurnished(level: FurnishedLevel): string {
  return level
    .split('-')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function parseFurnished(text: string): FurnishedLevel {
  const key = text.trim().toLowerCase().replace(/\s+/g, '-');
  return KNOWN_LEVELS.find((level) => level === key) ?? normalizeFurnished(text);
}
