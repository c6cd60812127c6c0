import { BaseExtractionStrategy, type RuleTable } from './base.strategy';
import type { ListingDocument } from './listing-document';
import {
  bathroomsRule,
  bedroomsRule,
  codeRule,
  fixed,
  furnishedRule,
  hasYearBuilt,
  leaseYearsRule,
  locationRule,
  poolRule,
  saleTypeRule,
  sizeRule,
  titleRule,
  YEAR_BUILT_OFFSET,
  yearBuiltRule,
} from './rules';

const SHARED = {
  code: codeRule,
  title: titleRule,
  location: locationRule,
  saleType: saleTypeRule,
  leaseYears: leaseYearsRule,
  bedrooms: bedroomsRule,
  bathrooms: bathroomsRule,
  pool: poolRule,
  landSize: sizeRule('land size', [3]),
};

const WITH_YEAR_BUILT: RuleTable = {
  ...SHARED,
  yearBuilt: yearBuiltRule(YEAR_BUILT_OFFSET),
  buildingSize: sizeRule('building size', [6]),
  furnished: furnishedRule(7),
};

const WITHOUT_YEAR_BUILT: RuleTable = {
  ...SHARED,
  yearBuilt: fixed(null),
  buildingSize: sizeRule('building size', [5]),
  furnished: furnishedRule(6),
};

/**
 * VillaSaleStrategy
 * Villas for sale. Description offsets depend on whether the listing
 * shows a "Year Built" entry.
 */
export class VillaSaleStrategy extends BaseExtractionStrategy {
  readonly name = 'VillaSale';
  readonly propertyType = 'villa-sale' as const;

  canHandle(url: string): boolean {
    return url.includes('villas-for-sale');
  }

  protected rules(doc: ListingDocument): RuleTable {
    return hasYearBuilt(doc) ? WITH_YEAR_BUILT : WITHOUT_YEAR_BUILT;
  }
}
