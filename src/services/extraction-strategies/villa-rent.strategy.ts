import { BaseExtractionStrategy, type RuleTable } from './base.strategy';
import {
  bathroomsRule,
  bedroomsRule,
  codeRule,
  fixed,
  locationRule,
  poolRule,
  sizeRule,
  titleRule,
} from './rules';

// Rentals carry no sale terms, build year or furnishing entry.
// Building size sits one item later on some listings.
const RULES: RuleTable = {
  code: codeRule,
  title: titleRule,
  location: locationRule,
  saleType: fixed('unknown'),
  leaseYears: fixed(null),
  yearBuilt: fixed(null),
  bedrooms: bedroomsRule,
  bathrooms: bathroomsRule,
  landSize: sizeRule('land size', [3]),
  buildingSize: sizeRule('building size', [4, 5]),
  pool: poolRule,
  furnished: fixed('unknown'),
};

export class VillaRentStrategy extends BaseExtractionStrategy {
  readonly name = 'VillaRent';
  readonly propertyType = 'villa-rent' as const;

  canHandle(url: string): boolean {
    return url.includes('villas-for-rent');
  }

  protected rules(): RuleTable {
    return RULES;
  }
}
