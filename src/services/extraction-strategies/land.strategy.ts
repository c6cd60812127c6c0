import { BaseExtractionStrategy, type RuleTable } from './base.strategy';
import { codeRule, fixed, leaseYearsRule, locationRule, saleTypeRule, sizeRule, titleRule } from './rules';

// A "land" path segment, optionally followed by a suffix such as "-for-sale"
const LAND_PATH = /\/land(?:-[^/?#]*)?(?:[/?#]|$)/;

const RULES: RuleTable = {
  code: codeRule,
  title: titleRule,
  location: locationRule,
  saleType: saleTypeRule,
  leaseYears: leaseYearsRule,
  yearBuilt: fixed(null),
  bedrooms: fixed(null),
  bathrooms: fixed(null),
  landSize: sizeRule('land size', [3]),
  buildingSize: fixed(null),
  pool: fixed(false),
  furnished: fixed('unfurnished'),
};

/**
 * LandStrategy
 * Land parcels: sale terms and land size only.
 */
export class LandStrategy extends BaseExtractionStrategy {
  readonly name = 'Land';
  readonly propertyType = 'land' as const;

  canHandle(url: string): boolean {
    return LAND_PATH.test(url);
  }

  protected rules(): RuleTable {
    return RULES;
  }
}
