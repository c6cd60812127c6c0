import type { FieldDiagnostic, ListingRecord, PropertyType } from '../../types';
import { normalizePrice } from '../normalizers/price.normalizer';
import type { ListingDocument } from './listing-document';
import type { FieldRule } from './rules';

/**
 * Fields read from the page by rules. URL, property type, prices and
 * listed state are filled in by the strategy itself.
 */
export type ExtractedFields = Omit<ListingRecord, 'url' | 'propertyType' | 'priceLocal' | 'priceUsd' | 'listedState'>;

export type RuleTable = { [K in keyof ExtractedFields]: FieldRule<ExtractedFields[K]> };

export interface StrategyInput {
  usd: ListingDocument;
  local: ListingDocument;
}

export interface StrategyOutput {
  record: ListingRecord;
  diagnostics: FieldDiagnostic[];
}

export interface ExtractionStrategy {
  readonly name: string;
  readonly propertyType: PropertyType;
  canHandle(url: string): boolean;
  extract(input: StrategyInput, url: string): StrategyOutput;
}

/**
 * BaseExtractionStrategy
 * Applies a property type's rule table to the local-currency view and
 * normalizes the price of each view. A failing rule degrades only its own
 * field and is reported in the diagnostics.
 */
export abstract class BaseExtractionStrategy implements ExtractionStrategy {
  abstract readonly name: string;
  abstract readonly propertyType: PropertyType;

  abstract canHandle(url: string): boolean;

  /**
   * Select the rule table for this document's markup variant
   */
  protected abstract rules(doc: ListingDocument): RuleTable;

  extract(input: StrategyInput, url: string): StrategyOutput {
    const diagnostics: FieldDiagnostic[] = [];
    const fields = this.applyRules(this.rules(input.local), input.local, diagnostics);

    const priceUsd = normalizePrice(input.usd.priceText, this.propertyType);
    if (priceUsd.degraded) {
      diagnostics.push({ field: 'priceUsd', reason: priceUsd.degraded, raw: input.usd.priceText ?? undefined });
    }

    const priceLocal = normalizePrice(input.local.priceText, this.propertyType);
    if (priceLocal.degraded) {
      diagnostics.push({ field: 'priceLocal', reason: priceLocal.degraded, raw: input.local.priceText ?? undefined });
    }

    return {
      record: {
        ...fields,
        url,
        propertyType: this.propertyType,
        priceUsd: { amount: priceUsd.amount, period: priceUsd.period },
        priceLocal: { amount: priceLocal.amount, period: priceLocal.period },
        listedState: 'listed',
      },
      diagnostics,
    };
  }

  private applyRules(table: RuleTable, doc: ListingDocument, diagnostics: FieldDiagnostic[]): ExtractedFields {
    const read = <K extends keyof ExtractedFields>(field: K): ExtractedFields[K] => {
      const rule: FieldRule<ExtractedFields[K]> = table[field];
      const outcome = rule.read(doc);
      if (outcome.ok) return outcome.value;

      diagnostics.push({ field, reason: outcome.reason, raw: outcome.raw });
      return rule.fallback;
    };

    return {
      code: read('code'),
      title: read('title'),
      location: read('location'),
      saleType: read('saleType'),
      leaseYears: read('leaseYears'),
      yearBuilt: read('yearBuilt'),
      bedrooms: read('bedrooms'),
      bathrooms: read('bathrooms'),
      landSize: read('landSize'),
      buildingSize: read('buildingSize'),
      pool: read('pool'),
      furnished: read('furnished'),
    };
  }
}
