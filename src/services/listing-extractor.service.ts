import type { ListingExtractionResult, ListingViews, PropertyType } from '../types';
import { createLogger } from '../utils/logger';
import type { ExtractionStrategy } from './extraction-strategies/base.strategy';
import { LandStrategy } from './extraction-strategies/land.strategy';
import { parseListingDocument } from './extraction-strategies/listing-document';
import { VillaRentStrategy } from './extraction-strategies/villa-rent.strategy';
import { VillaSaleStrategy } from './extraction-strategies/villa-sale.strategy';

const logger = createLogger('extractor');

/**
 * ListingExtractorService
 * Stateless service that turns the USD and local-currency views of one
 * detail page into a listing record, using the strategy for its property type
 */
export class ListingExtractorService {
  private strategies: ExtractionStrategy[] = [];

  constructor() {
    // Registration order decides which strategy claims a URL first
    this.registerStrategy(new VillaSaleStrategy());
    this.registerStrategy(new VillaRentStrategy());
    this.registerStrategy(new LandStrategy());
  }

  registerStrategy(strategy: ExtractionStrategy): void {
    this.strategies.push(strategy);
  }

  /**
   * Extract one listing. The property type, when given, wins over URL detection.
   */
  extractListing(views: ListingViews, url: string, propertyType?: PropertyType): ListingExtractionResult | null {
    const strategy = this.findStrategy(url, propertyType);

    if (!strategy) {
      logger.warn(`No strategy found for ${url}`);
      return null;
    }

    const { record, diagnostics } = strategy.extract(
      {
        usd: parseListingDocument(views.usd),
        local: parseListingDocument(views.local),
      },
      url
    );

    for (const diagnostic of diagnostics) {
      logger.warn(
        `⚠️  ${record.code || url} field "${diagnostic.field}" degraded: ${diagnostic.reason}` +
          (diagnostic.raw !== undefined ? ` (raw: ${JSON.stringify(diagnostic.raw)})` : '')
      );
    }

    return {
      record,
      diagnostics,
      metadata: {
        source: url,
        extractedAt: new Date(),
        strategyUsed: strategy.name,
      },
    };
  }

  private findStrategy(url: string, propertyType?: PropertyType): ExtractionStrategy | null {
    if (propertyType) {
      return this.strategies.find((s) => s.propertyType === propertyType) ?? null;
    }
    return this.strategies.find((s) => s.canHandle(url)) ?? null;
  }

  /**
   * Property type implied by a listing URL
   */
  detectPropertyType(url: string): PropertyType | null {
    return this.findStrategy(url)?.propertyType ?? null;
  }

  getRegisteredStrategies(): string[] {
    return this.strategies.map((s) => s.name);
  }
}

