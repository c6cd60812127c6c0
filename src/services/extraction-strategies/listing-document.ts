import { load } from 'cheerio';

/**
 * Text tokens of one rendered detail view, read once with Cheerio so that
 * extraction rules stay pure functions of this structure.
 */
export interface ListingDocument {
  title: string | null;
  code: string | null;
  priceText: string | null;
  // Trimmed text of each `.colswidth20` summary block
  summaryBlocks: string[];
  // Child nodes (text nodes included) of every `.available` block
  availableTokens: string[];
  // Every `p` of the `.property-description-row.flexbox` rows, in order
  descriptionItems: string[];
  // Text of facility entries marked `.available` (on the entry or its icon)
  facilities: string[];
}

export function parseListingDocument(html: string): ListingDocument {
  const $ = load(html);

  const firstText = (selector: string): string | null => {
    const node = $(selector).first();
    return node.length > 0 ? node.text().trim() : null;
  };

  const summaryBlocks = $('.colswidth20')
    .toArray()
    .map((el) => $(el).text().trim());

  const availableTokens: string[] = [];
  $('.available').each((_, block) => {
    $(block)
      .contents()
      .each((_, node) => {
        availableTokens.push($(node).text().trim());
      });
  });

  const descriptionItems = $('.property-description-row.flexbox p')
    .toArray()
    .map((el) => $(el).text().trim());

  const facilities = $('.flexbox-wrap p')
    .toArray()
    .filter((el) => $(el).is('.available') || $(el).find('.available').length > 0)
    .map((el) => $(el).text().trim());

  return {
    title: firstText('.name'),
    code: firstText('.code'),
    priceText: firstText('.regular-price'),
    summaryBlocks,
    availableTokens,
    descriptionItems,
    facilities,
  };
}

/**
 * Non-empty trimmed lines of a text block
 */
export function lines(text: string | undefined): string[] {
  if (!text) return [];
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
