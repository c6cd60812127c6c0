import { load } from 'cheerio';

/**
 * Page count from the pagination block: the second-to-last item, the
 * last one being the "next" arrow. Null when it cannot be read.
 */
export function parsePageCount(html: string): number | null {
  const $ = load(html);
  const items = $('li.page-item')
    .toArray()
    .map((el) => $(el).text().trim());

  if (items.length < 2) return null;

  const count = parseInt(items[items.length - 2], 10);
  return Number.isInteger(count) && count > 0 ? count : null;
}

/**
 * Detail links of one search results page, absolute and in page order
 */
export function parseListingLinks(html: string, baseUrl: string): string[] {
  const $ = load(html);
  const links: string[] = [];

  $('.box.property-item').each((_, item) => {
    const href = $(item).find('a').first().attr('href');
    if (!href || !URL.canParse(href, baseUrl)) return;

    const absolute = new URL(href, baseUrl).href;
    if (!links.includes(absolute)) links.push(absolute);
  });

  return links;
}

/**
 * URL of the n-th (1-based) results page
 */
export function pageUrl(baseUrl: string, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set('page', String(page));
  return url.href;
}
