import { describe, expect, it, vi } from 'vitest';
import { CrawlSession } from '../src/services/crawl-session';
import { ListingExtractorService } from '../src/services/listing-extractor.service';
import { PageWalkerService } from '../src/services/page-walker.service';
import type { FetchOptions } from '../src/types';
import { FetchError, ListingPageError } from '../src/utils/errors';
import { currencyOf, FakeBrowserSession, type PageHandler } from './fakes';
import { fixture } from './helpers';

const BASE = 'https://www.example-listings.com/search/villas-for-sale';
const LINK = 'https://www.example-listings.com/villa/vs-100';

function detailPage(html: string): PageHandler {
  return (_url: string, options: FetchOptions) =>
    currencyOf(options) === 'USD' ? html.replace('IDR 2.500.000.000', 'USD 165,000') : html;
}

function setup(handler: PageHandler, options: { maxAttempts?: number; maxPages?: number } = {}) {
  const sleep = vi.fn(async (_ms: number) => undefined);
  const browser = new FakeBrowserSession('session-1', handler);
  const session = new CrawlSession(browser, 'IDR');
  const walker = new PageWalkerService(new ListingExtractorService(), {
    maxAttempts: options.maxAttempts ?? 5,
    retryDelayMs: 10000,
    maxPages: options.maxPages,
    sleep,
  });
  return { sleep, browser, session, walker };
}

describe('PageWalkerService.processLink', () => {
  it('records a listing from its two currency views', async () => {
    const { walker, session, browser } = setup(detailPage(fixture('villa-sale.html')));

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome.state).toBe('recorded');
    if (outcome.state !== 'recorded') return;
    expect(outcome.attempts).toBe(1);
    expect(outcome.record.url).toBe(LINK);
    expect(outcome.record.priceUsd.amount).toBe(165000);
    expect(outcome.record.priceLocal.amount).toBe(2500000000);
    expect(browser.calls.map((call) => currencyOf(call.options))).toEqual(['USD', 'IDR']);
  });

  it('retries failed fetches with a fixed delay', async () => {
    const page = detailPage(fixture('villa-sale.html'));
    let fetches = 0;
    const { walker, session, sleep } = setup((url, options) => {
      fetches++;
      if (fetches <= 2) throw new FetchError('net::ERR_CONNECTION_RESET', url);
      return page(url, options);
    });

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome).toMatchObject({ state: 'recorded', attempts: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10000);
  });

  it('gives up on a link after the attempt budget', async () => {
    const { walker, session, sleep } = setup(
      (url) => {
        throw new FetchError('Timeout 30000ms exceeded', url);
      },
      { maxAttempts: 3 }
    );

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome).toEqual({ state: 'failed', link: LINK, attempts: 3, reason: 'Timeout 30000ms exceeded' });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('retries a page rendered without a listing code', async () => {
    const html = fixture('villa-sale.html').replace('<span class="code">VS-100</span>', '');
    const { walker, session, browser } = setup(detailPage(html), { maxAttempts: 2 });

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome).toEqual({
      state: 'failed',
      link: LINK,
      attempts: 2,
      reason: `No listing code found on ${LINK}`,
    });
    expect(browser.calls).toHaveLength(4);
  });

  it('treats a redirect as a withdrawn listing', async () => {
    const { walker, session, browser } = setup((url) => ({
      requestedUrl: url,
      finalUrl: 'https://www.example-listings.com/',
      html: '<html></html>',
    }));

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome).toEqual({ state: 'redirected', link: LINK, finalUrl: 'https://www.example-listings.com/' });
    expect(browser.calls).toHaveLength(1);
  });

  it('ignores a trailing slash or scheme change in the final url', async () => {
    const html = fixture('villa-sale.html');
    const { walker, session } = setup((url) => ({
      requestedUrl: url,
      finalUrl: `${url.replace('https:', 'http:')}/`,
      html,
    }));

    const outcome = await walker.processLink(session, LINK, 'villa-sale');

    expect(outcome.state).toBe('recorded');
  });

  it('shifts the USD option position after the first USD pick of the session', async () => {
    const { walker, session, browser } = setup(detailPage(fixture('villa-sale.html')));

    await walker.processLink(session, LINK, 'villa-sale');
    await walker.processLink(session, LINK, 'villa-sale');

    expect(browser.calls.map((call) => call.options.interaction?.[1])).toEqual([
      { selector: 'text=USD', action: 'click', nth: 2 },
      { selector: 'text=IDR', action: 'click', nth: 0 },
      { selector: 'text=USD', action: 'click', nth: 1 },
      { selector: 'text=IDR', action: 'click', nth: 0 },
    ]);
    expect(browser.calls[0].options.interaction?.[0]).toEqual({ selector: '.header-cur', action: 'click' });
  });
});

describe('PageWalkerService page discovery', () => {
  it('reads the page count from the pagination block', async () => {
    const { walker, session, browser } = setup(() => fixture('pagination.html'));

    await expect(walker.discoverPageCount(session, BASE)).resolves.toBe(3);
    expect(browser.calls[0]).toEqual({ url: BASE, options: { scope: '#pagination' } });
  });

  it('caps the page count', async () => {
    const { walker, session } = setup(() => fixture('pagination.html'), { maxPages: 2 });

    await expect(walker.discoverPageCount(session, BASE)).resolves.toBe(2);
  });

  it('assumes a single page when pagination is absent', async () => {
    const { walker, session } = setup(() => '<div id="pagination"></div>');

    await expect(walker.discoverPageCount(session, BASE)).resolves.toBe(1);
  });

  it('fails the target when the results page cannot be read', async () => {
    const { walker, session } = setup(
      (url) => {
        throw new FetchError('net::ERR_NAME_NOT_RESOLVED', url);
      },
      { maxAttempts: 2 }
    );

    await expect(walker.discoverPageCount(session, BASE)).rejects.toBeInstanceOf(ListingPageError);
    await expect(walker.discoverLinks(session, BASE, 1)).rejects.toThrow(`Could not read results page ${BASE}?page=1`);
  });

  it('reads the links of a results page', async () => {
    const { walker, session, browser } = setup(() => fixture('results-page.html'));

    const links = await walker.discoverLinks(session, BASE, 2);

    expect(links).toEqual([
      'https://www.example-listings.com/villa/vs-100',
      'https://www.example-listings.com/villa/vs-200',
    ]);
    expect(browser.calls[0]).toEqual({ url: `${BASE}?page=2`, options: { scope: '#box' } });
  });
});

describe('PageWalkerService.crawlTarget', () => {
  it('walks every page and tallies link outcomes', async () => {
    const pagination =
      '<li class="page-item">1</li><li class="page-item">2</li><li class="page-item">›</li>';
    const resultPages: Record<string, string> = {
      [`${BASE}?page=1`]:
        '<div class="box property-item"><a href="/villa/vs-100">A</a></div>' +
        '<div class="box property-item"><a href="/villa/vs-200">B</a></div>',
      [`${BASE}?page=2`]:
        '<div class="box property-item"><a href="/villa/vs-200">B</a></div>' +
        '<div class="box property-item"><a href="/villa/vs-300">C</a></div>',
    };
    const details: Record<string, string> = {
      'https://www.example-listings.com/villa/vs-100': fixture('villa-sale.html'),
      'https://www.example-listings.com/villa/vs-200': fixture('villa-sale-no-year.html'),
    };

    const { walker, session } = setup((url, options) => {
      if (options.scope === '#pagination') return pagination;
      if (options.scope === '#box') return resultPages[url] ?? '';
      const html = details[url];
      if (html === undefined) {
        return { requestedUrl: url, finalUrl: 'https://www.example-listings.com/', html: '' };
      }
      return html;
    });

    const result = await walker.crawlTarget(session, { propertyType: 'villa-sale', url: BASE });

    expect(result.pages).toBe(2);
    expect(result.records.map((record) => record.code)).toEqual(['VS-100', 'VS-200']);
    expect(result).toMatchObject({ recorded: 2, redirected: 1, failed: 0 });
  });
});
