import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';

const TARGET_URLS = {
  URL_VILLAS: 'https://www.example-listings.com/search/villas-for-sale',
  URL_VILLAS_RENTS: 'https://www.example-listings.com/search/villas-for-rent',
  URL_LANDS: 'https://www.example-listings.com/search/land',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ ...TARGET_URLS });

    expect(config.targets).toEqual([
      { propertyType: 'villa-sale', url: TARGET_URLS.URL_VILLAS },
      { propertyType: 'villa-rent', url: TARGET_URLS.URL_VILLAS_RENTS },
      { propertyType: 'land', url: TARGET_URLS.URL_LANDS },
    ]);
    expect(config.crawl).toEqual({
      linkMaxAttempts: 20,
      linkRetryDelayMs: 10000,
      fetchTimeoutMs: 30000,
      workers: 1,
      maxPages: undefined,
    });
    expect(config.run).toEqual({ maxAttempts: 10, retryDelayMs: 20000, schedule: undefined, runOnStart: true });
    expect(config.currency.local).toBe('IDR');
    expect(config.browser.headless).toBe(true);
  });

  it('reads overrides and treats empty values as unset', () => {
    const config = loadConfig({
      ...TARGET_URLS,
      CRAWL_WORKERS: '3',
      HEADLESS: 'false',
      MAX_PAGES: '',
      LOG_LEVEL: 'debug',
      CRAWL_SCHEDULE: '0 3 * * *',
    });

    expect(config.crawl.workers).toBe(3);
    expect(config.crawl.maxPages).toBeUndefined();
    expect(config.browser.headless).toBe(false);
    expect(config.logging.level).toBe('debug');
    expect(config.run.schedule).toBe('0 3 * * *');
  });

  it('rejects a missing target url', () => {
    const { URL_LANDS: _omitted, ...rest } = TARGET_URLS;

    expect(() => loadConfig(rest)).toThrow(ConfigurationError);
    expect(() => loadConfig(rest)).toThrow(/URL_LANDS/);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ ...TARGET_URLS, LINK_MAX_ATTEMPTS: '0' })).toThrow(/LINK_MAX_ATTEMPTS/);
  });
});
