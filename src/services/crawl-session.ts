import type { BrowserSession, InteractionScript, RenderedPage } from '../types';

export type CurrencyView = 'usd' | 'local';

export const CURRENCY_SELECTOR = '.header-cur';

// Position of the USD option among "USD" text matches. The header shows an
// extra match until a currency has been picked once in the session.
const USD_FIRST_POSITION = 2;
const USD_POSITION = 1;
const LOCAL_POSITION = 0;

/**
 * CrawlSession
 * A browser session plus the currency UI state that belongs to it.
 * Owned by a single worker.
 */
export class CrawlSession {
  private usdSelected = false;

  constructor(
    readonly browser: BrowserSession,
    private readonly localCurrency: string
  ) {}

  get id(): string {
    return this.browser.id;
  }

  currencyScript(view: CurrencyView): InteractionScript {
    const option =
      view === 'local'
        ? { selector: `text=${this.localCurrency}`, nth: LOCAL_POSITION }
        : { selector: 'text=USD', nth: this.usdSelected ? USD_POSITION : USD_FIRST_POSITION };

    return [
      { selector: CURRENCY_SELECTOR, action: 'click' },
      { selector: option.selector, action: 'click', nth: option.nth },
    ];
  }

  /**
   * Fetch a detail page rendered in the given currency
   */
  async fetchInCurrency(url: string, view: CurrencyView): Promise<RenderedPage> {
    const page = await this.browser.fetchRendered(url, { interaction: this.currencyScript(view) });
    if (view === 'usd') this.usdSelected = true;
    return page;
  }

  fetchScoped(url: string, scope: string): Promise<RenderedPage> {
    return this.browser.fetchRendered(url, { scope });
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}
