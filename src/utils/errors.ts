/**
 * Transient navigation or network failure while fetching a page.
 * Retried per link by the page walker.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/**
 * The rendered detail view carried no listing code, which means the page
 * did not finish rendering. Retried like a fetch failure.
 */
export class IncompleteRecordError extends Error {
  constructor(readonly url: string) {
    super(`No listing code found on ${url}`);
    this.name = 'IncompleteRecordError';
  }
}

/**
 * A results page that could not be read even after retries. Fails the run:
 * carrying on would mark every listing of that page as unlisted.
 */
export class ListingPageError extends Error {
  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not read results page ${url}`, options);
    this.name = 'ListingPageError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DatasetStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetStoreError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
