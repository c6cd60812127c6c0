export * from './listing.types';
export * from './crawl.types';
