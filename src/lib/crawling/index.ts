/**
 * Crawling System
 * Main export file for documentation crawling
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './page-fetcher';
export * from './crawling-statistics';
export * from './crawl-session';
