/**
 * Crawling Types
 * Type definitions for the documentation crawler
 */

import type { CheerioAPI } from 'cheerio';

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Maximum pages to collect per seed
   */
  maxPages: number;

  /**
   * Maximum crawl depth (0 = seed page only)
   */
  maxDepth: number;

  /**
   * Request timeout in milliseconds
   */
  timeout: number;

  /**
   * Retries for transient HTTP statuses
   */
  maxRetries: number;

  /**
   * Base backoff delay in milliseconds
   */
  retryBackoffBase: number;

  /**
   * Bodies shorter than this are treated as stub pages
   */
  minPageLength: number;

  userAgent: string;
}

/**
 * A successfully fetched and parsed documentation page
 */
export interface Page {
  readonly url: string;
  readonly html: string;
  readonly document: CheerioAPI;
  readonly depth: number;
}

/**
 * Raw result of fetching one URL
 */
export interface FetchedResource {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  body: string;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesVisited: number;
  pagesSkipped: number;
  pagesFailed: number;
  depthReached: number;
  totalTime: number;
  averagePageTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}

export interface CrawlOptions extends Partial<CrawlingConfig> {
  /**
   * Stops the traversal; pages collected so far are kept
   */
  signal?: AbortSignal;
  fetchFn?: FetchFn;
}
