/**
 * Crawl Session
 * Depth-first, same-host documentation crawl owned by one session object
 */

import * as cheerio from 'cheerio';
import { env } from '../../config/env';
import { FetchError, ScrapingErrorType } from '../scraping/errors';
import { PageFetcher } from './page-fetcher';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { extractHost, isDocumentationUrl, resolveLink } from './url-normalizer';
import type { CrawlOptions, CrawlingConfig, CrawlingStatistics, Page } from './crawling.types';

export function resolveCrawlingConfig(options: Partial<CrawlingConfig> = {}): CrawlingConfig {
  return {
    maxDepth: options.maxDepth ?? env.CRAWL_MAX_DEPTH,
    maxPages: options.maxPages ?? env.CRAWL_MAX_PAGES,
    timeout: options.timeout ?? env.CRAWL_TIMEOUT,
    maxRetries: options.maxRetries ?? env.CRAWL_MAX_RETRIES,
    retryBackoffBase: options.retryBackoffBase ?? env.RETRY_BACKOFF_BASE,
    minPageLength: options.minPageLength ?? env.MIN_PAGE_LENGTH,
    userAgent: options.userAgent ?? env.USER_AGENT,
  };
}

export class CrawlSession {
  readonly seedUrl: string;
  readonly host: string;
  readonly config: CrawlingConfig;

  private readonly visited = new Set<string>();
  private readonly pages: Page[] = [];
  private readonly fetcher: PageFetcher;
  private readonly stats = new CrawlingStatisticsTracker();
  private readonly signal?: AbortSignal;

  constructor(seedUrl: string, options: CrawlOptions = {}) {
    this.seedUrl = resolveLink(seedUrl, seedUrl) ?? seedUrl;
    this.host = extractHost(seedUrl);
    this.config = resolveCrawlingConfig(options);
    this.fetcher = new PageFetcher(this.config, options.fetchFn);
    this.signal = options.signal;
  }

  /**
   * Run the crawl. Never throws: failures are logged per page and
   * whatever was collected is returned.
   */
  async run(): Promise<Page[]> {
    await this.visit(this.seedUrl, 0);
    console.log(`[Done] ${this.seedUrl}: ${this.stats.summary()}`);
    return [...this.pages];
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  getStatistics(): CrawlingStatistics {
    return this.stats.getStatistics();
  }

  private isFull(): boolean {
    return this.pages.length >= this.config.maxPages;
  }

  private async visit(url: string, depth: number): Promise<void> {
    if (depth > this.config.maxDepth || this.visited.has(url) || this.isFull() || this.signal?.aborted) {
      return;
    }

    this.visited.add(url);
    const startedAt = Date.now();

    let page: Page;
    let baseUrl: string;
    try {
      const resource = await this.fetcher.fetchPage(url, this.signal);
      page = { url, html: resource.body, document: cheerio.load(resource.body), depth };
      baseUrl = resource.finalUrl;
    } catch (error) {
      this.handleFailure(url, error);
      return;
    }

    this.pages.push(page);
    this.stats.recordPageVisit(depth, Date.now() - startedAt);
    console.log(`[OK] Crawled (${this.pages.length}): ${url}`);

    for (const link of this.discoverLinks(page, baseUrl)) {
      if (this.isFull() || this.signal?.aborted) break;
      if (this.visited.has(link)) continue;
      await this.visit(link, depth + 1);
    }
  }

  /**
   * Same-host documentation links in order of appearance
   */
  private discoverLinks(page: Page, baseUrl: string): string[] {
    const $ = page.document;
    const links: string[] = [];

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href) return;

      const absoluteUrl = resolveLink(href, baseUrl);
      if (absoluteUrl && isDocumentationUrl(absoluteUrl, this.host)) {
        links.push(absoluteUrl);
      }
    });

    return links;
  }

  private handleFailure(url: string, error: unknown): void {
    if (!(error instanceof FetchError)) {
      this.stats.recordFailed();
      console.error(`[Unexpected Error] ${url}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    switch (error.type) {
      case ScrapingErrorType.NOT_FOUND:
        this.stats.recordSkipped();
        console.warn(`[404 Not Found] ${url}`);
        break;
      case ScrapingErrorType.UNSUPPORTED_CONTENT:
        this.stats.recordSkipped();
        console.log(`[Skipped] ${error.message}: ${url}`);
        break;
      case ScrapingErrorType.TIMEOUT:
        this.stats.recordFailed();
        console.error(`[Timeout] ${url} (took > ${this.config.timeout / 1000}s)`);
        break;
      case ScrapingErrorType.NETWORK_ERROR:
        this.stats.recordFailed();
        console.error(`[Connection Error] ${url} - cannot reach host`);
        break;
      case ScrapingErrorType.ABORTED:
        console.warn(`[Aborted] ${url}`);
        break;
      case ScrapingErrorType.RATE_LIMITED:
      case ScrapingErrorType.SERVER_ERROR:
      case ScrapingErrorType.HTTP_ERROR:
        this.stats.recordFailed();
        console.error(`[HTTP Error] ${url}: ${error.statusCode ?? 'unknown status'}`);
        break;
      default:
        this.stats.recordFailed();
        console.error(`[Request Error] ${url}: ${error.message}`);
    }
  }
}

/**
 * Crawl a documentation site starting at `url`
 */
export async function crawl(url: string, options: CrawlOptions = {}): Promise<Page[]> {
  const session = new CrawlSession(url, options);
  return session.run();
}

/**
 * Crawl independent seeds with bounded concurrency. Each seed gets its
 * own session; results keep seed order.
 */
export async function crawlAll(
  seeds: readonly string[],
  options: CrawlOptions & { concurrency?: number } = {}
): Promise<Page[]> {
  const concurrency = Math.max(1, options.concurrency ?? env.MAX_CONCURRENT_CRAWLS);
  const results: Page[][] = new Array(seeds.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < seeds.length && !options.signal?.aborted) {
      const index = next++;
      console.log(`🔗 Crawling: ${seeds[index]}`);
      results[index] = await crawl(seeds[index], options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, seeds.length) }, () => worker()));

  return results.flatMap((pages) => pages ?? []);
}
