/**
 * Page Fetcher
 * Single-URL fetch with timeout, redirects and backoff on transient failures
 */

import { headersForUserAgent } from '../scraping/headers';
import {
  FetchError,
  ScrapingErrorType,
  calculateRetryDelay,
  classifyError,
  isTransientStatus,
  parseRetryAfter,
} from '../scraping/errors';
import type { CrawlingConfig, FetchFn, FetchedResource } from './crawling.types';

const DOCUMENT_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export type FetcherConfig = Pick<
  CrawlingConfig,
  'timeout' | 'maxRetries' | 'retryBackoffBase' | 'minPageLength' | 'userAgent'
>;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function isRetryableFailure(error: unknown): error is FetchError {
  return (
    error instanceof FetchError &&
    (error.type === ScrapingErrorType.NETWORK_ERROR || error.type === ScrapingErrorType.TIMEOUT)
  );
}

export class PageFetcher {
  private readonly config: FetcherConfig;
  private readonly fetchFn: FetchFn;

  constructor(config: FetcherConfig, fetchFn: FetchFn = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  /**
   * Fetch one URL. Throws FetchError for anything that is not an
   * acceptable documentation page.
   */
  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchedResource> {
    const response = await this.fetchWithRetry(url, signal);

    if (response.status === 404) {
      throw new FetchError(ScrapingErrorType.NOT_FOUND, url, 'Page not found', 404);
    }

    if (!response.ok) {
      const classified = classifyError(null, response.status);
      throw new FetchError(classified.type, url, `HTTP ${response.status}`, response.status);
    }

    const contentType = (response.headers.get('content-type') || '').toLowerCase();
    if (!DOCUMENT_CONTENT_TYPES.some((type) => contentType.includes(type))) {
      throw new FetchError(
        ScrapingErrorType.UNSUPPORTED_CONTENT,
        url,
        `Non-HTML content (${contentType || 'unknown'})`,
        response.status
      );
    }

    const body = await response.text();
    if (body.length < this.config.minPageLength) {
      throw new FetchError(
        ScrapingErrorType.UNSUPPORTED_CONTENT,
        url,
        `Page too small (${body.length} chars)`,
        response.status
      );
    }

    return {
      url,
      finalUrl: response.url || url,
      statusCode: response.status,
      contentType,
      body,
    };
  }

  /**
   * GET with redirects, retrying timeouts, connection failures and 429/5xx
   * with exponential backoff. The last response is returned once retries
   * run out; the last error is thrown.
   */
  private async fetchWithRetry(url: string, signal?: AbortSignal): Promise<Response> {
    const { maxRetries, retryBackoffBase } = this.config;

    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchOnce(url, signal);
      } catch (error) {
        if (!isRetryableFailure(error) || attempt >= maxRetries || signal?.aborted) {
          throw error;
        }
        const delay = calculateRetryDelay(attempt, retryBackoffBase);
        console.log(`[Retry] ${url} failed (${error.message}), attempt ${attempt + 1}/${maxRetries} after ${delay}ms`);
        await sleep(delay, signal);
        continue;
      }

      if (!isTransientStatus(response.status) || attempt >= maxRetries || signal?.aborted) {
        return response;
      }

      const delay = calculateRetryDelay(
        attempt,
        retryBackoffBase,
        parseRetryAfter(response.headers.get('retry-after'))
      );
      console.log(`[Retry] ${url} returned ${response.status}, attempt ${attempt + 1}/${maxRetries} after ${delay}ms`);
      await response.body?.cancel();
      await sleep(delay, signal);
    }
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.fetchFn(url, {
        method: 'GET',
        headers: headersForUserAgent(this.config.userAgent),
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new FetchError(
          ScrapingErrorType.TIMEOUT,
          url,
          `Request timed out after ${this.config.timeout}ms`
        );
      }
      if (signal?.aborted) {
        throw new FetchError(ScrapingErrorType.ABORTED, url, 'Request aborted');
      }
      const classified = classifyError(error);
      throw new FetchError(classified.type, url, classified.message);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
