/**
 * Scraping Error Handling
 * Error types for the crawl pipeline and retry guidance for fetches
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  ABORTED = 'ABORTED',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  UNSUPPORTED_CONTENT = 'UNSUPPORTED_CONTENT',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

/**
 * HTTP statuses worth retrying with backoff
 */
export const TRANSIENT_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

export function isTransientStatus(statusCode: number): boolean {
  return TRANSIENT_STATUS_CODES.includes(statusCode);
}

/**
 * A single fetch that did not produce a usable response
 */
export class FetchError extends Error {
  readonly type: ScrapingErrorType;
  readonly url: string;
  readonly statusCode?: number;

  constructor(type: ScrapingErrorType, url: string, message: string, statusCode?: number) {
    super(message);
    this.name = 'FetchError';
    this.type = type;
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Input rejected before any work was attempted
 */
export class ValidationError extends Error {
  readonly reasons: string[];

  constructor(message: string, reasons: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.reasons = reasons;
  }
}

/**
 * Nothing usable was crawled or read, so there is nothing to infer from
 */
export class NoContentError extends Error {
  constructor(message: string = 'No meaningful content extracted: nothing to infer from') {
    super(message);
    this.name = 'NoContentError';
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Classify an error and provide retry guidance
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingError {
  if (error instanceof FetchError) {
    return {
      type: error.type,
      message: error.message,
      statusCode: error.statusCode,
      retryable: error.statusCode !== undefined && isTransientStatus(error.statusCode),
    };
  }

  const message = errorMessage(error);
  const name = error instanceof Error ? error.name : '';

  // fetch() rejects with TimeoutError/AbortError depending on which signal fired
  if (name === 'TimeoutError' || /timeout|ETIMEDOUT|ESOCKETTIMEDOUT/i.test(message)) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Request timed out',
      statusCode,
      retryable: true,
    };
  }

  if (name === 'AbortError') {
    return {
      type: ScrapingErrorType.ABORTED,
      message: 'Request aborted',
      statusCode,
      retryable: false,
    };
  }

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|fetch failed|network/i.test(message)) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      statusCode,
      retryable: true,
    };
  }

  if (statusCode !== undefined) {
    if (statusCode === 404) {
      return {
        type: ScrapingErrorType.NOT_FOUND,
        message: 'Page not found',
        statusCode,
        retryable: false,
      };
    }

    if (statusCode === 429) {
      return {
        type: ScrapingErrorType.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode,
        retryable: true,
      };
    }

    if (statusCode >= 500) {
      return {
        type: ScrapingErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode,
        retryable: isTransientStatus(statusCode),
      };
    }

    return {
      type: ScrapingErrorType.HTTP_ERROR,
      message: `HTTP ${statusCode}`,
      statusCode,
      retryable: false,
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
    statusCode,
    retryable: false,
  };
}

/**
 * Calculate retry delay with exponential backoff
 */
export function calculateRetryDelay(
  attemptCount: number,
  baseDelay: number,
  retryAfterSeconds?: number
): number {
  // Server-suggested delay wins, but never stall longer than 10s
  if (retryAfterSeconds !== undefined && retryAfterSeconds >= 0) {
    return Math.min(retryAfterSeconds * 1000, 10000);
  }

  return baseDelay * Math.pow(2, attemptCount);
}

/**
 * Parse a Retry-After header given in seconds
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) ? seconds : undefined;
}
