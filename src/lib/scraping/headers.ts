/**
 * Request Headers
 * Make crawler requests look like ordinary browser navigation
 */

import { env } from '../../config/env';

export interface BrowserFingerprint {
  userAgent: string;
  acceptLanguage: string;
  accept: string;
  secFetchDest?: string;
  secFetchMode?: string;
}

const DEFAULT_FINGERPRINT: Omit<BrowserFingerprint, 'userAgent'> = {
  acceptLanguage: 'en-US,en;q=0.9',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  secFetchDest: 'document',
  secFetchMode: 'navigate',
};

/**
 * Build headers from a fingerprint
 */
export function buildHeaders(
  fingerprint: BrowserFingerprint = { ...DEFAULT_FINGERPRINT, userAgent: env.USER_AGENT }
): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': fingerprint.userAgent,
    Accept: fingerprint.accept,
    'Accept-Language': fingerprint.acceptLanguage,
  };

  if (fingerprint.secFetchDest) headers['Sec-Fetch-Dest'] = fingerprint.secFetchDest;
  if (fingerprint.secFetchMode) headers['Sec-Fetch-Mode'] = fingerprint.secFetchMode;

  return headers;
}

/**
 * Browser-like headers with a custom user agent
 */
export function headersForUserAgent(userAgent: string): Record<string, string> {
  return buildHeaders({ ...DEFAULT_FINGERPRINT, userAgent });
}
