/**
 * URL Normalization Utilities
 * Validation of user input and filtering of discovered links
 */

import { ValidationError } from '../scraping/errors';

const SUPPORTED_PROTOCOLS = ['http:', 'https:', 'ftp:'];
const DOMAIN_PATTERN = /^[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

// Binary, media and data files are never documentation pages
const BLOCKED_EXTENSIONS = [
  '.pdf', '.zip', '.tar', '.gz', '.exe', '.msi',
  '.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg',
  '.mp4', '.webm', '.mp3', '.wav', '.flac',
  '.json', '.xml', '.csv',
];

const BLOCKED_PATH_PATTERNS = ['logout', 'login', 'register', 'account', 'cart', 'checkout', 'download'];

/**
 * Validate and normalize one or more raw URL strings.
 * Adds https:// when the scheme is missing, returns the canonical href
 * without its fragment, drops duplicates and throws when nothing valid is left.
 */
export function validateUrls(input: string | readonly string[]): string[] {
  const urls = typeof input === 'string' ? [input] : input;
  const valid: string[] = [];
  const seen = new Set<string>();
  const errors: string[] = [];

  for (const raw of urls) {
    const trimmed = raw.trim();
    if (!trimmed) continue;

    let candidate = trimmed;
    if (!/^(https?|ftp):\/\//i.test(candidate)) {
      if (!candidate.includes('.')) {
        errors.push(`Invalid: '${candidate}' - no domain specified`);
        continue;
      }
      candidate = `https://${candidate}`;
    }

    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch (error) {
      errors.push(`Invalid: '${candidate}' - ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    if (!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {
      errors.push(`Invalid: '${candidate}' - unsupported protocol '${parsed.protocol.replace(':', '')}'`);
      continue;
    }

    if (!parsed.host) {
      errors.push(`Invalid: '${candidate}' - no domain found`);
      continue;
    }

    if (!DOMAIN_PATTERN.test(parsed.hostname)) {
      errors.push(`Invalid: '${candidate}' - malformed domain '${parsed.hostname}'`);
      continue;
    }

    parsed.hash = '';
    const canonical = parsed.href;
    if (seen.has(canonical)) continue;

    seen.add(canonical);
    valid.push(canonical);
  }

  for (const error of errors) {
    console.warn(`⚠️  ${error}`);
  }

  if (valid.length === 0) {
    const detail = errors.length > 0 ? errors.join('; ') : 'empty input';
    throw new ValidationError(`No valid URLs found. Errors: ${detail}`, errors);
  }

  return valid;
}

/**
 * Extract host (with port) from URL
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Resolve an href against the page it was found on and drop the fragment
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl);
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Check if a URL is likely documentation content on the given host
 */
export function isDocumentationUrl(url: string, host: string): boolean {
  const lower = url.toLowerCase();

  if (BLOCKED_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
    return false;
  }

  if (BLOCKED_PATH_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return false;
  }

  return extractHost(url) === host;
}
