/**
 * Heading Detectors
 * Regex scanners that find candidate headings in normalized text or raw HTML
 */

export type HeadingSource = 'html' | 'markdown' | 'aria' | 'role';

export interface Heading {
  /**
   * Character offset of the match in the scanned text
   */
  offset: number;
  level: number;
  title: string;
  source: HeadingSource;
}

export interface HeadingDetector {
  readonly source: HeadingSource;

  /**
   * `found` holds headings reported by detectors that ran earlier
   */
  scan(text: string, found?: readonly Heading[]): Heading[];
}

export const MIN_TITLE_LENGTH = 3;

export function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, '');
}

export class HtmlHeadingDetector implements HeadingDetector {
  readonly source = 'html';

  scan(text: string): Heading[] {
    const headings: Heading[] = [];
    for (const match of text.matchAll(/<h([1-6])\b[^>]*>([\s\S]*?)<\/h\1\s*>/gi)) {
      headings.push({
        offset: match.index ?? 0,
        level: Number(match[1]),
        title: stripTags(match[2]).replace(/\s+/g, ' ').trim(),
        source: this.source,
      });
    }
    return headings;
  }
}

export class MarkdownHeadingDetector implements HeadingDetector {
  readonly source = 'markdown';

  scan(text: string): Heading[] {
    const headings: Heading[] = [];
    for (const match of text.matchAll(/^(#{1,6})[ \t]*(.+)$/gm)) {
      headings.push({
        offset: match.index ?? 0,
        level: match[1].length,
        title: match[2].replace(/[ \t]+#+[ \t]*$/, '').trim(),
        source: this.source,
      });
    }
    return headings;
  }
}

/**
 * aria-label values of 4-100 characters, level 3. A label is skipped when a
 * heading with the same title has already been found.
 */
export class AriaLabelDetector implements HeadingDetector {
  readonly source = 'aria';

  scan(text: string, found: readonly Heading[] = []): Heading[] {
    const titles = new Set(found.map((heading) => heading.title));
    const headings: Heading[] = [];

    for (const match of text.matchAll(/aria-label=["']([^"']{4,100})["']/gi)) {
      const title = match[1].trim();
      if (titles.has(title)) continue;
      titles.add(title);
      headings.push({ offset: match.index ?? 0, level: 3, title, source: this.source });
    }
    return headings;
  }
}

/**
 * Any element with role="heading", level 2
 */
export class RoleHeadingDetector implements HeadingDetector {
  readonly source = 'role';

  scan(text: string): Heading[] {
    const headings: Heading[] = [];
    const pattern = /<([a-z][a-z0-9]*)\b[^>]*\brole=["']heading["'][^>]*>([\s\S]*?)<\/\1\s*>/gi;
    for (const match of text.matchAll(pattern)) {
      headings.push({
        offset: match.index ?? 0,
        level: 2,
        title: stripTags(match[2]).replace(/\s+/g, ' ').trim(),
        source: this.source,
      });
    }
    return headings;
  }
}

export const DEFAULT_DETECTORS: readonly HeadingDetector[] = [
  new HtmlHeadingDetector(),
  new MarkdownHeadingDetector(),
  new AriaLabelDetector(),
  new RoleHeadingDetector(),
];

/**
 * Run every detector, drop short titles, order by offset and keep the
 * first heading of each title.
 */
export function harvestHeadings(
  text: string,
  detectors: readonly HeadingDetector[] = DEFAULT_DETECTORS
): Heading[] {
  const found: Heading[] = [];
  for (const detector of detectors) {
    found.push(...detector.scan(text, found));
  }

  const ordered = found
    .filter((heading) => heading.title.length >= MIN_TITLE_LENGTH)
    .sort((a, b) => a.offset - b.offset);

  const seen = new Set<string>();
  return ordered.filter((heading) => {
    if (seen.has(heading.title)) return false;
    seen.add(heading.title);
    return true;
  });
}
