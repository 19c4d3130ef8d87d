/**
 * HTML Processor
 * Strips page chrome and flattens a document into structure-preserving text
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { textProcessor, TextProcessor } from './text.processor';

export interface HtmlProcessorConfig {
  removeNoise?: boolean;
  preserveTables?: boolean;
  preserveLists?: boolean;

  /**
   * Emit h1-h6 as markdown heading lines
   */
  markHeadings?: boolean;
}

export class HtmlProcessor {
  private config: Required<HtmlProcessorConfig>;
  private readonly textProcessor: TextProcessor;

  // Tags that never carry documentation content
  private readonly noiseTags = [
    'script',
    'style',
    'meta',
    'link',
    'header',
    'footer',
    'nav',
    'aside',
    'noscript',
  ];

  private readonly noiseRoles = ['navigation', 'banner', 'contentinfo'];

  private readonly noiseClassPattern = /(sidebar|nav|menu|breadcrumb|cookie|popup|ad)/i;

  // Words that contain "ad" but name content, stripped from a class name before matching
  private readonly noiseClassAllowList = /(head|read|load|lead|badge|shadow|padding|gradient)/gi;

  constructor(config?: HtmlProcessorConfig, processor: TextProcessor = textProcessor) {
    this.config = {
      removeNoise: config?.removeNoise !== false,
      preserveTables: config?.preserveTables !== false,
      preserveLists: config?.preserveLists !== false,
      markHeadings: config?.markHeadings === true,
    };
    this.textProcessor = processor;
  }

  /**
   * Normalize an already parsed document. The input is not modified.
   */
  normalizeDocument(document: CheerioAPI): string {
    return this.process(document.html());
  }

  /**
   * Normalize an HTML string
   */
  process(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    const $ = cheerio.load(html);

    if (this.config.removeNoise) {
      this.removeNoise($);
    }

    if (this.config.markHeadings) {
      this.markHeadings($);
    }

    // Tables and lists become text before flattening so their markers survive
    if (this.config.preserveTables) {
      this.convertTables($);
    }

    if (this.config.preserveLists) {
      this.convertLists($, 'ul');
      this.convertLists($, 'ol');
    }

    const strings: string[] = [];
    this.collectText($.root().toArray(), strings);

    return this.textProcessor.process(strings.join('\n'));
  }

  private removeNoise($: CheerioAPI): void {
    $(this.noiseTags.join(', ')).remove();

    $('[class]')
      .filter((_, el) => {
        const classes = ($(el).attr('class') || '').split(/\s+/).filter(Boolean);
        return classes.some((name) => this.noiseClassPattern.test(name.replace(this.noiseClassAllowList, '')));
      })
      .remove();

    $(this.noiseRoles.map((role) => `[role="${role}"]`).join(', ')).remove();
  }

  private markHeadings($: CheerioAPI): void {
    $('h1, h2, h3, h4, h5, h6').each((_, el) => {
      const heading = $(el);
      const level = Number(el.tagName.slice(1));
      const title = this.textProcessor.cleanWhitespace(heading.text());
      if (title) {
        heading.replaceWith(escapeText(`\n${'#'.repeat(level)} ${title}\n`));
      }
    });
  }

  private convertTables($: CheerioAPI): void {
    let table = $('table').first();

    while (table.length > 0) {
      const rows: string[] = [];

      table.find('tr').each((_, tr) => {
        const cells = $(tr)
          .find('td, th')
          .map((_, cell) => this.textProcessor.cleanWhitespace($(cell).text()))
          .get();
        if (cells.length > 0) {
          rows.push(cells.join(' | '));
        }
      });

      if (rows.length > 0) {
        table.replaceWith(escapeText(`\nTable:\n${rows.join('\n')}\n`));
      } else {
        table.remove();
      }

      table = $('table').first();
    }
  }

  /**
   * Outermost lists first; nested lists are absorbed into their parent item
   */
  private convertLists($: CheerioAPI, tag: 'ul' | 'ol'): void {
    let list = $(tag).first();

    while (list.length > 0) {
      const items = list
        .children('li')
        .map((index, li) => {
          const marker = tag === 'ul' ? '• ' : `${index + 1}. `;
          return marker + this.textProcessor.cleanWhitespace($(li).text());
        })
        .get();

      list.replaceWith(escapeText(`\n${items.join('\n')}\n`));
      list = $(tag).first();
    }
  }

  private collectText(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
      if (isText(node)) {
        out.push(node.data);
      } else if (hasChildren(node)) {
        this.collectText(node.children, out);
      }
    }
  }
}

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

// Export singleton instance with default configuration
export const htmlProcessor = new HtmlProcessor();

export function normalizeHtml(html: string, config?: HtmlProcessorConfig): string {
  const processor = config ? new HtmlProcessor(config) : htmlProcessor;
  return processor.process(html);
}

export function normalizeDocument(document: CheerioAPI, config?: HtmlProcessorConfig): string {
  const processor = config ? new HtmlProcessor(config) : htmlProcessor;
  return processor.normalizeDocument(document);
}
