/**
 * Text Processor
 * Line-level cleanup of flattened page text
 */

// Lines that are almost always page chrome rather than documentation
const BOILERPLATE_PATTERN = /^(copyright|©|privacy|terms|cookie|advertisement|ads|share|follow|subscribe)/i;

export interface TextProcessorConfig {
  trimLines?: boolean;
  dropBoilerplate?: boolean;
  collapseBlankLines?: boolean;
  maxLength?: number;
}

export class TextProcessor {
  private config: Required<TextProcessorConfig>;

  constructor(config?: TextProcessorConfig) {
    this.config = {
      trimLines: config?.trimLines !== false,
      dropBoilerplate: config?.dropBoilerplate !== false,
      collapseBlankLines: config?.collapseBlankLines !== false,
      maxLength: config?.maxLength || Infinity,
    };
  }

  process(text: string, options?: Partial<TextProcessorConfig>): string {
    if (!text || text.trim().length === 0) {
      return '';
    }

    const config = { ...this.config, ...options };
    let lines = text.replace(/\r\n?/g, '\n').split('\n');

    if (config.trimLines) {
      lines = lines.map((line) => line.trim());
    }

    if (config.dropBoilerplate) {
      lines = lines.filter((line) => !this.isBoilerplate(line));
    }

    let processed = lines.join('\n');

    if (config.collapseBlankLines) {
      processed = processed.replace(/\n{3,}/g, '\n\n');
    }

    processed = processed.trim();

    if (processed.length > config.maxLength) {
      processed = processed.substring(0, config.maxLength);
    }

    return processed;
  }

  isBoilerplate(line: string): boolean {
    return BOILERPLATE_PATTERN.test(line.trim());
  }

  /**
   * Collapse every run of whitespace to one space
   */
  cleanWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}

export const textProcessor = new TextProcessor();

export function processText(text: string, config?: TextProcessorConfig): string {
  const processor = config ? new TextProcessor(config) : textProcessor;
  return processor.process(text);
}
