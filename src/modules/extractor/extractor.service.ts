/**
 * Extractor Service
 * Business logic for turning documentation inputs into a module outline
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { env } from '../../config/env';
import { crawlAll, validateUrls } from '../../lib/crawling';
import type { CrawlOptions, FetchFn, Page } from '../../lib/crawling';
import { HtmlProcessor, textProcessor } from '../../lib/processing';
import { textFileReader } from '../../lib/sources/local-file';
import type { LocalFileReader } from '../../lib/sources/local-file';
import { inferenceManager, InferenceManager } from '../../lib/inference/inference.manager';
import { backfillConfidence, toRecords } from '../../lib/inference/module-records';
import type { ModuleRecord } from '../../lib/inference/inference.types';
import { cacheManager, CacheManager, makeCacheKey } from '../../lib/cache/cache.manager';
import { NoContentError, ValidationError } from '../../lib/scraping/errors';
import { ExtractOptions, ExtractionOutcome } from './extractor.types';

export type Crawler = (
  seeds: readonly string[],
  options: CrawlOptions & { concurrency?: number }
) => Promise<Page[]>;

export interface ExtractorDependencies {
  crawler: Crawler;
  fetchFn?: FetchFn;
  normalizer: HtmlProcessor;
  reader: LocalFileReader;
  inference: InferenceManager;
  cache: CacheManager;
}

type CachedOutcome = Omit<ExtractionOutcome, 'fromCache'>;

interface SourceText {
  source: string;
  text: string;
}

function isModuleRecord(value: unknown): value is ModuleRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'module' in value &&
    typeof value.module === 'string' &&
    'Description' in value &&
    typeof value.Description === 'string' &&
    'Submodules' in value &&
    typeof value.Submodules === 'object' &&
    value.Submodules !== null
  );
}

export function isCachedOutcome(value: unknown): value is CachedOutcome {
  return (
    typeof value === 'object' &&
    value !== null &&
    'modules' in value &&
    Array.isArray(value.modules) &&
    value.modules.every(isModuleRecord) &&
    'pages' in value &&
    Array.isArray(value.pages) &&
    'strategy' in value &&
    typeof value.strategy === 'string'
  );
}

/**
 * Best-effort write of the result JSON
 */
export async function writeResult(outputPath: string, modules: readonly ModuleRecord[]): Promise<boolean> {
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, `${JSON.stringify(modules, null, 2)}\n`, 'utf8');
    console.log(`💾 Saved result to ${outputPath}`);
    return true;
  } catch (error) {
    console.error(`Failed to write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

export class ExtractorService {
  private readonly deps: ExtractorDependencies;

  constructor(deps: Partial<ExtractorDependencies> = {}) {
    this.deps = {
      crawler: deps.crawler ?? crawlAll,
      fetchFn: deps.fetchFn,
      normalizer: deps.normalizer ?? new HtmlProcessor({ markHeadings: true }),
      reader: deps.reader ?? textFileReader,
      inference: deps.inference ?? inferenceManager,
      cache: deps.cache ?? cacheManager,
    };
  }

  /**
   * Validate inputs, collect text from local files and crawled pages, and
   * infer the module outline.
   *
   * @throws ValidationError when no input is usable
   * @throws NoContentError when nothing readable was collected
   */
  async run(inputs: string | readonly string[], options: ExtractOptions = {}): Promise<ExtractionOutcome> {
    const maxDepth = options.maxDepth ?? env.CRAWL_MAX_DEPTH;
    const maxPages = options.maxPages ?? env.CRAWL_MAX_PAGES;
    const charsPerPage = options.charsPerPage ?? env.CHARS_PER_PAGE;
    const maxModules = options.maxModules ?? env.MAX_MODULES;

    const rawInputs = (typeof inputs === 'string' ? [inputs] : [...inputs])
      .map((input) => input.trim())
      .filter(Boolean);

    const localDocs = await this.readLocalFiles(rawInputs);
    const localSources = new Set(localDocs.map((doc) => doc.source));
    const urls = this.validateRemaining(
      rawInputs.filter((input) => !localSources.has(input)),
      localDocs.length > 0
    );

    const cacheKey = makeCacheKey(
      [...urls, ...localDocs.map((doc) => `local:${createHash('sha256').update(doc.text).digest('hex')}`)],
      { maxDepth, maxPages, charsPerPage, maxModules }
    );

    if (!options.forceRefresh) {
      const cached = await this.deps.cache.get(cacheKey, isCachedOutcome);
      if (cached.data) {
        console.log(`⚡ Cache hit for ${urls.length + localDocs.length} input(s)`);
        return { ...cached.data, fromCache: true };
      }
    }

    const sources: SourceText[] = localDocs.map((doc) => ({
      source: doc.source,
      text: textProcessor.process(doc.text).slice(0, charsPerPage),
    }));

    if (urls.length > 0) {
      const pages = await this.deps.crawler(urls, {
        maxDepth,
        maxPages,
        signal: options.signal,
        fetchFn: this.deps.fetchFn,
      });
      for (const page of pages) {
        sources.push({
          source: page.url,
          text: this.deps.normalizer.normalizeDocument(page.document).slice(0, charsPerPage),
        });
      }
    }

    const used = sources.filter((entry) => entry.text.trim().length > 0);
    const combined = used.map((entry) => entry.text).join('\n');

    if (!combined.trim()) {
      throw new NoContentError();
    }

    console.log(`🧠 Inferring modules from ${used.length} source(s), ${combined.length} chars`);
    const result = await this.deps.inference.infer({ text: combined, maxModules, signal: options.signal });

    const outcome: CachedOutcome = {
      modules: toRecords(backfillConfidence(result.modules)),
      pages: used.map((entry) => entry.source),
      strategy: result.strategyName,
    };

    // A cancelled run only has partial results
    if (options.signal?.aborted) {
      console.warn('⚠️  Run cancelled, result not cached or saved');
      return { ...outcome, fromCache: false };
    }

    if (options.writeOutput) {
      await writeResult(options.outputPath ?? env.OUTPUT_PATH, outcome.modules);
    }

    await this.deps.cache.set(cacheKey, outcome);

    return { ...outcome, fromCache: false };
  }

  private async readLocalFiles(inputs: readonly string[]): Promise<SourceText[]> {
    const docs: SourceText[] = [];
    for (const input of inputs) {
      const text = await this.deps.reader.read(input);
      if (text !== null) {
        docs.push({ source: input, text });
      }
    }
    return docs;
  }

  /**
   * URLs left after local files. Invalid URLs only fail the run when there
   * is no local document to work from.
   */
  private validateRemaining(candidates: readonly string[], haveLocalDocs: boolean): string[] {
    if (candidates.length === 0 && haveLocalDocs) {
      return [];
    }

    try {
      return validateUrls(candidates);
    } catch (error) {
      if (haveLocalDocs && error instanceof ValidationError) {
        console.warn(`⚠️  ${error.message}; continuing with local files`);
        return [];
      }
      throw error;
    }
  }
}

// Export singleton instance
export const extractorService = new ExtractorService();
