/**
 * Extractor Types
 * Type definitions for the documentation outline pipeline
 */

import type { ModuleRecord } from '../../lib/inference/inference.types';

export interface ExtractOptions {
  maxDepth?: number;
  maxPages?: number;
  charsPerPage?: number;
  maxModules?: number;

  /**
   * Skip the cache lookup (the result is still stored)
   */
  forceRefresh?: boolean;

  /**
   * Write the result JSON to `outputPath`
   */
  writeOutput?: boolean;
  outputPath?: string;

  signal?: AbortSignal;
}

export interface ExtractionOutcome {
  modules: ModuleRecord[];

  /**
   * Crawled page URLs and local file paths, in the order their text was used
   */
  pages: string[];

  /**
   * Name of the inference strategy that produced the modules
   */
  strategy: string;
  fromCache: boolean;
}

/**
 * POST /api/extract request body
 */
export interface IExtractRequest {
  urls: string | string[];
  maxDepth?: number;
  maxPages?: number;
  charsPerPage?: number;
  maxModules?: number;
  forceRefresh?: boolean;
}

export interface IExtractResponse {
  success: boolean;
  result: ExtractionOutcome;
}
