/**
 * Extractor Controller
 * HTTP request/response handling for outline extraction
 */

import { Request, Response } from 'express';
import { extractorService, ExtractorService } from './extractor.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { ExtractOptions, IExtractResponse } from './extractor.types';

const NUMERIC_OPTIONS = ['maxDepth', 'maxPages', 'charsPerPage', 'maxModules'] as const;

type NumericOption = (typeof NUMERIC_OPTIONS)[number];

function readUrls(body: Record<string, unknown>): string | string[] {
  const { urls } = body;
  if (typeof urls === 'string' && urls.trim()) {
    return urls;
  }
  if (Array.isArray(urls) && urls.length > 0 && urls.every((url): url is string => typeof url === 'string')) {
    return urls;
  }
  throw new ApiError(400, 'urls must be a non-empty string or array of strings');
}

function readNumber(body: Record<string, unknown>, key: NumericOption): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  // maxDepth may be 0 (seed page only)
  const min = key === 'maxDepth' ? 0 : 1;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ApiError(400, `${key} must be an integer >= ${min}`);
  }
  return value;
}

export class ExtractorController {
  constructor(private readonly service: ExtractorService = extractorService) {}

  /**
   * POST /api/extract
   * Crawl the given documentation and return its module outline
   */
  extract = asyncHandler(async (req: Request, res: Response) => {
    const body: Record<string, unknown> =
      typeof req.body === 'object' && req.body !== null && !Array.isArray(req.body) ? req.body : {};

    const urls = readUrls(body);
    const options: ExtractOptions = { forceRefresh: body.forceRefresh === true };
    for (const key of NUMERIC_OPTIONS) {
      options[key] = readNumber(body, key);
    }

    // Stop crawling when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    const result = await this.service.run(urls, { ...options, signal: controller.signal });

    const response: IExtractResponse = {
      success: true,
      result,
    };

    res.json(response);
  });
}

export const extractorController = new ExtractorController();
