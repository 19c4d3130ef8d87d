/**
 * Extractor Router
 * Route definitions for outline extraction
 */

import { Router } from 'express';
import { extractorController, ExtractorController } from './extractor.controller';

export const createExtractorRouter = (controller: ExtractorController = extractorController): Router => {
  const router = Router();

  /**
   * @route   POST /api/extract
   * @desc    Crawl documentation and infer its modules
   * @access  Public
   */
  router.post('/', controller.extract);

  return router;
};

export default createExtractorRouter();
