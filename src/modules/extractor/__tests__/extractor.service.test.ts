/**
 * Extractor Service Tests
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ExtractorService } from '../extractor.service';
import { CacheManager } from '../../../lib/cache/cache.manager';
import { CacheMode } from '../../../lib/cache/cache.types';
import { InferenceManager } from '../../../lib/inference/inference.manager';
import { InferenceStrategyType } from '../../../lib/inference/inference.types';
import type { LocalFileReader } from '../../../lib/sources/local-file';
import { NoContentError, ValidationError } from '../../../lib/scraping/errors';
import { createMockFetch } from '../../../__tests__/helpers/mocks';
import { SITE, docPage, markdownDoc } from '../../../__tests__/helpers/fixtures';
import type { FetchFn } from '../../../lib/crawling/crawling.types';

const ROOT = `${SITE}/`;

const SECTIONS = [
  '<h2>Installation</h2><p>Install the package with npm today.</p>',
  '<h2>Configuration</h2><p>Configure the toolkit through one file.</p>',
  '<h2>Deployment</h2><p>Deploy the built files anywhere you like.</p>',
].join('\n');

const localReader: LocalFileReader = {
  read: async (input) => (input === 'notes.md' ? markdownDoc : null),
};

function createService(routes: Parameters<typeof createMockFetch>[0] = {}) {
  const { fetchFn, calls } = createMockFetch(routes);
  const service = new ExtractorService({
    fetchFn,
    reader: localReader,
    inference: new InferenceManager(),
    cache: new CacheManager({ mode: CacheMode.BYPASS }),
  });
  return { service, calls };
}

describe('ExtractorService', () => {
  let spies: jest.SpyInstance[];

  beforeEach(() => {
    spies = (['log', 'warn', 'error'] as const).map((method) =>
      jest.spyOn(console, method).mockImplementation(() => undefined)
    );
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockRestore());
  });

  it('should crawl the site and infer its modules', async () => {
    const { service, calls } = createService({ [ROOT]: { body: docPage('Toolkit', SECTIONS) } });

    const outcome = await service.run(SITE, { charsPerPage: 5000 });

    expect(calls).toEqual([ROOT]);
    expect(outcome.pages).toEqual([ROOT]);
    expect(outcome.strategy).toBe('heuristic');
    expect(outcome.fromCache).toBe(false);
    expect(outcome.modules.map((record) => record.module)).toEqual(['Installation', 'Configuration', 'Deployment']);
    expect(outcome.modules[0].Description).toBe('Install the package with npm today.');
  });

  it('should serve a repeated request from the cache', async () => {
    const { service, calls } = createService({ [ROOT]: { body: docPage('Toolkit', SECTIONS) } });

    const first = await service.run(SITE);
    const second = await service.run(SITE);

    expect(calls).toHaveLength(1);
    expect(second.fromCache).toBe(true);
    expect(second.modules).toEqual(first.modules);
  });

  it('should crawl again when refresh is forced or parameters change', async () => {
    const { service, calls } = createService({ [ROOT]: { body: docPage('Toolkit', SECTIONS) } });

    await service.run(SITE);
    await service.run(SITE, { forceRefresh: true });
    await service.run(SITE, { maxModules: 2 });

    expect(calls).toHaveLength(3);
  });

  it('should not cache the partial result of a cancelled run', async () => {
    const { fetchFn, calls } = createMockFetch({
      [ROOT]: { body: docPage('Toolkit', SECTIONS, ['/guide']) },
      [`${SITE}/guide`]: { body: docPage('Guide', '<h2>Upgrading</h2><p>Upgrade one release at a time.</p>') },
    });
    const controller = new AbortController();
    const abortAfterSeed: FetchFn = async (input, init) => {
      const response = await fetchFn(input, init);
      controller.abort();
      return response;
    };
    const shared = { reader: localReader, inference: new InferenceManager(), cache: new CacheManager({ mode: CacheMode.BYPASS }) };

    const cancelled = await new ExtractorService({ ...shared, fetchFn: abortAfterSeed }).run(SITE, {
      signal: controller.signal,
    });
    const later = await new ExtractorService({ ...shared, fetchFn }).run(SITE);

    expect(cancelled.pages).toEqual([ROOT]);
    expect(later.fromCache).toBe(false);
    expect(later.pages).toEqual([ROOT, `${SITE}/guide`]);
    expect(calls).toEqual([ROOT, ROOT, `${SITE}/guide`]);
  });

  it('should read local documents without crawling', async () => {
    const { service, calls } = createService();

    const outcome = await service.run(['notes.md']);

    expect(calls).toEqual([]);
    expect(outcome.pages).toEqual(['notes.md']);
    expect(outcome.modules[0]).toEqual({
      module: 'Installation',
      Description: 'Install the package with your package manager. It works on every platform.',
      Submodules: { Requirements: 'A recent runtime is required.' },
      confidence: 0.61,
    });
  });

  it('should continue with local documents when the URLs are invalid', async () => {
    const { service } = createService();

    const outcome = await service.run(['notes.md', 'localhost']);

    expect(outcome.pages).toEqual(['notes.md']);
  });

  it('should reject input with no valid URL', async () => {
    const { service } = createService();

    await expect(service.run(['localhost'])).rejects.toThrow(ValidationError);
    await expect(service.run(['localhost'])).rejects.toThrow(
      "No valid URLs found. Errors: Invalid: 'localhost' - no domain specified"
    );
  });

  it('should fail when no page yields text', async () => {
    const { service } = createService();

    await expect(service.run(SITE)).rejects.toThrow(NoContentError);
  });

  it('should keep model confidence scores', async () => {
    const inference = new InferenceManager();
    inference.registerStrategy({
      name: 'scripted',
      type: InferenceStrategyType.CUSTOM,
      isAvailable: () => true,
      infer: async () => ({
        modules: [{ name: 'Auth', description: 'Login flows', submodules: {}, confidence: 0.9 }],
        success: true,
        strategy: InferenceStrategyType.CUSTOM,
        strategyName: 'scripted',
        executionTime: 0,
      }),
    });
    const service = new ExtractorService({
      reader: localReader,
      inference,
      cache: new CacheManager({ mode: CacheMode.DISABLED }),
    });

    const outcome = await service.run('notes.md');

    expect(outcome.strategy).toBe('scripted');
    expect(outcome.modules).toEqual([{ module: 'Auth', Description: 'Login flows', Submodules: {}, confidence: 0.9 }]);
  });

  describe('output file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'doc-outline-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the modules as JSON', async () => {
      const { service } = createService();
      const outputPath = path.join(dir, 'nested', 'result.json');

      const outcome = await service.run('notes.md', { writeOutput: true, outputPath });

      const written: unknown = JSON.parse(await readFile(outputPath, 'utf8'));
      expect(written).toEqual(outcome.modules);
    });
  });
});
