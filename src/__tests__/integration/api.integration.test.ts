/**
 * API Integration Tests
 * Runs the Express app on an ephemeral port with an in-process fetch for crawled sites
 */

import type { Server } from 'http';
import { createApp } from '../../app';
import { ExtractorService } from '../../modules/extractor/extractor.service';
import { CacheManager } from '../../lib/cache/cache.manager';
import { CacheMode } from '../../lib/cache/cache.types';
import { InferenceManager } from '../../lib/inference/inference.manager';
import { createMockFetch } from '../helpers/mocks';
import { SITE, docPage } from '../helpers/fixtures';

const SECTIONS = [
  '<h2>Installation</h2><p>Install the package with npm today.</p>',
  '<h2>Configuration</h2><p>Configure the toolkit through one file.</p>',
  '<h2>Deployment</h2><p>Deploy the built files anywhere you like.</p>',
].join('\n');

describe('API', () => {
  let server: Server;
  let baseUrl: string;
  let spies: jest.SpyInstance[];

  beforeAll(async () => {
    const { fetchFn } = createMockFetch({ [`${SITE}/`]: { body: docPage('Toolkit', SECTIONS) } });
    const cacheManager = new CacheManager({ mode: CacheMode.BYPASS });
    const extractorService = new ExtractorService({
      fetchFn,
      inference: new InferenceManager(),
      cache: cacheManager,
    });

    server = createApp({ extractorService, cacheManager }).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    spies = (['log', 'warn', 'error'] as const).map((method) =>
      jest.spyOn(console, method).mockImplementation(() => undefined)
    );
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockRestore());
  });

  function postExtract(body: string): Promise<Response> {
    return fetch(`${baseUrl}/api/extract`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    });
  }

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      message: 'Documentation outline API is running',
      environment: 'test',
      cache: { redisAvailable: false, memoryCacheSize: 0, mode: 'bypass' },
    });
  });

  it('should return the inferred modules', async () => {
    const response = await postExtract(JSON.stringify({ urls: SITE, maxDepth: 0 }));
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      result: {
        pages: [`${SITE}/`],
        strategy: 'heuristic',
        fromCache: false,
        modules: [{ module: 'Installation' }, { module: 'Configuration' }, { module: 'Deployment' }],
      },
    });
  });

  it('should reject a request without urls', async () => {
    const response = await postExtract(JSON.stringify({ maxDepth: 1 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'urls must be a non-empty string or array of strings',
    });
  });

  it('should reject out-of-range options', async () => {
    const response = await postExtract(JSON.stringify({ urls: SITE, maxDepth: -1 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ success: false, error: 'maxDepth must be an integer >= 0' });
  });

  it('should list why each URL was rejected', async () => {
    const response = await postExtract(JSON.stringify({ urls: ['localhost'] }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: "No valid URLs found. Errors: Invalid: 'localhost' - no domain specified",
      details: ["Invalid: 'localhost' - no domain specified"],
    });
  });

  it('should answer 422 when nothing could be read', async () => {
    const response = await postExtract(JSON.stringify({ urls: 'https://missing.example.com' }));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      success: false,
      error: 'No meaningful content extracted: nothing to infer from',
    });
  });

  it('should reject malformed JSON', async () => {
    const response = await postExtract('{"urls": ');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ success: false, error: 'Malformed JSON body' });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ success: false, error: 'Route not found', path: '/api/unknown' });
  });
});
