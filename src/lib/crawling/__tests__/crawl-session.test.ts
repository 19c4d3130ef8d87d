/**
 * Crawl Session Tests
 */

import { crawl, crawlAll, CrawlSession } from '../crawl-session';
import type { CrawlOptions, FetchFn } from '../crawling.types';
import { createMockFetch, MockRoute } from '../../../__tests__/helpers/mocks';
import { docPage, SITE } from '../../../__tests__/helpers/fixtures';

const ROOT = `${SITE}/`;
const GUIDE = `${SITE}/guide`;
const API = `${SITE}/api`;
const INSTALL = `${SITE}/guide/install`;

function site(): Record<string, MockRoute> {
  return {
    [ROOT]: {
      body: docPage('Home', '', [
        '/guide',
        '/api',
        'https://other.example.org/x',
        '/files/manual.pdf',
        '/login',
        '#top',
        '/',
      ]),
    },
    [GUIDE]: { body: docPage('Guide', '', ['/guide/install', '/']) },
    [API]: { body: docPage('API') },
    [INSTALL]: { body: docPage('Install') },
  };
}

function options(fetchFn: FetchFn, overrides: Partial<CrawlOptions> = {}): CrawlOptions {
  return { fetchFn, maxDepth: 1, maxPages: 10, maxRetries: 0, retryBackoffBase: 1, timeout: 1000, ...overrides };
}

describe('crawl', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should crawl depth-first within the depth limit', async () => {
    const { fetchFn, calls } = createMockFetch(site());

    const pages = await crawl(ROOT, options(fetchFn));

    expect(pages.map((page) => page.url)).toEqual([ROOT, GUIDE, API]);
    expect(pages.map((page) => page.depth)).toEqual([0, 1, 1]);
    expect(calls).toEqual([ROOT, GUIDE, API]);
  });

  it('should follow deeper links before siblings', async () => {
    const { fetchFn } = createMockFetch(site());

    const pages = await crawl(ROOT, options(fetchFn, { maxDepth: 2 }));

    expect(pages.map((page) => page.url)).toEqual([ROOT, GUIDE, INSTALL, API]);
  });

  it('should fetch only the seed at depth 0', async () => {
    const { fetchFn, calls } = createMockFetch(site());

    const pages = await crawl(ROOT, options(fetchFn, { maxDepth: 0 }));

    expect(pages.map((page) => page.url)).toEqual([ROOT]);
    expect(calls).toEqual([ROOT]);
  });

  it('should stop at the page limit', async () => {
    const { fetchFn, calls } = createMockFetch(site());

    const pages = await crawl(ROOT, options(fetchFn, { maxDepth: 2, maxPages: 2 }));

    expect(pages.map((page) => page.url)).toEqual([ROOT, GUIDE]);
    expect(calls).toEqual([ROOT, GUIDE]);
  });

  it('should never leave the seed host or fetch blocked links', async () => {
    const { fetchFn, calls } = createMockFetch(site());

    await crawl(ROOT, options(fetchFn, { maxDepth: 3 }));

    expect(calls.every((url) => url.startsWith(SITE))).toBe(true);
    expect(calls).not.toContain(`${SITE}/files/manual.pdf`);
    expect(calls).not.toContain(`${SITE}/login`);
  });

  it('should fetch each URL once when pages link in a cycle', async () => {
    const { fetchFn, calls } = createMockFetch({
      [ROOT]: { body: docPage('Home', '', ['/', '/b']) },
      [`${SITE}/b`]: { body: docPage('B', '', ['/', '/b']) },
    });

    const pages = await crawl(ROOT, options(fetchFn, { maxDepth: 5 }));

    expect(pages).toHaveLength(2);
    expect(calls).toEqual([ROOT, `${SITE}/b`]);
  });

  it('should not fetch a bare-host seed twice when it links to itself', async () => {
    const { fetchFn, calls } = createMockFetch({
      [ROOT]: { body: docPage('Home', '', ['/', '/b']) },
      [`${SITE}/b`]: { body: docPage('B') },
    });

    const pages = await crawl(SITE, options(fetchFn));

    expect(pages.map((page) => page.url)).toEqual([ROOT, `${SITE}/b`]);
    expect(calls).toEqual([ROOT, `${SITE}/b`]);
  });

  it('should return no pages when the seed fails', async () => {
    const { fetchFn } = createMockFetch({});

    await expect(crawl(ROOT, options(fetchFn))).resolves.toEqual([]);
  });

  it('should skip failing pages and keep crawling', async () => {
    const routes = site();
    delete routes[GUIDE];
    const { fetchFn, calls } = createMockFetch(routes);

    const pages = await crawl(ROOT, options(fetchFn));

    expect(pages.map((page) => page.url)).toEqual([ROOT, API]);
    expect(calls).toEqual([ROOT, GUIDE, API]);
  });

  it('should resolve links against the final URL after a redirect', async () => {
    const { fetchFn, calls } = createMockFetch({
      [ROOT]: { body: docPage('Home', '', ['intro']), redirectedTo: `${SITE}/v2/` },
      [`${SITE}/v2/intro`]: { body: docPage('Intro') },
    });

    const pages = await crawl(ROOT, options(fetchFn));

    expect(pages.map((page) => page.url)).toEqual([ROOT, `${SITE}/v2/intro`]);
    expect(calls).toEqual([ROOT, `${SITE}/v2/intro`]);
  });

  it('should keep the pages collected before cancellation', async () => {
    const controller = new AbortController();
    const { fetchFn: served } = createMockFetch(site());
    const fetchFn: FetchFn = async (input, init) => {
      const response = await served(input, init);
      controller.abort();
      return response;
    };

    const pages = await crawl(ROOT, options(fetchFn, { signal: controller.signal }));

    expect(pages.map((page) => page.url)).toEqual([ROOT]);
  });

  it('should track statistics for the session', async () => {
    const routes = site();
    delete routes[API];
    const { fetchFn } = createMockFetch(routes);
    const session = new CrawlSession(ROOT, options(fetchFn));

    await session.run();
    const stats = session.getStatistics();

    expect(stats.pagesVisited).toBe(2);
    expect(stats.pagesSkipped).toBe(1);
    expect(stats.pagesFailed).toBe(0);
    expect(stats.depthReached).toBe(1);
    expect(session.hasVisited(API)).toBe(true);
  });
});

describe('crawlAll', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should crawl every seed with its own session and keep seed order', async () => {
    const other = 'https://help.example.net/';
    const { fetchFn } = createMockFetch({
      ...site(),
      [other]: { body: docPage('Help', '', ['/faq']) },
      ['https://help.example.net/faq']: { body: docPage('FAQ', '', [ROOT]) },
    });

    const pages = await crawlAll([other, ROOT], { ...options(fetchFn, { maxDepth: 1 }), concurrency: 2 });

    expect(pages.map((page) => page.url)).toEqual([
      other,
      'https://help.example.net/faq',
      ROOT,
      GUIDE,
      API,
    ]);
  });
});
