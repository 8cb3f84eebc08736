import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { ScrapingEngine, TraversalError, type PageRenderer } from '../ScrapingEngine.js';
import type { RenderResult } from '../RenderController.js';
import { RenderTimeoutError, ScrapeErrorType } from '../types/errors.js';
import type { JobConfig } from '../../shared/types.js';

const BASE_URL = 'https://x.test/cat';

function job(overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    targetUrl: BASE_URL,
    recordSelector: 'li.item',
    paginationSelector: 'a.next',
    identityField: 'product_name',
    maxRecords: 10,
    waitTimeMs: 0,
    renderTimeoutMs: 1000,
    fields: {
      product_name: { kind: 'text', selector: '.name' },
      product_url: { kind: 'attribute', selector: 'a.item-link', attribute: 'href' },
    },
    ...overrides,
  };
}

function listing(names: string[], nextHref?: string): string {
  const items = names
    .map((name, i) => `<li class="item"><div class="name">${name}</div><a class="item-link" href="/p/${name || i}">x</a></li>`)
    .join('');
  const next = nextHref !== undefined ? `<a class="next" href="${nextHref}">Next</a>` : '';
  return `<!DOCTYPE html><html><body><ul>${items}</ul>${next}</body></html>`;
}

/**
 * Serves canned markup per URL and records the order of fetches
 */
class FakeRenderer implements PageRenderer {
  visited: string[] = [];

  constructor(private pages: Record<string, RenderResult | (() => RenderResult)>) {}

  async fetch(url: string): Promise<RenderResult> {
    this.visited.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      return { outcome: 'complete', snapshot: { url, html: listing([]), partial: false } };
    }
    return typeof page === 'function' ? page() : page;
  }
}

function complete(url: string, html: string): RenderResult {
  return { outcome: 'complete', snapshot: { url, html, partial: false } };
}

describe('ScrapingEngine', () => {
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('logs the next control found on each page', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['A'], ' ?page=1 ')),
      [`${BASE_URL}?page=1`]: complete(`${BASE_URL}?page=1`, listing(['B'])),
    });

    await new ScrapingEngine(job(), renderer, { sleep }).execute();

    const lines = log.mock.calls.map((args) => String(args[0]));
    expect(lines).toContain('[ScrapingEngine] Next control on page 0: ?page=1');
    expect(lines.filter((line) => line.startsWith('[ScrapingEngine] Next control'))).toHaveLength(1);
  });

  test('walks link-follow, then param synthesis, until a page yields nothing', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['Mouse', 'Keyboard'], '?page=1')),
      [`${BASE_URL}?page=1`]: complete(`${BASE_URL}?page=1`, listing(['Monitor', 'Headset'])),
      [`${BASE_URL}?page=2`]: complete(`${BASE_URL}?page=2`, listing(['', ''])),
    });

    const result = await new ScrapingEngine(job(), renderer, { sleep }).execute();

    expect(renderer.visited).toEqual([BASE_URL, `${BASE_URL}?page=1`, `${BASE_URL}?page=2`]);
    expect(result.records).toEqual([
      { product_name: 'Mouse', product_url: 'https://x.test/p/Mouse' },
      { product_name: 'Keyboard', product_url: 'https://x.test/p/Keyboard' },
      { product_name: 'Monitor', product_url: 'https://x.test/p/Monitor' },
      { product_name: 'Headset', product_url: 'https://x.test/p/Headset' },
    ]);
    expect(result.pagesScraped).toBe(3);
    expect(result.finalState).toEqual({ pageIndex: 2, currentUrl: `${BASE_URL}?page=2`, mode: 'done' });
  });

  test('stops fetching once the record cap is reached', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['A', 'B'], '?page=1')),
      [`${BASE_URL}?page=1`]: complete(`${BASE_URL}?page=1`, listing(['C', 'D'], '?page=2')),
    });

    const result = await new ScrapingEngine(job({ maxRecords: 3 }), renderer, { sleep }).execute();

    expect(result.records.map((r) => r.product_name)).toEqual(['A', 'B', 'C']);
    expect(renderer.visited).toHaveLength(2);
    expect(result.finalState.mode).toBe('done');
  });

  test('waits between pages but not before the first', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['A'], '?page=1')),
      [`${BASE_URL}?page=1`]: complete(`${BASE_URL}?page=1`, listing(['B'])),
    });

    await new ScrapingEngine(job({ waitTimeMs: 500 }), renderer, { sleep }).execute();

    expect(renderer.visited).toHaveLength(3);
    expect(sleeps).toEqual([500, 500]);
  });

  test('treats a failed capture as an empty page and stops', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: { outcome: 'failed', error: new RenderTimeoutError(BASE_URL, 'No markup captured') },
    });

    const result = await new ScrapingEngine(job(), renderer, { sleep }).execute();

    expect(result.records).toEqual([]);
    expect(result.failedPages).toBe(1);
    expect(result.finalState.mode).toBe('done');
  });

  test('extracts from partial captures', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: {
        outcome: 'partial',
        snapshot: { url: BASE_URL, html: listing(['A']), partial: true },
        cause: new Error('timeout'),
      },
    });

    const result = await new ScrapingEngine(job(), renderer, { sleep }).execute();

    expect(result.records.map((r) => r.product_name)).toEqual(['A']);
    expect(result.partialPages).toBe(1);
  });

  test('keeps records gathered before an unexpected error', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['A', 'B'], '?page=1')),
      [`${BASE_URL}?page=1`]: () => {
        throw new Error('net::ERR_CONNECTION_RESET');
      },
    });

    const error = await new ScrapingEngine(job(), renderer, { sleep }).execute().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TraversalError);
    if (!(error instanceof TraversalError)) return;
    expect(error.records.map((r) => r.product_name)).toEqual(['A', 'B']);
    expect(error.pagesScraped).toBe(1);
    expect(error.type).toBe(ScrapeErrorType.NETWORK);
  });

  test('starts every execution with a fresh result set', async () => {
    const renderer = new FakeRenderer({
      [BASE_URL]: complete(BASE_URL, listing(['A'])),
    });
    const engine = new ScrapingEngine(job(), renderer, { sleep });

    await engine.execute();
    const second = await engine.execute();

    expect(second.records).toHaveLength(1);
  });
});
