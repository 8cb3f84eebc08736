import { describe, test, expect, beforeEach } from 'vitest';
import { runWithRetry } from '../RetryEnvelope.js';
import { TraversalError, type TraversalResult } from '../ScrapingEngine.js';
import { ConfigError, ScrapeErrorType } from '../types/errors.js';
import type { ScrapedRecord } from '../../shared/types.js';

function records(count: number): ScrapedRecord[] {
  return Array.from({ length: count }, (_, i) => ({ product_name: `Item ${i + 1}` }));
}

function traversal(count: number): TraversalResult {
  return {
    records: records(count),
    pagesScraped: 1,
    partialPages: 0,
    failedPages: 0,
    finalState: { pageIndex: 0, currentUrl: 'https://x.test/cat', mode: 'done' },
    duration: 0,
  };
}

describe('runWithRetry', () => {
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
  });

  test('returns the first attempt that yields records', async () => {
    const results = [traversal(0), traversal(5)];
    const seen: number[] = [];

    const outcome = await runWithRetry(
      async (n) => {
        seen.push(n);
        return results[n - 1] ?? traversal(0);
      },
      { sleep }
    );

    expect(outcome.records).toHaveLength(5);
    expect(outcome.attempts).toBe(2);
    expect(outcome.succeeded).toBe(true);
    expect(outcome.errors.map((e) => e.type)).toEqual([ScrapeErrorType.EMPTY]);
    expect(seen).toEqual([1, 2]);
    expect(sleeps).toEqual([2000]);
  });

  test('does not retry a successful first attempt', async () => {
    const outcome = await runWithRetry(async () => traversal(2), { sleep });

    expect(outcome.attempts).toBe(1);
    expect(outcome.errors).toEqual([]);
    expect(sleeps).toEqual([]);
  });

  test('gives up after the configured attempts', async () => {
    const outcome = await runWithRetry(async () => traversal(0), { sleep });

    expect(outcome.records).toEqual([]);
    expect(outcome.attempts).toBe(3);
    expect(outcome.succeeded).toBe(false);
    expect(outcome.errors).toHaveLength(3);
    expect(sleeps).toEqual([2000, 2000]);
  });

  test('returns the partial records of the last failed attempt', async () => {
    const outcome = await runWithRetry(
      async (n) => {
        throw new TraversalError(new Error('net::ERR_CONNECTION_RESET'), records(n), 1);
      },
      { sleep }
    );

    expect(outcome.records).toEqual(records(3));
    expect(outcome.succeeded).toBe(false);
    expect(outcome.lastResult).toBeNull();
    expect(outcome.errors.map((e) => [e.type, e.attempt])).toEqual([
      [ScrapeErrorType.NETWORK, 1],
      [ScrapeErrorType.NETWORK, 2],
      [ScrapeErrorType.NETWORK, 3],
    ]);
  });

  test('stops on errors that are not retriable', async () => {
    const outcome = await runWithRetry(
      async () => {
        throw new ConfigError('bad mapping');
      },
      { sleep }
    );

    expect(outcome.attempts).toBe(1);
    expect(outcome.errors[0]?.retriable).toBe(false);
    expect(sleeps).toEqual([]);
  });

  test('applies backoff up to the maximum delay', async () => {
    await runWithRetry(async () => traversal(0), {
      sleep,
      config: { maxAttempts: 4, retryDelay: 100, backoffMultiplier: 2, maxDelay: 300 },
    });

    expect(sleeps).toEqual([100, 200, 300]);
  });
});
