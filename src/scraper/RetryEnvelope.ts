// ============================================================================
// RETRY ENVELOPE
// ============================================================================
// Re-runs a whole traversal from the start URL when it fails or comes back
// empty, up to a fixed number of attempts

import type { ScrapedRecord } from '../shared/types.js';
import { TraversalError, type TraversalResult } from './ScrapingEngine.js';
import {
  DEFAULT_RETRY_CONFIG,
  EmptyResultError,
  calculateRetryDelay,
  wrapError,
  type RetryConfig,
  type ScrapeError,
} from './types/errors.js';
import { delay, type Sleep } from './utils/timing.js';

export interface RetryOutcome {
  /** Records of the first non-empty attempt, or of the last attempt made */
  records: ScrapedRecord[];
  /** Result of the last attempt that ran to completion */
  lastResult: TraversalResult | null;
  attempts: number;
  succeeded: boolean;
  errors: ScrapeError[];
}

export interface RetryOptions {
  config?: Partial<RetryConfig>;
  sleep?: Sleep;
}

/**
 * Run `attempt` until it yields at least one record or the attempts run out.
 * `attempt` receives the 1-based attempt number.
 */
export async function runWithRetry(
  attempt: (attemptNumber: number) => Promise<TraversalResult>,
  options: RetryOptions = {}
): Promise<RetryOutcome> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const sleep = options.sleep ?? delay;
  const errors: ScrapeError[] = [];
  let records: ScrapedRecord[] = [];
  let lastResult: TraversalResult | null = null;
  let attempts = 0;

  for (let attemptNumber = 1; attemptNumber <= config.maxAttempts; attemptNumber++) {
    attempts = attemptNumber;
    console.log(`[RetryEnvelope] Attempt ${attemptNumber}/${config.maxAttempts}`);

    let retriable = true;
    try {
      const result = await attempt(attemptNumber);
      lastResult = result;
      records = result.records;

      if (records.length > 0) {
        return { records, lastResult, attempts, succeeded: true, errors };
      }

      errors.push(wrapError(new EmptyResultError(), { attempt: attemptNumber }, config));
      console.warn(`[RetryEnvelope] Attempt ${attemptNumber} produced no records`);
    } catch (error) {
      records = error instanceof TraversalError ? error.records : [];
      const scrapeError = wrapError(error, { attempt: attemptNumber }, config);
      errors.push(scrapeError);
      retriable = scrapeError.retriable;
      console.error(`[RetryEnvelope] Attempt ${attemptNumber} failed (${scrapeError.type}): ${scrapeError.message}`);
    }

    if (!retriable) {
      console.error('[RetryEnvelope] Error is not retriable, giving up');
      break;
    }

    if (attemptNumber < config.maxAttempts) {
      const wait = calculateRetryDelay(attemptNumber - 1, config);
      console.log(`[RetryEnvelope] Retrying in ${wait}ms`);
      await sleep(wait);
    }
  }

  console.error(`[RetryEnvelope] Giving up after ${attempts} attempt(s) with ${records.length} records`);
  return { records, lastResult, attempts, succeeded: false, errors };
}
