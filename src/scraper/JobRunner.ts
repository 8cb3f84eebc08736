// ============================================================================
// JOB RUNNER
// ============================================================================
// One job per run: open the browser session, run the retry envelope over the
// traversal, release the session, report quality

import { v4 as uuid } from 'uuid';
import type { JobConfig, QualityReport, ScrapedRecord } from '../shared/types.js';
import { DEFAULT_SESSION_CONFIG, withBrowserSession, type SessionConfig } from '../browser/BrowserManager.js';
import type { RenderTiming } from '../config/defaults.js';
import { computeQualityReport } from './QualityReporter.js';
import { RenderController, type RenderPage } from './RenderController.js';
import { runWithRetry } from './RetryEnvelope.js';
import { ScrapingEngine } from './ScrapingEngine.js';
import type { RetryConfig, ScrapeError } from './types/errors.js';
import type { Sleep } from './utils/timing.js';

/**
 * Opens a rendering session, hands its page to `fn`, and closes it whatever happens
 */
export type SessionOpener = <T>(fn: (page: RenderPage) => Promise<T>) => Promise<T>;

export interface RunJobOptions {
  session?: Partial<SessionConfig>;
  renderTiming?: Partial<RenderTiming>;
  retry?: Partial<RetryConfig>;
  sleep?: Sleep;
  openSession?: SessionOpener;
}

export interface JobResult {
  runId: string;
  records: ScrapedRecord[];
  report: QualityReport;
  attempts: number;
  succeeded: boolean;
  errors: ScrapeError[];
  pagesScraped: number;
  duration: number;
}

export async function runJob(job: JobConfig, options: RunJobOptions = {}): Promise<JobResult> {
  const startTime = Date.now();
  const runId = uuid();
  const sessionConfig: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...options.session };
  const openSession: SessionOpener =
    options.openSession ?? ((fn) => withBrowserSession(runId, sessionConfig, (page) => fn(page)));

  console.log(`[JobRunner] Starting run ${runId}`);

  const outcome = await openSession((page) => {
    const renderer = new RenderController(page, { timing: options.renderTiming, sleep: options.sleep });
    const engine = new ScrapingEngine(job, renderer, { sleep: options.sleep });

    return runWithRetry(() => engine.execute(), { config: options.retry, sleep: options.sleep });
  });

  const report = computeQualityReport(outcome.records);
  const duration = Date.now() - startTime;

  console.log(
    `[JobRunner] Run ${runId} finished: ${outcome.records.length} records, ${outcome.attempts} attempt(s), ${duration}ms`
  );

  return {
    runId,
    records: outcome.records,
    report,
    attempts: outcome.attempts,
    succeeded: outcome.succeeded,
    errors: outcome.errors,
    pagesScraped: outcome.lastResult?.pagesScraped ?? 0,
    duration,
  };
}
