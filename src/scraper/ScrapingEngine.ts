// ============================================================================
// SCRAPING ENGINE
// ============================================================================
// One traversal attempt: render -> extract -> paginate, page by page,
// until pagination is done or the record cap is reached

import type { JobConfig, PaginationState, ScrapedRecord } from '../shared/types.js';
import { ParsedPage, extractRecords } from './ExtractionEngine.js';
import { PaginationHandler } from './handlers/PaginationHandler.js';
import type { RenderResult } from './RenderController.js';
import { ScraperError, classifyError } from './types/errors.js';
import { formatSelectorSpec } from './utils/SelectorSpec.js';
import { delay, type Sleep } from './utils/timing.js';

/**
 * Anything that can turn a URL into a RenderResult (RenderController in production)
 */
export interface PageRenderer {
  fetch(url: string, readySelector: string, timeoutMs: number): Promise<RenderResult>;
}

export interface TraversalResult {
  records: ScrapedRecord[];
  pagesScraped: number;
  /** Pages built from a timeout-fallback capture */
  partialPages: number;
  /** Pages where nothing could be captured */
  failedPages: number;
  finalState: PaginationState;
  duration: number;
}

/**
 * A traversal attempt that stopped on an error; keeps what it had gathered
 */
export class TraversalError extends ScraperError {
  readonly records: ScrapedRecord[];
  readonly pagesScraped: number;

  constructor(cause: unknown, records: ScrapedRecord[], pagesScraped: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Traversal stopped after ${pagesScraped} page(s): ${reason}`, classifyError(cause), { cause });
    this.name = 'TraversalError';
    this.records = records;
    this.pagesScraped = pagesScraped;
  }
}

export interface ScrapingEngineOptions {
  sleep?: Sleep;
}

export class ScrapingEngine {
  private job: JobConfig;
  private renderer: PageRenderer;
  private sleep: Sleep;

  constructor(job: JobConfig, renderer: PageRenderer, options: ScrapingEngineOptions = {}) {
    this.job = job;
    this.renderer = renderer;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Run one traversal from the job's target URL with a fresh result set
   */
  async execute(): Promise<TraversalResult> {
    const startTime = Date.now();
    const { job } = this;
    const pagination = new PaginationHandler({ baseUrl: job.targetUrl, selector: job.paginationSelector });
    const records: ScrapedRecord[] = [];
    let state = pagination.initialState();
    let pagesScraped = 0;
    let partialPages = 0;
    let failedPages = 0;

    console.log(`[ScrapingEngine] URL: ${job.targetUrl}`);
    console.log(`[ScrapingEngine] Record selector: ${job.recordSelector}`);
    console.log(
      `[ScrapingEngine] Fields: ${Object.entries(job.fields)
        .map(([field, spec]) => `${field}=${formatSelectorSpec(spec)}`)
        .join(', ')}`
    );
    console.log(`[ScrapingEngine] Target: ${job.maxRecords} records`);

    try {
      while (state.mode !== 'done' && records.length < job.maxRecords) {
        if (pagesScraped > 0 && job.waitTimeMs > 0) {
          await this.sleep(job.waitTimeMs);
        }

        console.log(`[ScrapingEngine] Scraping page ${state.pageIndex}: ${state.currentUrl}`);
        const result = await this.renderer.fetch(state.currentUrl, job.recordSelector, job.renderTimeoutMs);
        pagesScraped++;

        if (result.outcome === 'failed') {
          failedPages++;
          console.warn(`[ScrapingEngine] ${result.error.message}; treating page ${state.pageIndex} as empty`);
          state = pagination.next(state, null, 0).state;
          continue;
        }

        if (result.outcome === 'partial') {
          partialPages++;
        }

        const page = ParsedPage.parse(result.snapshot);
        try {
          let accepted = 0;
          for (const record of extractRecords(page, {
            recordSelector: job.recordSelector,
            fields: job.fields,
            identityField: job.identityField,
            remainingCapacity: job.maxRecords - records.length,
          })) {
            records.push(record);
            accepted++;
          }

          console.log(
            `[ScrapingEngine] Page ${state.pageIndex}: ${accepted} records${page.partial ? ' (partial)' : ''} (total: ${records.length})`
          );

          if (records.length >= job.maxRecords) {
            console.log(`[ScrapingEngine] Reached target: ${job.maxRecords}`);
            state = { ...state, mode: 'done' };
            break;
          }

          const decision = pagination.next(state, page, accepted);
          if (decision.linkHref !== null) {
            console.log(`[ScrapingEngine] Next control on page ${state.pageIndex}: ${decision.linkHref}`);
          }
          state = decision.state;
        } finally {
          page.dispose();
        }
      }
    } catch (error) {
      throw new TraversalError(error, records, pagesScraped);
    }

    console.log(`[ScrapingEngine] Traversal finished at page ${state.pageIndex}: ${records.length} records from ${pagesScraped} page(s)`);

    return {
      records,
      pagesScraped,
      partialPages,
      failedPages,
      finalState: state,
      duration: Date.now() - startTime,
    };
  }
}
