export type {
  FieldSpecs,
  JobConfig,
  OutputFormat,
  PageSnapshot,
  PaginationMode,
  PaginationState,
  QualityReport,
  FieldCompleteness,
  ScrapedRecord,
  SelectorSpec,
} from './shared/types.js';

export { buildJobConfig, loadFieldMapping, type JobInput } from './config/JobConfigLoader.js';
export { DEFAULT_RENDER_TIMING, DEFAULT_USER_AGENT, JOB_DEFAULTS, type RenderTiming } from './config/defaults.js';
export { BrowserManager, PlaywrightRenderPage, withBrowserSession, type SessionConfig } from './browser/BrowserManager.js';
export { parseFieldMapping, parseSelectorSpec } from './scraper/utils/SelectorSpec.js';
export { resolveUrl } from './scraper/utils/ValueExtractor.js';
export { ParsedPage, extract, extractRecords } from './scraper/ExtractionEngine.js';
export { PaginationHandler, synthesizePageUrl } from './scraper/handlers/PaginationHandler.js';
export { RenderController, type RenderPage, type RenderResult } from './scraper/RenderController.js';
export { ScrapingEngine, TraversalError, type PageRenderer, type TraversalResult } from './scraper/ScrapingEngine.js';
export { runWithRetry, type RetryOutcome } from './scraper/RetryEnvelope.js';
export { computeQualityReport, formatQualityReport } from './scraper/QualityReporter.js';
export { runJob, type JobResult, type RunJobOptions } from './scraper/JobRunner.js';
export { saveRecords, toCSV, toJSON } from './output/OutputWriter.js';
export {
  ConfigError,
  EmptyResultError,
  ParseError,
  RenderTimeoutError,
  ScrapeErrorType,
  ScraperError,
  type ScrapeError,
} from './scraper/types/errors.js';
