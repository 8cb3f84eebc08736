// ============================================================================
// SHARED TYPES - Listing Scraper
// ============================================================================

// Selector Types

/**
 * Extraction rule for one field, resolved once when the mapping is loaded.
 * `selector` is evaluated relative to the record node; an empty selector
 * addresses the record node itself.
 */
export type SelectorSpec =
  | { kind: 'text'; selector: string }
  | { kind: 'attribute'; selector: string; attribute: string };

export type FieldSpecs = Readonly<Record<string, SelectorSpec>>;

// Job Types

export interface JobConfig {
  /** First page to fetch, also the base for synthesized page URLs */
  readonly targetUrl: string;
  /** Selector for one listing item; also the render "ready" selector */
  readonly recordSelector: string;
  /** Selector for the "next page" control */
  readonly paginationSelector: string;
  /** Field that must be non-empty for a record to be accepted */
  readonly identityField: string;
  readonly maxRecords: number;
  /** Delay between page fetches in ms */
  readonly waitTimeMs: number;
  /** Budget for one page's full capture in ms */
  readonly renderTimeoutMs: number;
  readonly fields: FieldSpecs;
}

// Page Types

export interface PageSnapshot {
  url: string;
  html: string;
  /** Captured by the timeout fallback rather than the full load sequence */
  partial: boolean;
}

export type ScrapedRecord = Record<string, string>;

// Pagination Types

export type PaginationMode = 'start' | 'link_follow' | 'param_synthesis' | 'done';

export interface PaginationState {
  /** 0-based index of the page at `currentUrl` */
  pageIndex: number;
  currentUrl: string;
  mode: PaginationMode;
}

// Result Types

export interface FieldCompleteness {
  field: string;
  filled: number;
  total: number;
  /** filled / total, 0 when there are no records */
  ratio: number;
  /** ratio * 100 */
  percent: number;
}

export interface QualityReport {
  totalRecords: number;
  fields: FieldCompleteness[];
  /** Records with at least one empty value */
  incompleteRecords: number;
  /** incompleteRecords / totalRecords, 0 when there are no records */
  incompleteRatio: number;
  incompletePercent: number;
}

export type OutputFormat = 'json' | 'csv';
