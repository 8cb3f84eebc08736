// ============================================================================
// DEFAULTS
// ============================================================================

/**
 * Fixed client identity presented to every site
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

/**
 * Pauses inside one page capture, in ms
 */
export interface RenderTiming {
  /** After navigation, before waiting for records */
  initialPaintMs: number;
  /** After scrolling to the bottom, for lazy content */
  settleMs: number;
  /** Budget for the markup capture after a failed load sequence */
  fallbackCaptureMs: number;
}

export const DEFAULT_RENDER_TIMING: RenderTiming = {
  initialPaintMs: 2000,
  settleMs: 8000,
  fallbackCaptureMs: 15000,
};

export const JOB_DEFAULTS = {
  paginationSelector: 'a.next-page',
  identityField: 'product_name',
  maxRecords: 100,
  waitTimeSeconds: 2,
  renderTimeoutSeconds: 45,
  format: 'json',
  output: 'output/records',
} as const;
