// ============================================================================
// SCRAPER ERROR TYPES
// ============================================================================
// Categorized errors for retry decisions and run reporting

/**
 * Categories of scraping errors with different handling strategies
 */
export enum ScrapeErrorType {
  /** Mapping or job parameters are invalid - fatal before any fetch */
  CONFIG = 'config',
  /** Page capture ran out of time with no usable fallback markup */
  TIMEOUT = 'timeout',
  /** Rendered markup or record selector could not be parsed */
  PARSE = 'parse',
  /** Attempt finished with zero accepted records */
  EMPTY = 'empty',
  /** Network-related errors (connection, DNS, etc.) */
  NETWORK = 'network',
  /** Navigation errors (page load, redirect issues) */
  NAVIGATION = 'navigation',
  /** Unknown/unexpected errors */
  UNKNOWN = 'unknown',
}

/**
 * Structured error record kept in run results
 */
export interface ScrapeError {
  /** Error category */
  type: ScrapeErrorType;
  /** Human-readable error message */
  message: string;
  /** Whether this error type can be retried */
  retriable: boolean;
  /** Original error if wrapped */
  cause?: Error;
  /** Page URL where the error occurred */
  url?: string;
  /** 1-based attempt number inside the retry envelope */
  attempt?: number;
  /** Timestamp when error occurred */
  timestamp: number;
}

/**
 * Configuration for the run-level retry envelope
 */
export interface RetryConfig {
  /** Total number of attempts, including the first */
  maxAttempts: number;
  /** Delay between attempts in ms */
  retryDelay: number;
  /** Multiplier applied per attempt (1 = fixed delay) */
  backoffMultiplier: number;
  /** Maximum delay cap in ms */
  maxDelay: number;
  /** Which error types to retry */
  retriableTypes: ScrapeErrorType[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  retryDelay: 2000,
  backoffMultiplier: 1,
  maxDelay: 10000,
  retriableTypes: [
    ScrapeErrorType.TIMEOUT,
    ScrapeErrorType.PARSE,
    ScrapeErrorType.EMPTY,
    ScrapeErrorType.NETWORK,
    ScrapeErrorType.NAVIGATION,
    ScrapeErrorType.UNKNOWN,
  ],
};

/**
 * Base class for errors raised by this package
 */
export class ScraperError extends Error {
  readonly type: ScrapeErrorType;

  constructor(message: string, type: ScrapeErrorType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScraperError';
    this.type = type;
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ScrapeErrorType.CONFIG, options);
    this.name = 'ConfigError';
  }
}

export class RenderTimeoutError extends ScraperError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, ScrapeErrorType.TIMEOUT, options);
    this.name = 'RenderTimeoutError';
    this.url = url;
  }
}

export class ParseError extends ScraperError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, ScrapeErrorType.PARSE, options);
    this.name = 'ParseError';
    this.url = url;
  }
}

export class EmptyResultError extends ScraperError {
  constructor(message = 'Traversal finished with zero accepted records') {
    super(message, ScrapeErrorType.EMPTY);
    this.name = 'EmptyResultError';
  }
}

/**
 * Check if an error type is retriable based on config
 */
export function isRetriable(errorType: ScrapeErrorType, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  return config.retriableTypes.includes(errorType);
}

/**
 * Calculate delay before the next attempt (attempt is 0-based)
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.retryDelay * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelay);
}

/**
 * Classify an error into a ScrapeErrorType based on its class or message
 */
export function classifyError(error: unknown): ScrapeErrorType {
  if (error instanceof ScraperError) {
    return error.type;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  if (
    message.includes('net::') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('connection')
  ) {
    return ScrapeErrorType.NETWORK;
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('exceeded')
  ) {
    return ScrapeErrorType.TIMEOUT;
  }

  if (
    message.includes('navigation') ||
    message.includes('navigate') ||
    message.includes('page.goto')
  ) {
    return ScrapeErrorType.NAVIGATION;
  }

  if (message.includes('parse') || message.includes('syntax')) {
    return ScrapeErrorType.PARSE;
  }

  return ScrapeErrorType.UNKNOWN;
}

/**
 * Create a ScrapeError with automatic classification
 */
export function wrapError(
  error: unknown,
  context?: Partial<Pick<ScrapeError, 'url' | 'attempt'>>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): ScrapeError {
  const type = classifyError(error);
  const url = error instanceof RenderTimeoutError || error instanceof ParseError ? error.url : undefined;

  return {
    type,
    message: error instanceof Error ? error.message : String(error),
    retriable: isRetriable(type, config),
    cause: error instanceof Error ? error : undefined,
    timestamp: Date.now(),
    ...(url !== undefined ? { url } : {}),
    ...context,
  };
}
