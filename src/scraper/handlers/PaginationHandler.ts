// ============================================================================
// PAGINATION HANDLER
// ============================================================================
// Decides after each page how to reach the next one: follow the "next" link,
// synthesize a page-number URL from the base URL, or stop

import type { PaginationMode, PaginationState } from '../../shared/types.js';
import type { ParsedPage } from '../ExtractionEngine.js';
import { resolveUrl } from '../utils/ValueExtractor.js';

/**
 * Pagination configuration
 */
export interface PaginationConfig {
  /** Original start URL; synthesized URLs are built from it */
  baseUrl: string;
  /** CSS selector for the next page link */
  selector: string;
  /** Query parameter carrying the page number */
  pageParam?: string;
}

/**
 * Outcome of one pagination decision
 */
export interface PaginationDecision {
  state: PaginationState;
  /** Link href found on the page, if any (kept for logging) */
  linkHref: string | null;
}

const DEFAULT_PAGE_PARAM = 'page';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function pageParamPattern(pageParam: string): RegExp {
  return new RegExp(`([?&]${escapeRegExp(pageParam)}=)(\\d*)`);
}

/**
 * Whether an href carries an explicit page-number query token
 */
export function hasPageMarker(href: string, pageParam: string = DEFAULT_PAGE_PARAM): boolean {
  return pageParamPattern(pageParam).test(href);
}

/**
 * Build the URL of page `pageIndex` from the base URL.
 * Appends ?page=N / &page=N, or increments a page parameter the base URL already has.
 */
export function synthesizePageUrl(
  baseUrl: string,
  pageIndex: number,
  pageParam: string = DEFAULT_PAGE_PARAM
): string {
  const pattern = pageParamPattern(pageParam);
  const existing = baseUrl.match(pattern);

  if (existing) {
    const start = existing[2] ? parseInt(existing[2], 10) : 0;
    return baseUrl.replace(pattern, (_match, prefix: string) => `${prefix}${start + pageIndex}`);
  }

  const hashIndex = baseUrl.indexOf('#');
  const url = hashIndex === -1 ? baseUrl : baseUrl.slice(0, hashIndex);
  const hash = hashIndex === -1 ? '' : baseUrl.slice(hashIndex);
  const separator = url.includes('?') ? '&' : '?';

  return `${url}${separator}${pageParam}=${pageIndex}${hash}`;
}

/**
 * Href-like value of the first element matching the pagination selector
 */
export function findNextHref(page: ParsedPage, selector: string): string | null {
  const element = page.query(selector);
  if (!element) return null;

  const href = element.getAttribute('href') ?? element.getAttribute('data-href');
  const trimmed = href?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Pagination state machine: start -> (link_follow | param_synthesis)* -> done
 */
export class PaginationHandler {
  private config: PaginationConfig;
  private pageParam: string;

  constructor(config: PaginationConfig) {
    this.config = config;
    this.pageParam = config.pageParam || DEFAULT_PAGE_PARAM;
  }

  /**
   * State before the first page is fetched
   */
  initialState(): PaginationState {
    return {
      pageIndex: 0,
      currentUrl: this.config.baseUrl,
      mode: 'start',
    };
  }

  /**
   * Decide the next state from the page just extracted.
   * `acceptedCount` is the number of records this page contributed.
   */
  next(state: PaginationState, page: ParsedPage | null, acceptedCount: number): PaginationDecision {
    const linkHref = page ? findNextHref(page, this.config.selector) : null;

    if (state.mode === 'done' || acceptedCount <= 0) {
      return { state: this.transition(state, 'done', state.currentUrl), linkHref };
    }

    if (linkHref !== null && hasPageMarker(linkHref, this.pageParam)) {
      const nextUrl = resolveUrl(linkHref, state.currentUrl);
      return { state: this.transition(state, 'link_follow', nextUrl), linkHref };
    }

    const nextUrl = synthesizePageUrl(this.config.baseUrl, state.pageIndex + 1, this.pageParam);
    return { state: this.transition(state, 'param_synthesis', nextUrl), linkHref };
  }

  private transition(state: PaginationState, mode: PaginationMode, url: string): PaginationState {
    if (mode === 'done') {
      return { ...state, mode };
    }

    const nextState: PaginationState = {
      pageIndex: state.pageIndex + 1,
      currentUrl: url,
      mode,
    };

    console.log(`[PaginationHandler] ${mode} -> page ${nextState.pageIndex}: ${url}`);
    return nextState;
  }
}
