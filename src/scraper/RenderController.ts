// ============================================================================
// RENDER CONTROLLER
// ============================================================================
// Drives the run's single rendering session: navigate, wait for records,
// scroll for lazy content, capture markup. Falls back to a partial capture
// when the sequence times out.

import type { PageSnapshot } from '../shared/types.js';
import { DEFAULT_RENDER_TIMING, type RenderTiming } from '../config/defaults.js';
import { RenderTimeoutError } from './types/errors.js';
import { delay, withTimeout, type Sleep } from './utils/timing.js';

/**
 * Page operations the controller needs from a rendering session.
 * Implemented over Playwright by PlaywrightRenderPage.
 */
export interface RenderPage {
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Resolve once at least one matching element is attached */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  scrollToBottom(): Promise<void>;
  /** Full document markup */
  content(): Promise<string>;
}

export type RenderResult =
  | { outcome: 'complete'; snapshot: PageSnapshot }
  | { outcome: 'partial'; snapshot: PageSnapshot; cause: unknown }
  | { outcome: 'failed'; error: RenderTimeoutError };

export interface RenderControllerOptions {
  timing?: Partial<RenderTiming>;
  sleep?: Sleep;
  now?: () => number;
}

export class RenderController {
  private page: RenderPage;
  private timing: RenderTiming;
  private sleep: Sleep;
  private now: () => number;

  constructor(page: RenderPage, options: RenderControllerOptions = {}) {
    this.page = page;
    this.timing = { ...DEFAULT_RENDER_TIMING, ...options.timing };
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  /**
   * Capture one page. Never throws: load failures become a partial snapshot,
   * or a failed result when nothing usable could be captured.
   */
  async fetch(url: string, readySelector: string, timeoutMs: number): Promise<RenderResult> {
    try {
      const html = await this.captureFull(url, readySelector, timeoutMs);
      return { outcome: 'complete', snapshot: { url, html, partial: false } };
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      console.warn(`[RenderController] Load sequence failed for ${url} (${reason}); attempting partial capture`);
      return this.captureFallback(url, cause);
    }
  }

  private async captureFull(url: string, readySelector: string, timeoutMs: number): Promise<string> {
    const deadline = this.now() + timeoutMs;
    const timedOut = () => new RenderTimeoutError(url, `Render budget of ${timeoutMs}ms exhausted for ${url}`);
    const remaining = (): number => {
      const ms = deadline - this.now();
      if (ms <= 0) throw timedOut();
      return ms;
    };

    await this.page.navigate(url, remaining());
    await this.pause(this.timing.initialPaintMs, remaining, timedOut);
    await this.page.waitForSelector(readySelector, remaining());
    await withTimeout(this.page.scrollToBottom(), remaining(), timedOut);
    await this.pause(this.timing.settleMs, remaining, timedOut);
    const html = await withTimeout(this.page.content(), remaining(), timedOut);

    if (!html.trim()) {
      throw new Error(`Empty markup captured for ${url}`);
    }
    return html;
  }

  /**
   * Sleep for `ms`, failing if that would cross the deadline
   */
  private async pause(ms: number, remaining: () => number, timedOut: () => Error): Promise<void> {
    const available = remaining();
    if (ms >= available) {
      await this.sleep(available);
      throw timedOut();
    }
    await this.sleep(ms);
  }

  private async captureFallback(url: string, cause: unknown): Promise<RenderResult> {
    let html = '';
    try {
      html = await withTimeout(
        this.page.content(),
        this.timing.fallbackCaptureMs,
        () => new RenderTimeoutError(url, `Partial capture timed out after ${this.timing.fallbackCaptureMs}ms for ${url}`)
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[RenderController] Partial capture failed for ${url}: ${reason}`);
      return {
        outcome: 'failed',
        error: new RenderTimeoutError(url, `No markup captured for ${url}: ${reason}`, { cause: error }),
      };
    }

    if (!html.trim()) {
      console.error(`[RenderController] Partial capture returned empty markup for ${url}`);
      return {
        outcome: 'failed',
        error: new RenderTimeoutError(url, `No markup captured for ${url}`, { cause }),
      };
    }

    console.log(`[RenderController] Partial capture for ${url}: ${html.length} chars`);
    return { outcome: 'partial', snapshot: { url, html, partial: true }, cause };
  }
}
