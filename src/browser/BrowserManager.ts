// ============================================================================
// BROWSER MANAGER - Playwright session for one scraping run
// ============================================================================

import { chromium, type Browser, type BrowserContext, type LaunchOptions, type Page } from 'playwright';
import { CHROME_FLAGS, IGNORED_DEFAULT_ARGS } from '../config/chrome-flags.js';
import { DEFAULT_USER_AGENT, DEFAULT_VIEWPORT } from '../config/defaults.js';
import type { RenderPage } from '../scraper/RenderController.js';

export interface SessionConfig {
  headless: boolean;
  userAgent: string;
  viewport: { width: number; height: number };
  /** Installed browser channel to try before the bundled Chromium */
  chromeChannel?: string;
  /** Abort image requests at the network layer */
  blockImages: boolean;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  headless: true,
  userAgent: DEFAULT_USER_AGENT,
  viewport: DEFAULT_VIEWPORT,
  blockImages: true,
};

export interface BrowserSession {
  id: string;
  browser: Browser;
  context: BrowserContext;
  page: Page;
  config: SessionConfig;
}

/**
 * RenderPage backed by a Playwright page
 */
export class PlaywrightRenderPage implements RenderPage {
  constructor(private page: Page) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  async content(): Promise<string> {
    return this.page.content();
  }
}

export class BrowserManager {
  async createSession(sessionId: string, config: SessionConfig = DEFAULT_SESSION_CONFIG): Promise<BrowserSession> {
    console.log(`[BrowserManager] Creating session ${sessionId}`);

    const launchOptions: LaunchOptions = {
      headless: config.headless,
      args: CHROME_FLAGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
    };

    let browser: Browser;
    if (config.chromeChannel) {
      try {
        console.log(`[BrowserManager] Attempting to use installed ${config.chromeChannel}...`);
        browser = await chromium.launch({ ...launchOptions, channel: config.chromeChannel });
      } catch (channelError) {
        console.log(`[BrowserManager] ${config.chromeChannel} not found, using bundled Chromium:`, channelError);
        browser = await chromium.launch(launchOptions);
      }
    } else {
      browser = await chromium.launch(launchOptions);
    }

    try {
      const context = await browser.newContext({
        viewport: config.viewport,
        userAgent: config.userAgent,
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
        hasTouch: false,
        isMobile: false,
        deviceScaleFactor: 1,
      });

      if (config.blockImages) {
        await context.route('**/*', (route) =>
          route.request().resourceType() === 'image' ? route.abort() : route.continue()
        );
      }

      const page = await context.newPage();

      // Alerts and confirms would block the load sequence
      page.on('dialog', (dialog) => {
        dialog.dismiss().catch((error: unknown) => {
          console.warn(`[BrowserManager] Could not dismiss ${dialog.type()} dialog:`, error);
        });
      });

      console.log(`[BrowserManager] Session ${sessionId} created successfully`);
      return { id: sessionId, browser, context, page, config };
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async destroySession(session: BrowserSession): Promise<void> {
    console.log(`[BrowserManager] Destroying session ${session.id}`);

    try {
      if (!session.page.isClosed()) {
        await session.page.close();
      }
      await session.context.close();
    } catch (error) {
      console.error(`[BrowserManager] Error closing context for session ${session.id}:`, error);
    } finally {
      await session.browser.close();
    }
  }
}

/**
 * Run `fn` with a fresh browser session and tear the session down on every exit path
 */
export async function withBrowserSession<T>(
  sessionId: string,
  config: SessionConfig,
  fn: (page: RenderPage, session: BrowserSession) => Promise<T>,
  manager: BrowserManager = new BrowserManager()
): Promise<T> {
  const session = await manager.createSession(sessionId, config);
  try {
    return await fn(new PlaywrightRenderPage(session.page), session);
  } finally {
    await manager.destroySession(session);
  }
}
