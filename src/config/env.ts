// ============================================================================
// ENVIRONMENT
// ============================================================================
// Browser settings taken from the environment (.env is loaded by the CLI)

import { DEFAULT_USER_AGENT } from './defaults.js';

export interface BrowserEnvironment {
  headless: boolean;
  userAgent: string;
  /** Installed browser channel to try first, e.g. "chrome" */
  chromeChannel?: string;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function readBrowserEnvironment(env: NodeJS.ProcessEnv = process.env): BrowserEnvironment {
  const channel = env.SCRAPER_CHROME_CHANNEL?.trim();

  return {
    headless: parseBoolean(env.SCRAPER_HEADLESS, true),
    userAgent: env.SCRAPER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    ...(channel ? { chromeChannel: channel } : {}),
  };
}
