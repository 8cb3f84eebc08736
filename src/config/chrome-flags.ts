// ============================================================================
// CHROME LAUNCH FLAGS
// ============================================================================
// Headless listing capture: no images, no automation fingerprint, no throttling

export const CHROME_FLAGS = [
  // =========================================================================
  // SPEED
  // =========================================================================
  // Skip image decoding and download; markup is all we keep
  '--blink-settings=imagesEnabled=false',
  '--mute-audio',

  // Keep timers running while the page is in the background
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',

  // =========================================================================
  // ANTI-DETECTION
  // =========================================================================
  '--disable-blink-features=AutomationControlled',

  // =========================================================================
  // WINDOW CONFIGURATION
  // =========================================================================
  '--no-first-run',
  '--no-default-browser-check',
  '--password-store=basic',
  '--use-mock-keychain',
];

// Flags to ignore from Playwright's defaults
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'];
