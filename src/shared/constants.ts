// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export const DEFAULT_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const;

/** JSON endpoints and small metadata pages. */
export const API_TIMEOUT_MS = 10_000;

/** Full problem pages. */
export const PAGE_TIMEOUT_MS = 15_000;

/** Connection-level failures worth one more try. Timeouts are not retried. */
export const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'EPIPE'];

// ---------------------------------------------------------------------------
// Browsers
// ---------------------------------------------------------------------------

export const BROWSER_NAMES = {
  ZEN: 'zen',
  FIREFOX: 'firefox',
  LIBREWOLF: 'librewolf',
  CHROME: 'chrome',
  CHROMIUM: 'chromium',
  EDGE: 'edge',
  BRAVE: 'brave',
  OPERA: 'opera',
  VIVALDI: 'vivaldi',
} as const;

export type BrowserName = (typeof BROWSER_NAMES)[keyof typeof BROWSER_NAMES];

/** Probe order when no preferred or default browser yields cookies. */
export const BROWSER_PRIORITY: readonly BrowserName[] = [
  BROWSER_NAMES.ZEN,
  BROWSER_NAMES.FIREFOX,
  BROWSER_NAMES.LIBREWOLF,
  BROWSER_NAMES.CHROME,
  BROWSER_NAMES.CHROMIUM,
  BROWSER_NAMES.EDGE,
  BROWSER_NAMES.BRAVE,
  BROWSER_NAMES.OPERA,
  BROWSER_NAMES.VIVALDI,
];

export function isBrowserName(value: string): value is BrowserName {
  return BROWSER_PRIORITY.some((name) => name === value);
}

// ---------------------------------------------------------------------------
// Cookie cache
// ---------------------------------------------------------------------------

export const DEFAULT_COOKIE_MAX_AGE_HOURS = 24;

/** `cookie_cache_max_age_hours` value that disables time-based expiry. */
export const NEVER_EXPIRE = -1;

export const MS_PER_HOUR = 3_600_000;

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Applies when NODE_ENV is unset; read by both env.ts and the logger. */
export const DEFAULT_NODE_ENV = 'production';

export const DEFAULT_LOG_LEVEL = 'warn';
