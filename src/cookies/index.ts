/**
 * Browser cookie extraction and the per-domain cookie cache.
 */

export { CookieCache, isStale } from './cookie-cache.js';
export type { CookieCacheOptions, GetCookiesOptions } from './cookie-cache.js';

export { FileCookieCacheStore } from './cache-store.js';

export { BrowserCookieExtractor, toCookieMap } from './browser-extractor.js';
export type { BrowserCookieExtractorOptions } from './browser-extractor.js';

export { createBrowserReaders, currentProfileEnvironment } from './browser-profiles.js';
export type { ProfileEnvironment } from './browser-profiles.js';

export { detectDefaultBrowser } from './default-browser.js';
