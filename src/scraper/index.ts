/**
 * Scraper Module
 *
 * Site adapters, page sessions and the image fetcher
 */

export { FrontpagesAdapter, resolveHighResUrl } from './frontpages.js';
export { ZouglaAdapter, isLowResSrc, type ZouglaAdapterOptions } from './zougla.js';
export { ImageFetcher, sanitizeFilename, type ImageFetcherOptions } from './fetcher.js';

// Page sessions
export {
  initBrowser,
  closeBrowser,
  createPage,
  navigateTo,
  openSession,
  PlaywrightSession,
} from './browser.js';
export { StaticHtmlSession, httpHtmlLoader, type HtmlLoader } from './static-session.js';

export type { BrowserOptions } from './browser.js';
export type {
  Fetcher,
  Listing,
  PageElement,
  PageSession,
  SessionHandle,
  SiteAdapter,
  SiteAdapterOptions,
} from './types.js';
