/**
 * Scraper Types
 */

import type { NormalizedName } from '../matching/index.js';
import type { DownloadedImage, SiteTag } from '../types/index.js';

/**
 * A DOM element reachable through a page session
 */
export interface PageElement {
  /** Text content, or null when the element has none */
  text(): Promise<string | null>;
  attribute(name: string): Promise<string | null>;
  /** First descendant matching the selector */
  query(selector: string): Promise<PageElement | null>;
  queryAll(selector: string): Promise<PageElement[]>;
}

/**
 * Long-lived page handle threaded through every adapter call
 */
export interface PageSession {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  queryAll(selector: string): Promise<PageElement[]>;
  /**
   * Wait until the selector is present
   * @returns false when it did not appear in time
   */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  /**
   * Click the first element matching the selector
   * @returns false when nothing was clicked
   */
  click(selector: string): Promise<boolean>;
}

/**
 * Session plus its teardown
 */
export interface SessionHandle {
  session: PageSession;
  close(): Promise<void>;
}

/**
 * Raw listing data extracted from an index page
 */
export interface Listing {
  label: string;
  dateText: string | null;
  /** Preview image src or detail page href */
  ref: string | null;
}

/**
 * Writes a resolved image to the run's output directory
 */
export interface Fetcher {
  fetch(url: string, filename: string): Promise<string | null>;
}

/**
 * Per-site search: locate on index, validate date, resolve high-res, fetch
 */
export interface SiteAdapter {
  readonly site: SiteTag;
  readonly name: string;
  search(target: NormalizedName, session: PageSession): Promise<DownloadedImage | null>;
}

/**
 * Options shared by both site adapters
 */
export interface SiteAdapterOptions {
  fetcher: Fetcher;
  indexUrl?: string;
  clock?: () => Date;
}
