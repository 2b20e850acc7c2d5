/**
 * Static HTML Session
 *
 * PageSession over plain HTTP GET and cheerio, for pages that need no script
 */

import axios from 'axios';
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { PageElement, PageSession } from './types.js';

/**
 * Returns the HTML served at a URL
 */
export type HtmlLoader = (url: string) => Promise<string>;

export const httpHtmlLoader: HtmlLoader = async (url) => {
  const response = await axios.get<string>(url, {
    responseType: 'text',
    timeout: config.browser.navigationTimeoutMs,
    headers: { 'User-Agent': config.browser.userAgent },
  });
  return response.data;
};

class StaticElement implements PageElement {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: Cheerio<AnyNode>
  ) {}

  async text(): Promise<string | null> {
    return this.node.text();
  }

  async attribute(name: string): Promise<string | null> {
    return this.node.attr(name) ?? null;
  }

  async query(selector: string): Promise<PageElement | null> {
    const match = this.node.find(selector).first();
    return match.length > 0 ? new StaticElement(this.$, match) : null;
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    return wrapAll(this.$, this.node.find(selector));
  }
}

function wrapAll($: CheerioAPI, nodes: Cheerio<AnyNode>): PageElement[] {
  return nodes.toArray().map((node) => new StaticElement($, $(node)));
}

export class StaticHtmlSession implements PageSession {
  private document: CheerioAPI = cheerio.load('');
  private url = 'about:blank';

  constructor(private readonly loadHtml: HtmlLoader = httpHtmlLoader) {}

  async goto(url: string): Promise<void> {
    logger.debug({ url }, 'Loading page');
    const html = await this.loadHtml(url);
    this.document = cheerio.load(html);
    this.url = url;
  }

  currentUrl(): string {
    return this.url;
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    return wrapAll(this.document, this.document(selector));
  }

  async waitFor(selector: string, _timeoutMs?: number): Promise<boolean> {
    return this.document(selector).length > 0;
  }

  async click(_selector?: string): Promise<boolean> {
    return false;
  }
}
