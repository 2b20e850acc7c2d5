/**
 * Playwright Browser Factory
 *
 * Manages browser lifecycle and exposes pages as PageSession handles
 */

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Locator, Page } from 'playwright';
import { config, type BrowserChannel } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { BrowserLaunchError, errorMessage } from '../utils/errors.js';
import { StaticHtmlSession } from './static-session.js';
import type { PageElement, PageSession, SessionHandle } from './types.js';

let browser: Browser | null = null;
let context: BrowserContext | null = null;

/**
 * Browser configuration options
 */
export interface BrowserOptions {
  headless?: boolean;
  timeout?: number;
  channels?: readonly BrowserChannel[];
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  text(): Promise<string | null> {
    return this.locator.textContent();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  async query(selector: string): Promise<PageElement | null> {
    const match = this.locator.locator(selector).first();
    return (await match.count()) > 0 ? new PlaywrightElement(match) : null;
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const matches = await this.locator.locator(selector).all();
    return matches.map((match) => new PlaywrightElement(match));
  }
}

/**
 * PageSession backed by a live Playwright page
 */
export class PlaywrightSession implements PageSession {
  constructor(
    private readonly page: Page,
    private readonly navigationTimeoutMs: number = config.browser.navigationTimeoutMs
  ) {}

  async goto(url: string): Promise<void> {
    await navigateTo(this.page, url, { timeout: this.navigationTimeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const matches = await this.page.locator(selector).all();
    return matches.map((match) => new PlaywrightElement(match));
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'attached' });
      return true;
    } catch (error) {
      logger.debug({ selector, timeoutMs, error: errorMessage(error) }, 'Selector did not appear');
      return false;
    }
  }

  async click(selector: string): Promise<boolean> {
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) {
      return false;
    }
    await target.click();
    return true;
  }
}

async function launchChannel(channel: BrowserChannel, headless: boolean): Promise<Browser> {
  return chromium.launch({
    headless,
    ...(channel === 'bundled' ? {} : { channel }),
    // Required for Docker/containerized environments
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  });
}

/**
 * Initialize browser instance, trying each channel in order
 */
export async function initBrowser(options: BrowserOptions = {}): Promise<Browser> {
  if (browser) {
    logger.debug('Browser already initialized');
    return browser;
  }

  const headless = options.headless ?? config.browser.headless;
  const channels = options.channels ?? config.browser.channels;
  const failures: Record<string, string> = {};
  let launched: Browser | null = null;

  for (const channel of channels) {
    logger.info({ channel, headless }, 'Launching browser');
    try {
      launched = await launchChannel(channel, headless);
      break;
    } catch (error) {
      const message = errorMessage(error);
      failures[channel] = message;
      logger.warn({ channel, error: message }, 'Browser channel unavailable');
    }
  }

  if (!launched) {
    throw new BrowserLaunchError('Failed to launch any Chromium browser', { failures });
  }

  browser = launched;

  // Fresh context so cookies and cache are not shared between runs
  context = await launched.newContext({
    userAgent: config.browser.userAgent,
    viewport: { width: 1920, height: 1080 },
    locale: 'el-GR',
    timezoneId: config.scheduler.timezone,
    extraHTTPHeaders: {
      'Accept-Language': 'el-GR,el;q=0.9,en-US;q=0.8,en;q=0.7',
    },
  });

  context.setDefaultTimeout(options.timeout ?? config.browser.navigationTimeoutMs);

  logger.info('Browser initialized successfully');
  return launched;
}

/**
 * Get or create a new page
 */
export async function createPage(): Promise<Page> {
  if (!context) {
    await initBrowser();
  }

  if (!context) {
    throw new BrowserLaunchError('Failed to initialize browser context');
  }

  const page = await context.newPage();

  // Block unnecessary resource types for faster loading
  await page.route('**/*', (route) => {
    const resourceType = route.request().resourceType();
    const blockedTypes = ['media', 'font'];

    if (blockedTypes.includes(resourceType)) {
      return route.abort();
    }
    return route.continue();
  });

  return page;
}

/**
 * Navigate to URL
 */
export async function navigateTo(
  page: Page,
  url: string,
  options: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle'; timeout?: number } = {}
): Promise<void> {
  const waitUntil = options.waitUntil ?? 'domcontentloaded';

  logger.debug({ url, waitUntil }, 'Navigating to URL');

  try {
    await page.goto(url, { waitUntil, timeout: options.timeout });
    logger.debug({ url }, 'Navigation successful');
  } catch (error) {
    logger.error({ url, error: errorMessage(error) }, 'Navigation failed');
    throw error;
  }
}

/**
 * Close browser and cleanup
 */
export async function closeBrowser(): Promise<void> {
  if (context) {
    try {
      await context.close();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Error closing context');
    }
    context = null;
  }

  if (browser) {
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Error closing browser');
    }
    browser = null;
  }
}

/**
 * Open the single session a run uses
 */
export async function openSession(
  mode: 'playwright' | 'static' = config.browser.mode
): Promise<SessionHandle> {
  if (mode === 'static') {
    logger.info('Using static HTML session');
    return { session: new StaticHtmlSession(), close: async () => {} };
  }

  await initBrowser();
  const page = await createPage();

  return {
    session: new PlaywrightSession(page),
    close: closeBrowser,
  };
}
