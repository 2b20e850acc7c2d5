/**
 * Application configuration
 */

import { env } from './env.js';

export type BrowserChannel = 'chrome' | 'msedge' | 'bundled';

function parseChannels(value: string): BrowserChannel[] {
  const channels: BrowserChannel[] = [];
  for (const raw of value.split(',')) {
    const channel = raw.trim();
    if (channel === 'chrome' || channel === 'msedge' || channel === 'bundled') {
      channels.push(channel);
    }
  }
  return channels.length > 0 ? channels : ['bundled'];
}

// No consent overlay on the newspapers index at present.
const ZOUGLA_POPUP_SELECTORS: readonly string[] = [];

export const config = {
  app: {
    name: 'daily-frontpages',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  input: {
    csvPath: env.TARGETS_CSV,
    nameColumn: 'NewspaperName',
    maxNameLength: env.MAX_NAME_LENGTH,
  },

  output: {
    rootDir: env.OUTPUT_ROOT,
    documentPrefix: 'Papers',
  },

  browser: {
    mode: env.BROWSER_MODE,
    channels: parseChannels(env.BROWSER_CHANNELS),
    headless: env.HEADLESS,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    userAgent: env.USER_AGENT,
  },

  download: {
    timeoutMs: env.DOWNLOAD_TIMEOUT_MS,
  },

  document: {
    dpi: env.PDF_DPI,
  },

  sites: {
    frontpages: {
      tag: 'fp',
      name: 'Frontpages.gr',
      indexUrl: 'https://www.frontpages.gr/',
      selectors: {
        entry: '.thumber',
        label: '.paperName a',
        date: '.paperdate',
        preview: 'img',
      },
      lowResSuffix: '300.jpg',
      highResSuffix: 'I.jpg',
    },
    zougla: {
      tag: 'zg',
      name: 'Zougla.gr',
      indexUrl: 'https://www.zougla.gr/newspapers/',
      selectors: {
        block: '.newspaper-block',
        info: '.newspaper-info',
        label: 'strong',
        detailLink: '.front-img a',
        cover: '.newspaper-cover img',
        image: 'img',
      },
      popupDismissSelectors: ZOUGLA_POPUP_SELECTORS,
      coverWaitMs: 15000,
      lowResMarkers: ['-sm.', '300x', '150x'],
    },
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
