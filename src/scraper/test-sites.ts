/**
 * Live Site Check
 *
 * Looks up one paper on both sites and downloads what it finds.
 * Run with: npx tsx src/scraper/test-sites.ts "Καθημερινή"
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { normalizeText } from '../matching/index.js';
import { ensureDailyDirectory } from '../output/directory.js';
import { logger } from '../utils/logger.js';
import { openSession } from './browser.js';
import { ImageFetcher } from './fetcher.js';
import { FrontpagesAdapter } from './frontpages.js';
import { ZouglaAdapter } from './zougla.js';

async function testSites(): Promise<void> {
  const name = process.argv[2] ?? 'Καθημερινή';
  const target = normalizeText(name);
  const outputDir = await ensureDailyDirectory(join(tmpdir(), 'frontpages-check'));

  logger.info({ name, target, outputDir }, 'Starting live site check');

  const fetcher = new ImageFetcher({ outputDir });
  const handle = await openSession();

  try {
    for (const adapter of [new FrontpagesAdapter({ fetcher }), new ZouglaAdapter({ fetcher })]) {
      const image = await adapter.search(target, handle.session);
      logger.info({ site: adapter.name, found: image !== null, path: image?.path }, 'Site result');
    }
  } finally {
    await handle.close();
  }

  logger.info('=== Live Site Check Complete ===');
}

testSites().catch((error) => {
  logger.fatal({ err: error }, 'Check failed');
  process.exit(1);
});
