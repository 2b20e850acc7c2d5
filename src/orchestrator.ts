/**
 * Search Orchestrator
 *
 * Runs every target through the site adapters in order; the first adapter
 * that returns an image wins and the rest are not consulted for that target.
 */

import { normalizeText } from './matching/index.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import type { PageSession, SiteAdapter } from './scraper/index.js';
import type { DownloadedImage, RunResult } from './types/index.js';

export interface SearchOptions {
  session: PageSession;
  adapters: readonly SiteAdapter[];
}

async function searchTarget(
  target: string,
  adapters: readonly SiteAdapter[],
  session: PageSession
): Promise<DownloadedImage | null> {
  for (const adapter of adapters) {
    try {
      const image = await adapter.search(target, session);
      if (image) {
        return image;
      }
    } catch (error) {
      logger.error({ target, site: adapter.name, error: errorMessage(error) }, 'Adapter failed');
    }
  }
  return null;
}

export async function searchTargets(
  targetNames: readonly string[],
  { session, adapters }: SearchOptions
): Promise<RunResult> {
  const result: RunResult = { images: [], missing: [] };

  for (const name of targetNames) {
    const target = normalizeText(name);
    logger.info({ name, target }, 'Processing');

    if (!target) {
      logger.warn({ name }, 'Name is empty after normalizing, skipping');
      result.missing.push(name);
      continue;
    }

    const image = await searchTarget(target, adapters, session);

    if (image) {
      result.images.push(image);
      logger.info({ name, site: image.site, path: image.path }, 'Front page collected');
    } else {
      result.missing.push(name);
      logger.warn({ name }, 'Not found or date skipped');
    }
  }

  return result;
}
