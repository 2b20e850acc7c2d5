/**
 * Frontpages.gr Adapter
 *
 * Finds a paper on the frontpages.gr index and derives the high-resolution
 * image from its thumbnail URL
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { normalizeText, isToday, type NormalizedName } from '../matching/index.js';
import type { DownloadedImage } from '../types/index.js';
import type { Fetcher, Listing, PageSession, SiteAdapter, SiteAdapterOptions } from './types.js';

const FRONTPAGES = config.sites.frontpages;

/**
 * Rewrite a "...300.jpg" thumbnail into its "...I.jpg" full-size variant.
 * Returns null when the thumbnail does not carry the expected suffix.
 */
export function resolveHighResUrl(thumbnailSrc: string, baseUrl: string = FRONTPAGES.indexUrl): string | null {
  const url = new URL(thumbnailSrc, baseUrl);

  if (!url.pathname.endsWith(FRONTPAGES.lowResSuffix)) {
    return null;
  }

  url.pathname = url.pathname.slice(0, -FRONTPAGES.lowResSuffix.length) + FRONTPAGES.highResSuffix;
  return url.toString();
}

async function extractListings(session: PageSession, target: NormalizedName): Promise<Listing[]> {
  const entries = await session.queryAll(FRONTPAGES.selectors.entry);
  logger.debug({ count: entries.length }, 'Frontpages entries found');

  const listings: Listing[] = [];

  for (const entry of entries) {
    const nameEl = await entry.query(FRONTPAGES.selectors.label);
    if (!nameEl) {
      continue;
    }

    const label = (await nameEl.text()) ?? '';
    if (normalizeText(label) !== target) {
      continue;
    }

    const dateEl = await entry.query(FRONTPAGES.selectors.date);
    const imgEl = await entry.query(FRONTPAGES.selectors.preview);

    listings.push({
      label,
      dateText: dateEl ? await dateEl.text() : null,
      ref: imgEl ? await imgEl.attribute('src') : null,
    });
  }

  return listings;
}

export class FrontpagesAdapter implements SiteAdapter {
  readonly site = FRONTPAGES.tag;
  readonly name = FRONTPAGES.name;

  private readonly fetcher: Fetcher;
  private readonly indexUrl: string;
  private readonly clock: () => Date;

  constructor(options: SiteAdapterOptions) {
    this.fetcher = options.fetcher;
    this.indexUrl = options.indexUrl ?? FRONTPAGES.indexUrl;
    this.clock = options.clock ?? (() => new Date());
  }

  async search(target: NormalizedName, session: PageSession): Promise<DownloadedImage | null> {
    logger.info({ target, site: this.name }, 'Checking site');

    try {
      await session.goto(this.indexUrl);

      const listings = await extractListings(session, target);
      if (listings.length === 0) {
        logger.info({ target, site: this.name }, 'Paper not listed');
        return null;
      }

      const thumbnailSrc = this.pickThumbnail(listings, target);
      if (!thumbnailSrc) {
        return null;
      }

      const assetUrl = resolveHighResUrl(thumbnailSrc, this.indexUrl);
      if (!assetUrl) {
        logger.warn({ target, src: thumbnailSrc }, 'Could not construct high-res URL');
        return null;
      }

      logger.debug({ target, assetUrl }, 'Constructed high-res URL');

      const path = await this.fetcher.fetch(assetUrl, `${target}_${this.site}.jpg`);
      return path ? { target, site: this.site, path, sourceUrl: assetUrl } : null;
    } catch (error) {
      logger.warn({ target, site: this.name, error: errorMessage(error) }, 'Site search failed');
      return null;
    }
  }

  /**
   * Any stale match ends the search; a match without a thumbnail defers to the next one
   */
  private pickThumbnail(listings: readonly Listing[], target: NormalizedName): string | null {
    const now = this.clock();
    for (const listing of listings) {
      if (!isToday(listing.dateText, now)) {
        return null;
      }
      if (listing.ref) {
        return listing.ref;
      }
      logger.debug({ target, label: listing.label }, 'Listing has no thumbnail, checking next match');
    }

    logger.warn({ target }, 'No matching listing has a thumbnail');
    return null;
  }
}
