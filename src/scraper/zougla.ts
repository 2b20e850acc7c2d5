/**
 * Zougla.gr Adapter
 *
 * Finds a paper on the zougla.gr newspapers index, follows its detail page
 * and picks the full-size cover image there
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { normalizeText, isToday, type NormalizedName } from '../matching/index.js';
import type { DownloadedImage } from '../types/index.js';
import type {
  Fetcher,
  Listing,
  PageSession,
  SiteAdapter,
  SiteAdapterOptions,
} from './types.js';

const ZOUGLA = config.sites.zougla;
const BLOCK_DATE = /(\d{2}\/\d{2}\/\d{4})/;

export interface ZouglaAdapterOptions extends SiteAdapterOptions {
  popupSelectors?: readonly string[];
  coverWaitMs?: number;
}

async function extractListings(session: PageSession, target: NormalizedName): Promise<Listing[]> {
  const blocks = await session.queryAll(ZOUGLA.selectors.block);
  logger.debug({ count: blocks.length }, 'Zougla blocks found');

  const listings: Listing[] = [];

  for (const block of blocks) {
    const info = await block.query(ZOUGLA.selectors.info);
    const nameEl = info ? await info.query(ZOUGLA.selectors.label) : null;
    if (!info || !nameEl) {
      continue;
    }

    const label = (await nameEl.text()) ?? '';
    if (normalizeText(label) !== target) {
      continue;
    }

    const infoText = (await info.text()) ?? '';
    const linkEl = await block.query(ZOUGLA.selectors.detailLink);

    listings.push({
      label,
      dateText: BLOCK_DATE.exec(infoText)?.[1] ?? null,
      ref: linkEl ? await linkEl.attribute('href') : null,
    });
  }

  return listings;
}

/**
 * Whether an image src looks like a thumbnail rather than the full cover
 */
export function isLowResSrc(src: string): boolean {
  const lower = src.toLowerCase();
  return ZOUGLA.lowResMarkers.some((marker) => lower.includes(marker));
}

export class ZouglaAdapter implements SiteAdapter {
  readonly site = ZOUGLA.tag;
  readonly name = ZOUGLA.name;

  private readonly fetcher: Fetcher;
  private readonly indexUrl: string;
  private readonly clock: () => Date;
  private readonly popupSelectors: readonly string[];
  private readonly coverWaitMs: number;

  constructor(options: ZouglaAdapterOptions) {
    this.fetcher = options.fetcher;
    this.indexUrl = options.indexUrl ?? ZOUGLA.indexUrl;
    this.clock = options.clock ?? (() => new Date());
    this.popupSelectors = options.popupSelectors ?? ZOUGLA.popupDismissSelectors;
    this.coverWaitMs = options.coverWaitMs ?? ZOUGLA.coverWaitMs;
  }

  async search(target: NormalizedName, session: PageSession): Promise<DownloadedImage | null> {
    logger.info({ target, site: this.name }, 'Checking site');

    try {
      await session.goto(this.indexUrl);
      await this.dismissPopups(session);

      const listings = await extractListings(session, target);
      if (listings.length === 0) {
        logger.info({ target, site: this.name }, 'Paper not listed');
        return null;
      }

      const detailHref = this.pickDetailLink(listings, target);
      if (!detailHref) {
        return null;
      }

      const detailUrl = new URL(detailHref, this.indexUrl).toString();
      logger.debug({ target, detailUrl }, 'Navigating to detail page');
      await session.goto(detailUrl);

      const imageSrc = await this.findHighResSrc(session, target);
      if (!imageSrc) {
        logger.warn({ target, detailUrl }, 'Could not find the high-res image on the detail page');
        return null;
      }

      const assetUrl = new URL(imageSrc, session.currentUrl()).toString();
      const path = await this.fetcher.fetch(assetUrl, `${target}_${this.site}.jpg`);
      return path ? { target, site: this.site, path, sourceUrl: assetUrl } : null;
    } catch (error) {
      logger.warn({ target, site: this.name, error: errorMessage(error) }, 'Site search failed');
      return null;
    }
  }

  private pickDetailLink(listings: readonly Listing[], target: NormalizedName): string | null {
    const now = this.clock();
    for (const listing of listings) {
      if (!isToday(listing.dateText, now)) {
        return null;
      }
      if (listing.ref) {
        return listing.ref;
      }
      logger.debug({ target, label: listing.label }, 'Block has no detail link, checking next match');
    }

    logger.warn({ target }, 'No matching block has a detail link');
    return null;
  }

  private async dismissPopups(session: PageSession): Promise<void> {
    for (const selector of this.popupSelectors) {
      try {
        if (await session.click(selector)) {
          logger.debug({ selector }, 'Dismissed popup');
          return;
        }
      } catch (error) {
        logger.debug({ selector, error: errorMessage(error) }, 'Popup dismissal failed');
      }
    }
  }

  /**
   * Cover container first, then a scan of every image on the page.
   *
   * The scan accepts an image whose normalized src equals the target name,
   * which can in principle pick an unrelated image with the same token.
   */
  private async findHighResSrc(session: PageSession, target: NormalizedName): Promise<string | null> {
    try {
      if (await session.waitFor(ZOUGLA.selectors.cover, this.coverWaitMs)) {
        const [cover] = await session.queryAll(ZOUGLA.selectors.cover);
        const src = cover ? await cover.attribute('src') : null;
        if (src) {
          return src;
        }
      }
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Cover lookup failed');
    }

    try {
      for (const img of await session.queryAll(ZOUGLA.selectors.image)) {
        const src = await img.attribute('src');
        if (src && normalizeText(src) === target && !isLowResSrc(src)) {
          return src;
        }
      }
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Image scan failed');
    }

    return null;
  }
}
