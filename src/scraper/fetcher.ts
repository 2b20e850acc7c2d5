/**
 * Image Fetcher
 *
 * Downloads a resolved image URL into the run's output directory
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Fetcher } from './types.js';

const UNSAFE_FILENAME_CHARS = /[^\p{L}\p{N}_.-]/gu;

/**
 * Strip every character outside letters, digits, "-", "_" and "."
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(UNSAFE_FILENAME_CHARS, '');
}

export interface ImageFetcherOptions {
  outputDir: string;
  timeoutMs?: number;
  userAgent?: string;
  http?: AxiosInstance;
}

export class ImageFetcher implements Fetcher {
  private readonly outputDir: string;
  private readonly http: AxiosInstance;

  constructor(options: ImageFetcherOptions) {
    this.outputDir = options.outputDir;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? config.download.timeoutMs,
        headers: { 'User-Agent': options.userAgent ?? config.browser.userAgent },
      });
  }

  async fetch(url: string, filename: string): Promise<string | null> {
    const cleanName = sanitizeFilename(filename);
    if (!cleanName.replace(/\./g, '')) {
      logger.warn({ filename }, 'Filename is empty after sanitizing');
      return null;
    }

    logger.info({ url, filename: cleanName }, 'Downloading');

    try {
      const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      const savePath = join(this.outputDir, cleanName);

      await writeFile(savePath, Buffer.from(response.data));

      logger.info({ path: savePath }, 'Saved');
      return savePath;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error(
          { url, status: error.response?.status, code: error.code, error: error.message },
          'Download failed'
        );
      } else {
        logger.error({ url, error: errorMessage(error) }, 'Download failed');
      }
      return null;
    }
  }
}
