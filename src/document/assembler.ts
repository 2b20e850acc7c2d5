/**
 * Document Assembler
 *
 * Combines the collected front pages into one PDF, one page per image
 */

import { writeFile } from 'fs/promises';
import { basename } from 'path';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const POINTS_PER_INCH = 72;

export interface AssembleOptions {
  /** Resolution recorded for every page; page size is pixels * 72 / dpi points */
  dpi?: number;
  title?: string;
}

interface PreparedImage {
  path: string;
  jpeg: Buffer;
  width: number;
  height: number;
}

/**
 * Decode an image and re-encode it as an sRGB JPEG without alpha
 */
async function prepareImage(path: string): Promise<PreparedImage> {
  const { data, info } = await sharp(path)
    .flatten({ background: '#ffffff' })
    .toColourspace('srgb')
    .jpeg({ quality: 92 })
    .toBuffer({ resolveWithObject: true });

  return { path, jpeg: data, width: info.width, height: info.height };
}

export async function assembleDocument(
  imagePaths: readonly string[],
  outputPath: string,
  options: AssembleOptions = {}
): Promise<string | null> {
  if (imagePaths.length === 0) {
    logger.warn('No images to create PDF');
    return null;
  }

  const dpi = options.dpi ?? config.document.dpi;
  const scale = POINTS_PER_INCH / dpi;

  logger.info({ count: imagePaths.length, dpi }, 'Creating PDF');

  const images: PreparedImage[] = [];
  for (const path of imagePaths) {
    try {
      images.push(await prepareImage(path));
    } catch (error) {
      logger.error({ file: basename(path), error: errorMessage(error) }, 'Could not process image for PDF');
    }
  }

  if (images.length === 0) {
    logger.error({ attempted: imagePaths.length }, 'No readable images, PDF not written');
    return null;
  }

  try {
    const pdf = await PDFDocument.create();
    pdf.setTitle(options.title ?? basename(outputPath, '.pdf'));
    pdf.setCreator(config.app.name);

    for (const image of images) {
      const embedded = await pdf.embedJpg(image.jpeg);
      const width = image.width * scale;
      const height = image.height * scale;
      const page = pdf.addPage([width, height]);
      page.drawImage(embedded, { x: 0, y: 0, width, height });
    }

    await writeFile(outputPath, await pdf.save());

    logger.info({ path: outputPath, pages: images.length }, 'PDF saved');
    return outputPath;
  } catch (error) {
    logger.error({ path: outputPath, error: errorMessage(error) }, 'PDF failed');
    return null;
  }
}
