/**
 * Main Pipeline
 *
 * One complete run:
 * 1. Read target newspapers from CSV
 * 2. Prepare today's output folder
 * 3. Open the browser session
 * 4. Search each paper on Frontpages.gr, then Zougla.gr
 * 5. Combine the collected front pages into one PDF
 */

import { join } from 'path';
import { config } from './config/index.js';
import { readTargetNames } from './input/targets.js';
import { ensureDailyDirectory, formatDateStamp } from './output/directory.js';
import { assembleDocument } from './document/assembler.js';
import { searchTargets } from './orchestrator.js';
import {
  FrontpagesAdapter,
  ZouglaAdapter,
  ImageFetcher,
  openSession,
  type Fetcher,
  type SessionHandle,
  type SiteAdapter,
} from './scraper/index.js';
import { logger } from './utils/logger.js';
import { CollectorError, errorMessage } from './utils/errors.js';
import type { PipelineResult } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  csvPath?: string;
  outputRoot?: string;
  clock?: () => Date;
  openSession?: () => Promise<SessionHandle>;
  /** Builds the ordered adapter list; defaults to Frontpages then Zougla */
  createAdapters?: (fetcher: Fetcher, clock: () => Date) => SiteAdapter[];
}

function defaultAdapters(fetcher: Fetcher, clock: () => Date): SiteAdapter[] {
  return [new FrontpagesAdapter({ fetcher, clock }), new ZouglaAdapter({ fetcher, clock })];
}

/**
 * Run the full pipeline
 */
export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineResult> {
  const {
    csvPath = config.input.csvPath,
    outputRoot = config.output.rootDir,
    clock = () => new Date(),
    createAdapters = defaultAdapters,
  } = options;

  const startTime = Date.now();
  const result: PipelineResult = {
    status: 'aborted',
    targets: 0,
    downloaded: [],
    missing: [],
    documentPath: null,
    durationMs: 0,
  };
  const finish = (): PipelineResult => {
    result.durationMs = Date.now() - startTime;
    return result;
  };

  logger.info({ csvPath, outputRoot }, 'Starting pipeline');

  // Step 1: Target list
  let names: string[];
  try {
    names = await readTargetNames(csvPath);
  } catch (error) {
    if (error instanceof CollectorError) {
      logger.error({ code: error.code, details: error.details }, error.message);
      return finish();
    }
    throw error;
  }

  if (names.length === 0) {
    logger.error('No newspapers loaded, exiting');
    return finish();
  }
  result.targets = names.length;

  // Step 2: Output folder
  const now = clock();
  let outputDir: string;
  try {
    outputDir = await ensureDailyDirectory(outputRoot, now);
  } catch (error) {
    logger.error({ outputRoot, error: errorMessage(error) }, 'Could not create the output folder');
    return finish();
  }

  // Step 3: Session
  let handle: SessionHandle;
  try {
    handle = await (options.openSession ?? openSession)();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Could not open a browser session');
    return finish();
  }

  // Step 4: Search
  const fetcher = new ImageFetcher({ outputDir });
  try {
    const run = await searchTargets(names, {
      session: handle.session,
      adapters: createAdapters(fetcher, clock),
    });
    result.downloaded = run.images;
    result.missing = run.missing;
  } finally {
    await handle.close();
  }

  // Step 5: PDF
  const documentPath = join(outputDir, `${config.output.documentPrefix}_${formatDateStamp(now)}.pdf`);
  result.documentPath = await assembleDocument(
    result.downloaded.map((image) => image.path),
    documentPath
  );
  result.status = 'completed';

  finish();
  logger.info(
    {
      targets: result.targets,
      downloaded: result.downloaded.length,
      missing: result.missing,
      documentPath: result.documentPath,
      durationMs: result.durationMs,
    },
    'Pipeline complete'
  );

  return result;
}
