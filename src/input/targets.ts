/**
 * Target List Reader
 *
 * Loads the newspaper names to collect from a CSV file
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { InputFormatError, InputMissingError, errorMessage } from '../utils/errors.js';

const csvRowsSchema = z.array(z.record(z.string().optional()));

export interface ReadTargetsOptions {
  column?: string;
  maxLength?: number;
}

export async function readTargetNames(
  csvPath: string,
  options: ReadTargetsOptions = {}
): Promise<string[]> {
  const { column = config.input.nameColumn, maxLength = config.input.maxNameLength } = options;

  let content: string;
  try {
    content = await readFile(csvPath, 'utf-8');
  } catch (error) {
    throw new InputMissingError(`CSV file not found at ${csvPath}`, { csvPath, cause: String(error) });
  }

  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(content, {
      columns: (names: string[]) => {
        header = names;
        return names;
      },
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new InputFormatError(`Could not parse CSV at ${csvPath}`, { csvPath, cause: errorMessage(error) });
  }

  if (!header.includes(column)) {
    throw new InputFormatError(`'${column}' column not found in CSV`, { csvPath, columns: header });
  }

  const rows = csvRowsSchema.parse(parsed);

  const names: string[] = [];
  for (const row of rows) {
    const name = row[column]?.trim();
    if (!name) {
      continue;
    }
    if (name.length > maxLength) {
      logger.warn({ name: name.slice(0, 40), length: name.length, maxLength }, 'Name too long, skipping');
      continue;
    }
    names.push(name);
  }

  logger.info({ count: names.length, file: basename(csvPath) }, 'Loaded target newspapers');
  return names;
}
