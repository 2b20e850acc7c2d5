/**
 * Daily output directory
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDateStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export async function ensureDailyDirectory(rootDir: string, now: Date = new Date()): Promise<string> {
  const path = join(rootDir, formatDateStamp(now));
  await mkdir(path, { recursive: true });
  return path;
}
