/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Input / output
  TARGETS_CSV: z.string().default('./newspapers.csv'),
  OUTPUT_ROOT: z.string().default('./downloaded_news_pictures'),
  MAX_NAME_LENGTH: z.coerce.number().int().positive().default(100),

  // Browser
  BROWSER_MODE: z.enum(['playwright', 'static']).default('playwright'),
  BROWSER_CHANNELS: z.string().default('chrome,msedge,bundled'),
  HEADLESS: booleanFlag,
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Downloads / document
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  PDF_DPI: z.coerce.number().positive().default(300),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().optional(),

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 7 * * *'),
  TZ: z.string().default('Europe/Athens'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
