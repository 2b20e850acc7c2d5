/**
 * Name Normalizer
 *
 * Canonical form used to compare configured newspaper names with scraped labels
 */

import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Normalized newspaper name; two names are the same paper iff these are equal
 */
export type NormalizedName = string;

const COMBINING_MARKS = /\p{Mn}/gu;
// Latin a-z, Greek α-ω (final sigma included), digits, whitespace
const DISALLOWED = /[^a-zα-ω\d\s]/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Normalize text for matching (lowercase, no accents, no punctuation)
 */
export function normalizeText(text: string | null | undefined): NormalizedName {
  if (!text) {
    return '';
  }

  try {
    return text
      .toLowerCase()
      .trim()
      .normalize('NFD')
      .replace(COMBINING_MARKS, '')
      .replace(DISALLOWED, '')
      .replace(WHITESPACE_RUN, ' ')
      .trim();
  } catch (error) {
    logger.warn({ error: errorMessage(error), text }, 'Failed to normalize text');
    return '';
  }
}

