/**
 * Matching Module
 *
 * Name normalization and listing date validation
 */

export { normalizeText, type NormalizedName } from './normalizer.js';
export {
  isToday,
  parseListingDate,
  formatCalendarDate,
  type CalendarDate,
} from './date-validator.js';
