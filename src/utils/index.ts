/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export { formatTable, truncate, type Column, type Alignment, type Row } from './table.js';

// Safe JSON parsing
export { safeJsonParse, extractJsonPayload } from './json.js';

// Logging seam for library code
export { silentLogger, prefixLogger, type Logger } from './logger.js';

// Local dates and timestamps
export {
  systemClock,
  toDateKey,
  toTimestamp,
  isValidDateKey,
  parseDateKey,
  addDays,
  type Clock,
} from './dates.js';
