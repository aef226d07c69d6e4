/**
 * Reporter Index
 * Re-exports all reporter functions
 */

export {
  formatConsoleOutput,
  formatCompactOutput,
  formatSummaryLine,
  formatWarningLimitLine,
  printResults,
  type ConsoleReportOptions,
} from './console.js';

export { formatJsonOutput, printJsonResults } from './json.js';

export { sanitizeDisplayText } from './sanitize.js';
