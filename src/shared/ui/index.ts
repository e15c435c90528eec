/**
 * UI utilities for terminal output - barrel exports
 *
 * - LogManager.ts: Levelled console output and tab layout helpers
 * - Spinner.ts: Spinner for dashboard loads and actions
 * - table.ts: Fixed-width tables
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  blankLine,
  debug,
  info,
  warn,
  error,
  success,
  header,
  status,
  divider,
  type ConsoleOutput,
} from './LogManager.js';

export { Spinner, type SpinnerOutput } from './Spinner.js';

export { type TableColumn, renderTable } from './table.js';
