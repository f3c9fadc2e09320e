/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters.js";
// Formatters
export {
  formatDateTime,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters.js";
export type { Spinner } from "./output.js";
// Output
export {
  APP_NAME,
  color,
  error,
  fail,
  info,
  intro,
  message,
  note,
  outro,
  spinner,
  step,
  success,
  VERSION,
  warn,
} from "./output.js";
// Progress
export { createSpinnerNotifier, formatProgress, runWithSpinner } from "./progress.js";

import * as output from "./output.js";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  fail: output.fail,
  step: output.step,
  message: output.message,
  spinner: output.spinner,
};
