/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatReport, formatSummary } from "./formatters";
// Output
export { color, error, intro, note, outro, success, VERSION, warn } from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  success: output.success,
  warn: output.warn,
  error: output.error,
};
