/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatStepStatus, formatSummary } from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  message,
  note,
  outro,
  step,
  success,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
};
