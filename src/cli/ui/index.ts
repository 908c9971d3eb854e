/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatPhase, formatSummary } from "./formatters";
// Output
export {
  banner,
  cancel,
  color,
  error,
  note,
  outro,
  PROGRAM,
  spinner,
  step,
  VERSION,
  warn,
} from "./output";
// Prompts
export { confirm, isCancel, password, select, text } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  banner: output.banner,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  warn: output.warn,
  error: output.error,
  step: output.step,
  spinner: output.spinner,
  confirm: prompts.confirm,
  select: prompts.select,
  text: prompts.text,
  password: prompts.password,
  isCancel: prompts.isCancel,
};
