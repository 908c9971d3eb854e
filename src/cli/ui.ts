/**
 * CLI UI - Re-exports from ui/ subdirectory
 */

export type { SummaryItem } from "./ui/index";
export {
  banner,
  cancel,
  color,
  confirm,
  error,
  formatPhase,
  formatSummary,
  isCancel,
  note,
  outro,
  PROGRAM,
  password,
  select,
  spinner,
  step,
  text,
  ui,
  VERSION,
  warn,
} from "./ui/index";
