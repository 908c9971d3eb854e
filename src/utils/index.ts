/**
 * Utility exports
 */

// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  info,
  logger,
  setLogFile,
  setLogLevel,
  warn,
} from "./logger";
// Naming utilities
export {
  formatRunTimestamp,
  isValidResourceName,
  RESOURCE_NAME_PATTERN,
  toResourceName,
  workloadName,
} from "./naming";
// Quantities
export { compareQuantities, parseQuantity } from "./quantity";
// Run directory
export { createRunDirectory, RUN_DIR_PREFIX, type RunDirectory, runDirectoryPaths } from "./run-dir";
// Shell quoting
export { shellJoin, shellQuote } from "./shell";
