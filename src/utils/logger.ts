import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";
let logFile: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Mirror every emitted line, without colors, to a file (the run's master log).
 * Pass null to stop.
 */
export function setLogFile(filePath: string | null): void {
  logFile = filePath;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return ` ${data.message}`;
  }
  if (typeof data === "object" && data !== null) {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  colored: boolean = true,
): string {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const suffix = data !== undefined ? formatData(data) : "";

  if (!colored) {
    return `[${timestamp}] ${levelStr} ${message}${suffix}`;
  }

  return `${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET} ${message}${suffix}`;
}

function writeToFile(level: LogLevel, message: string, data?: unknown): void {
  if (!logFile) {
    return;
  }
  try {
    appendFileSync(logFile, `${formatMessage(level, message, data, false)}\n`);
  } catch (err) {
    const path = logFile;
    logFile = null;
    console.error(formatMessage("error", `Failed to write log file ${path}`, err));
  }
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data));
    writeToFile("debug", message, data);
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data));
    writeToFile("info", message, data);
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data));
    writeToFile("warn", message, data);
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data));
    writeToFile("error", message, data);
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
};
