/**
 * Run and resource naming utilities
 */

/** Kubernetes object names: lowercase alphanumerics, '-' and '.', at most 253 chars */
export const RESOURCE_NAME_PATTERN = /^[a-z0-9]([a-z0-9.-]*[a-z0-9])?$/;

const MAX_RESOURCE_NAME_LENGTH = 253;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local-time run timestamp, e.g. 20240101-093005
 */
export function formatRunTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * Normalize arbitrary text into a valid resource name.
 * Uppercase is folded, runs of invalid characters collapse to a single '-',
 * and leading/trailing dashes are trimmed.
 */
export function toResourceName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9.-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^[-.]+/, "")
    .replace(/[-.]+$/, "")
    .slice(0, MAX_RESOURCE_NAME_LENGTH);
}

export function isValidResourceName(name: string): boolean {
  return name.length <= MAX_RESOURCE_NAME_LENGTH && RESOURCE_NAME_PATTERN.test(name);
}

/**
 * Name of a transfer pod, unique per run
 */
export function workloadName(role: "source" | "destination", runTimestamp: string): string {
  const prefix = role === "source" ? "pvc-src" : "pvc-dst";
  return toResourceName(`${prefix}-${runTimestamp}`);
}
