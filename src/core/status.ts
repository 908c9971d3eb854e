/**
 * Typed reads of a resource's `status` block
 */

import type { KubeObject } from "../types";

export interface StatusCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function readStatus(resource: KubeObject): Record<string, unknown> {
  return isRecord(resource.status) ? resource.status : {};
}

export function readConditions(resource: KubeObject): StatusCondition[] {
  const conditions = readStatus(resource).conditions;
  if (!Array.isArray(conditions)) {
    return [];
  }

  const result: StatusCondition[] = [];
  for (const entry of conditions) {
    if (!isRecord(entry)) continue;
    const type = asString(entry.type);
    const status = asString(entry.status);
    if (!type || !status) continue;
    result.push({ type, status, reason: asString(entry.reason), message: asString(entry.message) });
  }
  return result;
}

export function findCondition(resource: KubeObject, type: string): StatusCondition | undefined {
  return readConditions(resource).find((c) => c.type === type);
}

/**
 * A non-empty string field of `status`, or undefined
 */
export function readStatusString(resource: KubeObject, key: string): string | undefined {
  return asString(readStatus(resource)[key]);
}

/**
 * A boolean field of `status`; operators report these as booleans or as "true"
 */
export function readStatusFlag(resource: KubeObject, key: string): boolean {
  const value = readStatus(resource)[key];
  return value === true || (typeof value === "string" && value.toLowerCase() === "true");
}
