/**
 * Summary formatters
 */

import color from "picocolors";
import type { MigrationPhase } from "../../types";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

const PHASE_LABELS: Record<MigrationPhase, string> = {
  login: "Login",
  preflight: "Preflight",
  backup: "Backup",
  provision: "Provisioning",
  launch: "Pod launch",
  transfer: "Transfer",
  restore: "Restore",
  teardown: "Teardown",
};

export function formatPhase(phase: MigrationPhase): string {
  return PHASE_LABELS[phase];
}
