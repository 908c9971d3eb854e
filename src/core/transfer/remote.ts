/**
 * Commands run inside transfer pods around the copy itself
 */

import { shellQuote } from "../../utils/shell";
import { logger } from "../../utils/logger";
import { errorMessage, TransferError } from "../errors";
import type { TransferEndpoint } from "./types";

export interface DirectorySize {
  /** `du -s` block count, null when unmeasurable */
  blocks: number | null;
  /** `du -sh` size, e.g. 1.2G */
  human: string;
}

export async function prepareDestination(endpoint: TransferEndpoint, root: string): Promise<void> {
  try {
    await endpoint.client.exec(endpoint.namespace, endpoint.pod, `mkdir -p ${shellQuote(root)}`);
  } catch (error) {
    throw new TransferError(`Failed to create '${root}' on pod '${endpoint.pod}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Restore SELinux labels on copied files. Skipped where restorecon is absent.
 */
export async function relabelDirectory(endpoint: TransferEndpoint, dir: string): Promise<void> {
  const quoted = shellQuote(dir);
  try {
    await endpoint.client.exec(
      endpoint.namespace,
      endpoint.pod,
      `command -v restorecon >/dev/null 2>&1 && restorecon -R ${quoted} || true`,
    );
  } catch (error) {
    logger.warn(`restorecon on '${dir}' failed: ${errorMessage(error)}`);
  }
}

/**
 * Parse the output of `du -s <dir>; du -sh <dir>`
 */
export function parseDuOutput(output: string): DirectorySize {
  const [blocksLine = "", humanLine = ""] = output.split("\n").map((line) => line.trim());
  const blocksField = blocksLine.split(/\s+/)[0] ?? "";
  const humanField = humanLine.split(/\s+/)[0] ?? "";

  return {
    blocks: /^\d+$/.test(blocksField) ? Number.parseInt(blocksField, 10) : null,
    human: humanField || "0",
  };
}

export async function measureDirectory(endpoint: TransferEndpoint, dir: string): Promise<DirectorySize> {
  const quoted = shellQuote(dir);
  try {
    const output = await endpoint.client.exec(
      endpoint.namespace,
      endpoint.pod,
      `du -s ${quoted} 2>/dev/null; du -sh ${quoted} 2>/dev/null`,
    );
    return parseDuOutput(output);
  } catch (error) {
    logger.warn(`Could not measure '${dir}' on pod '${endpoint.pod}': ${errorMessage(error)}`);
    return { blocks: null, human: "0" };
  }
}
