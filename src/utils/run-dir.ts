/**
 * Per-run artifact directory: master log, kubeconfigs and transfer staging
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { ClusterRole } from "../types";
import { formatRunTimestamp } from "./naming";

export const RUN_DIR_PREFIX = "pvc-migrate-logs-";

export interface RunDirectory {
  root: string;
  timestamp: string;
  logFile: string;
  kubeconfigs: Record<ClusterRole, string>;
}

export function runDirectoryPaths(parent: string, timestamp: string): RunDirectory {
  const root = path.resolve(parent, `${RUN_DIR_PREFIX}${timestamp}`);
  return {
    root,
    timestamp,
    logFile: path.join(root, `run-${timestamp}.log`),
    kubeconfigs: {
      source: path.join(root, `kubeconfig-source-${timestamp}`),
      destination: path.join(root, `kubeconfig-destination-${timestamp}`),
    },
  };
}

/**
 * Create the run directory under parent (created too if missing)
 */
export async function createRunDirectory(
  parent: string,
  timestamp: string = formatRunTimestamp(),
): Promise<RunDirectory> {
  const paths = runDirectoryPaths(parent, timestamp);
  await mkdir(paths.root, { recursive: true });
  return paths;
}
