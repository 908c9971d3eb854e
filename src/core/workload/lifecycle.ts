/**
 * Transfer pods: short-lived pods that mount a claim so its files can be
 * reached with exec, cp and rsync.
 */

import * as path from "node:path";
import { DEFAULTS, TIMEOUTS } from "../../config/defaults";
import type { ClusterClient, ClusterRole, EphemeralWorkload, KubeManifest } from "../../types";
import { logger } from "../../utils/logger";
import { errorMessage, LaunchError, ReadinessTimeoutError } from "../errors";

export const WORKLOAD_LABEL = { app: "pvc-migrator" } as const;
export const WORKLOAD_CONTAINER = "migrator";

export function defineWorkload(
  role: ClusterRole,
  namespace: string,
  name: string,
  claimName: string,
  mountPath: string = DEFAULTS.operatorMountPath,
): EphemeralWorkload {
  return { role, namespace, name, claimName, mountPath };
}

/**
 * Translate a path the operator reports (under its own claim mount) into the
 * same file inside a pod that mounts the claim at mountPath. Null when the
 * path is outside the operator's mount.
 */
export function claimPathInPod(operatorPath: string, mountPath: string): string | null {
  const relative = path.posix.relative(DEFAULTS.operatorMountPath, path.posix.normalize(operatorPath));
  if (relative === ".." || relative.startsWith("../")) {
    return null;
  }
  return path.posix.join(mountPath, relative);
}

export function buildWorkloadManifest(workload: EphemeralWorkload, image: string): KubeManifest {
  return {
    apiVersion: "v1",
    kind: "Pod",
    metadata: {
      name: workload.name,
      namespace: workload.namespace,
      labels: { ...WORKLOAD_LABEL },
    },
    spec: {
      restartPolicy: "Never",
      containers: [
        {
          name: WORKLOAD_CONTAINER,
          image,
          command: ["bash", "-lc", "sleep infinity"],
          volumeMounts: [{ name: "vol", mountPath: workload.mountPath }],
        },
      ],
      volumes: [{ name: "vol", persistentVolumeClaim: { claimName: workload.claimName } }],
    },
  };
}

export async function launchWorkload(
  client: ClusterClient,
  workload: EphemeralWorkload,
  image: string,
): Promise<EphemeralWorkload> {
  logger.info(
    `Creating ${workload.role} pod '${workload.name}' in '${workload.namespace}' on claim '${workload.claimName}'...`,
  );
  try {
    await client.apply(buildWorkloadManifest(workload, image));
  } catch (error) {
    throw new LaunchError(`Failed to create ${workload.role} pod '${workload.name}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return workload;
}

export async function awaitWorkloadReady(
  client: ClusterClient,
  workload: EphemeralWorkload,
  timeoutSeconds: number = TIMEOUTS.workloadReadySeconds,
): Promise<void> {
  try {
    await client.waitForCondition("pod", workload.name, workload.namespace, "Ready", timeoutSeconds);
  } catch (error) {
    throw new ReadinessTimeoutError(
      `${workload.role} pod '${workload.name}' was not Ready within ${timeoutSeconds}s: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  logger.info(`${workload.role} pod '${workload.name}' is Ready`);
}

/**
 * Delete a pod. Never throws; returns the failure message instead.
 */
export async function terminateWorkload(
  client: ClusterClient,
  workload: EphemeralWorkload,
): Promise<string | null> {
  try {
    await client.delete("pod", workload.name, workload.namespace);
    logger.info(`Deleted ${workload.role} pod '${workload.name}'`);
    return null;
  } catch (error) {
    const message = errorMessage(error);
    logger.warn(`Failed to delete ${workload.role} pod '${workload.name}': ${message}`);
    return message;
  }
}
