/**
 * Restore phase: AutomationControllerRestore on the destination cluster
 */

import * as path from "node:path";
import type { ClusterClient, KubeManifest, MigrationRequest, RestoreOutcome } from "../../types";
import { readStatusFlag } from "../status";
import { OPERATOR_API_VERSION, SUCCESS_CONDITION } from "./backup";
import { PhaseController, type PhaseDefinition, type PhaseOptions } from "./controller";

export const RESTORE_KIND = "AutomationControllerRestore";
export const RESTORE_NAME = "aap-controller-restore";

export interface RestoreInput {
  namespace: string;
  workloadIdentity: string;
  /** Claim on the destination cluster holding the copied backup */
  claimName: string;
  /** Path of the backup directory as seen by the operator */
  backupDirectory: string;
}

export function buildRestoreManifest(input: RestoreInput): KubeManifest {
  return {
    apiVersion: OPERATOR_API_VERSION,
    kind: RESTORE_KIND,
    metadata: { name: RESTORE_NAME, namespace: input.namespace },
    spec: {
      backup_dir: input.backupDirectory,
      backup_pvc: input.claimName,
      backup_source: "PVC",
      deployment_name: input.workloadIdentity,
      force_drop_db: false,
      image_pull_policy: "IfNotPresent",
      no_log: true,
      set_self_labels: true,
    },
  };
}

/**
 * Where the operator finds the copied backup, given where it mounts the
 * destination claim
 */
export function restoreDirectory(operatorMountPath: string, backupDirectory: string): string {
  return path.posix.join(operatorMountPath, path.posix.basename(backupDirectory));
}

export function restorePhase(input: RestoreInput): PhaseDefinition<RestoreOutcome> {
  return {
    phase: "restore",
    label: "Restore",
    manifest: buildRestoreManifest(input),
    conditionType: SUCCESS_CONDITION,
    successReason: "Successful",
    predicate: (resource) => readStatusFlag(resource, "restoreComplete"),
    describe: (resource) => `restoreComplete='${readStatusFlag(resource, "restoreComplete")}'`,
    extract: () => ({ restoreComplete: true }),
  };
}

/**
 * Create the restore on the destination cluster and wait for it to complete
 */
export function runRestorePhase(
  client: ClusterClient,
  request: Pick<MigrationRequest, "destinationNamespace" | "workloadIdentity">,
  claimName: string,
  backupDirectory: string,
  options?: PhaseOptions,
): Promise<RestoreOutcome> {
  const input: RestoreInput = {
    namespace: request.destinationNamespace,
    workloadIdentity: request.workloadIdentity,
    claimName,
    backupDirectory,
  };
  return new PhaseController(client, restorePhase(input), options).run();
}
