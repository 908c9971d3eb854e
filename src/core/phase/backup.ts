/**
 * Backup phase: AutomationControllerBackup on the source cluster
 */

import { DEFAULTS, defaultBackupClaim } from "../../config/defaults";
import type { BackupOutcome, ClusterClient, KubeManifest, KubeObject, MigrationRequest } from "../../types";
import { readStatusString } from "../status";
import { PhaseController, type PhaseDefinition, type PhaseOptions } from "./controller";

export const OPERATOR_API_VERSION = "automationcontroller.ansible.com/v1beta1";
export const BACKUP_KIND = "AutomationControllerBackup";
export const BACKUP_NAME = "controller-backup";
export const SUCCESS_CONDITION = "Successful";

export function buildBackupManifest(namespace: string, workloadIdentity: string): KubeManifest {
  return {
    apiVersion: OPERATOR_API_VERSION,
    kind: BACKUP_KIND,
    metadata: { name: BACKUP_NAME, namespace },
    spec: {
      no_log: true,
      image_pull_policy: "IfNotPresent",
      set_self_labels: true,
      deployment_name: workloadIdentity,
    },
  };
}

/**
 * Decode the backup result. The directory falls back to the operator's claim
 * mount (/backups), the claim to `<identity>-backup-claim`.
 */
export function extractBackupOutcome(
  resource: KubeObject,
  request: Pick<MigrationRequest, "workloadIdentity">,
): BackupOutcome {
  return {
    backupDirectory: readStatusString(resource, "backupDirectory") ?? DEFAULTS.operatorMountPath,
    backupClaim:
      readStatusString(resource, "backupClaim") ?? defaultBackupClaim(request.workloadIdentity),
  };
}

export function backupPhase(request: MigrationRequest): PhaseDefinition<BackupOutcome> {
  return {
    phase: "backup",
    label: "Backup",
    manifest: buildBackupManifest(request.sourceNamespace, request.workloadIdentity),
    conditionType: SUCCESS_CONDITION,
    successReason: "Successful",
    describe: (resource) =>
      `dir='${readStatusString(resource, "backupDirectory") ?? ""}', ` +
      `claim='${readStatusString(resource, "backupClaim") ?? ""}'`,
    extract: (resource) => extractBackupOutcome(resource, request),
  };
}

/**
 * Create the backup on the source cluster and wait for it to complete
 */
export function runBackupPhase(
  client: ClusterClient,
  request: MigrationRequest,
  options?: PhaseOptions,
): Promise<BackupOutcome> {
  return new PhaseController(client, backupPhase(request), options).run();
}
