/**
 * Migration type definitions
 */

import type { ClusterRole } from "./kube";

/** `tar` streams an archive, `rsync` syncs incrementally */
export type TransferMethod = "tar" | "rsync";

export type MigrationPhase =
  | "login"
  | "preflight"
  | "backup"
  | "provision"
  | "launch"
  | "transfer"
  | "restore"
  | "teardown";

export interface MigrationRequest {
  readonly sourceNamespace: string;
  readonly destinationNamespace: string;
  /** Overrides the claim reported by the backup */
  readonly sourceVolumeName?: string;
  readonly destinationVolumeName: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly method: TransferMethod;
  /** Deployment name of the managed application */
  readonly workloadIdentity: string;
  /** Image for the transfer pods */
  readonly image: string;
}

export interface VolumeSpec {
  capacity: string;
  accessModes: string[];
  volumeMode: string;
  storageClassName?: string;
}

export interface EphemeralWorkload {
  name: string;
  namespace: string;
  claimName: string;
  /** Where the claim is mounted inside the pod */
  mountPath: string;
  role: ClusterRole;
}

export interface BackupOutcome {
  /** Absolute path of the backup inside the backup claim */
  backupDirectory: string;
  backupClaim: string;
}

export interface RestoreOutcome {
  restoreComplete: true;
}

export interface SizeCheckResult {
  status: "passed" | "warning" | "skipped";
  sourceBlocks: number | null;
  destinationBlocks: number | null;
  tolerance?: number;
  delta?: number;
}

export interface TransferResult {
  method: TransferMethod;
  /** Directory on the destination pod holding the copied backup */
  destinationDirectory: string;
  durationMs: number;
}

export interface TeardownFailure {
  target: string;
  error: string;
}

export interface TeardownReport {
  deletedWorkloads: string[];
  deletedVolumes: string[];
  failures: TeardownFailure[];
}

export interface MigrationResult {
  backup: BackupOutcome;
  destinationVolume: string;
  volumeCreated: boolean;
  volumeSpec: VolumeSpec;
  transfer: TransferResult;
  sizeCheck: SizeCheckResult;
  teardown: TeardownReport;
  durationMs: number;
}
