/**
 * Default configuration values
 */

export const DEFAULTS = {
  image: "registry.redhat.io/ubi9:9.5",
  method: "tar",
  sourcePath: "/backups",
  destinationPath: "/backups",
  workloadIdentity: "controller",
  /** Where the operator mounts backup claims; backup status paths live under it */
  operatorMountPath: "/backups",
  /** Capacity used when the source claim's size cannot be read */
  fallbackCapacity: "20Gi",
  fallbackAccessMode: "ReadWriteOnce",
  fallbackVolumeMode: "Filesystem",
  credentialsFileName: "cluster-creds.csv",
} as const;

export const TIMEOUTS = {
  /** Backup or restore completion */
  phaseMs: 30 * 60 * 1000,
  /** Interval between status polls */
  pollIntervalMs: 10 * 1000,
  /** Transfer pod readiness */
  workloadReadySeconds: 300,
} as const;

/** Claim the backup is written to when the backup status does not name one */
export function defaultBackupClaim(workloadIdentity: string): string {
  return `${workloadIdentity}-backup-claim`;
}

/** Destination claim when the mapping does not name one */
export function defaultRecoveryClaim(workloadIdentity: string): string {
  return `${workloadIdentity}-recovery-claim`;
}
