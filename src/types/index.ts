/**
 * Centralized type exports
 */

// Cluster types
export type {
  ClusterClient,
  ClusterCredentials,
  ClusterRole,
  CommandResult,
  CommandRunner,
  DeleteOptions,
  KubeManifest,
  KubeObject,
  ObjectMeta,
  RunOptions,
} from "./kube";
// Migration types
export type {
  BackupOutcome,
  EphemeralWorkload,
  MigrationPhase,
  MigrationRequest,
  MigrationResult,
  RestoreOutcome,
  SizeCheckResult,
  TeardownFailure,
  TeardownReport,
  TransferMethod,
  TransferResult,
  VolumeSpec,
} from "./migration";
