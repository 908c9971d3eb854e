/**
 * Core module exports
 */

// Errors
export {
  AuthError,
  ConditionWaitError,
  errorMessage,
  LaunchError,
  MigrationCancelledError,
  MigrationError,
  type ObservedCondition,
  ProvisioningError,
  ReadinessTimeoutError,
  ResourceTimeoutError,
  TransferError,
} from "./errors";

// Migration
export { type MigrationOptions, type MigrationSessions, runMigration } from "./migration";

// Phases
export {
  PhaseController,
  type PhaseOptions,
  type PhaseState,
  runBackupPhase,
  runRestorePhase,
} from "./phase";

// Polling
export { type Clock, type ConditionQuery, type PollOptions, systemClock, waitForCondition } from "./poller";

// Provisioning
export { ensureVolume, provisionDestinationVolume, resolveStorageClass } from "./provisioning";

// Teardown
export { type RunOutcome, TeardownCoordinator } from "./teardown";

// Transfer
export { selectTransferStrategy, verifyTransferSize } from "./transfer";

// Workloads
export { awaitWorkloadReady, launchWorkload, terminateWorkload } from "./workload";
