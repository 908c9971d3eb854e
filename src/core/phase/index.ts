/**
 * Phase controller exports
 */

export {
  BACKUP_KIND,
  BACKUP_NAME,
  backupPhase,
  buildBackupManifest,
  extractBackupOutcome,
  OPERATOR_API_VERSION,
  runBackupPhase,
} from "./backup";
export {
  type PhaseDefinition,
  PhaseController,
  type PhaseOptions,
  type PhaseState,
} from "./controller";
export {
  buildRestoreManifest,
  RESTORE_KIND,
  RESTORE_NAME,
  type RestoreInput,
  restoreDirectory,
  restorePhase,
  runRestorePhase,
} from "./restore";
