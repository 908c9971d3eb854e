/**
 * Configuration module exports
 */

// Credentials
export {
  type CredentialsByRole,
  credentialsFor,
  loadCredentialsFile,
  parseCredentials,
} from "./credentials";
// CSV
export { type CsvTable, normalizeColumn, parseCsv } from "./csv";
// Defaults
export { DEFAULTS, defaultBackupClaim, defaultRecoveryClaim, TIMEOUTS } from "./defaults";
// Mapping
export {
  buildMigrationRequest,
  loadMappingFile,
  type MappingRow,
  parseMapping,
  type RequestOverrides,
} from "./mapping";
// Validator
export {
  ConfigError,
  isTransferMethod,
  parseBooleanFlag,
  validateMigrationRequest,
} from "./validator";
