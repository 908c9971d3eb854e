/**
 * Configuration validation
 */

import type { MigrationRequest, TransferMethod } from "../types";
import { isValidResourceName } from "../utils/naming";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const TRANSFER_METHODS: readonly TransferMethod[] = ["tar", "rsync"];

export function isTransferMethod(value: string): value is TransferMethod {
  return TRANSFER_METHODS.some((method) => method === value);
}

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["", "0", "false", "no", "n", "off"]);

/**
 * Parse a yes/no style flag. Empty means false.
 */
export function parseBooleanFlag(value: string, field: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`${field} must be one of true|false|y|n|1|0 (got "${value}")`);
}

function validateName(value: string, field: string): void {
  if (!isValidResourceName(value)) {
    throw new ConfigError(`${field} "${value}" is not a valid resource name`);
  }
}

function validatePath(value: string, field: string): void {
  if (!value.startsWith("/")) {
    throw new ConfigError(`${field} must be an absolute path (got "${value}")`);
  }
}

/**
 * Validate a fully-defaulted migration request
 */
export function validateMigrationRequest(request: MigrationRequest): void {
  if (!request.sourceNamespace) {
    throw new ConfigError("source_namespace is required");
  }
  if (!request.destinationNamespace) {
    throw new ConfigError("dest_namespace is required");
  }

  validateName(request.sourceNamespace, "source_namespace");
  validateName(request.destinationNamespace, "dest_namespace");
  validateName(request.workloadIdentity, "controller_name");
  validateName(request.destinationVolumeName, "dest_pvc");
  if (request.sourceVolumeName !== undefined) {
    validateName(request.sourceVolumeName, "source_pvc");
  }

  validatePath(request.sourcePath, "source_path");
  validatePath(request.destinationPath, "dest_path");

  if (!isTransferMethod(request.method)) {
    throw new ConfigError(`method must be one of ${TRANSFER_METHODS.join(", ")}`);
  }
  if (!request.image) {
    throw new ConfigError("image must not be empty");
  }
}
