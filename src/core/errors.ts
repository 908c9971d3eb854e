/**
 * Migration error taxonomy. Every fatal error names the phase it came from.
 */

import type { MigrationPhase } from "../types";

export class MigrationError extends Error {
  constructor(
    readonly phase: MigrationPhase,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MigrationError";
  }
}

export class AuthError extends MigrationError {
  /** Credentials were missing rather than rejected */
  readonly incomplete: boolean;

  constructor(message: string, options: { incomplete?: boolean; cause?: unknown } = {}) {
    super("login", message, { cause: options.cause });
    this.name = "AuthError";
    this.incomplete = options.incomplete ?? false;
  }
}

export interface ObservedCondition {
  status?: string;
  reason?: string;
}

/**
 * A custom resource never reached the wanted condition. The resource is left in
 * place for inspection.
 */
export class ConditionWaitError extends MigrationError {
  constructor(
    phase: MigrationPhase,
    message: string,
    readonly kind: string,
    readonly resourceName: string,
    readonly observed: ObservedCondition,
  ) {
    super(phase, message);
    this.name = "ConditionWaitError";
  }
}

export class ResourceTimeoutError extends ConditionWaitError {
  constructor(
    phase: MigrationPhase,
    kind: string,
    resourceName: string,
    observed: ObservedCondition,
    timeoutMs: number,
  ) {
    super(
      phase,
      `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for ${kind}/${resourceName} ` +
        `(last status='${observed.status ?? ""}', reason='${observed.reason ?? ""}')`,
      kind,
      resourceName,
      observed,
    );
    this.name = "ResourceTimeoutError";
  }
}

export class ProvisioningError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provision", message, options);
    this.name = "ProvisioningError";
  }
}

export class LaunchError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("launch", message, options);
    this.name = "LaunchError";
  }
}

export class ReadinessTimeoutError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("launch", message, options);
    this.name = "ReadinessTimeoutError";
  }
}

export class TransferError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transfer", message, options);
    this.name = "TransferError";
  }
}

export class MigrationCancelledError extends MigrationError {
  constructor(phase: MigrationPhase) {
    super(phase, `Migration cancelled during ${phase}`);
    this.name = "MigrationCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
