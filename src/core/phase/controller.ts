/**
 * Submit → poll → extract, shared by the backup and restore phases
 */

import type { ClusterClient, KubeManifest, KubeObject, MigrationPhase } from "../../types";
import { logger } from "../../utils/logger";
import { ResourceTimeoutError } from "../errors";
import { type Clock, waitForCondition } from "../poller";

export type PhaseState = "pending" | "submitted" | "polling" | "succeeded" | "failed" | "timed-out";

export interface PhaseDefinition<TResult> {
  phase: MigrationPhase;
  /** Human label for logs, e.g. "Backup" */
  label: string;
  manifest: KubeManifest;
  /** Condition that signals completion */
  conditionType: string;
  successReason: string;
  /** Extra requirement on the successful observation */
  predicate?: (resource: KubeObject) => boolean;
  describe?: (resource: KubeObject) => string;
  /** Decode the result fields from the successful observation */
  extract: (resource: KubeObject) => TResult;
}

export interface PhaseOptions {
  timeoutMs?: number;
  intervalMs?: number;
  signal?: AbortSignal;
  clock?: Clock;
  onTransition?: (state: PhaseState, label: string) => void;
}

/**
 * Drives one custom resource through its lifecycle.
 *
 * Any same-named record is deleted (and the deletion awaited) before the new
 * one is applied, so a namespace never holds more than one.
 */
export class PhaseController<TResult> {
  private currentState: PhaseState = "pending";

  constructor(
    private readonly client: ClusterClient,
    private readonly definition: PhaseDefinition<TResult>,
    private readonly options: PhaseOptions = {},
  ) {}

  get state(): PhaseState {
    return this.currentState;
  }

  private transition(state: PhaseState): void {
    this.currentState = state;
    logger.debug(`${this.definition.label} phase: ${state}`);
    this.options.onTransition?.(state, this.definition.label);
  }

  async run(): Promise<TResult> {
    const { manifest, label } = this.definition;
    const { kind } = manifest;
    const { name, namespace } = manifest.metadata;
    if (!namespace) {
      throw new Error(`${label} manifest must set metadata.namespace`);
    }

    const existing = await this.client.get(kind, name, namespace);
    if (existing) {
      logger.info(`Deleting existing ${kind} '${name}' in '${namespace}'...`);
      await this.client.delete(kind, name, namespace, { wait: true });
    }

    logger.info(`Creating ${kind} '${name}' in '${namespace}'...`);
    await this.client.apply(manifest);
    this.transition("submitted");
    this.transition("polling");

    let resource: KubeObject;
    try {
      resource = await waitForCondition(
        this.client,
        {
          phase: this.definition.phase,
          label,
          kind,
          name,
          namespace,
          conditionType: this.definition.conditionType,
          status: "True",
          reason: this.definition.successReason,
          predicate: this.definition.predicate,
          describe: this.definition.describe,
        },
        this.options,
      );
    } catch (error) {
      this.transition(error instanceof ResourceTimeoutError ? "timed-out" : "failed");
      throw error;
    }

    this.transition("succeeded");
    return this.definition.extract(resource);
  }
}
