/**
 * Blocking wait for a status condition on a custom resource
 */

import { setTimeout as delay } from "node:timers/promises";
import { TIMEOUTS } from "../config/defaults";
import type { ClusterClient, KubeObject, MigrationPhase } from "../types";
import { logger } from "../utils/logger";
import {
  errorMessage,
  MigrationCancelledError,
  type ObservedCondition,
  ResourceTimeoutError,
} from "./errors";
import { findCondition } from "./status";

export interface Clock {
  now(): number;
  /** Rejects when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
};

export interface ConditionQuery {
  phase: MigrationPhase;
  /** Prefix for the per-poll log line, e.g. "Backup" */
  label: string;
  kind: string;
  name: string;
  namespace: string;
  conditionType: string;
  status: string;
  reason: string;
  /** Must also hold for the wait to succeed */
  predicate?: (resource: KubeObject) => boolean;
  /** Extra fields for the per-poll log line */
  describe?: (resource: KubeObject) => string;
}

export interface PollOptions {
  timeoutMs?: number;
  intervalMs?: number;
  signal?: AbortSignal;
  clock?: Clock;
}

function throwIfAborted(phase: MigrationPhase, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new MigrationCancelledError(phase);
  }
}

/**
 * Poll until the condition has the wanted status and reason and the predicate
 * holds, all in the same observation. Returns that observation.
 *
 * A condition that is still unsatisfied at the deadline raises
 * ResourceTimeoutError carrying the last observed status and reason, whatever
 * that status was. The resource is left untouched.
 */
export async function waitForCondition(
  client: ClusterClient,
  query: ConditionQuery,
  options: PollOptions = {},
): Promise<KubeObject> {
  const clock = options.clock ?? systemClock;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.phaseMs;
  const intervalMs = options.intervalMs ?? TIMEOUTS.pollIntervalMs;
  const { conditionType } = query;
  const start = clock.now();
  let observed: ObservedCondition = {};

  for (;;) {
    throwIfAborted(query.phase, options.signal);

    let resource: KubeObject | null = null;
    try {
      resource = await client.get(query.kind, query.name, query.namespace);
    } catch (error) {
      logger.warn(`Could not read ${query.kind}/${query.name}: ${errorMessage(error)}`);
    }

    const condition = resource ? findCondition(resource, conditionType) : undefined;
    observed = { status: condition?.status, reason: condition?.reason };
    const extra = resource && query.describe ? `, ${query.describe(resource)}` : "";
    logger.info(
      `${query.label} status: ${conditionType}.status='${observed.status ?? ""}', ` +
        `${conditionType}.reason='${observed.reason ?? ""}'${extra}`,
    );

    if (
      resource &&
      condition?.status === query.status &&
      condition.reason === query.reason &&
      (!query.predicate || query.predicate(resource))
    ) {
      return resource;
    }

    if (clock.now() - start >= timeoutMs) {
      throw new ResourceTimeoutError(query.phase, query.kind, query.name, observed, timeoutMs);
    }

    try {
      await clock.sleep(intervalMs, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new MigrationCancelledError(query.phase);
      }
      throw error;
    }
  }
}
