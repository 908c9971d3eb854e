/**
 * Cleanup of everything a run creates.
 *
 * Transfer pods are registered before their launch is attempted and deleted on
 * every exit path. The two claims are only deleted after a fully successful
 * run. Each deletion is tried once; failures are reported, never thrown.
 */

import type { ClusterClient, EphemeralWorkload, TeardownReport } from "../types";
import { logger } from "../utils/logger";
import { errorMessage } from "./errors";
import { terminateWorkload } from "./workload/lifecycle";

export type RunOutcome = "succeeded" | "failed";

interface TrackedWorkload {
  client: ClusterClient;
  workload: EphemeralWorkload;
}

interface TrackedVolume {
  client: ClusterClient;
  namespace: string;
  name: string;
  label: string;
}

export class TeardownCoordinator {
  private readonly workloads = new Map<string, TrackedWorkload>();
  private readonly volumes: TrackedVolume[] = [];
  /** Pods deleted ahead of teardown, with the failure message if any */
  private readonly released: { workload: EphemeralWorkload; failure: string | null }[] = [];
  private report: TeardownReport | null = null;

  private static key(workload: EphemeralWorkload): string {
    return `${workload.role}/${workload.namespace}/${workload.name}`;
  }

  /**
   * Track a pod so teardown deletes it, whether or not it was ever created
   */
  acquireWorkload(client: ClusterClient, workload: EphemeralWorkload): EphemeralWorkload {
    this.workloads.set(TeardownCoordinator.key(workload), { client, workload });
    return workload;
  }

  /**
   * Delete a pod ahead of teardown and stop tracking it
   */
  async releaseWorkload(workload: EphemeralWorkload): Promise<void> {
    const key = TeardownCoordinator.key(workload);
    const tracked = this.workloads.get(key);
    if (!tracked) {
      return;
    }
    this.workloads.delete(key);
    const failure = await terminateWorkload(tracked.client, workload);
    this.released.push({ workload, failure });
  }

  /**
   * Register a claim for deletion after a successful run
   */
  registerVolume(client: ClusterClient, namespace: string, name: string, label: string): void {
    this.volumes.push({ client, namespace, name, label });
  }

  /**
   * Run teardown once. Later calls return the first report.
   */
  async run(outcome: RunOutcome): Promise<TeardownReport> {
    if (this.report) {
      return this.report;
    }

    const report: TeardownReport = { deletedWorkloads: [], deletedVolumes: [], failures: [] };
    this.report = report;
    const recordPod = (workload: EphemeralWorkload, failure: string | null): void => {
      if (failure === null) {
        report.deletedWorkloads.push(workload.name);
      } else {
        report.failures.push({ target: `pod/${workload.name}`, error: failure });
      }
    };

    for (const { workload, failure } of this.released) {
      recordPod(workload, failure);
    }

    if (this.workloads.size > 0) {
      logger.info("Cleaning up transfer pods...");
    }
    for (const { client, workload } of this.workloads.values()) {
      recordPod(workload, await terminateWorkload(client, workload));
    }
    this.workloads.clear();

    if (outcome !== "succeeded") {
      if (this.volumes.length > 0) {
        logger.info("Run did not succeed; keeping claims");
      }
      return report;
    }

    for (const volume of this.volumes) {
      logger.info(`Deleting ${volume.label} claim '${volume.name}' in '${volume.namespace}'...`);
      try {
        await volume.client.delete("pvc", volume.name, volume.namespace);
        report.deletedVolumes.push(volume.name);
      } catch (error) {
        const message = errorMessage(error);
        logger.warn(`Failed to delete claim '${volume.name}': ${message}`);
        report.failures.push({ target: `pvc/${volume.name}`, error: message });
      }
    }

    return report;
  }
}
