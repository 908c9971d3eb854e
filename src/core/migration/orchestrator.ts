/**
 * Migration orchestration: backup on the source, provision and copy, restore
 * on the destination, then teardown.
 */

import * as path from "node:path";
import { DEFAULTS, TIMEOUTS } from "../../config/defaults";
import type { ClusterSession } from "../../kube/session";
import type {
  BackupOutcome,
  MigrationPhase,
  MigrationRequest,
  MigrationResult,
  SizeCheckResult,
  TransferResult,
  VolumeSpec,
} from "../../types";
import { logger } from "../../utils/logger";
import { formatDuration } from "../../utils/format";
import { workloadName } from "../../utils/naming";
import { errorMessage, MigrationCancelledError, MigrationError } from "../errors";
import { runBackupPhase } from "../phase/backup";
import type { PhaseOptions, PhaseState } from "../phase/controller";
import { restoreDirectory, runRestorePhase } from "../phase/restore";
import type { Clock } from "../poller";
import { provisionDestinationVolume } from "../provisioning/resolver";
import { TeardownCoordinator } from "../teardown";
import {
  prepareDestination,
  relabelDirectory,
  selectTransferStrategy,
  type TransferEndpoint,
  verifyTransferSize,
} from "../transfer";
import { awaitWorkloadReady, claimPathInPod, defineWorkload, launchWorkload } from "../workload/lifecycle";

export interface MigrationSessions {
  source: ClusterSession;
  destination: ClusterSession;
}

export interface MigrationOptions {
  /** Suffix for transfer pod names, e.g. 20240101-093005 */
  runTimestamp: string;
  /** Local directory for transfer staging files */
  stagingDir: string;
  rsyncAvailable: boolean;
  signal?: AbortSignal;
  clock?: Clock;
  phaseTimeoutMs?: number;
  pollIntervalMs?: number;
  readyTimeoutSeconds?: number;
  /** Called when a phase starts */
  onPhase?: (phase: MigrationPhase) => void;
  onPhaseState?: (state: PhaseState, label: string) => void;
  teardown?: TeardownCoordinator;
}

type CompletedPhases = Omit<MigrationResult, "teardown" | "durationMs">;

function throwIfCancelled(phase: MigrationPhase, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new MigrationCancelledError(phase);
  }
}

/**
 * Run a step, attributing any foreign error to the phase
 */
async function inPhase<T>(phase: MigrationPhase, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof MigrationError) {
      throw error;
    }
    throw new MigrationError(phase, errorMessage(error), { cause: error });
  }
}

async function executePhases(
  request: MigrationRequest,
  sessions: MigrationSessions,
  options: MigrationOptions,
  teardown: TeardownCoordinator,
): Promise<CompletedPhases> {
  const { source, destination } = sessions;
  const { signal } = options;
  const phaseOptions: PhaseOptions = {
    timeoutMs: options.phaseTimeoutMs ?? TIMEOUTS.phaseMs,
    intervalMs: options.pollIntervalMs ?? TIMEOUTS.pollIntervalMs,
    signal,
    clock: options.clock,
    onTransition: options.onPhaseState,
  };
  const enter = (phase: MigrationPhase): void => {
    throwIfCancelled(phase, signal);
    options.onPhase?.(phase);
  };

  // Preflight
  enter("preflight");
  await inPhase("preflight", async () => {
    if (!(await source.client.namespaceExists(request.sourceNamespace))) {
      throw new MigrationError("preflight", `Source namespace '${request.sourceNamespace}' not found`);
    }
    if (!(await destination.client.namespaceExists(request.destinationNamespace))) {
      throw new MigrationError(
        "preflight",
        `Destination namespace '${request.destinationNamespace}' not found`,
      );
    }
  });

  // Backup
  enter("backup");
  logger.info(
    `Backing up '${request.workloadIdentity}' in '${request.sourceNamespace}' on the source cluster...`,
  );
  const backup: BackupOutcome = await inPhase("backup", () =>
    runBackupPhase(source.client, request, phaseOptions),
  );
  const sourceClaim = request.sourceVolumeName ?? backup.backupClaim;
  if (request.sourceVolumeName && request.sourceVolumeName !== backup.backupClaim) {
    logger.info(`Using configured source claim '${sourceClaim}' instead of '${backup.backupClaim}'`);
  }
  const sourceDirectory = claimPathInPod(backup.backupDirectory, request.sourcePath);
  if (sourceDirectory === null) {
    throw new MigrationError(
      "backup",
      `Backup directory '${backup.backupDirectory}' is outside the operator's mount '${DEFAULTS.operatorMountPath}'`,
    );
  }
  const dirName = path.posix.basename(backup.backupDirectory);
  logger.info(
    `Using source claim='${sourceClaim}', backup dir='${backup.backupDirectory}', dir name='${dirName}'`,
  );

  // Provision
  enter("provision");
  const provisioned = await inPhase("provision", () =>
    provisionDestinationVolume(
      { client: source.client, namespace: request.sourceNamespace, claimName: sourceClaim },
      {
        client: destination.client,
        namespace: request.destinationNamespace,
        claimName: request.destinationVolumeName,
      },
    ),
  );
  const volumeSpec: VolumeSpec = provisioned.spec;
  // Only the claim the backup wrote to is disposable, never a configured one
  teardown.registerVolume(source.client, request.sourceNamespace, backup.backupClaim, "source backup");
  teardown.registerVolume(
    destination.client,
    request.destinationNamespace,
    request.destinationVolumeName,
    "destination recovery",
  );

  // Launch
  enter("launch");
  const strategy = selectTransferStrategy(request.method, { rsyncAvailable: options.rsyncAvailable });
  logger.info(`Copy method: ${strategy.method}`);

  const sourceWorkload = teardown.acquireWorkload(
    source.client,
    defineWorkload(
      "source",
      request.sourceNamespace,
      workloadName("source", options.runTimestamp),
      sourceClaim,
      request.sourcePath,
    ),
  );
  const destinationWorkload = teardown.acquireWorkload(
    destination.client,
    defineWorkload(
      "destination",
      request.destinationNamespace,
      workloadName("destination", options.runTimestamp),
      request.destinationVolumeName,
      request.destinationPath,
    ),
  );

  await inPhase("launch", async () => {
    await launchWorkload(source.client, sourceWorkload, request.image);
    await awaitWorkloadReady(source.client, sourceWorkload, options.readyTimeoutSeconds);
    throwIfCancelled("launch", signal);
    await launchWorkload(destination.client, destinationWorkload, request.image);
    await awaitWorkloadReady(destination.client, destinationWorkload, options.readyTimeoutSeconds);
  });

  // Transfer
  enter("transfer");
  const sourceEndpoint: TransferEndpoint = {
    client: source.client,
    namespace: sourceWorkload.namespace,
    pod: sourceWorkload.name,
  };
  const destinationEndpoint: TransferEndpoint = {
    client: destination.client,
    namespace: destinationWorkload.namespace,
    pod: destinationWorkload.name,
  };

  const { transfer, sizeCheck } = await inPhase("transfer", async () => {
    await prepareDestination(destinationEndpoint, request.destinationPath);
    const result: TransferResult = await strategy.transfer({
      source: sourceEndpoint,
      destination: destinationEndpoint,
      sourceDirectory,
      destinationRoot: request.destinationPath,
      stagingDir: options.stagingDir,
    });
    logger.info(`Copied to '${result.destinationDirectory}' in ${formatDuration(result.durationMs)}`);

    await relabelDirectory(destinationEndpoint, result.destinationDirectory);
    const check: SizeCheckResult = await verifyTransferSize(
      sourceEndpoint,
      sourceDirectory,
      destinationEndpoint,
      result.destinationDirectory,
    );
    return { transfer: result, sizeCheck: check };
  });

  // The restore needs the destination claim, which the pod may hold
  logger.info(`Deleting destination transfer pod '${destinationWorkload.name}' before restore...`);
  await teardown.releaseWorkload(destinationWorkload);

  // Restore. The pod mounted the claim at the destination path; the operator
  // mounts it at its own root.
  enter("restore");
  const backupDirForRestore = restoreDirectory(DEFAULTS.operatorMountPath, backup.backupDirectory);
  await inPhase("restore", () =>
    runRestorePhase(
      destination.client,
      request,
      request.destinationVolumeName,
      backupDirForRestore,
      phaseOptions,
    ),
  );
  logger.info("Restore completed successfully");

  return {
    backup,
    destinationVolume: request.destinationVolumeName,
    volumeCreated: provisioned.created,
    volumeSpec,
    transfer,
    sizeCheck,
  };
}

/**
 * Run the whole migration. Teardown runs on every exit path; claims are only
 * deleted when every phase succeeded.
 */
export async function runMigration(
  request: MigrationRequest,
  sessions: MigrationSessions,
  options: MigrationOptions,
): Promise<MigrationResult> {
  const start = Date.now();
  const teardown = options.teardown ?? new TeardownCoordinator();

  logger.info(
    `Starting migration ${request.sourceNamespace} (${sessions.source.endpoint}) -> ` +
      `${request.destinationNamespace} (${sessions.destination.endpoint})`,
  );

  let phases: CompletedPhases;
  try {
    phases = await executePhases(request, sessions, options, teardown);
  } catch (error) {
    options.onPhase?.("teardown");
    const report = await teardown.run("failed");
    if (report.failures.length > 0) {
      logger.warn(`${report.failures.length} cleanup step(s) failed`);
    }
    throw error;
  }

  options.onPhase?.("teardown");
  logger.info("Cleaning up transfer pods and claims...");
  const report = await teardown.run("succeeded");
  if (report.failures.length > 0) {
    logger.warn(`${report.failures.length} cleanup step(s) failed`);
  }

  const durationMs = Date.now() - start;
  logger.info(`Migration completed in ${formatDuration(durationMs)}`);

  return { ...phases, teardown: report, durationMs };
}
