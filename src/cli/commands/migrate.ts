import { existsSync } from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import {
  buildMigrationRequest,
  ConfigError,
  type CredentialsByRole,
  credentialsFor,
  DEFAULTS,
  loadCredentialsFile,
  loadMappingFile,
  type MappingRow,
} from "../../config";
import { errorMessage, MigrationError, type PhaseState, runMigration } from "../../core";
import { isOcAvailable, isRsyncAvailable, OcClusterClient } from "../../kube";
import type { ClusterClient, ClusterRole, MigrationRequest, MigrationResult } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger, setLogFile, setLogLevel } from "../../utils/logger";
import { createRunDirectory, type RunDirectory } from "../../utils/run-dir";
import { establishSession } from "../login";
import { color, formatPhase, formatSummary, PROGRAM, ui } from "../ui";

/**
 * Outside world the command talks to; tests substitute fakes
 */
export interface MigrateDependencies {
  isOcAvailable: () => Promise<boolean>;
  isRsyncAvailable: () => Promise<boolean>;
  createClient: (role: ClusterRole, kubeconfig: string) => ClusterClient;
  /** Source of SIGINT and SIGTERM */
  signals: NodeJS.EventEmitter;
}

const defaultDependencies: MigrateDependencies = {
  isOcAvailable,
  isRsyncAvailable,
  createClient: (_role, kubeconfig) => new OcClusterClient({ kubeconfig }),
  signals: process,
};

type Spinner = ReturnType<typeof ui.spinner>;

/**
 * Spin while a backup or restore is being polled
 */
export function phaseStateReporter(
  createSpinner: () => Pick<Spinner, "start" | "stop"> = ui.spinner,
): (state: PhaseState, label: string) => void {
  let active: Pick<Spinner, "start" | "stop"> | null = null;

  return (state, label) => {
    if (state === "polling") {
      active = createSpinner();
      active.start(`Waiting for ${label.toLowerCase()} to complete...`);
      return;
    }
    if (!active) {
      return;
    }
    if (state === "succeeded") {
      active.stop(`${label} completed`);
    } else if (state === "failed" || state === "timed-out") {
      active.stop(`${label} ${state}`, 1);
    } else {
      return;
    }
    active = null;
  };
}

/**
 * Credentials file to use when --cred is not given: cluster-creds.csv beside
 * the mapping file, if it exists
 */
export function defaultCredentialsPath(mappingPath: string): string | undefined {
  const candidate = path.join(path.dirname(mappingPath), DEFAULTS.credentialsFileName);
  return existsSync(candidate) ? candidate : undefined;
}

async function promptRequestFields(
  row: MappingRow,
  interactive: boolean,
  image: string | undefined,
): Promise<{ workloadIdentity?: string; image?: string } | null> {
  if (!interactive) {
    return { image };
  }

  let workloadIdentity = row.workloadIdentity;
  if (!workloadIdentity) {
    const answer = await ui.text({
      message: "Controller (deployment) name",
      initialValue: DEFAULTS.workloadIdentity,
    });
    if (ui.isCancel(answer)) {
      return null;
    }
    workloadIdentity = answer.trim() || DEFAULTS.workloadIdentity;
  }

  let chosenImage = image;
  if (!chosenImage) {
    const answer = await ui.text({
      message: "Ephemeral pod image",
      initialValue: DEFAULTS.image,
    });
    if (ui.isCancel(answer)) {
      return null;
    }
    chosenImage = answer.trim() || DEFAULTS.image;
  }

  return { workloadIdentity, image: chosenImage };
}

function planSummary(request: MigrationRequest, runDir: RunDirectory): string {
  return formatSummary([
    { label: "Source", value: request.sourceNamespace },
    { label: "Destination", value: request.destinationNamespace },
    { label: "Controller", value: request.workloadIdentity },
    { label: "Source claim", value: request.sourceVolumeName ?? "(from backup)" },
    { label: "Destination claim", value: request.destinationVolumeName },
    { label: "Paths", value: `${request.sourcePath} -> ${request.destinationPath}` },
    { label: "Method", value: request.method },
    { label: "Image", value: request.image },
    { label: "Logs", value: runDir.root },
  ]);
}

export function resultSummary(result: MigrationResult, runDir: RunDirectory): string {
  const { sizeCheck, teardown } = result;
  const sizeValue =
    sizeCheck.status === "skipped"
      ? "skipped"
      : `${sizeCheck.status} (delta=${sizeCheck.delta ?? 0}, tolerance=${sizeCheck.tolerance ?? 0})`;

  return formatSummary([
    { label: "Backup directory", value: result.backup.backupDirectory },
    { label: "Backup claim", value: result.backup.backupClaim },
    {
      label: "Destination claim",
      value: `${result.destinationVolume} (${result.volumeCreated ? "created" : "existing"})`,
    },
    { label: "Storage class", value: result.volumeSpec.storageClassName ?? "(cluster default)" },
    { label: "Capacity", value: result.volumeSpec.capacity },
    { label: "Copied to", value: result.transfer.destinationDirectory },
    { label: "Method", value: result.transfer.method },
    {
      label: "Backup size",
      // du reports 1 KiB blocks
      value: sizeCheck.sourceBlocks !== null ? formatBytes(sizeCheck.sourceBlocks * 1024) : null,
    },
    { label: "Size check", value: sizeValue },
    { label: "Pods deleted", value: teardown.deletedWorkloads.join(", ") || "none" },
    { label: "Claims deleted", value: teardown.deletedVolumes.join(", ") || "none" },
    {
      label: "Cleanup failures",
      value: teardown.failures.length > 0 ? teardown.failures.map((f) => f.target).join(", ") : null,
    },
    { label: "Duration", value: formatDuration(result.durationMs) },
    { label: "Log", value: runDir.logFile },
  ]);
}

export async function migrateCommand(
  args: string[],
  deps: MigrateDependencies = defaultDependencies,
): Promise<number> {
  let parsed: ReturnType<typeof parseMigrateArgs>;
  try {
    parsed = parseMigrateArgs(args);
  } catch (error) {
    ui.error(errorMessage(error));
    printHelp();
    return 1;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    printHelp();
    return 0;
  }

  const mappingPath = values.pvc ?? positionals[0];
  if (!mappingPath) {
    printHelp();
    return 1;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const interactive = !values.yes && process.stdin.isTTY === true;

  ui.banner("migrate");

  if (!(await deps.isOcAvailable())) {
    ui.error("The oc CLI was not found on PATH");
    return 1;
  }

  let request: MigrationRequest;
  let credentials: CredentialsByRole = {};
  try {
    const row = await loadMappingFile(mappingPath);
    const credentialsPath = values.cred ?? defaultCredentialsPath(mappingPath);
    if (credentialsPath) {
      credentials = await loadCredentialsFile(credentialsPath);
    }

    const fields = await promptRequestFields(row, interactive, values.image);
    if (!fields) {
      ui.cancel("Migration cancelled");
      return 1;
    }
    request = buildMigrationRequest(row, fields);
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const runDir = await createRunDirectory(values["log-dir"] ?? process.cwd());
  setLogFile(runDir.logFile);
  logger.info(`Logs at: ${runDir.root}`);

  ui.note(planSummary(request, runDir), "Migration Plan");

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}; cancelling after the current step...`);
    controller.abort();
  };
  deps.signals.once("SIGINT", onSignal);
  deps.signals.once("SIGTERM", onSignal);

  try {
    const source = await establishSession(
      "source",
      credentialsFor(credentials, "source"),
      deps.createClient("source", runDir.kubeconfigs.source),
      { interactive },
    );
    const destination = await establishSession(
      "destination",
      credentialsFor(credentials, "destination"),
      deps.createClient("destination", runDir.kubeconfigs.destination),
      { interactive },
    );

    const rsyncAvailable = request.method === "rsync" ? await deps.isRsyncAvailable() : false;

    const result = await runMigration(
      request,
      { source, destination },
      {
        runTimestamp: runDir.timestamp,
        stagingDir: runDir.root,
        rsyncAvailable,
        signal: controller.signal,
        onPhase: (phase) => ui.step(formatPhase(phase)),
        onPhaseState: phaseStateReporter(),
      },
    );

    ui.note(resultSummary(result, runDir), "Migration Summary");
    ui.outro("Migration complete!");
    return 0;
  } catch (error) {
    const prefix = error instanceof MigrationError ? formatPhase(error.phase) : "Migration";
    logger.error(`${prefix} failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    ui.cancel(`Migration failed. See ${runDir.logFile}`);
    return 1;
  } finally {
    deps.signals.off("SIGINT", onSignal);
    deps.signals.off("SIGTERM", onSignal);
    setLogFile(null);
  }
}

function parseMigrateArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      pvc: { type: "string" },
      cred: { type: "string" },
      image: { type: "string" },
      "log-dir": { type: "string" },
      yes: { type: "boolean", short: "y", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });
}

export function printHelp(): void {
  console.log(`
${color.bold(PROGRAM)} - Move a controller backup between OpenShift clusters

${color.dim("USAGE:")}
  ${PROGRAM} --pvc <mapping.csv> [--cred <credentials.csv>] [OPTIONS]
  ${PROGRAM} <mapping.csv> [OPTIONS]

${color.dim("OPTIONS:")}
  --pvc <path>        Migration mapping CSV
  --cred <path>       Cluster credentials CSV (default: ${DEFAULTS.credentialsFileName} beside the mapping)
  --image <ref>       Transfer pod image (default: ${DEFAULTS.image})
  --log-dir <dir>     Parent of the run directory (default: current directory)
  -y, --yes           Never prompt; use defaults and fail on missing credentials
  --verbose           Debug logging
  -h, --help          Show this help message
  -v, --version       Show version

${color.dim("MAPPING COLUMNS:")}
  source_namespace, dest_namespace ${color.dim("(required)")}
  source_pvc, dest_pvc, source_path, dest_path, method, controller_name

${color.dim("CREDENTIALS COLUMNS:")}
  label ${color.dim("(source|destination)")}, api_url, token, user, pass, insecure

${color.dim("EXAMPLES:")}
  ${PROGRAM} --pvc pvc-map.csv --cred cluster-creds.csv
  ${PROGRAM} pvc-map.csv --yes --log-dir /var/tmp
`);
}
