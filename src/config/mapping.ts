/**
 * Migration mapping file loading
 */

import type { MigrationRequest } from "../types";
import { columnIndex, field, readCsvFile, type CsvTable } from "./csv";
import { DEFAULTS, defaultRecoveryClaim } from "./defaults";
import { ConfigError, isTransferMethod, validateMigrationRequest } from "./validator";

/**
 * One mapping row as written, before defaults. Empty cells are undefined.
 */
export interface MappingRow {
  sourceNamespace: string;
  destinationNamespace: string;
  sourceVolumeName?: string;
  destinationVolumeName?: string;
  sourcePath?: string;
  destinationPath?: string;
  method?: string;
  workloadIdentity?: string;
}

const COLUMNS = {
  sourceNamespace: ["source_namespace", "sourcenamespace"],
  destinationNamespace: ["dest_namespace", "destnamespace"],
  sourceVolumeName: ["source_pvc", "sourcepvc"],
  destinationVolumeName: ["dest_pvc", "destpvc"],
  sourcePath: ["source_path", "sourcepath"],
  destinationPath: ["dest_path", "destpath"],
  method: ["method"],
  workloadIdentity: ["controller_name", "controllername"],
} as const;

const REQUIRED = ["sourceNamespace", "destinationNamespace"] as const;

const EXPECTED_COLUMNS =
  "source_namespace, dest_namespace [plus optional: source_pvc, dest_pvc, source_path, dest_path, method, controller_name]";

function optional(value: string): string | undefined {
  return value === "" ? undefined : value;
}

/**
 * Read the first data row of a parsed mapping table
 */
export function parseMapping(table: CsvTable): MappingRow {
  const index = {
    sourceNamespace: columnIndex(table.header, COLUMNS.sourceNamespace),
    destinationNamespace: columnIndex(table.header, COLUMNS.destinationNamespace),
    sourceVolumeName: columnIndex(table.header, COLUMNS.sourceVolumeName),
    destinationVolumeName: columnIndex(table.header, COLUMNS.destinationVolumeName),
    sourcePath: columnIndex(table.header, COLUMNS.sourcePath),
    destinationPath: columnIndex(table.header, COLUMNS.destinationPath),
    method: columnIndex(table.header, COLUMNS.method),
    workloadIdentity: columnIndex(table.header, COLUMNS.workloadIdentity),
  };

  const missing = REQUIRED.filter((key) => index[key] < 0).map((key) => COLUMNS[key][0]);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required column(s) in header: ${missing.join(", ")}. ` +
        `Header seen: '${table.header.join(",")}'. Expected at least: ${EXPECTED_COLUMNS}`,
    );
  }

  const row = table.rows[0];
  if (!row) {
    throw new ConfigError("Mapping file has no data row");
  }

  const sourceNamespace = field(row, index.sourceNamespace);
  const destinationNamespace = field(row, index.destinationNamespace);
  if (!sourceNamespace || !destinationNamespace) {
    throw new ConfigError(
      `source_namespace or dest_namespace is empty in the first data row: ${row.join(",")}`,
    );
  }

  return {
    sourceNamespace,
    destinationNamespace,
    sourceVolumeName: optional(field(row, index.sourceVolumeName)),
    destinationVolumeName: optional(field(row, index.destinationVolumeName)),
    sourcePath: optional(field(row, index.sourcePath)),
    destinationPath: optional(field(row, index.destinationPath)),
    method: optional(field(row, index.method).toLowerCase()),
    workloadIdentity: optional(field(row, index.workloadIdentity)),
  };
}

export async function loadMappingFile(filePath: string): Promise<MappingRow> {
  const table = await readCsvFile(filePath, "Mapping file");
  return parseMapping(table);
}

export interface RequestOverrides {
  workloadIdentity?: string;
  image?: string;
}

/**
 * Apply defaults to a mapping row and validate the result
 */
export function buildMigrationRequest(
  row: MappingRow,
  overrides: RequestOverrides = {},
): MigrationRequest {
  const method = row.method ?? DEFAULTS.method;
  if (!isTransferMethod(method)) {
    throw new ConfigError(`method must be "tar" or "rsync" (got "${method}")`);
  }

  const workloadIdentity =
    overrides.workloadIdentity ?? row.workloadIdentity ?? DEFAULTS.workloadIdentity;

  const request: MigrationRequest = Object.freeze({
    sourceNamespace: row.sourceNamespace,
    destinationNamespace: row.destinationNamespace,
    sourceVolumeName: row.sourceVolumeName,
    destinationVolumeName: row.destinationVolumeName ?? defaultRecoveryClaim(workloadIdentity),
    sourcePath: row.sourcePath ?? DEFAULTS.sourcePath,
    destinationPath: row.destinationPath ?? DEFAULTS.destinationPath,
    method,
    workloadIdentity,
    image: overrides.image ?? DEFAULTS.image,
  });

  validateMigrationRequest(request);
  return request;
}
