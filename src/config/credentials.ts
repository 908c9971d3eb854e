/**
 * Cluster credentials file loading
 */

import type { ClusterCredentials, ClusterRole } from "../types";
import { columnIndex, field, readCsvFile, type CsvTable } from "./csv";
import { parseBooleanFlag } from "./validator";

export type CredentialsByRole = Partial<Record<ClusterRole, ClusterCredentials>>;

const LABELS: Record<string, ClusterRole> = {
  source: "source",
  destination: "destination",
  dest: "destination",
};

function optional(value: string): string | undefined {
  return value === "" ? undefined : value;
}

export function parseCredentials(table: CsvTable): CredentialsByRole {
  const index = {
    label: columnIndex(table.header, ["label"]),
    endpoint: columnIndex(table.header, ["api_url", "apiurl"]),
    token: columnIndex(table.header, ["token"]),
    username: columnIndex(table.header, ["user"]),
    password: columnIndex(table.header, ["pass"]),
    insecure: columnIndex(table.header, ["insecure"]),
  };

  const result: CredentialsByRole = {};

  for (const row of table.rows) {
    const role = LABELS[field(row, index.label).toLowerCase()];
    if (!role) {
      continue;
    }

    result[role] = {
      endpoint: optional(field(row, index.endpoint)),
      token: optional(field(row, index.token)),
      username: optional(field(row, index.username)),
      password: optional(field(row, index.password)),
      insecureSkipTlsVerify: parseBooleanFlag(field(row, index.insecure), `${role} insecure`),
    };
  }

  return result;
}

export async function loadCredentialsFile(filePath: string): Promise<CredentialsByRole> {
  const table = await readCsvFile(filePath, "Credentials file");
  return parseCredentials(table);
}

/**
 * Credentials for a role, or an empty set that will trigger prompting
 */
export function credentialsFor(all: CredentialsByRole, role: ClusterRole): ClusterCredentials {
  return all[role] ?? { insecureSkipTlsVerify: false };
}
