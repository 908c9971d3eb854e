/**
 * Minimal CSV reading for the mapping and credentials files.
 * Fields are comma-separated without quoting, matching what the files are
 * documented to contain.
 */

import { readFile } from "node:fs/promises";
import { ConfigError } from "./validator";

export interface CsvTable {
  /** Normalized column names */
  header: string[];
  /** Data rows, blank and '#' lines removed */
  rows: string[][];
}

/**
 * Normalize a header cell: BOM and CR removed, lowercased, spaces dropped
 */
export function normalizeColumn(name: string): string {
  return name.replace(/^\uFEFF/, "").replace(/\r/g, "").toLowerCase().replace(/\s+/g, "");
}

function splitLine(line: string): string[] {
  return line.replace(/\r/g, "").split(",").map((field) => field.trim());
}

export function parseCsv(content: string): CsvTable {
  const lines = content.replace(/^\uFEFF/, "").split("\n");
  const headerLine = lines[0] ?? "";
  if (!headerLine.trim()) {
    return { header: [], rows: [] };
  }

  const header = headerLine.split(",").map(normalizeColumn);
  const rows = lines
    .slice(1)
    .filter((line) => line.trim() !== "" && !line.trim().startsWith("#"))
    .map(splitLine);

  return { header, rows };
}

/**
 * Index of the first column matching any of the names, or -1
 */
export function columnIndex(header: string[], names: readonly string[]): number {
  for (const name of names) {
    const index = header.indexOf(name);
    if (index >= 0) {
      return index;
    }
  }
  return -1;
}

/**
 * Field value at a column index; missing columns and cells read as ""
 */
export function field(row: string[], index: number): string {
  return index >= 0 ? (row[index] ?? "") : "";
}

export async function readCsvFile(filePath: string, description: string): Promise<CsvTable> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") {
      throw new ConfigError(`${description} not found: ${filePath}`);
    }
    throw new ConfigError(`${description} could not be read: ${filePath}`);
  }
  return parseCsv(content);
}
