/**
 * Table loader.
 *
 * Reads one delimited file into a Table with named columns. The loader has
 * no knowledge of other tables and leaves values untyped; stages coerce the
 * fields they need.
 *
 * Header handling:
 *   none   every line is data
 *   skip   the first line is dropped; columns are assigned by position
 *   named  columns are located by header label; extra columns are ignored
 */

import { existsSync, statSync } from "node:fs";
import { Table, parseTsv, readText } from "../tables/index.js";
import { MISSING_VALUES } from "./columns.js";
import { MissingInputError, SchemaMismatchError } from "./errors.js";

/** A loaded row: column name → cell, null where the file has no value. */
export type RawRow = Readonly<Record<string, string | null>>;

export type HeaderMode = "none" | "skip" | "named";

export interface LoadTableOptions {
  header?: HeaderMode;
  /** Role of the file, used in error messages */
  role?: string;
}

export function toCell(value: string): string | null {
  return MISSING_VALUES.has(value.trim()) ? null : value;
}

/**
 * Assert a required input file exists.
 *
 * @throws MissingInputError
 */
export function requireFile(path: string, role: string): void {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new MissingInputError(path, role);
  }
}

/**
 * Load a tab-separated file with the given column names.
 *
 * @throws MissingInputError if the path is not a file
 * @throws SchemaMismatchError if a row's field count differs from the
 *   column list (or header, in named mode), or a named column is absent
 */
export function loadTable(
  path: string,
  columns: readonly string[],
  options: LoadTableOptions = {}
): Table<RawRow> {
  const mode = options.header ?? "none";
  requireFile(path, options.role ?? "input table");

  const records = parseTsv(readText(path));
  const headerRecord = mode === "none" ? undefined : records.shift();

  let positions: number[] = columns.map((_, index) => index);
  let width = columns.length;

  if (mode === "named" && headerRecord) {
    const labels = headerRecord.fields.map((label) => label.trim());
    positions = columns.map((column) => labels.indexOf(column));
    const missing = columns.filter((_, index) => positions[index] === -1);
    if (missing.length > 0) {
      throw new SchemaMismatchError(
        path,
        columns.length,
        labels.length,
        headerRecord.line,
        `${path}:${headerRecord.line}: header lacks column(s) ${missing.join(", ")}`
      );
    }
    width = labels.length;
  }

  const rows = records.map(({ line, fields }): RawRow => {
    if (fields.length !== width) {
      throw new SchemaMismatchError(path, width, fields.length, line);
    }
    const row: Record<string, string | null> = {};
    columns.forEach((column, index) => {
      row[column] = toCell(fields[positions[index] ?? index] ?? "");
    });
    return row;
  });

  return new Table(rows);
}
