/**
 * Tab-separated text codec.
 *
 * Files ending in `.gz` are gunzipped on read and gzipped on write. Blank
 * lines are skipped and carriage returns stripped, so files written on any
 * platform read the same.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { gunzipSync, gzipSync } from "node:zlib";
import type { Row, Table } from "./table.js";

export type Cell = string | number | null;

export interface TsvColumn<R extends Row> {
  /** Header label */
  header: string;
  value: (row: R) => Cell;
}

export interface WriteTsvOptions {
  /** Emit the header line */
  header?: boolean;
  /** Force gzip regardless of file extension */
  gzip?: boolean;
}

export function isGzipPath(path: string): boolean {
  return path.endsWith(".gz");
}

export function readText(path: string): string {
  const buffer = readFileSync(path);
  return (isGzipPath(path) ? gunzipSync(buffer) : buffer).toString("utf8");
}

/**
 * Split text into lines of tab-separated fields.
 * Each entry carries its 1-based line number for error reporting.
 */
export function parseTsv(text: string): Array<{ line: number; fields: string[] }> {
  const records: Array<{ line: number; fields: string[] }> = [];
  const lines = text.split("\n");
  lines.forEach((raw, index) => {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (line.trim() === "") {
      return;
    }
    records.push({ line: index + 1, fields: line.split("\t") });
  });
  return records;
}

export function formatCell(cell: Cell): string {
  if (cell === null) {
    return "";
  }
  return typeof cell === "number" ? String(cell) : cell;
}

export function formatTsv(header: readonly string[] | null, rows: readonly Cell[][]): string {
  const lines: string[] = [];
  if (header) {
    lines.push(header.join("\t"));
  }
  for (const row of rows) {
    lines.push(row.map(formatCell).join("\t"));
  }
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

/**
 * Write a table through its column accessors.
 */
export function writeTsv<R extends Row>(
  path: string,
  table: Table<R>,
  columns: readonly TsvColumn<R>[],
  options: WriteTsvOptions = {}
): void {
  const header = options.header === false ? null : columns.map((column) => column.header);
  const rows = table.rows.map((row) => columns.map((column) => column.value(row)));
  const text = formatTsv(header, rows);
  const gzip = options.gzip ?? isGzipPath(path);
  writeFileSync(path, gzip ? gzipSync(Buffer.from(text, "utf8")) : text);
}
