/**
 * Tests for the tab-separated codec.
 *
 * Run: node --import tsx --test src/tables/tsv.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { gunzipSync } from "node:zlib";

import { Table } from "./table.js";
import { formatTsv, parseTsv, readText, writeTsv, type TsvColumn } from "./tsv.js";

interface Entry {
  readonly name: string;
  readonly score: number | null;
}

const COLUMNS: readonly TsvColumn<Entry>[] = [
  { header: "name", value: (row) => row.name },
  { header: "score", value: (row) => row.score },
];

describe("parseTsv", () => {
  test("skips blank lines, strips CR and keeps line numbers", () => {
    const records = parseTsv("a\tb\r\n\nc\t\r\n");
    assert.deepEqual(records, [
      { line: 1, fields: ["a", "b"] },
      { line: 3, fields: ["c", ""] },
    ]);
  });
});

describe("formatTsv", () => {
  test("writes null as an empty cell", () => {
    assert.equal(formatTsv(["x", "y"], [["a", null], [null, 2]]), "x\ty\na\t\n\t2\n");
  });

  test("empty input gives empty text", () => {
    assert.equal(formatTsv(null, []), "");
  });
});

describe("writeTsv", () => {
  const table = new Table<Entry>([
    { name: "T1", score: 0.25 },
    { name: "T2", score: null },
  ]);

  test("plain file without header", () => {
    const dir = mkdtempSync(join(tmpdir(), "reconcile-tsv-"));
    try {
      const path = join(dir, "out.tsv");
      writeTsv(path, table, COLUMNS, { header: false });
      assert.equal(readFileSync(path, "utf8"), "T1\t0.25\nT2\t\n");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("gzip by extension, read back through readText", () => {
    const dir = mkdtempSync(join(tmpdir(), "reconcile-tsv-"));
    try {
      const path = join(dir, "out.tsv.gz");
      writeTsv(path, table, COLUMNS);
      const expected = "name\tscore\nT1\t0.25\nT2\t\n";
      assert.equal(gunzipSync(readFileSync(path)).toString("utf8"), expected);
      assert.equal(readText(path), expected);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
