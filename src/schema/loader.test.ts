/**
 * Tests for the schema loader and the typed input loaders.
 *
 * Run: node --import tsx --test src/schema/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { after, describe, test } from "node:test";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadTable, toCell } from "./loader.js";
import { MissingInputError, SchemaMismatchError } from "./errors.js";
import {
  loadCoordinates,
  loadGeneOverrides,
  loadLossSummary,
  loadOrthologyScores,
  parseScore,
} from "./sources.js";

const dir = mkdtempSync(join(tmpdir(), "reconcile-schema-"));
after(() => rmSync(dir, { recursive: true, force: true }));

function fixture(name: string, text: string): string {
  const path = join(dir, name);
  writeFileSync(path, text);
  return path;
}

function schemaError(fn: () => unknown): SchemaMismatchError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaMismatchError) {
      return err;
    }
    throw err;
  }
  assert.fail("expected SchemaMismatchError");
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTable", () => {
  test("assigns columns by position and reads missing spellings as null", () => {
    const path = fixture("positional.tsv", "x\ty\n1\tNA\nNone\t2\n");
    const table = loadTable(path, ["first", "second"], { header: "skip" });
    assert.deepEqual(table.rows, [
      { first: "1", second: null },
      { first: null, second: "2" },
    ]);
  });

  test("locates named columns and ignores extra ones", () => {
    const path = fixture("named.tsv", "extra\tquery_gene\tprojection\nz\tG1\tT1#1\n");
    const table = loadTable(path, ["projection", "query_gene"], { header: "named" });
    assert.deepEqual(table.rows, [{ projection: "T1#1", query_gene: "G1" }]);
  });

  test("a missing file raises MissingInputError naming its role", () => {
    assert.throws(
      () => loadTable(join(dir, "absent.tsv"), ["a"], { role: "loss summary" }),
      (err: unknown) =>
        err instanceof MissingInputError &&
        err.role === "loss summary" &&
        err.message === `Missing loss summary: ${join(dir, "absent.tsv")} is not a file`
    );
  });

  test("a short row raises SchemaMismatchError with its line", () => {
    const path = fixture("short.tsv", "a\tb\tc\n1\t2\t3\n\n4\t5\n");
    const err = schemaError(() => loadTable(path, ["a", "b", "c"], { header: "skip" }));
    assert.equal(err.line, 4);
    assert.equal(err.expected, 3);
    assert.equal(err.observed, 2);
    assert.equal(err.message, `${path}:4: expected 3 column(s), found 2`);
  });

  test("a named header lacking a column is a mismatch", () => {
    const path = fixture("bad-header.tsv", "projection\tgene\nT1\tG1\n");
    const err = schemaError(() => loadTable(path, ["projection", "query_gene"], { header: "named" }));
    assert.equal(err.message, `${path}:1: header lacks column(s) query_gene`);
  });

  test("toCell keeps surrounding text of real values", () => {
    assert.equal(toCell(" nan "), null);
    assert.equal(toCell("I"), "I");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TYPED LOADERS
// ═══════════════════════════════════════════════════════════════════════════

describe("parseScore", () => {
  test("malformed and absent scores read as 0", () => {
    assert.equal(parseScore(" 0.75 "), 0.75);
    assert.equal(parseScore("high"), 0);
    assert.equal(parseScore("Infinity"), 0);
    assert.equal(parseScore(null), 0);
  });
});

describe("input loaders", () => {
  test("orthology scores coerce the score column", () => {
    const path = fixture("scores.tsv", "transcript\tchain\torthology_score\nT1\t5\t0.9\nT2\t6\tn/a\n");
    assert.deepEqual(loadOrthologyScores(path).rows, [
      { transcript: "T1", chain: "5", orthologyScore: 0.9 },
      { transcript: "T2", chain: "6", orthologyScore: 0 },
    ]);
  });

  test("the loss summary keeps every level", () => {
    const path = fixture(
      "loss.tsv",
      "level\tquery_transcript\tloss_status\nPROJECTION\tT1#5\tI\nTRANSCRIPT\tT1\tI\nGENE\tG1\tI\n"
    );
    assert.deepEqual(loadLossSummary(path).column("level"), ["PROJECTION", "TRANSCRIPT", "GENE"]);
  });

  test("the first override for a projection wins", () => {
    const path = fixture("genes.tsv", "projection\tquery_gene\nT1#5\tQ1\nT1#5\tQ2\nT2#6\tNA\n");
    assert.deepEqual([...loadGeneOverrides(path)], [["T1#5", "Q1"]]);
  });

  test("coordinates keep fields verbatim", () => {
    const line = "chr1\t100\t200\tT1#5\t0\t+\t110\t190\t0,0,0\t2\t30,40,\t0,60,";
    const [row] = loadCoordinates(fixture("coords.bed", `${line}\n`)).rows;
    assert.equal(row?.id, "T1#5");
    assert.equal(row?.blockSizes, "30,40,");
    assert.equal(row?.rgb, "0,0,0");
  });
});
