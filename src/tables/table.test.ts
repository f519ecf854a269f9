/**
 * Tests for the table capability.
 *
 * Run: node --import tsx --test src/tables/table.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { Table } from "./table.js";

interface Left {
  readonly key: string | null;
  readonly gene: string | null;
}

interface Right {
  readonly key: string | null;
  readonly score: number;
}

const left = new Table<Left>([
  { key: "a", gene: "G1" },
  { key: "b", gene: null },
  { key: null, gene: "G3" },
]);

const right = new Table<Right>([
  { key: "b", score: 0.5 },
  { key: "c", score: 0.7 },
  { key: "b", score: 0.9 },
  { key: null, score: 0.1 },
]);

describe("Table.outerJoin", () => {
  test("keeps left order, pairs every match, then appends unmatched right rows", () => {
    const joined = left.outerJoin(
      right,
      (row) => row.key,
      (row) => row.key,
      (l, r) => ({ left: l?.key ?? null, gene: l?.gene ?? null, right: r?.key ?? null, score: r?.score ?? null })
    );
    assert.deepEqual(joined.rows, [
      { left: "a", gene: "G1", right: null, score: null },
      { left: "b", gene: null, right: "b", score: 0.5 },
      { left: "b", gene: null, right: "b", score: 0.9 },
      { left: null, gene: "G3", right: null, score: null },
      { left: null, gene: null, right: "c", score: 0.7 },
      { left: null, gene: null, right: null, score: 0.1 },
    ]);
  });
});

describe("Table.fillNull", () => {
  test("fills null cells only", () => {
    const filled = left.fillNull("gene", (row) => `from-${row.key ?? "none"}`);
    assert.deepEqual(filled.column("gene"), ["G1", "from-b", "G3"]);
  });

  test("a null fill leaves the cell null and returns the same row", () => {
    const filled = left.fillNull("gene", () => null);
    assert.equal(filled.rows[1], left.rows[1]);
    assert.equal(filled.rows[1]?.gene, null);
  });
});

describe("Table keys", () => {
  test("duplicateKeys counts non-null keys seen more than once", () => {
    assert.deepEqual([...right.duplicateKeys((row) => row.key)], [["b", 2]]);
  });

  test("uniqueBy keeps the first row per key and every null-keyed row", () => {
    const unique = right.uniqueBy((row) => row.key);
    assert.deepEqual(unique.column("score"), [0.5, 0.7, 0.1]);
  });

  test("groupBy preserves first-appearance order", () => {
    const groups = right.groupBy((row) => row.key);
    assert.deepEqual([...groups.keys()], ["b", "c", null]);
    assert.equal(groups.get("b")?.length, 2);
  });
});

describe("Table summaries", () => {
  test("distinct and valueCounts skip nulls", () => {
    assert.deepEqual([...left.distinct("gene")], ["G1", "G3"]);
    assert.deepEqual(right.valueCounts("key"), { b: 2, c: 1 });
  });

  test("operations return new tables", () => {
    const filtered = right.filter((row) => row.score > 0.6);
    assert.equal(filtered.size, 2);
    assert.equal(right.size, 4);
    assert.equal(Object.isFrozen(filtered.rows), true);
    assert.equal(Table.empty<Right>().size, 0);
  });
});
