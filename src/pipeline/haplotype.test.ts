/**
 * Tests for haplotype consensus runs.
 *
 * Run: node --import tsx --test src/pipeline/haplotype.test.ts
 */

import { strict as assert } from "node:assert";
import { after, describe, test } from "node:test";
import { existsSync, readFileSync, rmSync, unlinkSync } from "node:fs";
import { join } from "node:path";

import { runHaplotypes } from "./haplotype.js";
import { InputFiles, OutputFiles } from "./files.js";
import { bedLine, tempDir, writeResults } from "./testing.js";
import { loadHaplotypeConfig } from "../config/index.js";
import { createSilentLogger } from "../logging/index.js";
import { MissingInputError } from "../schema/index.js";
import { TierOrderError } from "../consensus/index.js";

const root = tempDir("reconcile-haplotype-");
after(() => rmSync(root, { recursive: true, force: true }));

const options = { logger: createSilentLogger(), runId: "20240115-abcdef" };

describe("runHaplotypes with loss summaries", () => {
  const first = writeResults(join(root, "loss-a"), {
    loss: ["level\tentity\tstatus", "PROJECTION\tRT1#1\tL", "TRANSCRIPT\tRT1\tL"].join("\n"),
  });
  const second = writeResults(join(root, "loss-b"), {
    loss: [
      "level\tentity\tstatus",
      "PROJECTION\tRT1#1\tI",
      "TRANSCRIPT\tRT1\tPI",
      "GENE\tRG1\tI",
    ].join("\n"),
  });
  const outputDir = join(root, "loss-out");

  test("elects the best class per entry at every level", () => {
    const summary = runHaplotypes(
      loadHaplotypeConfig({ paths: [first, second], source: "loss", outputDir }),
      options
    );

    assert.equal(summary.consensusPath, join(outputDir, OutputFiles.HAPLOTYPE_CONSENSUS));
    assert.equal(
      readFileSync(summary.consensusPath, "utf8"),
      "projection\ttranscript\tconsensus\nPROJECTION\tRT1#1\tI\nTRANSCRIPT\tRT1\tPI\nGENE\tRG1\tI\n"
    );
    assert.deepEqual(summary.consensus.rows[2]?.classes, ["NF", "I"]);
    assert.deepEqual(summary.byConsensus, { I: 2, PI: 1 });
  });

  test("only the loss summary is required", () => {
    const sparse = writeResults(join(root, "loss-c"));
    unlinkSync(join(sparse, InputFiles.QUERY_GENES));

    const summary = runHaplotypes(
      loadHaplotypeConfig({ paths: [first, sparse], outputDir: join(root, "loss-c-out") }),
      options
    );
    assert.equal(summary.consensus.size, 4);
  });

  test("a missing loss summary fails before anything is written", () => {
    const broken = writeResults(join(root, "loss-d"));
    unlinkSync(join(broken, InputFiles.LOSS_SUMMARY));
    const target = join(root, "loss-d-out");

    assert.throws(
      () => runHaplotypes(loadHaplotypeConfig({ paths: [first, broken], outputDir: target }), options),
      MissingInputError
    );
    assert.equal(existsSync(target), false);
  });
});

describe("runHaplotypes with unified tables", () => {
  test("merges projections present in each coordinate file", () => {
    const first = writeResults(join(root, "query-a"));
    const second = writeResults(join(root, "query-b"), {
      loss: [
        "level\tentity\tstatus",
        "PROJECTION\tRT1#1\tL",
        "PROJECTION\tRT2#2\tI",
        "PROJECTION\tRT3#3\tI",
      ].join("\n"),
      coordinates: [bedLine("RT1#1", 1000), bedLine("RT2#2", 3000)].join("\n"),
    });

    const summary = runHaplotypes(
      loadHaplotypeConfig({ paths: [first, second], source: "query" }),
      options
    );

    assert.equal(summary.consensusPath, join(first, OutputFiles.HAPLOTYPE_CONSENSUS));
    assert.equal(
      readFileSync(summary.consensusPath, "utf8"),
      [
        "reference_gene\treference_transcript\ttranscript\trelation\tconsensus",
        "RG1\tRT1\tRT1#1\tone2one\tI",
        "RG2\tRT2\tRT2#2\tone2one\tI",
        "RG3\tRT3\tRT3#3\tone2many\tPI",
        "",
      ].join("\n")
    );
    assert.deepEqual(summary.consensus.rows[2]?.classes, ["PI", "NF"]);
  });

  test("a malformed tier rule is rejected before inputs are read", () => {
    assert.throws(
      () =>
        runHaplotypes(
          {
            paths: [join(root, "absent-a"), join(root, "absent-b")],
            rule: "I>>L",
            source: "query",
            coordinateTarget: "utr",
          },
          options
        ),
      TierOrderError
    );
  });
});
