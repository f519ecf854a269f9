/**
 * Tests for a reconciliation run over one results directory.
 *
 * Run: node --import tsx --test src/pipeline/run.test.ts
 *
 * Tests cover:
 *   1. Full run: fragments, isoforms, filters, table and conversion
 *   2. Output modes: onlyTable, onlyConvert, bed target
 *   3. Input checks before any output is written
 *   4. Depure, completeness collaborator, owned log file
 */

import { strict as assert } from "node:assert";
import { after, describe, test } from "node:test";
import { existsSync, mkdirSync, readFileSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";

import { ReconciliationRun, runReconciliation } from "./run.js";
import type { ConversionRequest, GeneModelConverter } from "./collaborators.js";
import { InputFiles, OutputFiles } from "./files.js";
import { recordingLogger, tempDir, writeResults } from "./testing.js";
import { loadRunConfig } from "../config/index.js";
import { createSilentLogger } from "../logging/index.js";
import { MissingInputError } from "../schema/index.js";

const RUN_ID = "20240115-abcdef";

const root = tempDir("reconcile-run-");
after(() => rmSync(root, { recursive: true, force: true }));

let fixtures = 0;

function setup(): { togaDir: string; outputDir: string } {
  fixtures++;
  const togaDir = writeResults(join(root, `results-${fixtures}`));
  return { togaDir, outputDir: join(root, `out-${fixtures}`) };
}

function fakeConverter(): { converter: GeneModelConverter; requests: ConversionRequest[] } {
  const requests: ConversionRequest[] = [];
  return {
    requests,
    converter: {
      convert(request) {
        requests.push(request);
        return request.output;
      },
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FULL RUN
// ═══════════════════════════════════════════════════════════════════════════

describe("ReconciliationRun", () => {
  test("writes every output of a filtered run and converts the filtered file", () => {
    const dirs = setup();
    const { converter, requests } = fakeConverter();
    const config = loadRunConfig({ ...dirs, filters: { minScore: 0.5 } });

    const summary = runReconciliation(config, {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });

    const runDir = join(dirs.outputDir, `reconciled_${RUN_ID}`);
    assert.equal(summary.outputDir, runDir);
    assert.equal(summary.fragmented, true);

    assert.equal(
      readFileSync(join(runDir, OutputFiles.ISOFORMS), "utf8"),
      "QG1\tRT1#1#FG1\nQG1\tRT1#1#FG2\nQG2\tRT2#2\nQG3\tRT3#3\n"
    );

    const fragmentedIds = readFileSync(join(runDir, OutputFiles.FRAGMENTED_COORDINATES), "utf8")
      .trimEnd()
      .split("\n")
      .map((line) => line.split("\t")[3]);
    assert.deepEqual(fragmentedIds, ["RT1#1#FG1", "RT1#1#FG2", "RT2#2", "RT3#3"]);

    const filtered = readFileSync(join(runDir, OutputFiles.FILTERED_COORDINATES), "utf8")
      .trimEnd()
      .split("\n");
    assert.deepEqual(
      filtered.map((line) => line.split("\t")[3]),
      ["RT1#1#FG1", "RT1#1#FG2", "RT3#3"]
    );
    assert.equal(filtered[2], "chr1\t4000\t4120\tRT3#3\t0\t+\t4000\t4120\t0,0,0\t1\t120,\t0,");

    assert.equal(
      gunzipSync(readFileSync(join(runDir, OutputFiles.PROJECTIONS))).toString("utf8"),
      [
        "reference_gene\treference_transcript\tquery_gene\tquery_transcript\torthology_class\tloss_status\torthology_score\tfragment_count",
        "RG1\tRT1\tQG1\tRT1#1\tone2one\tI\t0.95\t2",
        "RG3\tRT3\tQG3\tRT3#3\tone2many\tPI\t0.8\t0",
        "",
      ].join("\n")
    );

    assert.deepEqual(requests, [
      {
        format: "gtf",
        coordinates: join(runDir, OutputFiles.FILTERED_COORDINATES),
        output: join(runDir, "query_annotation.gtf.gz"),
        isoforms: join(runDir, OutputFiles.ISOFORMS),
      },
    ]);
    assert.equal(summary.geneModelPath, join(runDir, "query_annotation.gtf.gz"));
    assert.equal(summary.filterStats?.discardedProjections, 1);
  });

  test("reconciles the unfiltered table when no filter is set", () => {
    const dirs = setup();
    const { converter } = fakeConverter();
    const summary = new ReconciliationRun(loadRunConfig(dirs), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    }).run();

    assert.deepEqual(summary.projections.column("queryGene"), ["QG1", "QG2", "QG3"]);
    assert.equal(summary.filterStats, null);
    assert.equal(summary.coordinatesPath, join(summary.outputDir, OutputFiles.FRAGMENTED_COORDINATES));
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT MODES
// ═══════════════════════════════════════════════════════════════════════════

describe("output modes", () => {
  test("onlyTable writes the table and skips isoforms and conversion", () => {
    const dirs = setup();
    const { converter, requests } = fakeConverter();
    const summary = runReconciliation(loadRunConfig({ ...dirs, onlyTable: true }), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });

    assert.equal(summary.isoformsPath, null);
    assert.equal(summary.geneModelPath, null);
    assert.equal(summary.tablePath, join(summary.outputDir, OutputFiles.PROJECTIONS));
    assert.equal(existsSync(join(summary.outputDir, OutputFiles.ISOFORMS)), false);
    assert.equal(requests.length, 0);
  });

  test("onlyConvert converts without writing the table", () => {
    const dirs = setup();
    const { converter, requests } = fakeConverter();
    const summary = runReconciliation(
      loadRunConfig({ ...dirs, onlyConvert: true, convertTo: "gff" }),
      { logger: createSilentLogger(), runId: RUN_ID, converter }
    );

    assert.equal(summary.tablePath, null);
    assert.equal(existsSync(join(summary.outputDir, OutputFiles.PROJECTIONS)), false);
    assert.equal(requests[0]?.format, "gff");
    assert.equal(requests[0]?.output, join(summary.outputDir, "query_annotation.gff.gz"));
  });

  test("a bed target skips conversion", () => {
    const dirs = setup();
    const { converter, requests } = fakeConverter();
    const summary = runReconciliation(loadRunConfig({ ...dirs, convertTo: "bed" }), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });

    assert.equal(summary.geneModelPath, null);
    assert.equal(requests.length, 0);
  });

  test("a user isoform file is handed to the converter as is", () => {
    const dirs = setup();
    const isoforms = join(dirs.togaDir, "my_isoforms.tsv");
    writeFileSync(isoforms, "QG1\tRT1#1\n");
    const { converter, requests } = fakeConverter();
    const summary = runReconciliation(loadRunConfig({ ...dirs, isoforms }), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });

    assert.equal(summary.isoformsPath, isoforms);
    assert.equal(existsSync(join(summary.outputDir, OutputFiles.ISOFORMS)), false);
    assert.equal(requests[0]?.isoforms, isoforms);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INPUT CHECKS
// ═══════════════════════════════════════════════════════════════════════════

describe("input checks", () => {
  test("a missing input aborts before the output directory exists", () => {
    const dirs = setup();
    unlinkSync(join(dirs.togaDir, InputFiles.QUERY_GENES));

    assert.throws(
      () => runReconciliation(loadRunConfig(dirs), { logger: createSilentLogger(), runId: RUN_ID }),
      (err: unknown) => err instanceof MissingInputError && err.role === "query genes"
    );
    assert.equal(existsSync(dirs.outputDir), false);
  });

  test("a missing user isoform file is reported", () => {
    const dirs = setup();
    const isoforms = join(dirs.togaDir, "absent.tsv");

    assert.throws(
      () =>
        runReconciliation(loadRunConfig({ ...dirs, isoforms }), {
          logger: createSilentLogger(),
          runId: RUN_ID,
        }),
      (err: unknown) => err instanceof MissingInputError && err.path === isoforms
    );
  });

  test("the coordinate target picks the coordinate file", () => {
    const dirs = setup();
    unlinkSync(join(dirs.togaDir, InputFiles.COORDINATES_UTR));
    const { converter } = fakeConverter();

    assert.throws(
      () => runReconciliation(loadRunConfig(dirs), { logger: createSilentLogger(), runId: RUN_ID }),
      MissingInputError
    );
    const summary = runReconciliation(loadRunConfig({ ...dirs, coordinateTarget: "bed" }), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });
    assert.equal(summary.projections.size, 3);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN DIRECTORY
// ═══════════════════════════════════════════════════════════════════════════

describe("run directory", () => {
  test("depure removes earlier run directories only", () => {
    const dirs = setup();
    const earlier = join(dirs.outputDir, "reconciled_20231231-000000");
    const other = join(dirs.outputDir, "notes");
    mkdirSync(earlier, { recursive: true });
    mkdirSync(other, { recursive: true });
    const { converter } = fakeConverter();

    const summary = runReconciliation(loadRunConfig({ ...dirs, depure: true }), {
      logger: createSilentLogger(),
      runId: RUN_ID,
      converter,
    });

    assert.equal(existsSync(earlier), false);
    assert.equal(existsSync(other), true);
    assert.equal(existsSync(summary.outputDir), true);
  });

  test("opens and closes its own log file when no logger is given", () => {
    const dirs = setup();
    const { converter } = fakeConverter();
    const summary = runReconciliation(loadRunConfig(dirs), {
      runId: RUN_ID,
      logToConsole: false,
      converter,
    });

    const log = readFileSync(join(summary.outputDir, OutputFiles.LOG), "utf8");
    assert.match(log, /\[INFO \] \[20240115-abcdef\] Reconciliation started/);
    assert.match(log, /\[INFO \] \[20240115-abcdef\] Reconciliation finished/);
  });

  test("completeness results are logged per database", () => {
    const dirs = setup();
    const { converter } = fakeConverter();
    const { logger, entries } = recordingLogger();
    const calls: Array<[number, string, string]> = [];

    runReconciliation(
      loadRunConfig({ ...dirs, completeness: { source: "vertebrata", taxon: "mammals" } }),
      {
        logger,
        runId: RUN_ID,
        converter,
        completeness: (projections, source, taxon) => {
          calls.push([projections.size, source, taxon]);
          return [["reference-set", 98.5]];
        },
      }
    );

    assert.deepEqual(calls, [[3, "vertebrata", "mammals"]]);
    assert.ok(entries.includes("info: Completeness against reference-set: 98.5%"));
  });

  test("completeness without a collaborator only warns", () => {
    const dirs = setup();
    const { converter } = fakeConverter();
    const { logger, entries } = recordingLogger();

    runReconciliation(
      loadRunConfig({ ...dirs, completeness: { source: "vertebrata", taxon: "mammals" } }),
      { logger, runId: RUN_ID, converter }
    );

    assert.ok(
      entries.includes("warn: Completeness statistics requested but no collaborator is configured")
    );
  });
});
