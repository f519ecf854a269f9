/**
 * Haplotype consensus run.
 *
 * Each path is the results directory of one assembly of the same organism.
 * With the `query` source every directory goes through reconciliation and
 * fragment resolution, narrowed to projections present in its coordinate
 * file; with the `loss` source the loss summary is read at every level.
 * The per-assembly tables are then merged into one consensus table.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { generateRunId, type Logger } from "../logging/index.js";
import type { HaplotypeConfig } from "../config/index.js";
import { loadLossSummary, requireFile } from "../schema/index.js";
import {
  ConsensusMerger,
  entriesFromLossSummary,
  entriesFromProjections,
  parseTierOrder,
  type ConsensusEntry,
} from "../consensus/index.js";
import { coordinateKey } from "../fragments/index.js";
import type { Table } from "../tables/index.js";
import type { HaplotypeConsensus, PipelineWarning } from "../types/index.js";
import { buildProjectionTables, checkInputs, openLogger, type LoggerSettings } from "./build.js";
import { inputPaths, OutputFiles } from "./files.js";
import { writeConsensus } from "./outputs.js";

export interface HaplotypeSummary {
  readonly runId: string;
  readonly consensusPath: string;
  readonly consensus: Table<HaplotypeConsensus>;
  readonly byConsensus: Readonly<Record<string, number>>;
  readonly warnings: readonly PipelineWarning[];
}

function queryEntries(
  resultsDir: string,
  config: Readonly<HaplotypeConfig>,
  logger: Logger,
  warnings: PipelineWarning[]
): Table<ConsensusEntry> {
  const paths = inputPaths(resultsDir, config.coordinateTarget);
  const built = buildProjectionTables(paths, logger);
  warnings.push(...built.warnings);

  const { projections, coordinates } = built.resolution;
  const present = new Set(coordinates.rows.map((row) => coordinateKey(row.id)));
  const narrowed = projections.filter((row) => present.has(row.queryTranscript));
  logger.info(`Kept ${narrowed.size} of ${projections.size} projections present in ${paths.coordinates}`);

  return entriesFromProjections(narrowed);
}

function lossEntries(resultsDir: string, logger: Logger): Table<ConsensusEntry> {
  const path = inputPaths(resultsDir, "bed").lossSummary;
  const loss = loadLossSummary(path);
  logger.info(`Loaded ${loss.size} loss entries from ${path}`, loss.valueCounts("level"));
  return entriesFromLossSummary(loss);
}

function checkHaplotypeInputs(config: Readonly<HaplotypeConfig>): void {
  for (const resultsDir of config.paths) {
    const paths = inputPaths(resultsDir, config.coordinateTarget);
    if (config.source === "query") {
      checkInputs(resultsDir, paths);
    } else {
      requireFile(paths.lossSummary, "loss summary");
    }
  }
}

/**
 * Merge the tables of every path and write `haplotype_consensus.tsv` to
 * `outputDir`, or to the first path when none is configured.
 *
 * @throws MissingInputError, SchemaMismatchError, TierOrderError, ConsensusInputError
 */
export function runHaplotypes(
  config: Readonly<HaplotypeConfig>,
  options: LoggerSettings = {}
): HaplotypeSummary {
  const order = parseTierOrder(config.rule);
  checkHaplotypeInputs(config);

  const runId = options.runId ?? generateRunId();
  const outputDir = config.outputDir ?? config.paths[0] ?? ".";
  mkdirSync(outputDir, { recursive: true });

  const { logger, owned } = openLogger(outputDir, OutputFiles.LOG, { ...options, runId });

  try {
    logger.info("Haplotype consensus started", {
      paths: config.paths,
      rule: order.toString(),
      source: config.source,
    });

    const warnings: PipelineWarning[] = [];
    const tables = config.paths.map((resultsDir) =>
      config.source === "query"
        ? queryEntries(resultsDir, config, logger, warnings)
        : lossEntries(resultsDir, logger)
    );

    const merged = new ConsensusMerger(logger).merge(tables, order, config.source);
    warnings.push(...merged.warnings);

    const consensusPath = join(outputDir, OutputFiles.HAPLOTYPE_CONSENSUS);
    writeConsensus(consensusPath, merged.consensus, config.source);
    logger.info(`Haplotype consensus written to ${consensusPath}`, { rows: merged.consensus.size });

    return {
      runId,
      consensusPath,
      consensus: merged.consensus,
      byConsensus: merged.byConsensus,
      warnings,
    };
  } catch (err) {
    logger.error("Haplotype consensus failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    if (owned) {
      logger.close();
    }
  }
}
