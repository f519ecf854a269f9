/**
 * Stages shared by reconciliation and haplotype runs: load the tables of one
 * results directory, reconcile them, and resolve fragmented coordinates.
 */

import { existsSync, statSync } from "node:fs";
import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import {
  loadCoordinates,
  loadGeneOverrides,
  loadLossSummary,
  loadOrthologyClassification,
  loadOrthologyScores,
  MissingInputError,
  requireFile,
} from "../schema/index.js";
import { Reconciler } from "../reconcile/index.js";
import { FragmentResolver, type FragmentResolution } from "../fragments/index.js";
import type { PipelineWarning } from "../types/index.js";
import type { InputPaths } from "./files.js";

export interface LoggerSettings {
  /** Use this logger instead of opening one in the output directory */
  readonly logger?: Logger;
  readonly runId?: string;
  readonly logLevel?: LogLevel;
  readonly logToConsole?: boolean;
}

export interface BuiltTables {
  readonly resolution: FragmentResolution;
  readonly warnings: readonly PipelineWarning[];
}

/**
 * Assert every input of a results directory is present.
 *
 * @throws MissingInputError naming the first absent file
 */
export function checkInputs(resultsDir: string, paths: InputPaths): void {
  if (!existsSync(resultsDir) || !statSync(resultsDir).isDirectory()) {
    throw new MissingInputError(resultsDir, "results directory");
  }
  requireFile(paths.coordinates, "coordinate annotation");
  requireFile(paths.lossSummary, "loss summary");
  requireFile(paths.orthology, "orthology classification");
  requireFile(paths.scores, "orthology scores");
  requireFile(paths.queryGenes, "query genes");
}

/**
 * Open the run logger in `logDir`, unless the caller supplied one.
 * Returns whether the caller owns closing it.
 */
export function openLogger(
  logDir: string,
  logFile: string,
  settings: LoggerSettings
): { logger: Logger; owned: boolean } {
  if (settings.logger) {
    return { logger: settings.logger, owned: false };
  }
  const logger = createLogger({
    logDir,
    logFile,
    level: settings.logLevel ?? "info",
    console: settings.logToConsole ?? true,
    runId: settings.runId,
  });
  return { logger, owned: true };
}

export function buildProjectionTables(paths: InputPaths, logger: Logger): BuiltTables {
  const orthology = loadOrthologyClassification(paths.orthology);
  const loss = loadLossSummary(paths.lossSummary);
  const scores = loadOrthologyScores(paths.scores);
  const geneOverrides = loadGeneOverrides(paths.queryGenes);
  const coordinates = loadCoordinates(paths.coordinates);

  logger.info("Loaded input tables", {
    orthology: orthology.size,
    loss: loss.size,
    scores: scores.size,
    geneOverrides: geneOverrides.size,
    coordinates: coordinates.size,
  });

  const reconciled = new Reconciler(logger).reconcile({ orthology, loss, scores, geneOverrides });
  const resolution = new FragmentResolver(logger).resolve(coordinates, reconciled.projections);

  return { resolution, warnings: reconciled.warnings };
}
