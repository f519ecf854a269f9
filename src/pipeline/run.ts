/**
 * Reconciliation run over one results directory.
 *
 * Expected directory layout:
 *
 *   ├── loss_summary.tsv
 *   ├── orthology_classification.tsv
 *   ├── orthology_scores.tsv
 *   ├── query_genes.tsv
 *   ├── query_annotation.bed
 *   └── query_annotation.with_utrs.bed
 *
 * Outputs go to `<outputDir or resultsDir>/reconciled_<runId>/`.
 */

import { mkdirSync, readdirSync, rmSync } from "node:fs";
import { dirname, join } from "node:path";
import { generateRunId, type Logger } from "../logging/index.js";
import { loadConfig, type RunConfig } from "../config/index.js";
import { requireFile } from "../schema/index.js";
import { extractIsoforms } from "../isoforms/index.js";
import { FilterPipeline, hasFilters, type FilterStats } from "../filters/index.js";
import type { Table } from "../tables/index.js";
import type { PipelineWarning, Projection } from "../types/index.js";
import {
  CommandConverter,
  type CompletenessStatistics,
  type GeneModelConverter,
} from "./collaborators.js";
import { buildProjectionTables, checkInputs, openLogger, type LoggerSettings } from "./build.js";
import {
  coordinateStem,
  inputPaths,
  OutputFiles,
  runDirectoryName,
  type InputPaths,
} from "./files.js";
import { writeCoordinates, writeIsoforms, writeProjections } from "./outputs.js";

export interface RunOptions extends LoggerSettings {
  readonly converter?: GeneModelConverter;
  readonly completeness?: CompletenessStatistics;
}

export interface RunSummary {
  readonly runId: string;
  readonly outputDir: string;
  readonly projections: Table<Projection>;
  /** Coordinate file the gene model was (or would be) built from */
  readonly coordinatesPath: string;
  readonly isoformsPath: string | null;
  readonly tablePath: string | null;
  readonly geneModelPath: string | null;
  readonly fragmented: boolean;
  readonly filterStats: FilterStats | null;
  readonly warnings: readonly PipelineWarning[];
}

export class ReconciliationRun {
  private readonly config: Readonly<RunConfig>;
  private readonly options: RunOptions;
  readonly runId: string;
  readonly outputDir: string;
  readonly inputs: InputPaths;

  constructor(config: Readonly<RunConfig>, options: RunOptions = {}) {
    this.config = config;
    this.options = options;
    this.runId = options.runId ?? generateRunId();
    this.inputs = inputPaths(config.togaDir, config.coordinateTarget);
    this.outputDir = join(config.outputDir ?? config.togaDir, runDirectoryName(this.runId));
  }

  /**
   * Run every stage. Inputs are checked before anything is written.
   *
   * @throws MissingInputError, SchemaMismatchError, ConverterError
   */
  run(): RunSummary {
    checkInputs(this.config.togaDir, this.inputs);
    if (this.config.isoforms !== undefined) {
      requireFile(this.config.isoforms, "isoform table");
    }

    if (this.config.depure) {
      this.depure();
    }
    mkdirSync(this.outputDir, { recursive: true });

    const { logger, owned } = openLogger(this.outputDir, OutputFiles.LOG, {
      ...this.options,
      runId: this.runId,
    });

    try {
      logger.info("Reconciliation started", { config: this.config });
      return this.execute(logger);
    } catch (err) {
      logger.error("Reconciliation failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      if (owned) {
        logger.close();
      }
    }
  }

  private execute(logger: Logger): RunSummary {
    const built = buildProjectionTables(this.inputs, logger);
    const warnings: PipelineWarning[] = [...built.warnings];
    let { projections, coordinates } = built.resolution;
    let coordinatesPath = this.inputs.coordinates;

    if (built.resolution.fragmented) {
      coordinatesPath = join(this.outputDir, OutputFiles.FRAGMENTED_COORDINATES);
      writeCoordinates(coordinatesPath, coordinates);
      logger.info(`Fragment-resolved coordinate file written to ${coordinatesPath}`);
    }

    let isoformsPath: string | null = this.config.isoforms ?? null;
    if (isoformsPath === null) {
      const extracted = extractIsoforms(coordinates, projections, logger);
      warnings.push(...extracted.warnings);
      if (!this.config.onlyTable) {
        isoformsPath = join(this.outputDir, OutputFiles.ISOFORMS);
        writeIsoforms(isoformsPath, extracted.isoforms);
        logger.info(
          `Gene-to-isoform map with ${extracted.isoforms.size} entries written to ${isoformsPath}`
        );
      }
    } else {
      logger.debug(`Using user-supplied isoforms at ${isoformsPath}`);
    }

    let filterStats: FilterStats | null = null;
    if (hasFilters(this.config.filters)) {
      const filtered = new FilterPipeline(logger).run(projections, coordinates, this.config.filters);
      warnings.push(...filtered.warnings);
      projections = filtered.projections;
      coordinates = filtered.coordinates;
      filterStats = filtered.stats;
      coordinatesPath = join(this.outputDir, OutputFiles.FILTERED_COORDINATES);
      writeCoordinates(coordinatesPath, coordinates);
      logger.info(`Filtered coordinate file written to ${coordinatesPath}`, {
        rows: coordinates.size,
      });
    } else {
      logger.debug("No filters applied to the unified table");
    }

    let tablePath: string | null = null;
    if (!this.config.onlyConvert) {
      tablePath = join(this.outputDir, OutputFiles.PROJECTIONS);
      writeProjections(tablePath, projections);
      logger.info(`Unified table with ${projections.size} projections written to ${tablePath}`);
    }

    let geneModelPath: string | null = null;
    if (this.config.onlyTable) {
      logger.info("Only the unified table was requested; skipping conversion");
    } else if (isoformsPath !== null) {
      geneModelPath = this.convert(coordinatesPath, isoformsPath, logger);
    }

    this.reportCompleteness(projections, logger);
    logger.info("Reconciliation finished", { warnings: warnings.length });

    return {
      runId: this.runId,
      outputDir: this.outputDir,
      projections,
      coordinatesPath,
      isoformsPath,
      tablePath,
      geneModelPath,
      fragmented: built.resolution.fragmented,
      filterStats,
      warnings,
    };
  }

  private convert(coordinatesPath: string, isoformsPath: string, logger: Logger): string | null {
    const format = this.config.convertTo;
    if (format === "bed") {
      logger.info("Conversion target is bed; coordinate file left as is");
      return null;
    }

    const converter = this.options.converter ?? defaultConverter(logger);
    const output = join(this.outputDir, `${coordinateStem(this.inputs.coordinates)}.${format}.gz`);
    return converter.convert({ format, coordinates: coordinatesPath, output, isoforms: isoformsPath });
  }

  private reportCompleteness(projections: Table<Projection>, logger: Logger): void {
    const settings = this.config.completeness;
    if (settings === undefined) {
      return;
    }
    if (this.options.completeness === undefined) {
      logger.warn("Completeness statistics requested but no collaborator is configured");
      return;
    }
    const results = this.options.completeness(projections, settings.source, settings.taxon);
    for (const [database, percentage] of results) {
      logger.info(`Completeness against ${database}: ${percentage}%`, {
        source: settings.source,
        taxon: settings.taxon,
      });
    }
  }

  /**
   * Remove earlier run directories beside the new output directory.
   */
  private depure(): void {
    const parent = dirname(this.outputDir);
    const prefix = `${OutputFiles.RUN_DIRECTORY}_`;
    let entries: string[];
    try {
      entries = readdirSync(parent);
    } catch {
      return;
    }
    for (const entry of entries) {
      if (entry.startsWith(prefix)) {
        rmSync(join(parent, entry), { recursive: true, force: true });
      }
    }
  }
}

function defaultConverter(logger: Logger): GeneModelConverter {
  const { bed2gtfBin, bed2gffBin } = loadConfig();
  return new CommandConverter({ gtf: bed2gtfBin, gff: bed2gffBin }, logger);
}

export function runReconciliation(config: Readonly<RunConfig>, options: RunOptions = {}): RunSummary {
  return new ReconciliationRun(config, options).run();
}
