/**
 * Filter pipeline.
 *
 * Narrows the unified table in a fixed order, skipping absent criteria:
 *
 *   score     orthology_score >= minScore
 *   class     loss_status in byClass
 *   relation  orthology_class in byRelation
 *   paralog   reference transcripts with more than one projection scoring
 *             above paralogScore are dropped whole
 *
 * The coordinate table is then narrowed to surviving projections, and the
 * unified table to projections present in the coordinate table, so both
 * outputs describe the same set.
 */

import type { Logger } from "../logging/index.js";
import { logWarnings } from "../logging/index.js";
import type { Table } from "../tables/index.js";
import {
  Stage,
  type CoordinateRecord,
  type EmptyResultWarning,
  type PipelineWarning,
  type Projection,
} from "../types/index.js";
import { LossStatus, OrthologyRelation, type FilterOptions } from "../config/index.js";
import { coordinateKey } from "../fragments/index.js";

export type FilterStepName = "score" | "class" | "relation" | "paralog" | "coordinates";

export interface FilterStep {
  readonly step: FilterStepName;
  readonly before: number;
  readonly after: number;
}

export interface FilterStats {
  /** Coordinate rows written to the filtered file */
  readonly keptCoordinates: number;
  readonly keptProjections: number;
  readonly discardedProjections: number;
  readonly uniqueTranscripts: number;
  readonly uniqueGenes: number;
  /** Retained projections per loss-status class */
  readonly byClass: Readonly<Record<string, number>>;
  /** Retained projections per orthology relationship */
  readonly byRelation: Readonly<Record<string, number>>;
  readonly steps: readonly FilterStep[];
}

export interface FilterResult {
  readonly projections: Table<Projection>;
  readonly coordinates: Table<CoordinateRecord>;
  readonly stats: FilterStats;
  readonly warnings: readonly PipelineWarning[];
}

/**
 * True when at least one criterion is set.
 */
export function hasFilters(criteria: FilterOptions): boolean {
  return (
    criteria.byClass !== undefined ||
    criteria.byRelation !== undefined ||
    criteria.minScore !== undefined ||
    criteria.paralogScore !== undefined
  );
}

/**
 * Keep reference transcripts with at most one projection scoring above the
 * threshold. Projections without a reference transcript stand alone.
 */
export function dropParalogGroups(
  projections: Table<Projection>,
  threshold: number
): Table<Projection> {
  const hits = new Map<string, number>();
  for (const row of projections) {
    if (row.referenceTranscript !== null && row.orthologyScore > threshold) {
      hits.set(row.referenceTranscript, (hits.get(row.referenceTranscript) ?? 0) + 1);
    }
  }
  return projections.filter(
    (row) => row.referenceTranscript === null || (hits.get(row.referenceTranscript) ?? 0) <= 1
  );
}

export class FilterPipeline {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  run(
    projections: Table<Projection>,
    coordinates: Table<CoordinateRecord>,
    criteria: FilterOptions
  ): FilterResult {
    const steps: FilterStep[] = [];
    const warnings: PipelineWarning[] = [];
    const initial = projections.size;

    this.warnUnknownValues(criteria);

    const apply = (
      table: Table<Projection>,
      step: FilterStepName,
      narrow: (table: Table<Projection>) => Table<Projection>,
      detail: string
    ): Table<Projection> => {
      const after = narrow(table);
      this.record(steps, warnings, step, table.size, after.size, detail);
      return after;
    };

    let table = projections;
    const { minScore, byClass, byRelation, paralogScore } = criteria;

    if (minScore !== undefined) {
      table = apply(
        table,
        "score",
        (t) => t.filter((row) => row.orthologyScore >= minScore),
        `orthology_score < ${minScore}`
      );
    }

    if (byClass !== undefined) {
      const allowed = new Set(byClass);
      table = apply(
        table,
        "class",
        (t) => t.filter((row) => row.lossStatus !== null && allowed.has(row.lossStatus)),
        `classes outside ${byClass.join(",")}`
      );
    }

    if (byRelation !== undefined) {
      const allowed = new Set(byRelation);
      table = apply(
        table,
        "relation",
        (t) => t.filter((row) => row.orthologyClass !== null && allowed.has(row.orthologyClass)),
        `relationships outside ${byRelation.join(",")}`
      );
    }

    if (paralogScore !== undefined) {
      table = apply(
        table,
        "paralog",
        (t) => dropParalogGroups(t, paralogScore),
        `paralog hits scoring > ${paralogScore}`
      );
    }

    const surviving = new Set(table.column("queryTranscript"));
    const keptCoordinates = coordinates.filter((row) => surviving.has(coordinateKey(row.id)));
    const present = new Set(keptCoordinates.rows.map((row) => coordinateKey(row.id)));
    const keptProjections = apply(
      table,
      "coordinates",
      (t) => t.filter((row) => present.has(row.queryTranscript)),
      "projections absent from the coordinate file"
    );

    const stats: FilterStats = {
      keptCoordinates: keptCoordinates.size,
      keptProjections: keptProjections.size,
      discardedProjections: initial - keptProjections.size,
      uniqueTranscripts: keptProjections.distinct("referenceTranscript").size,
      uniqueGenes: keptProjections.distinct("referenceGene").size,
      byClass: keptProjections.valueCounts("lossStatus"),
      byRelation: keptProjections.valueCounts("orthologyClass"),
      steps,
    };

    logWarnings(this.logger, warnings);
    this.logger.info(
      `Kept ${stats.keptCoordinates} coordinate rows after filters, discarded ${stats.discardedProjections} projections`
    );
    this.logger.info(
      `${stats.keptProjections} projections from ${stats.uniqueTranscripts} unique transcripts and ${stats.uniqueGenes} genes`
    );
    this.logger.info("Class stats of filtered projections", stats.byClass);
    this.logger.info("Relation stats of filtered projections", stats.byRelation);

    return { projections: keptProjections, coordinates: keptCoordinates, stats, warnings };
  }

  private record(
    steps: FilterStep[],
    warnings: PipelineWarning[],
    step: FilterStepName,
    before: number,
    after: number,
    detail: string
  ): void {
    steps.push({ step, before, after });
    if (before > after) {
      this.logger.debug(`Discarded ${before - after} projections with ${detail}`, {
        step,
        before,
        after,
      });
    }
    if (before > 0 && after === 0) {
      const warning: EmptyResultWarning = { type: "empty_result", stage: Stage.Filter, step, before };
      warnings.push(warning);
    }
  }

  private warnUnknownValues(criteria: FilterOptions): void {
    const unknownClasses = (criteria.byClass ?? []).filter(
      (value) => !LossStatus.safeParse(value).success
    );
    const unknownRelations = (criteria.byRelation ?? []).filter(
      (value) => !OrthologyRelation.safeParse(value).success
    );
    if (unknownClasses.length > 0) {
      this.logger.warn("Class filter names unknown loss-status values", { values: unknownClasses });
    }
    if (unknownRelations.length > 0) {
      this.logger.warn("Relation filter names unknown orthology relationships", {
        values: unknownRelations,
      });
    }
  }
}

export function filterProjections(
  projections: Table<Projection>,
  coordinates: Table<CoordinateRecord>,
  criteria: FilterOptions,
  logger: Logger
): FilterResult {
  return new FilterPipeline(logger).run(projections, coordinates, criteria);
}
