/**
 * Gene-to-isoform map for gene-model conversion.
 *
 * Pairs every coordinate row with the query gene of the projection it
 * belongs to. Coordinate rows whose projection is missing from the unified
 * table are left out.
 */

import { logWarnings, type Logger } from "../logging/index.js";
import { Table } from "../tables/index.js";
import { Stage, type CoordinateRecord, type PipelineWarning, type Projection } from "../types/index.js";
import { coordinateKey } from "../fragments/index.js";

export interface IsoformEntry {
  readonly queryGene: string;
  /** Coordinate row ID */
  readonly id: string;
}

export interface IsoformResult {
  readonly isoforms: Table<IsoformEntry>;
  readonly warnings: readonly PipelineWarning[];
}

export function extractIsoforms(
  coordinates: Table<CoordinateRecord>,
  projections: Table<Projection>,
  logger: Logger
): IsoformResult {
  const genes = new Map<string, string>();
  for (const row of projections) {
    genes.set(row.queryTranscript, row.queryGene);
  }

  const entries: IsoformEntry[] = [];
  const unmatched: string[] = [];
  for (const row of coordinates) {
    const gene = genes.get(coordinateKey(row.id));
    if (gene === undefined) {
      unmatched.push(row.id);
    } else {
      entries.push({ queryGene: gene, id: row.id });
    }
  }

  const warnings: PipelineWarning[] =
    unmatched.length > 0
      ? [
          {
            type: "ambiguous_join",
            stage: Stage.Isoforms,
            source: "unified projection table",
            matches: "none",
            keys: unmatched,
          },
        ]
      : [];

  logWarnings(logger, warnings);
  logger.debug("Extracted gene-to-isoform map", { entries: entries.length });

  return { isoforms: new Table(entries), warnings };
}
