/**
 * Typed loaders for each input table of a results directory.
 */

import type { Table } from "../tables/index.js";
import type {
  CoordinateRecord,
  GeneOverrides,
  LossRecord,
  OrthologyRecord,
  ScoreRecord,
} from "../types/index.js";
import {
  COORDINATE_COLUMNS,
  LOSS_SUMMARY_COLUMNS,
  ORTHOLOGY_CLASSIFICATION_COLUMNS,
  ORTHOLOGY_SCORE_COLUMNS,
  QUERY_GENE_COLUMNS,
} from "./columns.js";
import { loadTable, type RawRow } from "./loader.js";

/**
 * Coerce a score cell to a number. Absent or malformed scores are 0.
 */
export function parseScore(value: string | null): number {
  if (value === null) {
    return 0;
  }
  const trimmed = value.trim();
  const score = trimmed === "" ? NaN : Number(trimmed);
  return Number.isFinite(score) ? score : 0;
}

function cell(row: RawRow, column: string): string | null {
  return row[column] ?? null;
}

function text(row: RawRow, column: string): string {
  return row[column] ?? "";
}

export function loadOrthologyClassification(path: string): Table<OrthologyRecord> {
  return loadTable(path, ORTHOLOGY_CLASSIFICATION_COLUMNS, {
    header: "skip",
    role: "orthology classification",
  }).map((row) => ({
    referenceGene: cell(row, "reference_gene"),
    referenceTranscript: cell(row, "reference_transcript"),
    queryGene: cell(row, "query_gene"),
    queryTranscript: cell(row, "query_transcript"),
    orthologyClass: cell(row, "orthology_class"),
  }));
}

/**
 * Load the loss summary at every level. The reconciler keeps only
 * projection-level rows; haplotype runs use all of them.
 */
export function loadLossSummary(path: string): Table<LossRecord> {
  return loadTable(path, LOSS_SUMMARY_COLUMNS, {
    header: "skip",
    role: "loss summary",
  }).map((row) => ({
    level: cell(row, "level"),
    queryTranscript: cell(row, "query_transcript"),
    lossStatus: cell(row, "loss_status"),
  }));
}

export function loadOrthologyScores(path: string): Table<ScoreRecord> {
  return loadTable(path, ORTHOLOGY_SCORE_COLUMNS, {
    header: "skip",
    role: "orthology scores",
  }).map((row) => ({
    transcript: cell(row, "transcript"),
    chain: cell(row, "chain"),
    orthologyScore: parseScore(cell(row, "orthology_score")),
  }));
}

/**
 * Load projection → query gene overrides. The first row for a projection wins.
 */
export function loadGeneOverrides(path: string): GeneOverrides {
  const table = loadTable(path, QUERY_GENE_COLUMNS, {
    header: "named",
    role: "query genes",
  });
  const overrides = new Map<string, string>();
  for (const row of table) {
    const projection = cell(row, "projection");
    const gene = cell(row, "query_gene");
    if (projection !== null && gene !== null && !overrides.has(projection)) {
      overrides.set(projection, gene);
    }
  }
  return overrides;
}

/**
 * Load a 12-column coordinate file. Fields stay verbatim.
 */
export function loadCoordinates(path: string): Table<CoordinateRecord> {
  return loadTable(path, COORDINATE_COLUMNS, {
    header: "none",
    role: "coordinate annotation",
  }).map((row) => ({
    chrom: text(row, "chrom"),
    start: text(row, "start"),
    end: text(row, "end"),
    id: text(row, "id"),
    score: text(row, "score"),
    strand: text(row, "strand"),
    thickStart: text(row, "thickStart"),
    thickEnd: text(row, "thickEnd"),
    rgb: text(row, "rgb"),
    blockCount: text(row, "blockCount"),
    blockSizes: text(row, "blockSizes"),
    blockStarts: text(row, "blockStarts"),
  }));
}
