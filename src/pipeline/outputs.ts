/**
 * Column layouts and writers for every file a run produces.
 */

import { writeTsv, type Table, type TsvColumn } from "../tables/index.js";
import type { CoordinateRecord, HaplotypeConsensus, Projection } from "../types/index.js";
import type { ConsensusSource } from "../config/index.js";
import type { IsoformEntry } from "../isoforms/index.js";

export const PROJECTION_COLUMNS: readonly TsvColumn<Projection>[] = [
  { header: "reference_gene", value: (row) => row.referenceGene },
  { header: "reference_transcript", value: (row) => row.referenceTranscript },
  { header: "query_gene", value: (row) => row.queryGene },
  { header: "query_transcript", value: (row) => row.queryTranscript },
  { header: "orthology_class", value: (row) => row.orthologyClass },
  { header: "loss_status", value: (row) => row.lossStatus },
  { header: "orthology_score", value: (row) => row.orthologyScore },
  { header: "fragment_count", value: (row) => row.fragmentCount },
];

export const COORDINATE_COLUMNS: readonly TsvColumn<CoordinateRecord>[] = [
  { header: "chrom", value: (row) => row.chrom },
  { header: "start", value: (row) => row.start },
  { header: "end", value: (row) => row.end },
  { header: "id", value: (row) => row.id },
  { header: "score", value: (row) => row.score },
  { header: "strand", value: (row) => row.strand },
  { header: "thickStart", value: (row) => row.thickStart },
  { header: "thickEnd", value: (row) => row.thickEnd },
  { header: "rgb", value: (row) => row.rgb },
  { header: "blockCount", value: (row) => row.blockCount },
  { header: "blockSizes", value: (row) => row.blockSizes },
  { header: "blockStarts", value: (row) => row.blockStarts },
];

export const ISOFORM_COLUMNS: readonly TsvColumn<IsoformEntry>[] = [
  { header: "query_gene", value: (row) => row.queryGene },
  { header: "id", value: (row) => row.id },
];

const QUERY_CONSENSUS_COLUMNS: readonly TsvColumn<HaplotypeConsensus>[] = [
  { header: "reference_gene", value: (row) => row.referenceGene },
  { header: "reference_transcript", value: (row) => row.referenceTranscript },
  { header: "transcript", value: (row) => row.transcript },
  { header: "relation", value: (row) => row.relation },
  { header: "consensus", value: (row) => row.consensus },
];

const LOSS_CONSENSUS_COLUMNS: readonly TsvColumn<HaplotypeConsensus>[] = [
  { header: "projection", value: (row) => row.projection },
  { header: "transcript", value: (row) => row.transcript },
  { header: "consensus", value: (row) => row.consensus },
];

export function consensusColumns(source: ConsensusSource): readonly TsvColumn<HaplotypeConsensus>[] {
  return source === "query" ? QUERY_CONSENSUS_COLUMNS : LOSS_CONSENSUS_COLUMNS;
}

/** Gzip-compressed, with header. */
export function writeProjections(path: string, projections: Table<Projection>): void {
  writeTsv(path, projections, PROJECTION_COLUMNS, { header: true, gzip: true });
}

/** 12 columns, no header. */
export function writeCoordinates(path: string, coordinates: Table<CoordinateRecord>): void {
  writeTsv(path, coordinates, COORDINATE_COLUMNS, { header: false });
}

/** query_gene, coordinate ID; no header. */
export function writeIsoforms(path: string, isoforms: Table<IsoformEntry>): void {
  writeTsv(path, isoforms, ISOFORM_COLUMNS, { header: false });
}

export function writeConsensus(
  path: string,
  consensus: Table<HaplotypeConsensus>,
  source: ConsensusSource
): void {
  writeTsv(path, consensus, consensusColumns(source), { header: true });
}
