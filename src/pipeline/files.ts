/**
 * File layout of a results directory and of a run's output directory.
 */

import { basename, join } from "node:path";
import type { CoordinateTarget } from "../config/index.js";

export const InputFiles = {
  COORDINATES: "query_annotation.bed",
  COORDINATES_UTR: "query_annotation.with_utrs.bed",
  LOSS_SUMMARY: "loss_summary.tsv",
  ORTHOLOGY: "orthology_classification.tsv",
  SCORES: "orthology_scores.tsv",
  QUERY_GENES: "query_genes.tsv",
} as const;

export const OutputFiles = {
  /** Prefix of every run's output directory */
  RUN_DIRECTORY: "reconciled",
  LOG: "reconcile.log",
  PROJECTIONS: "projections.tsv.gz",
  ISOFORMS: "isoforms.tsv",
  FRAGMENTED_COORDINATES: "fragmented.bed",
  FILTERED_COORDINATES: "filtered.bed",
  HAPLOTYPE_CONSENSUS: "haplotype_consensus.tsv",
} as const;

export interface InputPaths {
  readonly coordinates: string;
  readonly lossSummary: string;
  readonly orthology: string;
  readonly scores: string;
  readonly queryGenes: string;
}

export function inputPaths(resultsDir: string, target: CoordinateTarget): InputPaths {
  return {
    coordinates: join(
      resultsDir,
      target === "utr" ? InputFiles.COORDINATES_UTR : InputFiles.COORDINATES
    ),
    lossSummary: join(resultsDir, InputFiles.LOSS_SUMMARY),
    orthology: join(resultsDir, InputFiles.ORTHOLOGY),
    scores: join(resultsDir, InputFiles.SCORES),
    queryGenes: join(resultsDir, InputFiles.QUERY_GENES),
  };
}

export function runDirectoryName(runId: string): string {
  return `${OutputFiles.RUN_DIRECTORY}_${runId}`;
}

/**
 * File name stem of a coordinate file: "query_annotation.with_utrs.bed" →
 * "query_annotation".
 */
export function coordinateStem(path: string): string {
  const name = basename(path);
  const dot = name.indexOf(".");
  return dot === -1 ? name : name.slice(0, dot);
}
