/**
 * Results-directory fixtures for pipeline tests.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "../logging/index.js";
import { InputFiles } from "./files.js";

export const ORTHOLOGY_TSV = [
  "t_gene\tt_transcript\tq_gene\tq_transcript\torthology_class",
  "RG1\tRT1\tQG1\tRT1#1\tone2one",
  "RG2\tRT2\tNA\tRT2#2\tone2one",
  "RG3\tRT3\tQG3\tRT3#3\tone2many",
].join("\n");

export const LOSS_TSV = [
  "level\tentity\tstatus",
  "PROJECTION\tRT1#1\tI",
  "PROJECTION\tRT2#2\tL",
  "PROJECTION\tRT3#3\tPI",
  "TRANSCRIPT\tRT1\tI",
].join("\n");

export const SCORES_TSV = [
  "transcript\tchain\tscore",
  "RT1\t1\t0.95",
  "RT2\t2\t0.4",
  "RT3\t3\t0.8",
].join("\n");

export const QUERY_GENES_TSV = ["projection\tquery_gene", "RT2#2\tQG2"].join("\n");

export function bedLine(id: string, start: number): string {
  return ["chr1", start, start + 120, id, 0, "+", start, start + 120, "0,0,0", 1, "120,", "0,"].join("\t");
}

/** RT1#1 is split across two rows. */
export const COORDINATES_BED = [
  bedLine("RT1#1", 1000),
  bedLine("RT1#1", 2000),
  bedLine("RT2#2", 3000),
  bedLine("RT3#3", 4000),
].join("\n");

export interface ResultsFixture {
  orthology?: string;
  loss?: string;
  scores?: string;
  queryGenes?: string;
  coordinates?: string;
}

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Write a results directory; both coordinate files get the same rows.
 */
export function writeResults(dir: string, files: ResultsFixture = {}): string {
  mkdirSync(dir, { recursive: true });
  const coordinates = `${files.coordinates ?? COORDINATES_BED}\n`;
  writeFileSync(join(dir, InputFiles.ORTHOLOGY), `${files.orthology ?? ORTHOLOGY_TSV}\n`);
  writeFileSync(join(dir, InputFiles.LOSS_SUMMARY), `${files.loss ?? LOSS_TSV}\n`);
  writeFileSync(join(dir, InputFiles.SCORES), `${files.scores ?? SCORES_TSV}\n`);
  writeFileSync(join(dir, InputFiles.QUERY_GENES), `${files.queryGenes ?? QUERY_GENES_TSV}\n`);
  writeFileSync(join(dir, InputFiles.COORDINATES), coordinates);
  writeFileSync(join(dir, InputFiles.COORDINATES_UTR), coordinates);
  return dir;
}

/** Logger that keeps "level: message" lines in memory. */
export function recordingLogger(): { logger: Logger; entries: string[] } {
  const entries: string[] = [];
  const record = (level: string) => (message: string) => {
    entries.push(`${level}: ${message}`);
  };
  return {
    entries,
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
      close: () => undefined,
    },
  };
}
