/**
 * Source record definitions.
 * One shape per input table; cells absent in the file are null.
 */

/** Row of the orthology classification table. */
export interface OrthologyRecord {
  readonly referenceGene: string | null;
  readonly referenceTranscript: string | null;
  readonly queryGene: string | null;
  readonly queryTranscript: string | null;
  readonly orthologyClass: string | null;
}

/** Row of the loss summary (projection, transcript or gene level). */
export interface LossRecord {
  readonly level: string | null;
  readonly queryTranscript: string | null;
  readonly lossStatus: string | null;
}

/** Row of the orthology score table. */
export interface ScoreRecord {
  readonly transcript: string | null;
  readonly chain: string | null;
  /** Unparseable or absent scores read as 0 */
  readonly orthologyScore: number;
}

/** Projection ID → query gene, from the query gene table. */
export type GeneOverrides = ReadonlyMap<string, string>;

/**
 * Row of the 12-column coordinate file. Fields are kept as text so rows are
 * written back byte for byte.
 */
export interface CoordinateRecord {
  readonly chrom: string;
  readonly start: string;
  readonly end: string;
  readonly id: string;
  readonly score: string;
  readonly strand: string;
  readonly thickStart: string;
  readonly thickEnd: string;
  readonly rgb: string;
  readonly blockCount: string;
  readonly blockSizes: string;
  readonly blockStarts: string;
}
