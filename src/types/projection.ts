/**
 * Projection definitions.
 * A projection is one predicted correspondence between a reference
 * transcript and a locus of the query genome.
 */

export interface Projection {
  readonly referenceGene: string | null;
  readonly referenceTranscript: string | null;
  /** Never null; falls back to UNASSIGNED_GENE */
  readonly queryGene: string;
  /** Unique within a unified table */
  readonly queryTranscript: string;
  readonly orthologyClass: string | null;
  readonly lossStatus: string | null;
  readonly orthologyScore: number;
  /** Size of the coordinate fragment group, 0 when not fragmented */
  readonly fragmentCount: number;
}

/**
 * Elected classification of one transcript across several assemblies.
 */
export interface HaplotypeConsensus {
  /** Shared transcript key */
  readonly transcript: string;
  /** One class per source, in source order; "NF" where a source has no row */
  readonly classes: readonly string[];
  readonly consensus: string;
  /** First non-null value across sources (query source only) */
  readonly referenceGene: string | null;
  readonly referenceTranscript: string | null;
  readonly relation: string | null;
  /** First non-null level across sources (loss source only) */
  readonly projection: string | null;
}
