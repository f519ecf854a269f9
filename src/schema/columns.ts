/**
 * Column layouts of the input and output tables.
 */

export const ORTHOLOGY_CLASSIFICATION_COLUMNS = [
  "reference_gene",
  "reference_transcript",
  "query_gene",
  "query_transcript",
  "orthology_class",
] as const;

export const LOSS_SUMMARY_COLUMNS = ["level", "query_transcript", "loss_status"] as const;

export const ORTHOLOGY_SCORE_COLUMNS = ["transcript", "chain", "orthology_score"] as const;

export const QUERY_GENE_COLUMNS = ["projection", "query_gene"] as const;

export const COORDINATE_COLUMNS = [
  "chrom",
  "start",
  "end",
  "id",
  "score",
  "strand",
  "thickStart",
  "thickEnd",
  "rgb",
  "blockCount",
  "blockSizes",
  "blockStarts",
] as const;

/** Cell spellings read as an absent value. */
export const MISSING_VALUES: ReadonlySet<string> = new Set(["", "NA", "NaN", "nan", "None", "null"]);

/** Loss summary level holding one row per projection. */
export const PROJECTION_LEVEL = "PROJECTION";
