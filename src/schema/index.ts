/**
 * Schema loading: raw input files → named-column tables.
 */

export {
  COORDINATE_COLUMNS,
  LOSS_SUMMARY_COLUMNS,
  MISSING_VALUES,
  ORTHOLOGY_CLASSIFICATION_COLUMNS,
  ORTHOLOGY_SCORE_COLUMNS,
  PROJECTION_LEVEL,
  QUERY_GENE_COLUMNS,
} from "./columns.js";
export { MissingInputError, SchemaMismatchError } from "./errors.js";
export {
  loadTable,
  requireFile,
  toCell,
  type HeaderMode,
  type LoadTableOptions,
  type RawRow,
} from "./loader.js";
export {
  loadCoordinates,
  loadGeneOverrides,
  loadLossSummary,
  loadOrthologyClassification,
  loadOrthologyScores,
  parseScore,
} from "./sources.js";
