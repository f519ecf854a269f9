/**
 * Entry points: a reconciliation run over one results directory and a
 * haplotype consensus run over several.
 */

export {
  InputFiles,
  OutputFiles,
  coordinateStem,
  inputPaths,
  runDirectoryName,
  type InputPaths,
} from "./files.js";
export {
  COORDINATE_COLUMNS as COORDINATE_OUTPUT_COLUMNS,
  ISOFORM_COLUMNS,
  PROJECTION_COLUMNS,
  consensusColumns,
  writeConsensus,
  writeCoordinates,
  writeIsoforms,
  writeProjections,
} from "./outputs.js";
export {
  CommandConverter,
  ConverterError,
  type CompletenessStatistics,
  type ConversionRequest,
  type GeneModelConverter,
  type GeneModelFormat,
} from "./collaborators.js";
export {
  buildProjectionTables,
  checkInputs,
  openLogger,
  type BuiltTables,
  type LoggerSettings,
} from "./build.js";
export {
  ReconciliationRun,
  runReconciliation,
  type RunOptions,
  type RunSummary,
} from "./run.js";
export { runHaplotypes, type HaplotypeSummary } from "./haplotype.js";
