/**
 * Run configuration module.
 *
 * Provides schema-validated, immutable configuration for reconciliation and
 * haplotype runs.
 *
 * Usage:
 *   import { loadRunConfig } from "./config/run/index.js";
 *
 *   const config = loadRunConfig({
 *     togaDir: "results/assembly_a",
 *     filters: { minScore: 0.5, byClass: ["I", "PI"] },
 *   });
 */

export {
  LossStatus,
  OrthologyRelation,
  ConsensusSource,
  ConversionFormat,
  CoordinateTarget,
} from "./enums.js";

export type { RunConfig, HaplotypeConfig, FilterOptions } from "./schema.js";

export { RunConfigSchema, HaplotypeConfigSchema, FilterOptionsSchema } from "./schema.js";

export {
  loadRunConfig,
  loadHaplotypeConfig,
  RunConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export {
  DEFAULT_RUN_CONFIG,
  DEFAULT_HAPLOTYPE_CONFIG,
  DEFAULT_TIER_RULE,
} from "./defaults.js";
