/**
 * Projection reconciler.
 *
 * Merges the per-projection tables of a genome-projection results directory
 * into one unified table, resolves fragmented coordinate rows, filters the
 * result, and elects consensus classes across haplotype assemblies.
 */

export * from "./types/index.js";
export * from "./tables/index.js";
export * from "./logging/index.js";
export * from "./config/index.js";
export * from "./schema/index.js";
export * from "./reconcile/index.js";
export * from "./fragments/index.js";
export * from "./filters/index.js";
export * from "./isoforms/index.js";
export * from "./consensus/index.js";
export * from "./pipeline/index.js";
