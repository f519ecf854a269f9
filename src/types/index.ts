/**
 * Shared type foundations for the reconciliation pipeline.
 */

export * from "./records.js";
export * from "./projection.js";
export * from "./pipeline.js";
