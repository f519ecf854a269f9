/**
 * Default run configuration.
 *
 * Defaults reproduce an unfiltered run: every projection is kept, the
 * UTR-extended coordinate file is used and converted to GTF.
 */

import type { HaplotypeConfig, RunConfig } from "./schema.js";

/** Tier order used when a haplotype run names none. */
export const DEFAULT_TIER_RULE = "I>PI>UL>L>M>PM>PG>NF";

export const DEFAULT_RUN_CONFIG: Omit<RunConfig, "togaDir"> = {
  coordinateTarget: "utr",
  filters: {},
  convertTo: "gtf",
  onlyTable: false,
  onlyConvert: false,
  depure: false,
};

export const DEFAULT_HAPLOTYPE_CONFIG: Omit<HaplotypeConfig, "paths"> = {
  rule: DEFAULT_TIER_RULE,
  source: "loss",
  coordinateTarget: "utr",
};
