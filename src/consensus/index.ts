/**
 * Rule-based consensus across haplotype assemblies.
 */

export {
  NOT_FOUND,
  TIER_SEPARATOR,
  TierOrderError,
  parseTierOrder,
  type TierOrder,
} from "./rules.js";
export {
  ConsensusInputError,
  ConsensusMerger,
  entriesFromLossSummary,
  entriesFromProjections,
  mergeHaplotypes,
  type ConsensusEntry,
  type ConsensusResult,
} from "./merger.js";
