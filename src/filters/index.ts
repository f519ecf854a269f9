/**
 * Sequential filtering of the unified projection table.
 */

export {
  FilterPipeline,
  dropParalogGroups,
  filterProjections,
  hasFilters,
  type FilterResult,
  type FilterStats,
  type FilterStep,
  type FilterStepName,
} from "./pipeline.js";
