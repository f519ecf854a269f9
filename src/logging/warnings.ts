/**
 * Rendering of recoverable pipeline conditions into the run log.
 */

import type { Logger } from "./logger.js";
import type { PipelineWarning } from "../types/index.js";

/** Keys quoted per warning; the full count is always logged. */
const MAX_LISTED_KEYS = 5;

export function describeWarning(warning: PipelineWarning): string {
  switch (warning.type) {
    case "ambiguous_join": {
      const listed = warning.keys.slice(0, MAX_LISTED_KEYS).join(", ");
      const more = warning.keys.length > MAX_LISTED_KEYS ? ", ..." : "";
      const what = warning.matches === "none" ? "matched no row" : "matched several rows";
      return `${warning.keys.length} key(s) in ${warning.source} ${what}: ${listed}${more}`;
    }
    case "empty_result":
      return `${warning.step} discarded all ${warning.before} remaining row(s)`;
  }
}

export function logWarnings(logger: Logger, warnings: readonly PipelineWarning[]): void {
  for (const warning of warnings) {
    logger.warn(describeWarning(warning), { stage: warning.stage, type: warning.type });
  }
}
