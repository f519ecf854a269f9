/**
 * Multi-source reconciliation into the unified projection table.
 */

export {
  FRAGMENT_DELIMITER,
  RETRO_LABEL,
  RETRO_SEGMENT,
  UNASSIGNED_GENE,
  Reconciler,
  fragmentMarker,
  isRetroProjection,
  locusKey,
  reconcile,
  scoreProjectionId,
  type ReconcileInput,
  type ReconcileResult,
} from "./reconciler.js";
