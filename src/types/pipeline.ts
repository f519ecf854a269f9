/**
 * Pipeline stage and diagnostic definitions.
 */

export enum Stage {
  Reconcile = "reconcile",
  Filter = "filter",
  Isoforms = "isoforms",
  Consensus = "consensus",
}

/**
 * A key matched no row, or several rows, where exactly one was expected.
 * Recovered by the first-wins fill policy.
 */
export interface AmbiguousJoinWarning {
  readonly type: "ambiguous_join";
  readonly stage: Stage;
  /** Table or lookup the keys were resolved against */
  readonly source: string;
  readonly matches: "none" | "multiple";
  /** Affected keys, first-appearance order */
  readonly keys: readonly string[];
}

/**
 * A filter step discarded every remaining row. The run continues.
 */
export interface EmptyResultWarning {
  readonly type: "empty_result";
  readonly stage: Stage;
  readonly step: string;
  /** Rows entering the step */
  readonly before: number;
}

export type PipelineWarning = AmbiguousJoinWarning | EmptyResultWarning;
