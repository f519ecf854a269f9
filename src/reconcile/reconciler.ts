/**
 * Reconciler: joins the orthology, loss and score tables of one results
 * directory into a unified projection table.
 *
 * Identifiers missing from one table are recovered from the others in a
 * fixed order:
 *
 *   1. loss rows at projection level; locus key = ID minus its last segment
 *   2. orthology ⟗ loss on query_transcript; null reference_transcript ← locus key
 *   3. transcript → gene lookup fills null reference_gene / query_gene
 *   4. ⟗ scores on transcript#chain; null reference_transcript ← score transcript
 *   5. transcript → gene lookup again
 *   6. query gene overrides, unconditionally
 *   7. fragment and retro markers appended to query_gene
 *   8. remaining null query_gene ← UNASSIGNED_GENE
 *
 * Every fill targets null cells only, so the first value set wins. Steps 6
 * and 7 are the only ones that rewrite a set value.
 */

import { Table } from "../tables/index.js";
import { PROJECTION_LEVEL } from "../schema/index.js";
import { logWarnings, type Logger } from "../logging/index.js";
import {
  Stage,
  type AmbiguousJoinWarning,
  type GeneOverrides,
  type LossRecord,
  type OrthologyRecord,
  type PipelineWarning,
  type Projection,
  type ScoreRecord,
} from "../types/index.js";

/** query_gene of a projection no source names a gene for. */
export const UNASSIGNED_GENE = "UNASSIGNED";

/** Separator of the fragment marker in projection IDs. */
export const FRAGMENT_DELIMITER = "$";

/** Last `#` segment marking a retrocopy projection. */
export const RETRO_SEGMENT = "retro";
export const RETRO_LABEL = "#RETRO";

export interface ReconcileInput {
  readonly orthology: Table<OrthologyRecord>;
  readonly loss: Table<LossRecord>;
  readonly scores: Table<ScoreRecord>;
  readonly geneOverrides: GeneOverrides;
}

export interface ReconcileResult {
  readonly projections: Table<Projection>;
  readonly warnings: readonly PipelineWarning[];
}

const GENE_LOOKUP = "transcript → gene lookup";

interface WorkingRow {
  readonly referenceGene: string | null;
  readonly referenceTranscript: string | null;
  readonly queryGene: string | null;
  readonly queryTranscript: string | null;
  readonly orthologyClass: string | null;
  readonly lossStatus: string | null;
  readonly orthologyScore: number | null;
  /** Loss-derived locus key (step 1) */
  readonly lossKey: string | null;
  /** Raw transcript of the joined score row (step 4) */
  readonly scoreTranscript: string | null;
}

interface KeyedScore {
  readonly queryTranscript: string | null;
  readonly transcript: string | null;
  readonly orthologyScore: number;
}

/**
 * Drop the last `#` segment of a projection ID, or its last `.` segment
 * when it has no `#`. IDs with neither are returned unchanged.
 */
export function locusKey(projectionId: string): string {
  const hash = projectionId.lastIndexOf("#");
  if (hash > 0) {
    return projectionId.slice(0, hash);
  }
  const dot = projectionId.lastIndexOf(".");
  return dot > 0 ? projectionId.slice(0, dot) : projectionId;
}

/**
 * Projection ID of a score row: transcript#chain.
 */
export function scoreProjectionId(transcript: string | null, chain: string | null): string | null {
  return transcript === null || chain === null ? null : `${transcript}#${chain}`;
}

/**
 * Fragment marker of a projection ID (text after the last `$`), or null.
 */
export function fragmentMarker(projectionId: string): string | null {
  const index = projectionId.lastIndexOf(FRAGMENT_DELIMITER);
  return index === -1 ? null : projectionId.slice(index + 1);
}

export function isRetroProjection(projectionId: string): boolean {
  const segments = projectionId.split("#");
  return segments.length > 1 && segments[segments.length - 1]?.toLowerCase() === RETRO_SEGMENT;
}

function countNull<R extends object>(table: Table<R>, key: keyof R): number {
  return table.rows.reduce((count, row) => (row[key] === null ? count + 1 : count), 0);
}

export class Reconciler {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  reconcile(input: ReconcileInput): ReconcileResult {
    const warnings: PipelineWarning[] = [];

    // Step 1
    const projectionLoss = input.loss.filter((row) => row.level === PROJECTION_LEVEL);
    this.logger.debug("Kept projection-level loss rows", {
      before: input.loss.size,
      after: projectionLoss.size,
    });

    const orthology = this.uniqueByTranscript(input.orthology, "orthology classification", warnings);
    const loss = this.uniqueByTranscript(projectionLoss, "loss summary", warnings);

    // Step 2
    let table = orthology.outerJoin(
      loss,
      (row) => row.queryTranscript,
      (row) => row.queryTranscript,
      (left, right): WorkingRow => ({
        referenceGene: left?.referenceGene ?? null,
        referenceTranscript: left?.referenceTranscript ?? null,
        queryGene: left?.queryGene ?? null,
        queryTranscript: left?.queryTranscript ?? right?.queryTranscript ?? null,
        orthologyClass: left?.orthologyClass ?? null,
        lossStatus: right?.lossStatus ?? null,
        orthologyScore: null,
        lossKey: right?.queryTranscript ? locusKey(right.queryTranscript) : null,
        scoreTranscript: null,
      })
    );
    this.logger.debug("Joined orthology and loss tables", {
      orthology: orthology.size,
      loss: loss.size,
      joined: table.size,
    });
    table = this.fill(table, "referenceTranscript", (row) => row.lossKey, "loss locus key");

    // Step 3
    table = this.fillGenes(table, warnings);

    // Step 4
    const keyed = input.scores.map(
      (row): KeyedScore => ({
        queryTranscript: scoreProjectionId(row.transcript, row.chain),
        transcript: row.transcript,
        orthologyScore: row.orthologyScore,
      })
    );
    const scores = this.uniqueByTranscript(keyed, "orthology scores", warnings);
    const beforeScores = table.size;
    table = table.outerJoin(
      scores,
      (row) => row.queryTranscript,
      (row) => row.queryTranscript,
      (left, right): WorkingRow => ({
        referenceGene: left?.referenceGene ?? null,
        referenceTranscript: left?.referenceTranscript ?? null,
        queryGene: left?.queryGene ?? null,
        queryTranscript: left?.queryTranscript ?? right?.queryTranscript ?? null,
        orthologyClass: left?.orthologyClass ?? null,
        lossStatus: left?.lossStatus ?? null,
        orthologyScore: right?.orthologyScore ?? null,
        lossKey: left?.lossKey ?? null,
        scoreTranscript: right?.transcript ?? null,
      })
    );
    this.logger.debug("Joined orthology scores", {
      scores: scores.size,
      before: beforeScores,
      after: table.size,
    });
    table = this.fill(
      table,
      "referenceTranscript",
      (row) => row.scoreTranscript,
      "score transcript"
    );

    // Step 5
    table = this.fillGenes(table, warnings);

    // Step 6
    table = this.applyOverrides(table, input.geneOverrides);

    // Step 7
    table = this.markFragments(table);

    // Step 8
    table = this.fill(table, "queryGene", () => UNASSIGNED_GENE, "placeholder gene");

    const projections = this.finalize(table);
    logWarnings(this.logger, warnings);
    this.logger.info("Reconciled projection table", {
      projections: projections.size,
      warnings: warnings.length,
    });

    return { projections, warnings };
  }

  private uniqueByTranscript<R extends { readonly queryTranscript: string | null }>(
    table: Table<R>,
    source: string,
    warnings: PipelineWarning[]
  ): Table<R> {
    const duplicates = table.duplicateKeys((row) => row.queryTranscript);
    if (duplicates.size === 0) {
      return table;
    }
    warnings.push(this.ambiguous(source, "multiple", [...duplicates.keys()]));
    return table.uniqueBy((row) => row.queryTranscript);
  }

  private ambiguous(
    source: string,
    matches: AmbiguousJoinWarning["matches"],
    keys: string[]
  ): AmbiguousJoinWarning {
    return { type: "ambiguous_join", stage: Stage.Reconcile, source, matches, keys };
  }

  private fill<K extends "referenceTranscript" | "referenceGene" | "queryGene">(
    table: Table<WorkingRow>,
    key: K,
    value: (row: WorkingRow) => string | null,
    label: string
  ): Table<WorkingRow> {
    const before = countNull(table, key);
    const filled = table.fillNull(key, value);
    const after = countNull(filled, key);
    if (before !== after) {
      this.logger.debug(`Filled ${key} from ${label}`, { filled: before - after, remaining: after });
    }
    return filled;
  }

  /**
   * Build reference_transcript → reference_gene from rows that carry both
   * and fill null gene cells through it. The first gene seen for a
   * transcript wins.
   */
  private fillGenes(table: Table<WorkingRow>, warnings: PipelineWarning[]): Table<WorkingRow> {
    const lookup = new Map<string, string>();
    const conflicting = new Set<string>();
    for (const row of table) {
      if (row.referenceTranscript === null || row.referenceGene === null) {
        continue;
      }
      const known = lookup.get(row.referenceTranscript);
      if (known === undefined) {
        lookup.set(row.referenceTranscript, row.referenceGene);
      } else if (known !== row.referenceGene) {
        conflicting.add(row.referenceTranscript);
      }
    }
    const reported = new Set(
      warnings.flatMap((warning) =>
        warning.type === "ambiguous_join" && warning.source === GENE_LOOKUP ? warning.keys : []
      )
    );
    const fresh = [...conflicting].filter((transcript) => !reported.has(transcript));
    if (fresh.length > 0) {
      warnings.push(this.ambiguous(GENE_LOOKUP, "multiple", fresh));
    }

    const geneOf = (row: WorkingRow): string | null =>
      row.referenceTranscript === null ? null : lookup.get(row.referenceTranscript) ?? null;

    const withReference = this.fill(table, "referenceGene", geneOf, GENE_LOOKUP);
    return this.fill(withReference, "queryGene", geneOf, GENE_LOOKUP);
  }

  /**
   * Overrides replace query_gene unconditionally. Override projections absent
   * from every table are added so no named projection is lost.
   */
  private applyOverrides(table: Table<WorkingRow>, overrides: GeneOverrides): Table<WorkingRow> {
    let replaced = 0;
    const seen = new Set<string>();
    const updated = table.map((row): WorkingRow => {
      if (row.queryTranscript === null) {
        return row;
      }
      seen.add(row.queryTranscript);
      const gene = overrides.get(row.queryTranscript);
      if (gene === undefined) {
        return row;
      }
      replaced++;
      return { ...row, queryGene: gene };
    });

    const added: WorkingRow[] = [];
    for (const [projection, gene] of overrides) {
      if (!seen.has(projection)) {
        added.push({
          referenceGene: null,
          referenceTranscript: null,
          queryGene: gene,
          queryTranscript: projection,
          orthologyClass: null,
          lossStatus: null,
          orthologyScore: null,
          lossKey: null,
          scoreTranscript: null,
        });
      }
    }

    this.logger.debug("Applied query gene overrides", { replaced, added: added.length });
    return updated.concat(new Table(added));
  }

  private markFragments(table: Table<WorkingRow>): Table<WorkingRow> {
    let fragments = 0;
    let retro = 0;
    const marked = table.map((row): WorkingRow => {
      if (row.queryTranscript === null || row.queryGene === null) {
        return row;
      }
      let gene = row.queryGene;
      const marker = fragmentMarker(row.queryTranscript);
      if (marker !== null) {
        gene = `${gene}${FRAGMENT_DELIMITER}${marker}`;
        fragments++;
      }
      if (isRetroProjection(row.queryTranscript) && !gene.endsWith(RETRO_LABEL)) {
        gene = `${gene}${RETRO_LABEL}`;
        retro++;
      }
      return gene === row.queryGene ? row : { ...row, queryGene: gene };
    });
    if (fragments > 0 || retro > 0) {
      this.logger.debug("Marked query genes of fragmented and retro projections", {
        fragments,
        retro,
      });
    }
    return marked;
  }

  private finalize(table: Table<WorkingRow>): Table<Projection> {
    const identified = table.filter((row) => row.queryTranscript !== null);
    if (identified.size !== table.size) {
      this.logger.debug("Dropped rows without a projection ID", {
        dropped: table.size - identified.size,
      });
    }
    return identified.map(
      (row): Projection => ({
        referenceGene: row.referenceGene,
        referenceTranscript: row.referenceTranscript,
        queryGene: row.queryGene ?? UNASSIGNED_GENE,
        queryTranscript: row.queryTranscript ?? "",
        orthologyClass: row.orthologyClass,
        lossStatus: row.lossStatus,
        orthologyScore: row.orthologyScore ?? 0,
        fragmentCount: 0,
      })
    );
  }
}

/**
 * Reconcile with a one-off Reconciler.
 */
export function reconcile(input: ReconcileInput, logger: Logger): ReconcileResult {
  return new Reconciler(logger).reconcile(input);
}
