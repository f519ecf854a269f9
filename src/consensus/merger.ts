/**
 * Haplotype consensus merger.
 *
 * Given N >= 2 tables from different assemblies of one organism, joins them
 * on the shared transcript key and elects, per transcript, the class with
 * the lowest rank in the tier order. A source without a row for the
 * transcript contributes "NF", the worst tier, so the vote is always
 * defined. Non-class attributes are taken from the first source, in source
 * order, that has a value.
 */

import type { Logger } from "../logging/index.js";
import { logWarnings } from "../logging/index.js";
import { Table } from "../tables/index.js";
import {
  Stage,
  type HaplotypeConsensus,
  type LossRecord,
  type PipelineWarning,
  type Projection,
} from "../types/index.js";
import type { ConsensusSource } from "../config/index.js";
import { NOT_FOUND, type TierOrder } from "./rules.js";

/**
 * One assembly's view of a transcript, reduced to the fields the vote uses.
 */
export interface ConsensusEntry {
  readonly transcript: string;
  /** Null reads as "NF" */
  readonly classValue: string | null;
  readonly referenceGene: string | null;
  readonly referenceTranscript: string | null;
  readonly relation: string | null;
  readonly projection: string | null;
}

export interface ConsensusResult {
  readonly consensus: Table<HaplotypeConsensus>;
  readonly warnings: readonly PipelineWarning[];
  /** Transcripts per elected class */
  readonly byConsensus: Readonly<Record<string, number>>;
}

export class ConsensusInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConsensusInputError";
  }
}

/**
 * Entries of a unified projection table: class = loss status,
 * relation = orthology class.
 */
export function entriesFromProjections(projections: Table<Projection>): Table<ConsensusEntry> {
  return projections.map(
    (row): ConsensusEntry => ({
      transcript: row.queryTranscript,
      classValue: row.lossStatus,
      referenceGene: row.referenceGene,
      referenceTranscript: row.referenceTranscript,
      relation: row.orthologyClass,
      projection: null,
    })
  );
}

/**
 * Entries of a loss summary at every level: projection = level.
 */
export function entriesFromLossSummary(loss: Table<LossRecord>): Table<ConsensusEntry> {
  const entries: ConsensusEntry[] = [];
  for (const row of loss) {
    if (row.queryTranscript === null) {
      continue;
    }
    entries.push({
      transcript: row.queryTranscript,
      classValue: row.lossStatus,
      referenceGene: null,
      referenceTranscript: null,
      relation: null,
      projection: row.level,
    });
  }
  return new Table(entries);
}

function firstValue<K extends "referenceGene" | "referenceTranscript" | "relation" | "projection">(
  entries: readonly (ConsensusEntry | undefined)[],
  key: K
): string | null {
  for (const entry of entries) {
    const value = entry?.[key];
    if (value !== undefined && value !== null && value !== NOT_FOUND) {
      return value;
    }
  }
  return null;
}

export class ConsensusMerger {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * @throws ConsensusInputError with fewer than two tables, or when a class
   *   value lies outside the tier order
   */
  merge(
    tables: readonly Table<ConsensusEntry>[],
    order: TierOrder,
    source: ConsensusSource
  ): ConsensusResult {
    if (tables.length < 2) {
      throw new ConsensusInputError(
        `At least two tables are required to merge haplotypes, got ${tables.length}`
      );
    }

    const warnings: PipelineWarning[] = [];
    const indexed = tables.map((table, position) => this.index(table, position, warnings));
    this.checkClasses(tables, order);

    const keys: string[] = [];
    const seen = new Set<string>();
    for (const table of tables) {
      for (const entry of table) {
        if (!seen.has(entry.transcript)) {
          seen.add(entry.transcript);
          keys.push(entry.transcript);
        }
      }
    }

    const rows = keys.map((transcript): HaplotypeConsensus => {
      const entries = indexed.map((index) => index.get(transcript));
      const classes = entries.map((entry) => entry?.classValue ?? NOT_FOUND);
      return {
        transcript,
        classes,
        consensus: this.elect(classes, order),
        referenceGene: source === "query" ? firstValue(entries, "referenceGene") : null,
        referenceTranscript: source === "query" ? firstValue(entries, "referenceTranscript") : null,
        relation: source === "query" ? firstValue(entries, "relation") : null,
        projection: source === "loss" ? firstValue(entries, "projection") : null,
      };
    });

    const consensus = new Table(rows);
    const byConsensus = consensus.valueCounts("consensus");

    logWarnings(this.logger, warnings);
    if (source === "query") {
      this.logger.info(
        `Merged ${consensus.size} projections from ${consensus.distinct("referenceTranscript").size} transcripts and ${consensus.distinct("referenceGene").size} genes`,
        { sources: tables.length }
      );
    } else {
      this.logger.info(`Merged ${consensus.size} loss entries`, {
        sources: tables.length,
        ...consensus.valueCounts("projection"),
      });
    }
    this.logger.info("Class stats in merged table", byConsensus);

    return { consensus, warnings, byConsensus };
  }

  private elect(classes: readonly string[], order: TierOrder): string {
    let best = NOT_FOUND;
    let bestRank = order.rankOf(NOT_FOUND) ?? order.tiers.length;
    for (const value of classes) {
      const rank = order.rankOf(value);
      if (rank !== undefined && rank < bestRank) {
        best = value;
        bestRank = rank;
      }
    }
    return best;
  }

  private index(
    table: Table<ConsensusEntry>,
    position: number,
    warnings: PipelineWarning[]
  ): Map<string, ConsensusEntry> {
    const duplicates = table.duplicateKeys((entry) => entry.transcript);
    if (duplicates.size > 0) {
      warnings.push({
        type: "ambiguous_join",
        stage: Stage.Consensus,
        source: `source ${position}`,
        matches: "multiple",
        keys: [...duplicates.keys()],
      });
    }
    const index = new Map<string, ConsensusEntry>();
    for (const entry of table) {
      if (!index.has(entry.transcript)) {
        index.set(entry.transcript, entry);
      }
    }
    return index;
  }

  private checkClasses(tables: readonly Table<ConsensusEntry>[], order: TierOrder): void {
    const unknown = new Set<string>();
    for (const table of tables) {
      for (const entry of table) {
        if (entry.classValue !== null && !order.has(entry.classValue)) {
          unknown.add(entry.classValue);
        }
      }
    }
    if (unknown.size > 0) {
      throw new ConsensusInputError(
        `Class value(s) ${[...unknown].join(", ")} are not in the tier order ${order.toString()}`
      );
    }
  }
}

export function mergeHaplotypes(
  tables: readonly Table<ConsensusEntry>[],
  order: TierOrder,
  source: ConsensusSource,
  logger: Logger
): ConsensusResult {
  return new ConsensusMerger(logger).merge(tables, order, source);
}
