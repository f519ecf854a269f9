/**
 * Run configuration schemas.
 *
 * A run configuration is validated once at startup and then treated as
 * read-only: every stage of a run must see the same filters and paths, and
 * the log records exactly the parameters that produced an output directory.
 */

import { z } from "zod";
import { ConsensusSource, ConversionFormat, CoordinateTarget } from "./enums.js";
import { parseTierOrder, TierOrderError } from "../../consensus/rules.js";

/** Probability-like thresholds share the 0..1 range. */
const Probability = z.number().min(0).max(1);

const ValueList = z.array(z.string().trim().min(1)).min(1);

/**
 * Filters narrowing the unified projection table.
 * Absent filters are skipped.
 */
export const FilterOptionsSchema = z
  .object({
    /** Allowed loss-status classes (I, PI, L, ...) */
    byClass: ValueList.optional().describe("Loss-status classes to keep"),

    /** Allowed orthology relationships (one2one, one2many, ...) */
    byRelation: ValueList.optional().describe("Orthology relationships to keep"),

    /** Minimum orthology score, inclusive */
    minScore: Probability.optional().describe("Keep projections scoring at or above this value"),

    /**
     * Score above which a projection counts as a competing paralog hit.
     * Reference transcripts with more than one such hit are dropped.
     */
    paralogScore: Probability.optional().describe(
      "Drop reference transcripts with more than one projection scoring above this value"
    ),
  })
  .strict();

export type FilterOptions = z.infer<typeof FilterOptionsSchema>;

/**
 * Configuration of a single reconciliation run over one results directory.
 */
export const RunConfigSchema = z
  .object({
    /** Results directory holding the input tables */
    togaDir: z.string().min(1),

    /** Parent of the run's output directory; defaults to togaDir */
    outputDir: z.string().min(1).optional(),

    coordinateTarget: CoordinateTarget,

    filters: FilterOptionsSchema,

    convertTo: ConversionFormat,

    /** User-supplied gene-to-transcript map; skips isoform extraction */
    isoforms: z.string().min(1).optional(),

    /** Write the unified table and stop before conversion */
    onlyTable: z.boolean(),

    /** Convert the coordinate file without writing the unified table */
    onlyConvert: z.boolean(),

    /** Remove outputs of earlier runs beside the new output directory */
    depure: z.boolean(),

    /** Namespace and taxon group handed to the completeness collaborator */
    completeness: z
      .object({
        source: z.string().min(1),
        taxon: z.string().min(1),
      })
      .strict()
      .optional(),
  })
  .strict()
  .refine((config) => !(config.onlyTable && config.onlyConvert), {
    message: "onlyTable and onlyConvert cannot both be set",
    path: ["onlyConvert"],
  });

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Configuration of a haplotype consensus run over several results directories.
 */
export const HaplotypeConfigSchema = z
  .object({
    /** One results directory per assembly, in source order */
    paths: z.array(z.string().min(1)).min(2, "at least two results directories are required"),

    /** Tier string, best first (e.g. "I>PI>UL>L>M>PM>PG>NF") */
    rule: z.string().superRefine((rule, ctx) => {
      try {
        parseTierOrder(rule);
      } catch (err) {
        if (!(err instanceof TierOrderError)) {
          throw err;
        }
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.format() });
      }
    }),

    source: ConsensusSource,

    /** Coordinate file used to narrow each assembly's projections (query source) */
    coordinateTarget: CoordinateTarget,

    /** Directory receiving the consensus table; defaults to the first path */
    outputDir: z.string().min(1).optional(),
  })
  .strict();

export type HaplotypeConfig = z.infer<typeof HaplotypeConfigSchema>;
