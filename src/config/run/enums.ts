/**
 * Domain enumerations for run configuration.
 *
 * Value lists follow the vocabulary of the projection tables the pipeline
 * reads: loss-status tiers in the loss summary, relationship types in the
 * orthology classification.
 */

import { z } from "zod";

/**
 * Loss-status tiers of a projection, from fully intact to absent.
 *
 *   FI  fully intact          M   missing
 *   I   intact                PM  partially missing
 *   PI  partially intact      PG  paralogous projection
 *   UL  uncertain loss        NF  not found in an assembly
 *   L   lost
 */
export const LossStatus = z.enum(["FI", "I", "PI", "UL", "L", "M", "PM", "PG", "NF"]);
export type LossStatus = z.infer<typeof LossStatus>;

/**
 * Orthology relationship types reported by the classifier.
 */
export const OrthologyRelation = z.enum([
  "one2one",
  "one2many",
  "many2one",
  "many2many",
  "one2zero",
]);
export type OrthologyRelation = z.infer<typeof OrthologyRelation>;

/**
 * Which tables feed the haplotype consensus.
 * - query: unified projection tables built per assembly
 * - loss: raw loss summaries at every level
 */
export const ConsensusSource = z.enum(["query", "loss"]);
export type ConsensusSource = z.infer<typeof ConsensusSource>;

/**
 * Gene-model format produced from the coordinate file. `bed` skips conversion.
 */
export const ConversionFormat = z.enum(["gtf", "gff", "bed"]);
export type ConversionFormat = z.infer<typeof ConversionFormat>;

/**
 * Which coordinate file of the results directory is used.
 * - bed: coding coordinates only
 * - utr: coordinates extended with UTRs
 */
export const CoordinateTarget = z.enum(["bed", "utr"]);
export type CoordinateTarget = z.infer<typeof CoordinateTarget>;
