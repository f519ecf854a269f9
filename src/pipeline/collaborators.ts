/**
 * External collaborators of a run: gene-model conversion and completeness
 * statistics. Both are black boxes to the pipeline.
 */

import { execFileSync } from "node:child_process";
import type { Logger } from "../logging/index.js";
import type { Table } from "../tables/index.js";
import type { Projection } from "../types/index.js";

export type GeneModelFormat = "gtf" | "gff";

export interface ConversionRequest {
  readonly format: GeneModelFormat;
  /** Coordinate file to convert */
  readonly coordinates: string;
  readonly output: string;
  /** Gene-to-isoform map */
  readonly isoforms: string;
}

export interface GeneModelConverter {
  /** Returns the path of the written gene model. */
  convert(request: ConversionRequest): string;
}

export class ConverterError extends Error {
  public readonly command: string;

  constructor(command: string, detail: string) {
    super(`Gene-model conversion failed (${command}): ${detail}`);
    this.name = "ConverterError";
    this.command = command;
  }
}

/**
 * Runs a converter executable per format:
 *   <bin> --input <coordinates> --output <output> --isoforms <isoforms>
 */
export class CommandConverter implements GeneModelConverter {
  private readonly binaries: Readonly<Record<GeneModelFormat, string>>;
  private readonly logger: Logger;

  constructor(binaries: Readonly<Record<GeneModelFormat, string>>, logger: Logger) {
    this.binaries = binaries;
    this.logger = logger;
  }

  convert(request: ConversionRequest): string {
    const bin = this.binaries[request.format];
    const args = [
      "--input",
      request.coordinates,
      "--output",
      request.output,
      "--isoforms",
      request.isoforms,
    ];
    this.logger.info(`Converting coordinates to ${request.format.toUpperCase()} with ${bin}`);

    try {
      const output = execFileSync(bin, args, { stdio: "pipe" }).toString().trim();
      if (output !== "") {
        this.logger.debug(output);
      }
    } catch (err) {
      throw new ConverterError(
        [bin, ...args].join(" "),
        err instanceof Error ? err.message : String(err)
      );
    }

    this.logger.info(`Gene model written to ${request.output}`);
    return request.output;
  }
}

/**
 * Percentage of a reference gene set recovered, per database.
 */
export type CompletenessStatistics = (
  projections: Table<Projection>,
  source: string,
  taxon: string
) => ReadonlyArray<readonly [database: string, percentage: number]>;
