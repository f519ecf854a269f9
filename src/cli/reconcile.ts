#!/usr/bin/env node
/**
 * CLI for the projection reconciler.
 *
 * Subcommands:
 *   base       Reconcile one results directory into a unified projection
 *              table, filtered coordinate file and gene model
 *   haplotype  Merge the results of several assemblies of one organism into
 *              a consensus table
 *
 * Usage:
 *   npx tsx src/cli/reconcile.ts base --toga-dir <dir> [options]
 *   npx tsx src/cli/reconcile.ts haplotype --paths <dir,dir,...> [options]
 *   npm run reconcile -- <subcommand> [options]
 *
 * Exit codes:
 *   0 - Run finished
 *   1 - Invalid arguments, missing or malformed input, or a failed conversion
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  loadConfig,
  loadHaplotypeConfig,
  loadRunConfig,
  RunConfigError,
  validateConfig,
} from "../config/index.js";
import { initRunId, type LogLevel } from "../logging/index.js";
import { MissingInputError, SchemaMismatchError } from "../schema/index.js";
import { ConsensusInputError, TierOrderError } from "../consensus/index.js";
import { ConverterError, runHaplotypes, runReconciliation } from "../pipeline/index.js";

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printSuccess(component: string, message: string): void {
  console.log(`${c("green", "✓")} ${c("bold", component)}: ${message}`);
}

function printFailure(component: string, message: string): void {
  console.error(`${c("red", "✗")} ${c("bold", component)}: ${message}`);
}

function printDetail(text: string, indent = 2): void {
  const spaces = " ".repeat(indent);
  console.log(`${spaces}${c("dim", "•")} ${text}`);
}

// ============================================================
// Argument Parsing
// ============================================================

const USAGE = `
Usage: reconcile <base|haplotype> [options]

base options:
  --toga-dir <dir>       Results directory holding the input tables (required)
  --outdir <dir>         Parent of the run directory (default: --toga-dir)
  --target <bed|utr>     Coordinate file to use (default: utr)
  --by-class <list>      Comma-separated loss-status classes to keep
  --by-rel <list>        Comma-separated orthology relationships to keep
  --threshold <score>    Minimum orthology score, 0..1
  --paralog <score>      Drop reference transcripts with more than one
                         projection scoring above this value, 0..1
  --to <gtf|gff|bed>     Gene-model format (default: gtf; bed skips conversion)
  --isoforms <path>      Gene-to-transcript map; skips isoform extraction
  --only-table           Write the unified table and stop before conversion
  --only-convert         Convert without writing the unified table
  --depure               Remove earlier run directories beside the new one
  --source <name>        Namespace for completeness statistics
  --taxon <name>         Taxon group for completeness statistics

haplotype options:
  --paths <list>         Comma-separated results directories, one per assembly
  --rule <tiers>         Tier order, best first (default: I>PI>UL>L>M>PM>PG>NF)
  --source <query|loss>  Tables to merge (default: loss)
  --target <bed|utr>     Coordinate file narrowing query tables (default: utr)
  --outdir <dir>         Directory for the consensus table (default: first path)

Common options:
  --log-level <level>    debug, info, warn or error (default: LOG_LEVEL or info)
  --quiet                Log to file only
  -h, --help             Show this help message
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "toga-dir": { type: "string" },
      outdir: { type: "string" },
      target: { type: "string" },
      "by-class": { type: "string" },
      "by-rel": { type: "string" },
      threshold: { type: "string" },
      paralog: { type: "string" },
      to: { type: "string" },
      isoforms: { type: "string" },
      "only-table": { type: "boolean", default: false },
      "only-convert": { type: "boolean", default: false },
      depure: { type: "boolean", default: false },
      source: { type: "string" },
      taxon: { type: "string" },
      paths: { type: "string" },
      rule: { type: "string" },
      "log-level": { type: "string" },
      quiet: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  return { command: positionals[0], values };
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function toPath(value: string | undefined): string | undefined {
  return value === undefined ? undefined : resolve(value);
}

/** Drop keys the user left unset so defaults apply. */
function defined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function baseInput(values: CliValues): Record<string, unknown> {
  const completeness =
    values.source !== undefined || values.taxon !== undefined
      ? { source: values.source, taxon: values.taxon }
      : undefined;

  return defined({
    togaDir: toPath(values["toga-dir"]),
    outputDir: toPath(values.outdir),
    coordinateTarget: values.target,
    filters: defined({
      byClass: splitList(values["by-class"]),
      byRelation: splitList(values["by-rel"]),
      minScore: toNumber(values.threshold),
      paralogScore: toNumber(values.paralog),
    }),
    convertTo: values.to,
    isoforms: toPath(values.isoforms),
    onlyTable: values["only-table"],
    onlyConvert: values["only-convert"],
    depure: values.depure,
    completeness,
  });
}

function haplotypeInput(values: CliValues): Record<string, unknown> {
  return defined({
    paths: splitList(values.paths)?.map((path) => resolve(path)),
    rule: values.rule,
    source: values.source,
    coordinateTarget: values.target,
    outputDir: toPath(values.outdir),
  });
}

function resolveLogLevel(values: CliValues): LogLevel {
  const config = loadConfig();
  const level = values["log-level"];
  return validateConfig(level === undefined ? config : { ...config, logLevel: level });
}

// ============================================================
// Error Reporting
// ============================================================

function describeError(err: unknown): { component: string; message: string } {
  if (err instanceof RunConfigError) {
    return { component: "Configuration", message: err.format() };
  }
  if (err instanceof TierOrderError) {
    return { component: "Tier rule", message: err.format() };
  }
  if (err instanceof ConfigError) {
    return { component: "Environment", message: err.message };
  }
  if (err instanceof MissingInputError) {
    return { component: "Input", message: err.message };
  }
  if (err instanceof SchemaMismatchError) {
    return { component: "Schema", message: err.message };
  }
  if (err instanceof ConsensusInputError) {
    return { component: "Consensus", message: err.message };
  }
  if (err instanceof ConverterError) {
    return { component: "Conversion", message: err.message };
  }
  return { component: "Unexpected error", message: err instanceof Error ? err.message : String(err) };
}

// ============================================================
// Main
// ============================================================

function runBase(values: CliValues, logLevel: LogLevel, runId: string): void {
  const config = loadRunConfig(baseInput(values));
  const summary = runReconciliation(config, {
    runId,
    logLevel,
    logToConsole: !values.quiet && loadConfig().logToConsole,
  });

  printSuccess("Reconciliation", `run ${summary.runId} written to ${summary.outputDir}`);
  printDetail(`${summary.projections.size} projections`);
  if (summary.fragmented) {
    printDetail("fragmented projections resolved");
  }
  if (summary.filterStats !== null) {
    printDetail(
      `filters kept ${summary.filterStats.keptProjections}, discarded ${summary.filterStats.discardedProjections}`
    );
  }
  if (summary.tablePath !== null) {
    printDetail(`table: ${summary.tablePath}`);
  }
  if (summary.geneModelPath !== null) {
    printDetail(`gene model: ${summary.geneModelPath}`);
  }
  if (summary.warnings.length > 0) {
    printDetail(c("yellow", `${summary.warnings.length} warning(s); see the run log`));
  }
}

function runHaplotype(values: CliValues, logLevel: LogLevel, runId: string): void {
  const config = loadHaplotypeConfig(haplotypeInput(values));
  const summary = runHaplotypes(config, {
    runId,
    logLevel,
    logToConsole: !values.quiet && loadConfig().logToConsole,
  });

  printSuccess("Haplotype consensus", `${summary.consensus.size} transcripts merged`);
  for (const [tier, count] of Object.entries(summary.byConsensus)) {
    printDetail(`${c("cyan", tier)}: ${count}`);
  }
  printDetail(`table: ${summary.consensusPath}`);
}

function main(): void {
  const { command, values } = parseCliArgs();
  const runId = initRunId();

  try {
    const logLevel = resolveLogLevel(values);
    switch (command) {
      case "base":
        runBase(values, logLevel, runId);
        break;
      case "haplotype":
        runHaplotype(values, logLevel, runId);
        break;
      default:
        printFailure("Arguments", `unknown subcommand "${command ?? ""}"`);
        console.log(USAGE);
        process.exit(1);
    }
  } catch (err) {
    const { component, message } = describeError(err);
    printFailure(component, message);
    process.exit(1);
  }
}

main();
