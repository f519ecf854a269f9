/**
 * Run configuration loader and validator.
 *
 * Responsible for:
 * - Merging caller input over defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import {
  HaplotypeConfigSchema,
  RunConfigSchema,
  type HaplotypeConfig,
  type RunConfig,
} from "./schema.js";
import { DEFAULT_HAPLOTYPE_CONFIG, DEFAULT_RUN_CONFIG } from "./defaults.js";

/**
 * Structured validation error for run configuration.
 */
export class RunConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "RunConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Run configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseWith<T extends object>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  defaults: object,
  input: unknown,
  label: string
): Readonly<T> {
  const merged = isRecord(input) ? { ...defaults, ...input } : input;
  const result = schema.safeParse(merged);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RunConfigError(
      `Invalid ${label} configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate and load the configuration of a reconciliation run.
 * Missing optional keys take their values from DEFAULT_RUN_CONFIG.
 *
 * @throws RunConfigError if validation fails
 */
export function loadRunConfig(input: unknown): Readonly<RunConfig> {
  return parseWith(RunConfigSchema, DEFAULT_RUN_CONFIG, input, "run");
}

/**
 * Validate and load the configuration of a haplotype consensus run.
 *
 * @throws RunConfigError if validation fails
 */
export function loadHaplotypeConfig(input: unknown): Readonly<HaplotypeConfig> {
  return parseWith(HaplotypeConfigSchema, DEFAULT_HAPLOTYPE_CONFIG, input, "haplotype");
}
