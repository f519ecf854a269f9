/**
 * Fatal input errors. Raised before any output of the run is written.
 */

export class MissingInputError extends Error {
  public readonly path: string;
  /** Role of the file in the run, e.g. "loss summary" */
  public readonly role: string;

  constructor(path: string, role: string) {
    super(`Missing ${role}: ${path} is not a file`);
    this.name = "MissingInputError";
    this.path = path;
    this.role = role;
  }
}

export class SchemaMismatchError extends Error {
  public readonly path: string;
  public readonly expected: number;
  public readonly observed: number;
  /** 1-based line of the offending row */
  public readonly line: number;

  constructor(path: string, expected: number, observed: number, line: number, detail?: string) {
    super(
      detail ??
        `${path}:${line}: expected ${expected} column(s), found ${observed}`
    );
    this.name = "SchemaMismatchError";
    this.path = path;
    this.expected = expected;
    this.observed = observed;
    this.line = line;
  }
}
