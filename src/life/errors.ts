import type { ZodIssue } from "zod";

/**
 * Construction options failed validation. Thrown before anything is
 * allocated, so no partially-built universe is ever observable.
 */
export class InvalidUniverseOptionsError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      `Invalid universe options: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "InvalidUniverseOptionsError";
    this.issues = issues;
  }
}

export class UnknownPatternError extends Error {
  readonly patternId: string;

  constructor(patternId: string) {
    super(`Unknown pattern: "${patternId}"`);
    this.name = "UnknownPatternError";
    this.patternId = patternId;
  }
}

export class PatternParseError extends Error {
  readonly issues: ZodIssue[];

  constructor(patternId: string, issues: ZodIssue[]) {
    super(
      `Pattern "${patternId}" is malformed: ${issues
        .map((issue) => issue.message)
        .join("; ")}`
    );
    this.name = "PatternParseError";
    this.issues = issues;
  }
}

/**
 * A mutator got a coordinate that cannot be wrapped onto the grid (NaN or
 * an infinity). Thrown before any cell is written.
 */
export class InvalidCoordinateError extends Error {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number) {
    super(`Invalid coordinate: (${row}, ${col})`);
    this.name = "InvalidCoordinateError";
    this.row = row;
    this.col = col;
  }
}
