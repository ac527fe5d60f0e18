/**
 * Error types raised at the library boundary.
 *
 * The decimation loop itself never throws: a candidate edge that fails a
 * geometric check is skipped. These errors only report bad input.
 */

export const ERROR_CODES = {
  INVALID_MESH: "INVALID_MESH",
  INVALID_OPTIONS: "INVALID_OPTIONS",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Issues listed in an error message before the rest are summarized */
const MAX_LISTED_ISSUES = 10;

function formatIssues(summary: string, issues: readonly string[]): string {
  if (issues.length === 0) return summary;
  const listed = issues.slice(0, MAX_LISTED_ISSUES).join("; ");
  const more =
    issues.length > MAX_LISTED_ISSUES
      ? ` (+${issues.length - MAX_LISTED_ISSUES} more)`
      : "";
  return `${summary}: ${listed}${more}`;
}

export class MeshError extends Error {
  constructor(
    summary: string,
    public readonly code: ErrorCode,
    public readonly issues: readonly string[] = [],
  ) {
    super(formatIssues(summary, issues));
    this.name = "MeshError";
  }
}

/**
 * Mesh data that breaks the indexed-mesh contract (index out of range,
 * partial triangle, non-finite coordinate)
 */
export class InvalidMeshError extends MeshError {
  constructor(issues: readonly string[]) {
    super("Invalid mesh", ERROR_CODES.INVALID_MESH, issues);
    this.name = "InvalidMeshError";
  }
}

/**
 * Options rejected by their schema
 */
export class InvalidOptionsError extends MeshError {
  constructor(issues: readonly string[]) {
    super("Invalid options", ERROR_CODES.INVALID_OPTIONS, issues);
    this.name = "InvalidOptionsError";
  }
}
