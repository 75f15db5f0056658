/**
 * Errors surfaced to callers of the generation API.
 *
 * Construction mistakes inside the engine (bad counts, malformed knot
 * vectors) throw plain `Error`s; these classes mark the conditions a caller
 * is expected to handle.
 */

/**
 * A generation request was rejected. No geometry is produced.
 */
export class GenerationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "GenerationError";
    this.issues = issues;
  }
}

/**
 * A recursive pattern asked for more levels than the configured maximum.
 */
export class RecursionDepthError extends Error {
  readonly requested: number;
  readonly maximum: number;

  constructor(requested: number, maximum: number) {
    super(`Recursion depth ${requested} exceeds the maximum of ${maximum}`);
    this.name = "RecursionDepthError";
    this.requested = requested;
    this.maximum = maximum;
  }
}

/**
 * A queued request was replaced by a newer one before it ran.
 */
export class SupersededRequestError extends Error {
  readonly requestId: number;

  constructor(requestId: number) {
    super(`Generation request ${requestId} was superseded`);
    this.name = "SupersededRequestError";
    this.requestId = requestId;
  }
}
