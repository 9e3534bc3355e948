/**
 * Raised when a date range has its start after its end.
 * Reported to the caller as a request problem; never retried.
 */
export class InvalidRangeError extends Error {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date) {
    super(
      `Invalid date range: start ${start.toISOString()} is after end ${end.toISOString()}`
    );
    this.name = "InvalidRangeError";
    this.start = start;
    this.end = end;
  }
}

/** Raised when request query parameters fail validation. */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

/** Raised when a record file cannot be parsed at all. */
export class RecordValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordValidationError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
