/**
 * Error taxonomy for the dashboard pipeline.
 * - DataUnavailableError: fatal to the render pass (no table, no dashboard).
 * - MissingFieldError: fails a single region row; the row is excluded and reported.
 * - InvalidParamsError: God Mode input that cannot be read as a number/boolean.
 * Live feed failures are not errors here; they surface as LiveReading.status.
 */

export type SentinelErrorCode = "DATA_UNAVAILABLE" | "MISSING_FIELD" | "INVALID_PARAMS";

export class SentinelError extends Error {
  readonly code: SentinelErrorCode;

  constructor(code: SentinelErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DataUnavailableError extends SentinelError {
  readonly sourcePath: string;
  readonly reason: string;

  constructor(sourcePath: string, reason: string) {
    super("DATA_UNAVAILABLE", `Region data unavailable (${sourcePath}): ${reason}`);
    this.sourcePath = sourcePath;
    this.reason = reason;
  }
}

export class MissingFieldError extends SentinelError {
  readonly field: string;
  /** 1-based data row number (header excluded); null when not tied to a row. */
  readonly rowNumber: number | null;

  constructor(field: string, rowNumber: number | null = null, detail = "missing or non-numeric") {
    const where = rowNumber == null ? "" : ` in row ${rowNumber}`;
    super("MISSING_FIELD", `Field "${field}"${where} is ${detail}`);
    this.field = field;
    this.rowNumber = rowNumber;
  }
}

export class InvalidParamsError extends SentinelError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_PARAMS", `Invalid simulation parameters: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
