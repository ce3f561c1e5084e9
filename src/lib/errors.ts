/**
 * Error types raised while building a coverage report.
 *
 * A NOT COVERED instance is a normal outcome and never surfaces as an error;
 * these classes describe input and infrastructure failures only.
 */

/** Base class for every error this tool raises deliberately. */
export class CoverageReportError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CoverageReportError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * A record or setting is missing a required field or holds a value outside
 * its allowed range. Raised before any matching starts.
 */
export class ValidationError extends CoverageReportError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(options?.code ?? "INVALID_INPUT", message, options);
    this.name = "ValidationError";
  }
}

/** The inventory could not be read (AWS API call or snapshot file failed). */
export class InventoryError extends CoverageReportError {
  readonly operation: string;

  constructor(
    operation: string,
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(options?.code ?? "INVENTORY_UNAVAILABLE", message, options);
    this.name = "InventoryError";
    this.operation = operation;
  }
}
