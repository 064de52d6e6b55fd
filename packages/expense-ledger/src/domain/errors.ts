/**
 * Error classes for the expense ledger.
 * Every error carries a `code` so collaborators can branch on the kind of
 * failure without string matching.
 */

/**
 * Field-level failure codes produced by the validator.
 */
export type ValidationFailureCode =
  | "InvalidAmount"
  | "InvalidDate"
  | "EmptyCategory"
  | "EmptyDescription";

export type ExpenseField = "date" | "category" | "amount" | "description";

/**
 * A single field that failed validation.
 */
export interface ValidationFailure {
  readonly code: ValidationFailureCode;
  readonly field: ExpenseField;
  readonly message: string;
}

export type LedgerErrorCode =
  | "ValidationFailed"
  | "MalformedRecord"
  | "InvalidRecord"
  | "CorruptStore"
  | "IndexOutOfRange"
  | "AmountOutOfRange"
  | "PersistError"
  | "ExportEmpty"
  | "CapabilityUnavailable"
  | "InvalidConfig";

/**
 * Base class for all ledger errors.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Thrown when a record is rejected by the validator.
 * Holds every failing field, not just the first one.
 */
export class ValidationError extends LedgerError {
  readonly failures: readonly ValidationFailure[];

  constructor(failures: readonly ValidationFailure[]) {
    super(
      "ValidationFailed",
      `Invalid expense: ${failures.map((f) => f.message).join("; ")}`
    );
    this.name = "ValidationError";
    this.failures = failures;
  }

  /** Failure codes in field order. */
  get codes(): ValidationFailureCode[] {
    return this.failures.map((f) => f.code);
  }
}

// =============================================================================
// Load Errors
// =============================================================================

/**
 * Thrown when a stored mapping is missing a field or has the wrong kind.
 */
export class MalformedRecordError extends LedgerError {
  constructor(
    readonly index: number | undefined,
    readonly field: string,
    detail: string
  ) {
    super(
      "MalformedRecord",
      (index === undefined ? "Malformed record" : `Malformed record #${index}`) +
        `: ${field} ${detail}`
    );
    this.name = "MalformedRecordError";
  }
}

/**
 * Thrown when a stored record is well-formed but breaks a validation rule.
 */
export class InvalidRecordError extends LedgerError {
  constructor(
    readonly index: number,
    readonly failures: readonly ValidationFailure[]
  ) {
    super(
      "InvalidRecord",
      `Invalid record #${index}: ${failures.map((f) => f.message).join("; ")}`
    );
    this.name = "InvalidRecordError";
  }
}

/**
 * Thrown when the backing file cannot be parsed as a list of records.
 */
export class CorruptStoreError extends LedgerError {
  constructor(
    readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super("CorruptStore", `Expense file ${path} is corrupt: ${reason}`, options);
    this.name = "CorruptStoreError";
  }
}

// =============================================================================
// Mutation Errors
// =============================================================================

/**
 * Thrown when edit() or delete() addresses a position outside the collection.
 */
export class IndexOutOfRangeError extends LedgerError {
  constructor(
    readonly position: number,
    readonly size: number
  ) {
    super(
      "IndexOutOfRange",
      size === 0
        ? `No expense at position ${position}: the ledger is empty`
        : `No expense at position ${position}: expected 0 to ${size - 1}`
    );
    this.name = "IndexOutOfRangeError";
  }
}

/**
 * Thrown when an amount or a sum of amounts no longer fits in whole cents.
 */
export class AmountOutOfRangeError extends LedgerError {
  constructor(readonly cents: number) {
    super(
      "AmountOutOfRange",
      `Amount of ${cents} cents is outside the supported range`
    );
    this.name = "AmountOutOfRangeError";
  }
}

/**
 * Thrown when reading or writing a file fails at the I/O level.
 */
export class PersistError extends LedgerError {
  constructor(
    readonly path: string,
    readonly operation: "read" | "write" | "export",
    cause: unknown
  ) {
    super(
      "PersistError",
      `Failed to ${operation} ${path}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = "PersistError";
  }
}

// =============================================================================
// Export Errors
// =============================================================================

/**
 * Thrown when an export is requested for a ledger with no records.
 */
export class ExportEmptyError extends LedgerError {
  constructor(readonly format: string) {
    super("ExportEmpty", `Nothing to export to ${format}: the ledger is empty`);
    this.name = "ExportEmptyError";
  }
}

/**
 * Thrown when an optional capability was not configured or could not be loaded.
 */
export class CapabilityUnavailableError extends LedgerError {
  constructor(
    readonly capability: string,
    hint?: string
  ) {
    super(
      "CapabilityUnavailable",
      `${capability} is not available.` + (hint ? ` ${hint}` : "")
    );
    this.name = "CapabilityUnavailableError";
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Thrown when options or environment variables hold unusable values.
 */
export class ConfigError extends LedgerError {
  constructor(readonly issues: readonly string[]) {
    super("InvalidConfig", `Invalid ledger configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Narrow an unknown error to a ledger error, optionally of a given code.
 *
 * @example
 * ```ts
 * try {
 *   ledger.delete(7);
 * } catch (error) {
 *   if (isLedgerError(error, "IndexOutOfRange")) showNotice(error.message);
 *   else throw error;
 * }
 * ```
 */
export function isLedgerError(
  error: unknown,
  code?: LedgerErrorCode
): error is LedgerError {
  if (!(error instanceof LedgerError)) return false;
  return code === undefined || error.code === code;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
