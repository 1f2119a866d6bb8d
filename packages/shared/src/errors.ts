/**
 * Error Taxonomy
 *
 * Every failure the allocation and redirect engine reports is one of the
 * classes below. Callers branch on `instanceof` or on the stable `code`.
 *
 * Propagation:
 * - InvalidUrlError, InvalidCodeFormatError, CodeTakenError: caller mistakes,
 *   never retried.
 * - DuplicateError: raised by the store when the unique constraint fires;
 *   absorbed by the allocator's retry loop.
 * - AllocationExhaustedError: transient, the whole request may be retried.
 * - NotFoundError: expected outcome on redirect, not a fault.
 * - StorageError: driver/I/O failure, fatal for the current request.
 */

export type SnaplinkErrorCode =
  | "INVALID_URL"
  | "INVALID_CODE_FORMAT"
  | "CODE_TAKEN"
  | "ALLOCATION_EXHAUSTED"
  | "NOT_FOUND"
  | "DUPLICATE"
  | "STORAGE_ERROR";

export abstract class SnaplinkError extends Error {
  abstract readonly code: SnaplinkErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidUrlError extends SnaplinkError {
  readonly code = "INVALID_URL";
}

export class InvalidCodeFormatError extends SnaplinkError {
  readonly code = "INVALID_CODE_FORMAT";
}

export class CodeTakenError extends SnaplinkError {
  readonly code = "CODE_TAKEN";

  constructor(
    public readonly shortCode: string,
    message = "Custom code already exists. Please choose a different one."
  ) {
    super(message);
  }
}

export class AllocationExhaustedError extends SnaplinkError {
  readonly code = "ALLOCATION_EXHAUSTED";

  constructor(public readonly attempts: number) {
    super("Unable to generate unique short code. Please try again.");
  }
}

export class NotFoundError extends SnaplinkError {
  readonly code = "NOT_FOUND";

  constructor(public readonly shortCode: string) {
    super(`Short code "${shortCode}" not found`);
  }
}

export class DuplicateError extends SnaplinkError {
  readonly code = "DUPLICATE";

  constructor(public readonly shortCode: string, options?: { cause?: unknown }) {
    super(`Short code "${shortCode}" already exists`, options);
  }
}

export class StorageError extends SnaplinkError {
  readonly code = "STORAGE_ERROR";

  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Storage operation "${operation}" failed`, { cause });
  }
}

/**
 * True for the errors that describe a bad request rather than a fault.
 */
export function isClientError(err: unknown): err is InvalidUrlError | InvalidCodeFormatError | CodeTakenError {
  return (
    err instanceof InvalidUrlError ||
    err instanceof InvalidCodeFormatError ||
    err instanceof CodeTakenError
  );
}
