// Error Types
// Purpose: Typed failures shared by services and controllers

/**
 * Base class for failures the request layer knows how to answer.
 * `statusCode` is the HTTP status the failure maps to.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Request input rejected before touching the database
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * An expected row is absent (no state row for a user, unknown entry id),
 * or rows could not be read at all.
 */
export class LookupError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 404, options);
  }
}

/**
 * A stored row does not have the shape its table promises.
 * Bulk scans log and skip it; single-row lookups fail with it.
 */
export class ScanError extends AppError {
  readonly table: string;

  constructor(table: string, message: string) {
    super(`Malformed row in ${table}: ${message}`, 500);
    this.table = table;
  }
}

/**
 * A transition failed after its transaction began. The transaction has been
 * rolled back; `step` names what was being done when it failed.
 */
export class TransactionError extends AppError {
  readonly step: string;
  readonly uid: number;

  constructor(step: string, uid: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to ${step} for user ${uid}: ${reason}`,
      cause instanceof AppError ? cause.statusCode : 500,
      { cause }
    );
    this.step = step;
    this.uid = uid;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
