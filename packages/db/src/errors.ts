/**
 * Storage error types and PostgreSQL error translation.
 */

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A unique constraint rejected the write
 */
export class DuplicateKeyError extends StoreError {
  readonly constraint: string | null;

  constructor(constraint: string | null, options?: { cause?: unknown }) {
    super(`Unique constraint violated${constraint ? `: ${constraint}` : ""}`, options);
    this.constraint = constraint;
  }
}

/**
 * The store could not be reached or aborted the statement.
 *
 * `retrySafe` is true when the statement is known not to have been
 * applied (connection refused, transaction rolled back), so even a
 * non-idempotent write may be issued again.
 */
export class StoreUnavailableError extends StoreError {
  readonly retrySafe: boolean;

  constructor(message: string, options: { retrySafe: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.retrySafe = options.retrySafe;
  }
}

// =============================================================================
// PostgreSQL translation
// =============================================================================

const UNIQUE_VIOLATION = "23505";

/** Failures before the statement reached the server, or rolled back by it */
const NOT_APPLIED_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "53300", // too_many_connections
  "57P03", // cannot_connect_now
  "40001", // serialization_failure
  "40P01", // deadlock_detected
]);

/** Failures while the statement may have been running */
const IN_FLIGHT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57014", // query_canceled (statement_timeout)
  "08000",
  "08003",
  "08006",
]);

function readStringProperty(err: unknown, key: "code" | "constraint"): string | undefined {
  if (typeof err === "object" && err !== null && key in err) {
    const value: unknown = Reflect.get(err, key);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

/**
 * Map a pg / socket error onto the storage error types.
 * Errors that match neither are returned as they are.
 */
export function translatePgError(err: unknown): unknown {
  if (err instanceof StoreError) {
    return err;
  }

  const code = readStringProperty(err, "code");
  const message = err instanceof Error ? err.message : String(err);

  if (code === UNIQUE_VIOLATION) {
    return new DuplicateKeyError(readStringProperty(err, "constraint") ?? null, { cause: err });
  }

  if ((code && NOT_APPLIED_CODES.has(code)) || /timeout exceeded when trying to connect/i.test(message)) {
    return new StoreUnavailableError(`Database unavailable: ${message}`, { retrySafe: true, cause: err });
  }

  if ((code && IN_FLIGHT_CODES.has(code)) || /Connection terminated|Query read timeout/i.test(message)) {
    return new StoreUnavailableError(`Database connection lost: ${message}`, { retrySafe: false, cause: err });
  }

  return err;
}
