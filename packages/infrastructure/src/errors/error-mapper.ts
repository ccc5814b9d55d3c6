import { DependencyError } from "@workspace/core/errors";

// PostgreSQL SQLSTATE codes after which the same statement may succeed.
const TRANSIENT_SQLSTATES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "53300", // too_many_connections
  "57014", // query_canceled (statement_timeout)
  "57P01", // admin_shutdown
]);

const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
]);

const errorCode = (error: unknown): string | undefined =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Whether retrying the failed statement may succeed: serialization
 * failures, deadlocks, connection loss and cancelled queries.
 */
export const isTransientDatabaseError = (error: unknown): boolean => {
  const code = errorCode(error);
  if (code !== undefined) {
    return (
      TRANSIENT_SQLSTATES.has(code) ||
      code.startsWith("08") || // connection_exception class
      TRANSIENT_SOCKET_CODES.has(code)
    );
  }
  return (
    error instanceof Error &&
    /Connection terminated|connection timeout/i.test(error.message)
  );
};

/**
 * Whether `error` is a unique_violation, on `constraint` when one is given.
 */
export const isUniqueViolation = (
  error: unknown,
  constraint?: string,
): boolean =>
  errorCode(error) === "23505" &&
  (constraint === undefined ||
    (typeof error === "object" &&
      error !== null &&
      "constraint" in error &&
      error.constraint === constraint));

/**
 * Maps a driver error to a DependencyError for `step`.
 */
export const mapDatabaseError =
  (step: string) =>
  (error: unknown): DependencyError =>
    new DependencyError({
      step,
      message: sanitizeErrorMessage(
        error instanceof Error ? error.message : String(error),
      ),
      cause: error,
      transient: isTransientDatabaseError(error),
    });

/**
 * Sanitizes error messages to prevent exposing internal details
 */
export function sanitizeErrorMessage(message: string): string {
  // Remove connection strings (must be first to catch credentials)
  let sanitized = message.replace(
    /[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^\s@]+:[^\s@]+@[^\s]+/g,
    "<connection-string>",
  );

  sanitized = sanitized.replace(
    /(password|secret|token)\s+[^\s]+/gi,
    "$1 <redacted>",
  );

  // Remove IP addresses
  sanitized = sanitized.replace(
    /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
    "<ip-address>",
  );

  return sanitized;
}
