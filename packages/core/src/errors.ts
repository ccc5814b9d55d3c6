/**
 * @file errors.ts
 * @module @workspace/core/errors
 * @description Request-time error taxonomy shared by every operation, plus
 * the startup-only assembly error.
 *
 * - ValidationError / BusinessRuleError / UnauthorizedError: client faults, never retried.
 * - DependencyError: an injected dependency failed; retried only when `transient`.
 * - CancelledError: the execution context was cancelled or its deadline expired.
 * - AssemblyError: wiring failed; fatal, never surfaced per request.
 */

import { Data, Effect, ParseResult } from "effect";

// --- Client faults ---

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly message: string;
  readonly issues: ReadonlyArray<string>;
}> {
  static fromParseError(error: ParseResult.ParseError): ValidationError {
    const issues = ParseResult.ArrayFormatter.formatErrorSync(error).map(
      (issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
    );
    return new ValidationError({
      message: "Request is invalid",
      issues,
    });
  }
}

export class BusinessRuleError extends Data.TaggedError("BusinessRuleError")<{
  readonly rule: string;
  readonly message: string;
}> {}

export class UnauthorizedError extends Data.TaggedError("UnauthorizedError")<{
  readonly operation: string;
  readonly reason: string;
}> {}

// --- Server faults ---

export class DependencyError extends Data.TaggedError("DependencyError")<{
  readonly step: string;
  readonly message: string;
  readonly cause: unknown;
  readonly transient: boolean;
}> {}

export type CancellationReason = "cancelled" | "deadline";

export class CancelledError extends Data.TaggedError("CancelledError")<{
  readonly step: string;
  readonly reason: CancellationReason;
}> {}

// --- Startup ---

export type AssemblyFailureReason =
  | "duplicate"
  | "missing-dependency"
  | "tier-violation"
  | "cycle"
  | "build-failed";

export class AssemblyError extends Data.TaggedError("AssemblyError")<{
  readonly component: string;
  readonly reason: AssemblyFailureReason;
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Union of every request-time failure an operation stack can produce.
 */
export type OperationFailure =
  | ValidationError
  | BusinessRuleError
  | UnauthorizedError
  | DependencyError
  | CancelledError;

// =============================================================================
// Classification
// =============================================================================

export type ErrorCategory =
  | "validation"
  | "business-rule"
  | "authorization"
  | "dependency"
  | "cancelled";

const hasTag = (error: unknown): error is { readonly _tag: string } =>
  typeof error === "object" &&
  error !== null &&
  "_tag" in error &&
  typeof error._tag === "string";

/**
 * Maps a failure to its category. Anything outside the taxonomy is treated
 * as a dependency failure.
 */
export const categorize = (error: unknown): ErrorCategory => {
  if (!hasTag(error)) {
    return "dependency";
  }
  switch (error._tag) {
    case "ValidationError":
      return "validation";
    case "BusinessRuleError":
      return "business-rule";
    case "UnauthorizedError":
      return "authorization";
    case "CancelledError":
      return "cancelled";
    default:
      return "dependency";
  }
};

export const isClientFault = (category: ErrorCategory): boolean =>
  category === "validation" ||
  category === "business-rule" ||
  category === "authorization";

/**
 * Only dependency errors flagged transient by their adapter are retryable.
 */
export const isRetryable = (error: unknown): boolean =>
  error instanceof DependencyError && error.transient;

const describe = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * Wraps an arbitrary cause as a DependencyError for `step`. A cause that is
 * already a DependencyError keeps its classification and gains the step as a
 * prefix.
 */
export const dependencyFailure =
  (step: string, options: { readonly transient?: boolean } = {}) =>
  (cause: unknown): DependencyError =>
    cause instanceof DependencyError
      ? new DependencyError({
          step: `${step} > ${cause.step}`,
          message: cause.message,
          cause: cause.cause,
          transient: cause.transient,
        })
      : new DependencyError({
          step,
          message: describe(cause),
          cause,
          transient: options.transient ?? false,
        });

/**
 * Annotates dependency failures of `effect` with the calling step. Other
 * failures pass through untouched.
 */
export const annotateStep =
  (step: string) =>
  <A, E, R>(
    effect: Effect.Effect<A, E, R>,
  ): Effect.Effect<A, E | DependencyError, R> =>
    Effect.mapError(effect, (error) =>
      error instanceof DependencyError ? dependencyFailure(step)(error) : error,
    );
