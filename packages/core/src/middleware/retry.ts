import { Duration, Effect, Schedule } from "effect";
import { isRetryable } from "../errors.js";
import type { ExecutionContext } from "../execution-context.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

export interface RetryPolicy {
  /** Attempts after the first one. */
  readonly maxRetries: number;
  readonly baseDelay: Duration.DurationInput;
  readonly jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelay: Duration.millis(50),
  jitter: true,
};

/**
 * Exponential backoff, bounded by `maxRetries`, that only continues while the
 * failure is transient and the caller has not cancelled.
 */
export const retrySchedule = (policy: RetryPolicy, ctx: ExecutionContext) => {
  const schedule = Schedule.exponential(Duration.decode(policy.baseDelay)).pipe(
    Schedule.intersect(Schedule.recurs(policy.maxRetries)),
    Schedule.whileInput(
      (error: unknown) => isRetryable(error) && !ctx.isCancelled,
    ),
  );
  return policy.jitter ? Schedule.jittered(schedule) : schedule;
};

/**
 * Re-invokes the whole inner operation per attempt, so anything it wraps (a
 * transaction in particular) starts fresh each time. The last error is
 * propagated once the policy gives up.
 */
export const retry = (policy: RetryPolicy, label = "retry") => ({
  kind: "retry" as const,
  label,
  apply: <Req, Res, E>(operation: Operation<Req, Res, E>) => {
    const name = operationNameOf(operation);
    return defineOperation<Req, Res, E>(name, (ctx, request) =>
      Effect.retry(
        Effect.suspend(() => operation(ctx, request)).pipe(
          Effect.tapError((error) =>
            isRetryable(error)
              ? Effect.logDebug(`${name} attempt failed with a transient error`)
              : Effect.void,
          ),
        ),
        retrySchedule(policy, ctx),
      ),
    );
  },
});
