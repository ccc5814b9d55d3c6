import { type Duration, Effect } from "effect";
import type { CancelledError } from "../errors.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

/**
 * Gives the inner operation a context whose signal fires after `duration`
 * (or at an earlier deadline already in force). Cancellation is cooperative:
 * the inner operation sees the expiry through `ctx.ensureActive` and reports
 * a CancelledError with reason "deadline"; it is never interrupted.
 */
export const timeout = (
  duration: Duration.DurationInput,
  label = "timeout",
) => ({
  kind: "timeout" as const,
  label,
  apply: <Req, Res, E>(operation: Operation<Req, Res, E>) => {
    const name = operationNameOf(operation);
    return defineOperation<Req, Res, E | CancelledError>(name, (ctx, request) =>
      Effect.suspend(() => {
        const bounded = ctx.withTimeout(duration);
        return bounded
          .ensureActive(name)
          .pipe(Effect.zipRight(Effect.suspend(() => operation(bounded, request))));
      }),
    );
  },
});
