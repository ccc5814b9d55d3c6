import { Cause, Effect, Exit, Option } from "effect";
import { categorize, isClientFault } from "../errors.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

const logFailure = <E>(name: string, cause: Cause.Cause<E>) =>
  Option.match(Cause.failureOption(cause), {
    onNone: () =>
      Cause.isInterruptedOnly(cause)
        ? Effect.logWarning(`${name} interrupted`)
        : Effect.logError(`${name} crashed`, cause),
    onSome: (error) => {
      const category = categorize(error);
      return (
        isClientFault(category)
          ? Effect.logWarning(`${name} rejected`, error)
          : Effect.logError(`${name} failed`, error)
      ).pipe(Effect.annotateLogs("category", category));
    },
  }).pipe(Effect.annotateLogs("outcome", "failure"));

/**
 * Emits exactly one entry per invocation of the wrapped operation: info on
 * success, warning for client faults, error for dependency failures and
 * defects.
 */
export const logging = (label = "logging") => ({
  kind: "logging" as const,
  label,
  apply: <Req, Res, E>(operation: Operation<Req, Res, E>) => {
    const name = operationNameOf(operation);
    return defineOperation<Req, Res, E>(name, (ctx, request) =>
      Effect.suspend(() => operation(ctx, request)).pipe(
        Effect.onExit((exit) =>
          Exit.match(exit, {
            onSuccess: () =>
              Effect.logInfo(`${name} succeeded`).pipe(
                Effect.annotateLogs("outcome", "success"),
              ),
            onFailure: (cause) => logFailure(name, cause),
          }),
        ),
        Effect.withLogSpan(name),
        Effect.annotateLogs("operation", name),
      ),
    );
  },
});
