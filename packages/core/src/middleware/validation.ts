import { Effect, Schema } from "effect";
import { ValidationError } from "../errors.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

/**
 * Checks the request against `schema` before the inner operation runs. The
 * request itself is passed through unchanged.
 */
export const validation = <A, I>(
  schema: Schema.Schema<A, I>,
  label = "validation",
) => {
  const check = Schema.validate(schema);
  return {
    kind: "validation" as const,
    label,
    apply: <R extends A, Res, E>(operation: Operation<R, Res, E>) =>
      defineOperation<R, Res, E | ValidationError>(
        operationNameOf(operation),
        (ctx, request) =>
          check(request).pipe(
            Effect.mapError(ValidationError.fromParseError),
            Effect.zipRight(Effect.suspend(() => operation(ctx, request))),
          ),
      ),
  };
};
