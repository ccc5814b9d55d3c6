import { Effect, Option } from "effect";
import { UnauthorizedError } from "../errors.js";
import { Principal, type PrincipalShape } from "../execution-context.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

export type AuthorizationPolicy<Req> = (
  principal: PrincipalShape,
  request: Req,
) => boolean;

export const requireRole =
  (role: string): AuthorizationPolicy<unknown> =>
  (principal) =>
    principal.roles.includes(role);

/**
 * Rejects the call before the inner operation runs when no principal is
 * attached to the context or the policy denies it.
 */
export const authorization = <Req = unknown>(
  policy: AuthorizationPolicy<Req>,
  label = "authorization",
) => ({
  kind: "authorization" as const,
  label,
  apply: <R extends Req, Res, E>(operation: Operation<R, Res, E>) => {
    const name = operationNameOf(operation);
    return defineOperation<R, Res, E | UnauthorizedError>(
      name,
      (ctx, request) =>
        Option.match(ctx.lookup(Principal), {
          onNone: () =>
            Effect.fail(
              new UnauthorizedError({
                operation: name,
                reason: "no principal attached",
              }),
            ),
          onSome: (principal) =>
            policy(principal, request)
              ? operation(ctx, request)
              : Effect.fail(
                  new UnauthorizedError({
                    operation: name,
                    reason: `principal ${principal.id} is not allowed`,
                  }),
                ),
        }),
    );
  },
});
