import { Effect, Exit, Option } from "effect";
import {
  type CancelledError,
  type DependencyError,
  dependencyFailure,
} from "../errors.js";
import type { ExecutionContext } from "../execution-context.js";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";
import {
  guardHandle,
  type TransactionalResource,
  type TransactionHandle,
} from "../ports/transaction.js";

const runInNewTransaction = <H extends TransactionHandle, Req, Res, E>(
  resource: TransactionalResource<H>,
  operation: Operation<Req, Res, E>,
  name: string,
  ctx: ExecutionContext,
  request: Req,
): Effect.Effect<Res, E | DependencyError | CancelledError> =>
  // Masked so no exit path (failure, defect, interruption) can skip the
  // terminal action; only the inner operation runs interruptibly.
  Effect.uninterruptibleMask((restore) =>
    Effect.gen(function* () {
      yield* ctx.ensureActive(`${name}.begin`);
      const handle = guardHandle(yield* resource.begin(ctx));

      const exit = yield* Effect.exit(
        restore(
          Effect.suspend(() =>
            operation(ctx.attach(resource.tag, handle), request),
          ),
        ),
      );

      if (Exit.isSuccess(exit)) {
        yield* handle
          .commit()
          .pipe(Effect.mapError(dependencyFailure("transaction.commit")));
        yield* Effect.logDebug(`Transaction ${handle.id} committed`);
        return exit.value;
      }

      yield* handle.rollback().pipe(
        Effect.tap(() =>
          Effect.logDebug(`Transaction ${handle.id} rolled back`),
        ),
        Effect.catchAll((rollbackError) =>
          Effect.logError(
            `Rollback of transaction ${handle.id} failed`,
            rollbackError,
          ),
        ),
      );
      return yield* exit;
    }).pipe(
      Effect.annotateLogs({ operation: name, store: resource.store }),
    ),
  );

/**
 * Runs the inner operation inside a unit of work from `resource`: commit on
 * success, rollback on failure or defect, the inner outcome returned
 * unchanged.
 *
 * Transactions are flat: when a handle for the same store is already attached
 * to the context, the inner operation simply joins it.
 */
export const transactional = <H extends TransactionHandle>(
  resource: TransactionalResource<H>,
  label = "transaction",
) => ({
  kind: "transaction" as const,
  label,
  apply: <Req, Res, E>(operation: Operation<Req, Res, E>) => {
    const name = operationNameOf(operation);
    return defineOperation<Req, Res, E | DependencyError | CancelledError>(
      name,
      (ctx, request) =>
        Option.match(ctx.lookup(resource.tag), {
          onSome: () => operation(ctx, request),
          onNone: () =>
            runInNewTransaction(resource, operation, name, ctx, request),
        }),
    );
  },
});
