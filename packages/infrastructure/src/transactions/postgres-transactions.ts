import { randomUUID } from "node:crypto";
import type { DependencyError } from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import {
  type TransactionalResource,
  type TransactionHandle,
  transactionTag,
} from "@workspace/core/transaction";
import { Effect, Exit, Option } from "effect";
import type { PgClientLike, PgPoolLike, Queryable } from "../db/pool.js";
import { mapDatabaseError } from "../errors/error-mapper.js";

export const POSTGRES_STORE = "postgres";

/**
 * An open `BEGIN … COMMIT|ROLLBACK` block on a checked-out client.
 */
export interface PostgresTransaction extends TransactionHandle {
  readonly client: Queryable;
}

export const PostgresTransaction =
  transactionTag<PostgresTransaction>(POSTGRES_STORE);

/**
 * Runs `statement` and hands the client back to the pool whatever happens.
 * A client whose terminal statement failed is destroyed rather than reused.
 */
const finish = (
  client: PgClientLike,
  statement: "COMMIT" | "ROLLBACK",
  step: string,
): Effect.Effect<void, DependencyError> =>
  Effect.tryPromise({
    try: () => client.query(statement),
    catch: mapDatabaseError(step),
  }).pipe(
    Effect.onExit((exit) =>
      Effect.sync(() => client.release(Exit.isFailure(exit))),
    ),
    Effect.asVoid,
  );

export const makePostgresTransactions = (
  pool: PgPoolLike,
): TransactionalResource<PostgresTransaction> => ({
  store: POSTGRES_STORE,
  tag: PostgresTransaction,
  begin: (ctx: ExecutionContext) =>
    Effect.gen(function* () {
      yield* ctx.ensureActive("postgres.begin");
      const client = yield* Effect.tryPromise({
        try: () => pool.connect(),
        catch: mapDatabaseError("postgres.connect"),
      });
      yield* Effect.tryPromise({
        try: () => client.query("BEGIN"),
        catch: mapDatabaseError("postgres.begin"),
      }).pipe(Effect.tapError(() => Effect.sync(() => client.release(true))));

      return {
        id: randomUUID(),
        store: POSTGRES_STORE,
        client,
        commit: () => finish(client, "COMMIT", "postgres.commit"),
        rollback: () => finish(client, "ROLLBACK", "postgres.rollback"),
      };
    }),
});

/**
 * The client of the transaction attached to `ctx`, or the pool itself.
 */
export const queryTarget = (
  ctx: ExecutionContext,
  pool: Queryable,
): Queryable =>
  Option.match(ctx.lookup(PostgresTransaction), {
    onNone: () => pool,
    onSome: (transaction) => transaction.client,
  });

/**
 * Executes one statement on behalf of `step`, on the active transaction when
 * there is one. Fails with CancelledError instead of starting on a cancelled
 * context, and stops waiting for a running statement once the context is
 * cancelled. The server still finishes it, bounded by `statement_timeout`.
 */
export const runQuery = (
  ctx: ExecutionContext,
  pool: Queryable,
  step: string,
  text: string,
  values: unknown[] = [],
) =>
  ctx.ensureActive(step).pipe(
    Effect.zipRight(
      Effect.raceFirst(
        Effect.tryPromise({
          try: () => queryTarget(ctx, pool).query(text, values),
          catch: mapDatabaseError(step),
        }),
        ctx.awaitCancellation(step),
      ),
    ),
  );
