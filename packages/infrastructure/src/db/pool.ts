import type { DependencyError } from "@workspace/core/errors";
import type { DatabaseConfig } from "@workspace/config";
import { Effect, Option, Redacted, type Scope } from "effect";
import pg from "pg";
import { mapDatabaseError } from "../errors/error-mapper.js";

// ============================================================================
// DRIVER SURFACE
// ============================================================================

export interface QueryResultLike {
  readonly rows: ReadonlyArray<unknown>;
  readonly rowCount: number | null;
}

/** The part of `pg.Pool` / `pg.PoolClient` the adapters use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface PgClientLike extends Queryable {
  /** `true` (or an error) destroys the connection instead of pooling it. */
  release(destroy?: boolean | Error): void;
}

export interface PgPoolLike extends Queryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

// ============================================================================
// POOL
// ============================================================================

const poolOptions = (config: DatabaseConfig): pg.PoolConfig => {
  const common = {
    max: config.poolMax,
    statement_timeout: config.statementTimeoutMs,
  };
  return Option.match(config.url, {
    onSome: (url) => ({ ...common, connectionString: Redacted.value(url) }),
    onNone: () => ({
      ...common,
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: Redacted.value(config.password),
    }),
  });
};

/**
 * Opens a pool, checks it can reach the server, and ends it when the scope
 * closes.
 */
export const makePgPool = (
  config: DatabaseConfig,
): Effect.Effect<PgPoolLike, DependencyError, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.gen(function* () {
      const pool = new pg.Pool(poolOptions(config));
      // Idle clients can fail between checkouts; pg emits those on the pool.
      pool.on("error", (error) => {
        Effect.runFork(Effect.logError("Idle database client failed", error));
      });

      yield* Effect.tryPromise({
        try: () => pool.query("SELECT 1"),
        catch: mapDatabaseError("database.connect"),
      }).pipe(
        Effect.tapError(() => Effect.promise(() => pool.end())),
      );

      yield* Effect.logInfo("Database pool ready").pipe(
        Effect.annotateLogs({
          database: config.database,
          poolMax: config.poolMax,
        }),
      );
      return pool;
    }),
    (pool) =>
      Effect.tryPromise(() => pool.end()).pipe(
        Effect.tap(() => Effect.logInfo("Database pool closed")),
        Effect.catchAll((error) =>
          Effect.logWarning("Database pool did not close cleanly", error),
        ),
      ),
  );
