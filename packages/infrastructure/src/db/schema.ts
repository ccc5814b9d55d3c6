import { readFile } from "node:fs/promises";
import type { DependencyError } from "@workspace/core/errors";
import { Effect } from "effect";
import { mapDatabaseError } from "../errors/error-mapper.js";
import type { Queryable } from "./pool.js";

const SCHEMA_FILE = new URL("./schema.sql", import.meta.url);

/**
 * Creates the tables the Postgres adapters use. Every statement is
 * idempotent, so this runs on each startup.
 */
export const ensureSchema = (
  db: Queryable,
): Effect.Effect<void, DependencyError> =>
  Effect.gen(function* () {
    const ddl = yield* Effect.tryPromise({
      try: () => readFile(SCHEMA_FILE, "utf8"),
      catch: mapDatabaseError("schema.read"),
    });
    yield* Effect.tryPromise({
      try: () => db.query(ddl),
      catch: mapDatabaseError("schema.apply"),
    });
    yield* Effect.logInfo("Database schema is up to date");
  });
