import type { AuditTrailPort } from "@workspace/application/ports";
import { Effect, Option } from "effect";
import type { Queryable } from "../db/pool.js";
import { runQuery } from "../transactions/postgres-transactions.js";

export const makePostgresAuditTrail = (pool: Queryable): AuditTrailPort => ({
  append: (ctx, entry) =>
    runQuery(
      ctx,
      pool,
      "audit.append",
      "INSERT INTO account_audit_log (action, account_id, actor, at) VALUES ($1, $2, $3, $4)",
      [entry.action, entry.accountId, Option.getOrNull(entry.actor), entry.at],
    ).pipe(Effect.asVoid),
});
