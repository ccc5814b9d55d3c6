import type { AccountRepositoryPort } from "@workspace/application/ports";
import { BusinessRuleError, DependencyError } from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import type { Account } from "@workspace/domain/account";
import { Effect, Option, Schema } from "effect";
import type { Queryable } from "../db/pool.js";
import {
  isUniqueViolation,
  mapDatabaseError,
} from "../errors/error-mapper.js";
import { runQuery } from "../transactions/postgres-transactions.js";
import {
  ACCOUNT_COLUMNS,
  AccountFromRow,
  toRow,
} from "./mappers/account.mapper.js";

const decodeAccounts = Schema.decodeUnknown(Schema.Array(AccountFromRow));

const EMAIL_CONSTRAINT = "accounts_email_key";

/**
 * PostgreSQL implementation of the AccountRepository. Statements run on the
 * transaction attached to the context when there is one.
 */
export const makePostgresAccountRepository = (
  pool: Queryable,
): AccountRepositoryPort => {
  const findOne = (
    ctx: ExecutionContext,
    step: string,
    where: string,
    value: string,
  ) =>
    runQuery(
      ctx,
      pool,
      step,
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE ${where} = $1 LIMIT 1`,
      [value],
    ).pipe(
      Effect.flatMap((result) =>
        decodeAccounts(result.rows).pipe(
          Effect.mapError(mapDatabaseError(`${step}.decode`)),
        ),
      ),
      Effect.map((accounts) => Option.fromNullable(accounts[0])),
    );

  return {
    findById: (ctx, id) => findOne(ctx, "accounts.findById", "id", id),

    findByEmail: (ctx, email) =>
      findOne(ctx, "accounts.findByEmail", "email", email),

    insert: (ctx, account) => {
      const row = toRow(account);
      return runQuery(
        ctx,
        pool,
        "accounts.insert",
        `INSERT INTO accounts (${ACCOUNT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          row.id,
          row.email,
          row.display_name,
          row.status,
          row.opened_at,
          row.closed_at,
          row.version,
        ],
      ).pipe(
        Effect.catchTag("DependencyError", (error) =>
          Effect.fail(
            isUniqueViolation(error.cause, EMAIL_CONSTRAINT)
              ? new BusinessRuleError({
                  rule: "email-taken",
                  message: `An account already uses ${account.email}`,
                })
              : error,
          ),
        ),
        Effect.asVoid,
      );
    },

    update: (ctx, account: Account) => {
      const row = toRow(account);
      return runQuery(
        ctx,
        pool,
        "accounts.update",
        `UPDATE accounts
            SET display_name = $2, status = $3, closed_at = $4, version = $5
          WHERE id = $1 AND version = $6`,
        [
          row.id,
          row.display_name,
          row.status,
          row.closed_at,
          row.version,
          row.version - 1,
        ],
      ).pipe(
        Effect.flatMap((result) =>
          result.rowCount === 1
            ? Effect.void
            : Effect.fail(
                new DependencyError({
                  step: "accounts.update",
                  message: `Account ${account.id} changed since version ${account.version - 1}`,
                  cause: undefined,
                  transient: true,
                }),
              ),
        ),
      );
    },
  };
};
