import { HttpApiBuilder } from "@effect/platform";
import type {
  AccountLookupRequest,
  CreateAccountRequest,
} from "@workspace/application";
import type { OperationFailure } from "@workspace/core/errors";
import {
  ExecutionContext,
  Principal,
  type PrincipalShape,
} from "@workspace/core/execution-context";
import type { Operation } from "@workspace/core/operation";
import type { Account } from "@workspace/domain/account";
import { Context, Effect, Layer, Option } from "effect";
import { Api } from "../api.js";
import {
  type AccountApiError,
  AccountView,
  Conflict,
  Forbidden,
  InternalError,
  InvalidRequest,
  NotFound,
  Unavailable,
} from "./api.js";

// ============================================================================
// SERVICE
// ============================================================================

export interface AccountOperationSet {
  readonly createAccount: Operation<CreateAccountRequest, Account, OperationFailure>;
  readonly getAccount: Operation<AccountLookupRequest, Account, OperationFailure>;
  readonly closeAccount: Operation<AccountLookupRequest, Account, OperationFailure>;
}

/** The wrapped operations the handlers call. */
export class AccountOperations extends Context.Tag("@workspace/api/AccountOperations")<
  AccountOperations,
  AccountOperationSet
>() {}

// ============================================================================
// HELPERS
// ============================================================================

export const parsePrincipal = (
  header: string | undefined,
): Option.Option<PrincipalShape> => {
  if (header === undefined) {
    return Option.none();
  }
  const [id = "", roles = ""] = header.split(";", 2);
  const trimmedId = id.trim();
  if (trimmedId === "") {
    return Option.none();
  }
  return Option.some({
    id: trimmedId,
    roles: roles
      .split(",")
      .map((role) => role.trim())
      .filter((role) => role !== ""),
  });
};

export const toAccountView = (account: Account): AccountView =>
  new AccountView({
    id: account.id,
    email: account.email,
    displayName: account.displayName,
    status: account.status,
    openedAt: account.openedAt.toISOString(),
    closedAt: Option.match(account.closedAt, {
      onNone: () => null,
      onSome: (at) => at.toISOString(),
    }),
    version: account.version,
  });

export const toApiError = (error: OperationFailure): AccountApiError => {
  switch (error._tag) {
    case "ValidationError":
      return new InvalidRequest({ message: error.message, issues: error.issues });
    case "UnauthorizedError":
      return new Forbidden({ message: error.reason });
    case "BusinessRuleError":
      return error.rule.endsWith("-not-found")
        ? new NotFound({ rule: error.rule, message: error.message })
        : new Conflict({ rule: error.rule, message: error.message });
    case "CancelledError":
      return new Unavailable({ reason: error.reason });
    case "DependencyError":
      return new InternalError({ message: "The request could not be completed" });
  }
};

/**
 * Runs one operation under a fresh root context carrying the caller. The
 * context is cancelled when the server interrupts the handler, which it does
 * when the client goes away.
 */
export const invoke = (
  endpoint: string,
  principal: string | undefined,
  run: (ctx: ExecutionContext) => Effect.Effect<Account, OperationFailure>,
): Effect.Effect<AccountView, AccountApiError> =>
  Effect.suspend(() => {
    const { context, cancel } = ExecutionContext.make().withCancellation();
    const ctx = Option.match(parsePrincipal(principal), {
      onNone: () => context,
      onSome: (caller) => context.attach(Principal, caller),
    });
    return run(ctx).pipe(Effect.onInterrupt(() => Effect.sync(() => cancel())));
  }).pipe(
    Effect.map(toAccountView),
    Effect.mapError(toApiError),
    Effect.annotateLogs({ endpoint }),
  );

// ============================================================================
// API HANDLERS
// ============================================================================

export const AccountsApiLive = HttpApiBuilder.group(Api, "accounts", (handlers) =>
  handlers
    .handle("create", ({ headers, payload }) =>
      Effect.flatMap(AccountOperations, (operations) =>
        invoke("accounts.create", headers["x-principal"], (ctx) =>
          operations.createAccount(ctx, payload),
        ),
      ),
    )
    .handle("get", ({ headers, path }) =>
      Effect.flatMap(AccountOperations, (operations) =>
        invoke("accounts.get", headers["x-principal"], (ctx) =>
          operations.getAccount(ctx, { id: path.id }),
        ),
      ),
    )
    .handle("close", ({ headers, path }) =>
      Effect.flatMap(AccountOperations, (operations) =>
        invoke("accounts.close", headers["x-principal"], (ctx) =>
          operations.closeAccount(ctx, { id: path.id }),
        ),
      ),
    ),
);

/** The HTTP API served over `operations`. */
export const makeApiLayer = (operations: AccountOperationSet) =>
  HttpApiBuilder.api(Api).pipe(
    Layer.provide(AccountsApiLive),
    Layer.provide(Layer.succeed(AccountOperations, operations)),
  );
