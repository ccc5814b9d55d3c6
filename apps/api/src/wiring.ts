/**
 * @file wiring.ts
 * @module @workspace/api
 * @description The application graph: resources, base operations, the
 * operations wrapped in their middleware stacks, and the HTTP API layer.
 */

import type { HttpApi } from "@effect/platform";
import {
  type AccountLookupRequest,
  type AccountRepositoryPort,
  type AuditTrailPort,
  type ClockPort,
  type CloseAccount,
  type CreateAccount,
  type CreateAccountRequest,
  type GetAccount,
  type IdGeneratorPort,
  makeCloseAccount,
  makeCreateAccount,
  makeGetAccount,
} from "@workspace/application";
import {
  type AppConfig,
  DatabaseConfig,
  type OperationPolicyConfig,
  type StoreDriver,
} from "@workspace/config";
import type { OperationFailure } from "@workspace/core/errors";
import {
  type AuthorizationPolicy,
  authorization,
  composeChecked,
  logging,
  type Middleware,
  requireRole,
  retry,
  timeout,
  timing,
  transactional,
} from "@workspace/core/middleware";
import type { TransactionHandle } from "@workspace/core/transaction";
import { assemble, components } from "@workspace/core/wiring";
import type { Account } from "@workspace/domain/account";
import {
  ensureSchema,
  InMemoryStore,
  makePgPool,
  makePostgresAccountRepository,
  makePostgresAuditTrail,
  makePostgresTransactions,
  makeUuidGenerator,
  SystemClock,
} from "@workspace/infrastructure";
import { Effect, type Layer } from "effect";
import {
  type AccountOperationSet,
  makeApiLayer,
} from "./accounts/api-live.js";

// ============================================================================
// COMPONENTS
// ============================================================================

type TransactionMiddleware = ReturnType<
  typeof transactional<TransactionHandle>
>;

/** Repositories of one backing store plus the middleware opening its transactions. */
export interface StoreBackend {
  readonly driver: StoreDriver;
  readonly accounts: AccountRepositoryPort;
  readonly audit: AuditTrailPort;
  readonly transaction: TransactionMiddleware;
}

export interface AppComponents {
  readonly store: StoreBackend;
  readonly ids: IdGeneratorPort;
  readonly clock: ClockPort;
  readonly policy: OperationPolicyConfig;
  readonly "createAccount.base": CreateAccount;
  readonly "getAccount.base": GetAccount;
  readonly "closeAccount.base": CloseAccount;
  readonly createAccount: AccountOperationSet["createAccount"];
  readonly getAccount: AccountOperationSet["getAccount"];
  readonly closeAccount: AccountOperationSet["closeAccount"];
  readonly api: Layer.Layer<HttpApi.Api>;
}

export interface GraphOptions {
  /** Backing store for the `memory` driver; a fresh one by default. */
  readonly memoryStore?: InMemoryStore;
  readonly ids?: IdGeneratorPort;
  readonly clock?: ClockPort;
}

// ============================================================================
// MIDDLEWARE STACKS
// ============================================================================

export const WRITE_ROLE = "accounts:write";

const anyPrincipal: AuthorizationPolicy<unknown> = () => true;

/**
 * Canonical order, outermost first. Each retry attempt runs in its own
 * transaction, and the timeout bounds all attempts together.
 */
export const writeStack = <Req>(
  store: StoreBackend,
  policy: OperationPolicyConfig,
): ReadonlyArray<Middleware<Req, Account, OperationFailure>> => [
  logging(),
  timing(),
  authorization(requireRole(WRITE_ROLE)),
  timeout(policy.timeout),
  retry(policy.retry),
  store.transaction,
];

/** Single reads need no unit of work. */
export const readStack = <Req>(
  policy: OperationPolicyConfig,
): ReadonlyArray<Middleware<Req, Account, OperationFailure>> => [
  logging(),
  timing(),
  authorization(anyPrincipal),
  timeout(policy.timeout),
  retry(policy.retry),
];

// ============================================================================
// STORES
// ============================================================================

const postgresBackend = Effect.gen(function* () {
  const database = yield* DatabaseConfig;
  const pool = yield* makePgPool(database);
  yield* ensureSchema(pool);
  const backend: StoreBackend = {
    driver: "postgres",
    accounts: makePostgresAccountRepository(pool),
    audit: makePostgresAuditTrail(pool),
    transaction: transactional(makePostgresTransactions(pool)),
  };
  return backend;
});

const memoryBackend = (store: InMemoryStore): StoreBackend => ({
  driver: "memory",
  accounts: store.accounts,
  audit: store.audit,
  transaction: transactional(store.transactions),
});

// ============================================================================
// GRAPH
// ============================================================================

const { resource, operation, wrapped, binding } = components<AppComponents>();

export const makeGraph = (config: AppConfig, options: GraphOptions = {}) => [
  resource("store", [], () =>
    config.driver === "postgres"
      ? postgresBackend
      : Effect.sync(() => memoryBackend(options.memoryStore ?? new InMemoryStore())),
  ),
  resource("ids", [], () => Effect.succeed(options.ids ?? makeUuidGenerator())),
  resource("clock", [], () => Effect.succeed(options.clock ?? SystemClock)),
  resource("policy", [], () => Effect.succeed(config.policy)),

  operation("createAccount.base", ["store", "ids", "clock"], (deps) =>
    Effect.succeed(
      makeCreateAccount({
        accounts: deps.get("store").accounts,
        audit: deps.get("store").audit,
        ids: deps.get("ids"),
        clock: deps.get("clock"),
      }),
    ),
  ),
  operation("getAccount.base", ["store"], (deps) =>
    Effect.succeed(makeGetAccount({ accounts: deps.get("store").accounts })),
  ),
  operation("closeAccount.base", ["store", "clock"], (deps) =>
    Effect.succeed(
      makeCloseAccount({
        accounts: deps.get("store").accounts,
        audit: deps.get("store").audit,
        clock: deps.get("clock"),
      }),
    ),
  ),

  wrapped("createAccount", ["createAccount.base", "store", "policy"], (deps) =>
    composeChecked<CreateAccountRequest, Account, OperationFailure>(
      writeStack<CreateAccountRequest>(deps.get("store"), deps.get("policy")),
      deps.get("createAccount.base"),
    ),
  ),
  wrapped("getAccount", ["getAccount.base", "policy"], (deps) =>
    composeChecked<AccountLookupRequest, Account, OperationFailure>(
      readStack<AccountLookupRequest>(deps.get("policy")),
      deps.get("getAccount.base"),
    ),
  ),
  wrapped("closeAccount", ["closeAccount.base", "store", "policy"], (deps) =>
    composeChecked<AccountLookupRequest, Account, OperationFailure>(
      writeStack<AccountLookupRequest>(deps.get("store"), deps.get("policy")),
      deps.get("closeAccount.base"),
    ),
  ),

  binding("api", ["createAccount", "getAccount", "closeAccount"], (deps) =>
    Effect.succeed(
      makeApiLayer({
        createAccount: deps.get("createAccount"),
        getAccount: deps.get("getAccount"),
        closeAccount: deps.get("closeAccount"),
      }),
    ),
  ),
];

export const assembleApp = (config: AppConfig, options: GraphOptions = {}) =>
  assemble(makeGraph(config, options));
