import {
  annotateStep,
  type BusinessRuleError,
  type CancelledError,
  type DependencyError,
  ValidationError,
} from "@workspace/core/errors";
import { Principal } from "@workspace/core/execution-context";
import { defineOperation } from "@workspace/core/operation";
import type { Account } from "@workspace/domain/account";
import { Effect, Option, Schema } from "effect";
import type { AccountRepositoryPort } from "../ports/account.repository.js";
import type { AuditTrailPort } from "../ports/audit-trail.js";
import type { ClockPort } from "../ports/clock.js";
import { AccountLookupRequest, accountNotFound } from "./get-account.js";

export type CloseAccountError =
  | ValidationError
  | BusinessRuleError
  | DependencyError
  | CancelledError;

export interface CloseAccountDeps {
  readonly accounts: AccountRepositoryPort;
  readonly audit: AuditTrailPort;
  readonly clock: ClockPort;
}

export const makeCloseAccount = (deps: CloseAccountDeps) =>
  defineOperation<AccountLookupRequest, Account, CloseAccountError>(
    "closeAccount",
    (ctx, request) =>
      Effect.gen(function* () {
        const { id } = yield* Schema.decodeUnknown(AccountLookupRequest)(
          request,
        ).pipe(Effect.mapError(ValidationError.fromParseError));

        const found = yield* deps.accounts
          .findById(ctx, id)
          .pipe(annotateStep("closeAccount.findById"));
        if (Option.isNone(found)) {
          return yield* accountNotFound(id);
        }

        const at = yield* deps.clock.now(ctx);
        const closed = yield* found.value.close(at);

        yield* deps.accounts
          .update(ctx, closed)
          .pipe(annotateStep("closeAccount.update"));
        yield* deps.audit
          .append(ctx, {
            action: "account.closed",
            accountId: closed.id,
            actor: Option.map(ctx.lookup(Principal), (principal) => principal.id),
            at,
          })
          .pipe(annotateStep("closeAccount.audit"));

        return closed;
      }),
  );

export type CloseAccount = ReturnType<typeof makeCloseAccount>;
