import {
  annotateStep,
  BusinessRuleError,
  type CancelledError,
  type DependencyError,
  ValidationError,
} from "@workspace/core/errors";
import { Principal } from "@workspace/core/execution-context";
import { defineOperation } from "@workspace/core/operation";
import { Account } from "@workspace/domain/account";
import {
  AccountId,
  DisplayNameSchema,
  EmailSchema,
} from "@workspace/domain/kernel";
import { Effect, Option, Schema } from "effect";
import type { AccountRepositoryPort } from "../ports/account.repository.js";
import type { AuditTrailPort } from "../ports/audit-trail.js";
import type { ClockPort } from "../ports/clock.js";
import type { IdGeneratorPort } from "../ports/id-generator.js";

// ============================================================================
// TYPES
// ============================================================================

export const CreateAccountRequest = Schema.Struct({
  email: EmailSchema,
  displayName: DisplayNameSchema,
});

export type CreateAccountRequest = typeof CreateAccountRequest.Encoded;

export type CreateAccountError =
  | ValidationError
  | BusinessRuleError
  | DependencyError
  | CancelledError;

export interface CreateAccountDeps {
  readonly accounts: AccountRepositoryPort;
  readonly audit: AuditTrailPort;
  readonly ids: IdGeneratorPort;
  readonly clock: ClockPort;
}

// ============================================================================
// OPERATION
// ============================================================================

/**
 * Opens an account for an e-mail address nobody uses yet and records the
 * opening in the audit trail.
 */
export const makeCreateAccount = (deps: CreateAccountDeps) =>
  defineOperation<CreateAccountRequest, Account, CreateAccountError>(
    "createAccount",
    (ctx, request) =>
      Effect.gen(function* () {
        const input = yield* Schema.decodeUnknown(CreateAccountRequest)(
          request,
        ).pipe(Effect.mapError(ValidationError.fromParseError));

        const existing = yield* deps.accounts
          .findByEmail(ctx, input.email)
          .pipe(annotateStep("createAccount.findByEmail"));
        if (Option.isSome(existing)) {
          return yield* new BusinessRuleError({
            rule: "email-taken",
            message: `An account already uses ${input.email}`,
          });
        }

        const id = yield* deps.ids
          .next(ctx)
          .pipe(annotateStep("createAccount.nextId"));
        const at = yield* deps.clock.now(ctx);

        const account = Account.open({
          id: AccountId.make(id),
          email: input.email,
          displayName: input.displayName,
          at,
        });

        yield* deps.accounts
          .insert(ctx, account)
          .pipe(annotateStep("createAccount.insert"));
        yield* deps.audit
          .append(ctx, {
            action: "account.opened",
            accountId: account.id,
            actor: Option.map(ctx.lookup(Principal), (principal) => principal.id),
            at,
          })
          .pipe(annotateStep("createAccount.audit"));

        return account;
      }),
  );

export type CreateAccount = ReturnType<typeof makeCreateAccount>;
