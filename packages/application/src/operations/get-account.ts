import {
  annotateStep,
  BusinessRuleError,
  type CancelledError,
  type DependencyError,
  ValidationError,
} from "@workspace/core/errors";
import { defineOperation } from "@workspace/core/operation";
import type { Account } from "@workspace/domain/account";
import { AccountId } from "@workspace/domain/kernel";
import { Effect, Option, Schema } from "effect";
import type { AccountRepositoryPort } from "../ports/account.repository.js";

export const AccountLookupRequest = Schema.Struct({ id: AccountId });

export type AccountLookupRequest = typeof AccountLookupRequest.Encoded;

export type GetAccountError =
  | ValidationError
  | BusinessRuleError
  | DependencyError
  | CancelledError;

export const accountNotFound = (id: string) =>
  new BusinessRuleError({
    rule: "account-not-found",
    message: `Account ${id} does not exist`,
  });

export const makeGetAccount = (deps: {
  readonly accounts: AccountRepositoryPort;
}) =>
  defineOperation<AccountLookupRequest, Account, GetAccountError>(
    "getAccount",
    (ctx, request) =>
      Effect.gen(function* () {
        const { id } = yield* Schema.decodeUnknown(AccountLookupRequest)(
          request,
        ).pipe(Effect.mapError(ValidationError.fromParseError));

        const found = yield* deps.accounts
          .findById(ctx, id)
          .pipe(annotateStep("getAccount.findById"));

        return yield* Option.match(found, {
          onNone: () => Effect.fail(accountNotFound(id)),
          onSome: Effect.succeed,
        });
      }),
  );

export type GetAccount = ReturnType<typeof makeGetAccount>;
