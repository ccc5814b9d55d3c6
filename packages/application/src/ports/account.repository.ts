import type {
	BusinessRuleError,
	CancelledError,
	DependencyError,
} from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import type { Account } from "@workspace/domain/account";
import type { AccountId, Email } from "@workspace/domain/kernel";
import type { Effect, Option } from "effect";

export type RepositoryError = DependencyError | CancelledError;

/**
 * Every method takes the caller's context first: adapters run on the
 * transaction attached to it, if any.
 */
export interface AccountRepositoryPort {
	/**
	 * Find an account by its ID.
	 * Returns Option.none() if not found.
	 */
	findById(
		ctx: ExecutionContext,
		id: AccountId,
	): Effect.Effect<Option.Option<Account>, RepositoryError>;

	findByEmail(
		ctx: ExecutionContext,
		email: Email,
	): Effect.Effect<Option.Option<Account>, RepositoryError>;

	/**
	 * Fails with the `email-taken` BusinessRuleError when the store's own
	 * uniqueness check rejects the e-mail.
	 */
	insert(
		ctx: ExecutionContext,
		account: Account,
	): Effect.Effect<void, RepositoryError | BusinessRuleError>;

	/**
	 * Persist a new version of an existing account. Fails with a transient
	 * DependencyError when the stored version is not `account.version - 1`.
	 */
	update(
		ctx: ExecutionContext,
		account: Account,
	): Effect.Effect<void, RepositoryError>;
}
