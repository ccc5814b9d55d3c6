import type { CancelledError, DependencyError } from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import type { AccountId } from "@workspace/domain/kernel";
import type { Effect, Option } from "effect";

export type AuditAction = "account.opened" | "account.closed";

export interface AuditEntry {
	readonly action: AuditAction;
	readonly accountId: AccountId;
	readonly actor: Option.Option<string>;
	readonly at: Date;
}

export interface AuditTrailPort {
	append(
		ctx: ExecutionContext,
		entry: AuditEntry,
	): Effect.Effect<void, DependencyError | CancelledError>;
}
