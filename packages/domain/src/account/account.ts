import { BusinessRuleError } from "@workspace/core/errors";
import { Effect, Option as O, Schema } from "effect";
import {
	AccountId,
	type DisplayName,
	DisplayNameSchema,
	type Email,
	EmailSchema,
} from "../kernel.js";

export const AccountStatus = {
	ACTIVE: "ACTIVE",
	CLOSED: "CLOSED",
} as const;

export type AccountStatus = (typeof AccountStatus)[keyof typeof AccountStatus];

export const AccountStatusSchema = Schema.Enums(AccountStatus);

// --- Account Aggregate Root ---
export class Account extends Schema.Class<Account>("Account")({
	id: AccountId,
	email: EmailSchema,
	displayName: DisplayNameSchema,
	status: AccountStatusSchema,
	openedAt: Schema.DateFromSelf,
	closedAt: Schema.OptionFromSelf(Schema.DateFromSelf),
	version: Schema.Number.pipe(Schema.int(), Schema.positive()),
}) {
	// Time is always passed in; the aggregate never reads a clock.
	static open(props: {
		id: AccountId;
		email: Email;
		displayName: DisplayName;
		at: Date;
	}): Account {
		return new Account({
			id: props.id,
			email: props.email,
			displayName: props.displayName,
			status: AccountStatus.ACTIVE,
			openedAt: props.at,
			closedAt: O.none(),
			version: 1,
		});
	}

	isClosed(): boolean {
		return this.status === AccountStatus.CLOSED;
	}

	// State transition: Close account
	close(at: Date): Effect.Effect<Account, BusinessRuleError> {
		return Effect.gen(this, function* () {
			if (this.isClosed()) {
				return yield* new BusinessRuleError({
					rule: "account-already-closed",
					message: `Account ${this.id} is already closed`,
				});
			}

			return new Account({
				...this,
				status: AccountStatus.CLOSED,
				closedAt: O.some(at),
				version: this.version + 1,
			});
		});
	}
}
