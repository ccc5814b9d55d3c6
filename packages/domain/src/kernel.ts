/**
 * @file kernel.ts
 * @module @workspace/domain/kernel
 * @description Value objects shared by the account model and its adapters.
 */

import { Schema } from "effect";

// =============================================================================
// IDENTIFIERS
// =============================================================================

export const AccountId = Schema.String.pipe(
	Schema.minLength(1),
	Schema.brand("AccountId"),
);
export type AccountId = typeof AccountId.Type;
export const makeAccountId = (id: string): AccountId => AccountId.make(id);

// =============================================================================
// SCALARS WITH RULES
// =============================================================================

// --- Email Address ---
export const EmailSchema = Schema.String.pipe(
	Schema.pattern(/^[^\s@]+@[^\s@]+\.[^\s@]+$/, {
		message: () => "Expected an e-mail address",
	}),
	Schema.brand("Email"),
);
export type Email = typeof EmailSchema.Type;

// --- Display Name ---
export const DisplayNameSchema = Schema.String.pipe(
	Schema.trimmed(),
	Schema.minLength(1, { message: () => "Display name must not be empty" }),
	Schema.maxLength(80),
	Schema.brand("DisplayName"),
);
export type DisplayName = typeof DisplayNameSchema.Type;
