import { Account } from "@workspace/domain/account";
import { Option, ParseResult, Schema } from "effect";

// --- Database Row Types ---

export const AccountRow = Schema.Struct({
  id: Schema.String,
  email: Schema.String,
  display_name: Schema.String,
  status: Schema.String,
  opened_at: Schema.DateFromSelf,
  closed_at: Schema.NullOr(Schema.DateFromSelf),
  version: Schema.Number,
});

export type AccountRow = typeof AccountRow.Type;

export const ACCOUNT_COLUMNS =
  "id, email, display_name, status, opened_at, closed_at, version";

// --- Mappers ---

/**
 * Row ↔ aggregate. Decoding re-checks every domain rule, so a row written
 * by something else cannot smuggle an invalid account in.
 */
export const AccountFromRow = Schema.transformOrFail(
  AccountRow,
  Schema.typeSchema(Account),
  {
    strict: true,
    decode: (row) =>
      ParseResult.decodeUnknown(Account)({
        id: row.id,
        email: row.email,
        displayName: row.display_name,
        status: row.status,
        openedAt: row.opened_at,
        closedAt: Option.fromNullable(row.closed_at),
        version: row.version,
      }),
    encode: (account) =>
      ParseResult.succeed({
        id: account.id,
        email: account.email,
        display_name: account.displayName,
        status: account.status,
        opened_at: account.openedAt,
        closed_at: Option.getOrNull(account.closedAt),
        version: account.version,
      }),
  },
);

export const toRow = (account: Account): AccountRow =>
  Schema.encodeSync(AccountFromRow)(account);
