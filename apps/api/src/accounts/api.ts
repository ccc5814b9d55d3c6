import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { CreateAccountRequest } from "@workspace/application";
import { Schema } from "effect";

// ============================================================================
// RESPONSES
// ============================================================================

export class AccountView extends Schema.Class<AccountView>("AccountView")({
  id: Schema.String,
  email: Schema.String,
  displayName: Schema.String,
  status: Schema.String,
  openedAt: Schema.String,
  closedAt: Schema.NullOr(Schema.String),
  version: Schema.Number,
}) {}

export class InvalidRequest extends Schema.TaggedError<InvalidRequest>()(
  "InvalidRequest",
  { message: Schema.String, issues: Schema.Array(Schema.String) },
) {}

export class Forbidden extends Schema.TaggedError<Forbidden>()("Forbidden", {
  message: Schema.String,
}) {}

export class NotFound extends Schema.TaggedError<NotFound>()("NotFound", {
  rule: Schema.String,
  message: Schema.String,
}) {}

export class Conflict extends Schema.TaggedError<Conflict>()("Conflict", {
  rule: Schema.String,
  message: Schema.String,
}) {}

/** Dependency details stay in the logs. */
export class InternalError extends Schema.TaggedError<InternalError>()(
  "InternalError",
  { message: Schema.String },
) {}

export class Unavailable extends Schema.TaggedError<Unavailable>()(
  "Unavailable",
  { reason: Schema.String },
) {}

export type AccountApiError =
  | InvalidRequest
  | Forbidden
  | NotFound
  | Conflict
  | InternalError
  | Unavailable;

// ============================================================================
// ENDPOINTS
// ============================================================================

/** `x-principal: <id>;<role>,<role>` identifies the caller. */
const PrincipalHeaders = Schema.Struct({
  "x-principal": Schema.optional(Schema.String),
});

const AccountPath = Schema.Struct({ id: Schema.String });

export class AccountsGroup extends HttpApiGroup.make("accounts")
  .add(
    HttpApiEndpoint.post("create", "/")
      .setHeaders(PrincipalHeaders)
      // Only the shape is checked here; the operation enforces its own rules.
      .setPayload(Schema.encodedSchema(CreateAccountRequest))
      .addSuccess(AccountView, { status: 201 }),
  )
  .add(
    HttpApiEndpoint.get("get", "/:id")
      .setPath(AccountPath)
      .setHeaders(PrincipalHeaders)
      .addSuccess(AccountView),
  )
  .add(
    HttpApiEndpoint.post("close", "/:id/close")
      .setPath(AccountPath)
      .setHeaders(PrincipalHeaders)
      .addSuccess(AccountView),
  )
  .addError(InvalidRequest, { status: 400 })
  .addError(Forbidden, { status: 403 })
  .addError(NotFound, { status: 404 })
  .addError(Conflict, { status: 409 })
  .addError(InternalError, { status: 500 })
  .addError(Unavailable, { status: 503 })
  .prefix("/accounts") {}
