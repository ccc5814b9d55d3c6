import type { DependencyError } from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import type { Effect } from "effect";

export interface IdGeneratorPort {
	next(ctx: ExecutionContext): Effect.Effect<string, DependencyError>;
}
