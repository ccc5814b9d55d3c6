import type { ExecutionContext } from "@workspace/core/execution-context";
import type { Effect } from "effect";

export interface ClockPort {
	now(ctx: ExecutionContext): Effect.Effect<Date>;
}
