import type { ClockPort } from "@workspace/application/ports";
import { Clock, Effect } from "effect";

/**
 * Reads Effect's Clock service, so tests can drive it with TestClock.
 */
export const SystemClock: ClockPort = {
  now: () => Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis)),
};
