import { randomUUID } from "node:crypto";
import type { IdGeneratorPort } from "@workspace/application/ports";
import { Effect } from "effect";

export const makeUuidGenerator = (): IdGeneratorPort => ({
  next: () => Effect.sync(() => randomUUID()),
});
