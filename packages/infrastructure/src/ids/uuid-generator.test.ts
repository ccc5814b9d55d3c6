import { ExecutionContext } from "@workspace/core/execution-context";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { makeUuidGenerator } from "./uuid-generator.js";

describe("UuidGenerator", () => {
  it("returns distinct v4 identifiers", async () => {
    const ids = makeUuidGenerator();
    const ctx = ExecutionContext.make();

    const [first, second] = await Effect.runPromise(
      Effect.all([ids.next(ctx), ids.next(ctx)]),
    );

    expect(first).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
    expect(first).not.toBe(second);
  });
});
