import { Context, Effect, Fiber, Option } from "effect";
import { describe, expect, it } from "vitest";
import { CancelledError } from "./errors.js";
import { ExecutionContext, Principal } from "./execution-context.js";

class RequestId extends Context.Tag("test/RequestId")<RequestId, string>() {}

describe("ExecutionContext", () => {
  describe("attachments", () => {
    it("leaves the parent untouched when attaching", () => {
      const parent = ExecutionContext.make();
      const child = parent.attach(RequestId, "req-1");

      expect(Option.isNone(parent.lookup(RequestId))).toBe(true);
      expect(child.lookup(RequestId)).toEqual(Option.some("req-1"));
      expect(parent.depth).toBe(0);
      expect(child.depth).toBe(1);
    });

    it("resolves the innermost attachment first", () => {
      const ctx = ExecutionContext.make()
        .attach(RequestId, "outer")
        .attach(Principal, { id: "user-1", roles: [] })
        .attach(RequestId, "inner");

      expect(ctx.lookup(RequestId)).toEqual(Option.some("inner"));
      expect(Option.map(ctx.lookup(Principal), (p) => p.id)).toEqual(
        Option.some("user-1"),
      );
    });

    it("returns none for a key that was never attached", () => {
      const ctx = ExecutionContext.make().attach(RequestId, "req-1");

      expect(ctx.lookup(Principal)).toEqual(Option.none());
    });

    it("lets independent callers derive from the same context", () => {
      const shared = ExecutionContext.make();
      const left = shared.attach(RequestId, "left");
      const right = shared.attach(RequestId, "right");

      expect(left.lookup(RequestId)).toEqual(Option.some("left"));
      expect(right.lookup(RequestId)).toEqual(Option.some("right"));
    });
  });

  describe("cancellation", () => {
    it("is active until the owner aborts", async () => {
      const controller = new AbortController();
      const ctx = ExecutionContext.make({ signal: controller.signal }).attach(
        RequestId,
        "req-1",
      );

      await Effect.runPromise(ctx.ensureActive("load"));

      controller.abort();
      const error = await Effect.runPromise(Effect.flip(ctx.ensureActive("load")));

      expect(ctx.isCancelled).toBe(true);
      expect(error._tag).toBe("CancelledError");
      expect(error.step).toBe("load");
      expect(error.reason).toBe("cancelled");
    });

    it("cancels a child without affecting its parent", () => {
      const parent = ExecutionContext.make();
      const { context: child, cancel } = parent.withCancellation();

      cancel();

      expect(child.isCancelled).toBe(true);
      expect(parent.isCancelled).toBe(false);
    });

    it("propagates the parent signal to derived children", () => {
      const { context: parent, cancel } = ExecutionContext.make().withCancellation();
      const child = parent.attach(RequestId, "req-1").withTimeout("1 minute");

      cancel();

      expect(child.isCancelled).toBe(true);
      expect(child.cancellationReason).toEqual(Option.some("cancelled"));
    });
  });

  describe("deadlines", () => {
    it("keeps the earliest deadline", () => {
      const ctx = ExecutionContext.make({
        now: () => 0,
        deadline: new Date(1_000),
      });

      expect(ctx.withDeadline(new Date(5_000))).toBe(ctx);
      expect(ctx.withDeadline(new Date(500)).deadline).toEqual(
        Option.some(new Date(500)),
      );
    });

    it("derives the deadline of a timeout from the injected clock", () => {
      const ctx = ExecutionContext.make({ now: () => 10_000 }).withTimeout(
        "250 millis",
      );

      expect(ctx.deadline).toEqual(Option.some(new Date(10_250)));
    });

    it("reports an expired deadline as such", async () => {
      const ctx = ExecutionContext.make().withTimeout("1 millis");

      await new Promise((resolve) => setTimeout(resolve, 25));
      const error = await Effect.runPromise(Effect.flip(ctx.ensureActive("query")));

      expect(error.reason).toBe("deadline");
    });
  });

  describe("awaitCancellation", () => {
    it("fails once the context is cancelled", async () => {
      const { context, cancel } = ExecutionContext.make().withCancellation();
      const fiber = Effect.runFork(Effect.flip(context.awaitCancellation("wait")));

      cancel();
      const error = await Effect.runPromise(Fiber.join(fiber));

      expect(error).toEqual(new CancelledError({ step: "wait", reason: "cancelled" }));
    });

    it("fails straight away on a context that is already cancelled", async () => {
      const { context, cancel } = ExecutionContext.make().withCancellation();
      cancel();

      const error = await Effect.runPromise(
        Effect.flip(context.awaitCancellation("wait")),
      );

      expect(error.step).toBe("wait");
    });
  });
});
