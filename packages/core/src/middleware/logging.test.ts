import { fc, test } from "@fast-check/vitest";
import { Duration, Effect } from "effect";
import { describe, expect, it } from "vitest";
import { BusinessRuleError, DependencyError } from "../errors.js";
import { ExecutionContext } from "../execution-context.js";
import { defineOperation } from "../operation.js";
import { captureLogs } from "../test/capture-logs.js";
import { makeRecordingResource } from "../test/recording-resource.js";
import { compose } from "./compose.js";
import { logging } from "./logging.js";
import { retry } from "./retry.js";
import { transactional } from "./transaction.js";

const PROPERTIES = {
  LOGGING_OUTSIDE_RETRY: {
    number: 1,
    text: "Logging outside retry and transaction records one entry per call",
  },
  LOGGING_INSIDE_RETRY: {
    number: 2,
    text: "Logging inside retry records one entry per attempt",
  },
} as const;

const noDelay = { maxRetries: 5, baseDelay: Duration.zero, jitter: false };

const transient = (attempt: number) =>
  new DependencyError({
    step: "store.write",
    message: `attempt ${attempt} failed`,
    cause: undefined,
    transient: true,
  });

/** Fails transiently `failures` times, then succeeds. */
const flaky = (failures: number) => {
  let attempts = 0;
  const operation = defineOperation("flaky", () =>
    Effect.suspend(() => {
      attempts += 1;
      return attempts <= failures
        ? Effect.fail(transient(attempts))
        : Effect.succeed(attempts);
    }),
  );
  return { operation, attempts: () => attempts };
};

describe("logging", () => {
  it("logs a success at info level with the operation name", async () => {
    const logs = captureLogs();
    const operation = logging().apply(
      defineOperation("greet", (_ctx, name: string) =>
        Effect.succeed(`hello ${name}`),
      ),
    );

    const result = await Effect.runPromise(
      operation(ExecutionContext.make(), "ada").pipe(Effect.provide(logs.layer)),
    );

    expect(result).toBe("hello ada");
    expect(logs.entries).toHaveLength(1);
    expect(logs.entries[0]?.level).toBe("Info");
    expect(logs.entries[0]?.message).toBe("greet succeeded");
    expect(logs.entries[0]?.annotations).toMatchObject({
      operation: "greet",
      outcome: "success",
    });
  });

  it("logs a business rule failure as a warning", async () => {
    const logs = captureLogs();
    const operation = logging().apply(
      defineOperation("reserve", () =>
        Effect.fail(
          new BusinessRuleError({ rule: "sold-out", message: "Nothing left" }),
        ),
      ),
    );

    await Effect.runPromiseExit(
      operation(ExecutionContext.make(), undefined).pipe(
        Effect.provide(logs.layer),
      ),
    );

    expect(logs.entries).toHaveLength(1);
    expect(logs.entries[0]?.level).toBe("Warning");
    expect(logs.entries[0]?.annotations).toMatchObject({
      category: "business-rule",
      outcome: "failure",
    });
  });

  it("logs dependency failures and defects as errors", async () => {
    const logs = captureLogs();
    const failing = logging().apply(
      defineOperation("save", () => Effect.fail(transient(1))),
    );
    const crashing = logging().apply(
      defineOperation("explode", () => Effect.die(new Error("boom"))),
    );

    await Effect.runPromiseExit(
      failing(ExecutionContext.make(), undefined).pipe(Effect.provide(logs.layer)),
    );
    await Effect.runPromiseExit(
      crashing(ExecutionContext.make(), undefined).pipe(
        Effect.provide(logs.layer),
      ),
    );

    expect(logs.entries.map((entry) => entry.level)).toEqual(["Error", "Error"]);
    expect(logs.entries[0]?.annotations).toMatchObject({ category: "dependency" });
    expect(logs.entries[1]?.message.startsWith("explode crashed")).toBe(true);
  });

  test.prop([fc.integer({ min: 0, max: 5 })], { numRuns: 10 })(
    `Property ${PROPERTIES.LOGGING_OUTSIDE_RETRY.number}: ${PROPERTIES.LOGGING_OUTSIDE_RETRY.text}`,
    async (failures) => {
      const logs = captureLogs();
      const recording = makeRecordingResource();
      const { operation, attempts } = flaky(failures);
      const wrapped = compose([
        logging(),
        retry(noDelay),
        transactional(recording.resource),
      ])(operation);

      const result = await Effect.runPromise(
        wrapped(ExecutionContext.make(), undefined).pipe(
          Effect.provide(logs.layer),
        ),
      );

      expect(result).toBe(failures + 1);
      expect(attempts()).toBe(failures + 1);
      expect(logs.withAnnotation("operation", "flaky")).toHaveLength(1);
      expect(recording.count("begin")).toBe(failures + 1);
      expect(recording.count("rollback")).toBe(failures);
      expect(recording.count("commit")).toBe(1);
    },
  );

  test.prop([fc.integer({ min: 0, max: 5 })], { numRuns: 10 })(
    `Property ${PROPERTIES.LOGGING_INSIDE_RETRY.number}: ${PROPERTIES.LOGGING_INSIDE_RETRY.text}`,
    async (failures) => {
      const logs = captureLogs();
      const { operation } = flaky(failures);
      const wrapped = compose([retry(noDelay), logging()])(operation);

      await Effect.runPromise(
        wrapped(ExecutionContext.make(), undefined).pipe(
          Effect.provide(logs.layer),
        ),
      );

      const entries = logs.withAnnotation("operation", "flaky");
      expect(entries).toHaveLength(failures + 1);
      expect(entries.filter((entry) => entry.level === "Error")).toHaveLength(
        failures,
      );
    },
  );
});
