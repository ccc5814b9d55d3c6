import {
  Clock,
  Effect,
  Exit,
  Metric,
  MetricBoundaries,
  type MetricKeyType,
  type MetricState,
} from "effect";
import {
  defineOperation,
  type Operation,
  operationNameOf,
} from "../operation.js";

// ============================================================================
// METRICS
// ============================================================================

export const operationDurations = Metric.histogram(
  "operation_duration_ms",
  MetricBoundaries.fromIterable([
    5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000,
  ]),
  "Wall-clock duration of an operation invocation",
);

export const operationOutcomes = Metric.counter("operation_outcomes_total", {
  description: "Operation invocations by outcome",
});

/**
 * Records one duration sample and one outcome count per invocation, tagged
 * with the operation name.
 */
export const timing = (label = "timing") => ({
  kind: "timing" as const,
  label,
  apply: <Req, Res, E>(operation: Operation<Req, Res, E>) => {
    const name = operationNameOf(operation);
    const durations = operationDurations.pipe(Metric.tagged("operation", name));
    return defineOperation<Req, Res, E>(name, (ctx, request) =>
      Effect.gen(function* () {
        const startedAt = yield* Clock.currentTimeMillis;
        const exit = yield* Effect.exit(
          Effect.suspend(() => operation(ctx, request)),
        );
        const finishedAt = yield* Clock.currentTimeMillis;

        yield* Metric.update(durations, finishedAt - startedAt);
        yield* Metric.increment(
          operationOutcomes.pipe(
            Metric.tagged<
              MetricKeyType.MetricKeyType.Counter<number>,
              number,
              MetricState.MetricState.Counter<number>
            >("operation", name),
            Metric.tagged<
              MetricKeyType.MetricKeyType.Counter<number>,
              number,
              MetricState.MetricState.Counter<number>
            >("outcome", Exit.isSuccess(exit) ? "success" : "failure"),
          ),
        );

        return yield* exit;
      }),
    );
  },
});
