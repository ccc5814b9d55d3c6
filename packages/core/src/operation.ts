/**
 * @file operation.ts
 * @module @workspace/core/operation
 * @description The uniform unit of work: `(context, request) => Effect`.
 *
 * The success channel carries the fully populated response, the failure
 * channel the typed error, and a defect is the equivalent of a panic.
 * Operations require nothing from the Effect environment: their builders close
 * over every dependency at wiring time.
 */

import { Effect, type Exit } from "effect";
import type { ExecutionContext } from "./execution-context.js";

export interface Operation<Req, Res, E = never> {
  (ctx: ExecutionContext, request: Req): Effect.Effect<Res, E>;
}

export interface NamedOperation<Req, Res, E = never>
  extends Operation<Req, Res, E> {
  readonly operationName: string;
}

/**
 * Tags `body` with a stable name used by logging, metrics and the wiring
 * graph. Middleware re-uses the inner name so it survives composition.
 */
export const defineOperation = <Req, Res, E>(
  name: string,
  body: Operation<Req, Res, E>,
): NamedOperation<Req, Res, E> =>
  Object.assign(
    (ctx: ExecutionContext, request: Req) => body(ctx, request),
    { operationName: name },
  );

export const operationNameOf = <Req, Res, E>(
  operation: Operation<Req, Res, E>,
): string =>
  "operationName" in operation && typeof operation.operationName === "string"
    ? operation.operationName
    : operation.name || "anonymous";

export interface OperationRunner {
  readonly runPromiseExit: <A, E>(
    effect: Effect.Effect<A, E>,
  ) => Promise<Exit.Exit<A, E>>;
}

export const defaultRunner: OperationRunner = {
  runPromiseExit: (effect) => Effect.runPromiseExit(effect),
};

/**
 * Entry point for front-end adapters. Cancellation stays cooperative: the
 * context signal is not wired to fiber interruption.
 */
export const runOperation = <Req, Res, E>(
  operation: Operation<Req, Res, E>,
  ctx: ExecutionContext,
  request: Req,
  runner: OperationRunner = defaultRunner,
): Promise<Exit.Exit<Res, E>> =>
  runner.runPromiseExit(Effect.suspend(() => operation(ctx, request)));
