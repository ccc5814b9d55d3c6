/**
 * @file compose.ts
 * @module @workspace/core/middleware
 * @description Middleware values and their composition.
 *
 * A stack is a plain ordered array, outermost first, folded right-to-left
 * over the base operation:
 *   compose([a, b, c])(op) = a(b(c(op)))
 * Composition is associative but not commutative, so the array order is part
 * of an operation's observable behaviour.
 */

import { Effect } from "effect";
import type { Operation } from "../operation.js";

export type MiddlewareKind =
  | "logging"
  | "timing"
  | "authorization"
  | "validation"
  | "timeout"
  | "retry"
  | "transaction"
  | "custom";

/**
 * Canonical order, outermost to innermost. `custom` has no constraint.
 */
export const CANONICAL_ORDER: ReadonlyArray<Exclude<MiddlewareKind, "custom">> =
  [
    "logging",
    "timing",
    "authorization",
    "validation",
    "timeout",
    "retry",
    "transaction",
  ];

export interface Middleware<Req, Res, E> {
  readonly kind: MiddlewareKind;
  readonly label: string;
  readonly apply: (operation: Operation<Req, Res, E>) => Operation<Req, Res, E>;
}

export interface StackEntry {
  readonly kind: MiddlewareKind;
  readonly label: string;
}

export interface OrderingViolation {
  readonly outer: StackEntry;
  readonly inner: StackEntry;
}

const rank = (kind: MiddlewareKind): number =>
  kind === "custom" ? -1 : CANONICAL_ORDER.indexOf(kind);

/**
 * Lists every pair of middleware placed against the canonical order, e.g. a
 * transaction wrapping a retry.
 */
export const orderingViolations = (
  stack: ReadonlyArray<StackEntry>,
): ReadonlyArray<OrderingViolation> => {
  const violations: Array<OrderingViolation> = [];
  stack.forEach((outer, index) => {
    for (const inner of stack.slice(index + 1)) {
      const outerRank = rank(outer.kind);
      const innerRank = rank(inner.kind);
      if (outerRank >= 0 && innerRank >= 0 && outerRank > innerRank) {
        violations.push({ outer, inner });
      }
    }
  });
  return violations;
};

export const compose =
  <Req, Res, E>(stack: ReadonlyArray<Middleware<Req, Res, E>>) =>
  (base: Operation<Req, Res, E>): Operation<Req, Res, E> =>
    stack.reduceRight<Operation<Req, Res, E>>(
      (operation, middleware) => middleware.apply(operation),
      base,
    );

/**
 * Same as `compose`, but reports ordering violations as warnings first.
 * An out-of-order stack is still built.
 */
export const composeChecked = <Req, Res, E>(
  stack: ReadonlyArray<Middleware<Req, Res, E>>,
  base: Operation<Req, Res, E>,
): Effect.Effect<Operation<Req, Res, E>> =>
  Effect.gen(function* () {
    for (const { outer, inner } of orderingViolations(stack)) {
      yield* Effect.logWarning(
        `Middleware "${outer.label}" (${outer.kind}) wraps "${inner.label}" (${inner.kind}) against the canonical order`,
      );
    }
    return compose(stack)(base);
  });

export const describeStack = (stack: ReadonlyArray<StackEntry>): string =>
  stack.map((entry) => entry.label).join(" → ");
