/**
 * @file transaction.ts
 * @module @workspace/core/transaction
 * @description Contract between the transactional middleware and the
 * persistence adapters that open units of work.
 *
 * Adapters implement `TransactionalResource`; repositories borrow the active
 * handle through `ctx.lookup(resource.tag)` and never terminate it.
 */

import { Context, Effect } from "effect";
import type { CancelledError, DependencyError } from "../errors.js";
import type { ExecutionContext } from "../execution-context.js";

export interface TransactionHandle {
  readonly id: string;
  /** Name of the backing store; one active handle per store per context. */
  readonly store: string;
  readonly commit: () => Effect.Effect<void, DependencyError>;
  readonly rollback: () => Effect.Effect<void, DependencyError>;
}

export interface TransactionalResource<H extends TransactionHandle> {
  readonly store: string;
  readonly tag: Context.Tag<H, H>;
  /** Must be safe to call concurrently. */
  readonly begin: (
    ctx: ExecutionContext,
  ) => Effect.Effect<H, DependencyError | CancelledError>;
}

/**
 * Context key for the active handle of `store`. Equal store names yield
 * equal keys, which is what makes nested transactional calls share a handle.
 */
export const transactionTag = <H extends TransactionHandle>(
  store: string,
): Context.Tag<H, H> =>
  Context.GenericTag<H>(`@workspace/core/Transaction/${store}`);

export type HandleState = "open" | "committed" | "rolled-back";

/**
 * Enforces the single terminal action of a handle: the first commit or
 * rollback wins, any later one is a defect. The state flips before the
 * adapter runs, so a failed commit still counts as terminal.
 */
export const guardHandle = <H extends TransactionHandle>(
  handle: H,
): H & { readonly state: () => HandleState } => {
  let state: HandleState = "open";

  const terminate = (
    next: Exclude<HandleState, "open">,
    action: () => Effect.Effect<void, DependencyError>,
  ): Effect.Effect<void, DependencyError> =>
    Effect.suspend(() => {
      if (state !== "open") {
        return Effect.dieMessage(
          `Transaction ${handle.id} on ${handle.store} is already ${state}`,
        );
      }
      state = next;
      return action();
    });

  return {
    ...handle,
    state: () => state,
    commit: () => terminate("committed", handle.commit),
    rollback: () => terminate("rolled-back", handle.rollback),
  };
};
