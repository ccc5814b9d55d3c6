/**
 * @file execution-context.ts
 * @module @workspace/core/execution-context
 * @description Immutable, chainable carrier passed as the first argument of
 * every operation call. Holds the cooperative cancellation signal, an optional
 * deadline, and resources attached by middleware (e.g. the active
 * transaction) keyed by `Context.Tag`.
 */

import { Context, Duration, Effect, Option } from "effect";
import { type CancellationReason, CancelledError } from "./errors.js";

interface Attachment {
  readonly services: Context.Context<never>;
  readonly parent: Attachment | undefined;
}

export interface ExecutionContextOptions {
  /** Signal owned by the front-end (client disconnect, shutdown...). */
  readonly signal?: AbortSignal;
  readonly deadline?: Date;
  /** Time source used to derive deadlines. Defaults to `Date.now`. */
  readonly now?: () => number;
}

export interface CancellableContext {
  readonly context: ExecutionContext;
  readonly cancel: (reason?: unknown) => void;
}

const isTimeoutReason = (reason: unknown): boolean =>
  typeof reason === "object" &&
  reason !== null &&
  "name" in reason &&
  reason.name === "TimeoutError";

export class ExecutionContext {
  private constructor(
    readonly signal: AbortSignal,
    readonly deadline: Option.Option<Date>,
    private readonly attachments: Attachment | undefined,
    /** Number of resources attached along the chain. */
    readonly depth: number,
    private readonly now: () => number,
  ) {}

  static make(options: ExecutionContextOptions = {}): ExecutionContext {
    const root = new ExecutionContext(
      options.signal ?? new AbortController().signal,
      Option.none(),
      undefined,
      0,
      options.now ?? Date.now,
    );
    return options.deadline === undefined
      ? root
      : root.withDeadline(options.deadline);
  }

  get isCancelled(): boolean {
    return this.signal.aborted;
  }

  /**
   * Returns a child context carrying `service` under `tag`. The receiver is
   * left untouched, so the same context can be reused by independent callers.
   */
  attach<I, S>(tag: Context.Tag<I, S>, service: S): ExecutionContext {
    return new ExecutionContext(
      this.signal,
      this.deadline,
      {
        services: Context.add(Context.empty(), tag, service),
        parent: this.attachments,
      },
      this.depth + 1,
      this.now,
    );
  }

  /**
   * Finds the innermost attachment for `tag`.
   */
  lookup<I, S>(tag: Context.Tag<I, S>): Option.Option<S> {
    for (let node = this.attachments; node !== undefined; node = node.parent) {
      const found = Context.getOption(node.services, tag);
      if (Option.isSome(found)) {
        return found;
      }
    }
    return Option.none();
  }

  /**
   * Derives a child whose signal also aborts at `at`. An earlier deadline
   * already in force wins.
   */
  withDeadline(at: Date): ExecutionContext {
    if (Option.isSome(this.deadline) && this.deadline.value <= at) {
      return this;
    }
    const remaining = Math.max(0, at.getTime() - this.now());
    return new ExecutionContext(
      AbortSignal.any([this.signal, AbortSignal.timeout(remaining)]),
      Option.some(at),
      this.attachments,
      this.depth,
      this.now,
    );
  }

  withTimeout(duration: Duration.DurationInput): ExecutionContext {
    return this.withDeadline(
      new Date(this.now() + Duration.toMillis(Duration.decode(duration))),
    );
  }

  /**
   * Derives a child with its own cancel switch. Cancelling the child never
   * affects the receiver.
   */
  withCancellation(): CancellableContext {
    const controller = new AbortController();
    const context = new ExecutionContext(
      AbortSignal.any([this.signal, controller.signal]),
      this.deadline,
      this.attachments,
      this.depth,
      this.now,
    );
    return { context, cancel: (reason) => controller.abort(reason) };
  }

  get cancellationReason(): Option.Option<CancellationReason> {
    if (!this.signal.aborted) {
      return Option.none();
    }
    return Option.some(
      isTimeoutReason(this.signal.reason) ? "deadline" : "cancelled",
    );
  }

  /**
   * Fails with CancelledError once the signal fires and never succeeds.
   * Raced against calls that cannot observe the signal themselves.
   */
  awaitCancellation(step: string): Effect.Effect<never, CancelledError> {
    return Effect.async<never, CancelledError>((resume) => {
      const fire = () =>
        resume(
          Effect.fail(
            new CancelledError({
              step,
              reason: Option.getOrElse(
                this.cancellationReason,
                (): CancellationReason => "cancelled",
              ),
            }),
          ),
        );
      if (this.signal.aborted) {
        fire();
        return;
      }
      this.signal.addEventListener("abort", fire, { once: true });
      return Effect.sync(() => this.signal.removeEventListener("abort", fire));
    });
  }

  /**
   * Fails with CancelledError when the signal has fired. Operations call this
   * before blocking or long-running dependency calls.
   */
  ensureActive(step: string): Effect.Effect<void, CancelledError> {
    return Effect.suspend(() =>
      Option.match(this.cancellationReason, {
        onNone: () => Effect.void,
        onSome: (reason) => Effect.fail(new CancelledError({ step, reason })),
      }),
    );
  }
}

// =============================================================================
// Well-known attachments
// =============================================================================

export interface PrincipalShape {
  readonly id: string;
  readonly roles: ReadonlyArray<string>;
}

/**
 * Authenticated caller, attached by front-end adapters.
 */
export class Principal extends Context.Tag("@workspace/core/Principal")<
  Principal,
  PrincipalShape
>() {}
