import { fc, test } from "@fast-check/vitest";
import { BusinessRuleError } from "@workspace/core/errors";
import { ExecutionContext } from "@workspace/core/execution-context";
import { transactional } from "@workspace/core/middleware";
import { defineOperation } from "@workspace/core/operation";
import { Account } from "@workspace/domain/account";
import {
  DisplayNameSchema,
  EmailSchema,
  makeAccountId,
} from "@workspace/domain/kernel";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { InMemoryStore, MemoryTransaction } from "./in-memory-store.js";

const PROPERTIES = {
  ROLLBACK_LEAVES_NO_TRACE: {
    number: 1,
    text: "A rolled-back transaction publishes none of its writes",
  },
} as const;

const AT = new Date("2024-06-01T08:00:00.000Z");

const accountFor = (n: number) =>
  Account.open({
    id: makeAccountId(`acc-${n}`),
    email: EmailSchema.make(`user${n}@example.com`),
    displayName: DisplayNameSchema.make(`User ${n}`),
    at: AT,
  });

const openAndAudit = (store: InMemoryStore, account: Account) =>
  defineOperation("open", (ctx: ExecutionContext) =>
    store.accounts.insert(ctx, account).pipe(
      Effect.zipRight(
        store.audit.append(ctx, {
          action: "account.opened",
          accountId: account.id,
          actor: Option.none(),
          at: AT,
        }),
      ),
    ),
  );

describe("InMemoryStore", () => {
  it("publishes writes on commit", async () => {
    const store = new InMemoryStore();
    const account = accountFor(1);
    const operation = transactional(store.transactions).apply(
      openAndAudit(store, account),
    );

    await Effect.runPromise(operation(ExecutionContext.make(), undefined));

    expect(store.committedAccount(account.id)).toEqual(Option.some(account));
    expect(store.auditEntries().map((entry) => entry.action)).toEqual([
      "account.opened",
    ]);
    expect(store.statistics()).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
  });

  it("hides uncommitted writes from other callers", async () => {
    const store = new InMemoryStore();
    const account = accountFor(1);
    const seenOutside: Array<boolean> = [];
    const operation = transactional(store.transactions).apply(
      defineOperation("peek", (ctx: ExecutionContext) =>
        store.accounts.insert(ctx, account).pipe(
          Effect.zipRight(
            store.accounts.findById(ExecutionContext.make(), account.id),
          ),
          Effect.tap((found) =>
            Effect.sync(() => seenOutside.push(Option.isSome(found))),
          ),
        ),
      ),
    );

    await Effect.runPromise(operation(ExecutionContext.make(), undefined));

    expect(seenOutside).toEqual([false]);
    expect(Option.isSome(store.committedAccount(account.id))).toBe(true);
  });

  test.prop([fc.integer({ min: 1, max: 20 })], { numRuns: 25 })(
    `Property ${PROPERTIES.ROLLBACK_LEAVES_NO_TRACE.number}: ${PROPERTIES.ROLLBACK_LEAVES_NO_TRACE.text}`,
    async (n) => {
      const store = new InMemoryStore();
      const account = accountFor(n);
      const operation = transactional(store.transactions).apply(
        defineOperation("open-then-refuse", (ctx: ExecutionContext) =>
          openAndAudit(store, account)(ctx, undefined).pipe(
            Effect.zipRight(
              Effect.fail(new BusinessRuleError({ rule: "refused", message: "No" })),
            ),
          ),
        ),
      );

      await Effect.runPromise(
        Effect.flip(operation(ExecutionContext.make(), undefined)),
      );

      expect(store.committedAccount(account.id)).toEqual(Option.none());
      expect(store.auditEntries()).toEqual([]);
      expect(store.statistics()).toEqual({ begun: 1, committed: 0, rolledBack: 1 });
    },
  );

  it("keeps the writes of overlapping transactions", async () => {
    const store = new InMemoryStore();
    const root = ExecutionContext.make();

    await Effect.runPromise(
      Effect.gen(function* () {
        const first = yield* store.transactions.begin(root);
        const second = yield* store.transactions.begin(root);
        yield* store.accounts.insert(
          root.attach(MemoryTransaction, first),
          accountFor(1),
        );
        yield* store.accounts.insert(
          root.attach(MemoryTransaction, second),
          accountFor(2),
        );
        yield* first.commit();
        yield* second.commit();
      }),
    );

    expect(Option.isSome(store.committedAccount("acc-1"))).toBe(true);
    expect(Option.isSome(store.committedAccount("acc-2"))).toBe(true);
    expect(store.statistics()).toEqual({ begun: 2, committed: 2, rolledBack: 0 });
  });

  it("reads committed writes of other transactions through its own", async () => {
    const store = new InMemoryStore();
    const root = ExecutionContext.make();

    const seen = await Effect.runPromise(
      Effect.gen(function* () {
        const reader = yield* store.transactions.begin(root);
        yield* store.accounts.insert(root, accountFor(1));
        return yield* store.accounts.findById(
          root.attach(MemoryTransaction, reader),
          makeAccountId("acc-1"),
        );
      }),
    );

    expect(Option.isSome(seen)).toBe(true);
  });

  it("fails the later of two conflicting updates at commit", async () => {
    const store = new InMemoryStore();
    const root = ExecutionContext.make();
    const account = accountFor(1);
    await Effect.runPromise(store.accounts.insert(root, account));
    const closed = await Effect.runPromise(account.close(AT));

    const error = await Effect.runPromise(
      Effect.gen(function* () {
        const first = yield* store.transactions.begin(root);
        const second = yield* store.transactions.begin(root);
        yield* store.accounts.update(root.attach(MemoryTransaction, first), closed);
        yield* store.accounts.update(root.attach(MemoryTransaction, second), closed);
        yield* first.commit();
        return yield* Effect.flip(second.commit());
      }),
    );

    expect(error).toMatchObject({
      _tag: "DependencyError",
      step: "memory.commit",
      message: "Account acc-1 changed since version 1",
      transient: true,
    });
    expect(store.committedAccount("acc-1")).toEqual(Option.some(closed));
    expect(store.statistics()).toEqual({ begun: 2, committed: 1, rolledBack: 1 });
  });

  it("publishes nothing from a commit that conflicts on a later write", async () => {
    const store = new InMemoryStore();
    const root = ExecutionContext.make();
    const twin = Account.open({
      id: makeAccountId("acc-9"),
      email: EmailSchema.make("user1@example.com"),
      displayName: DisplayNameSchema.make("Twin"),
      at: AT,
    });

    const error = await Effect.runPromise(
      Effect.gen(function* () {
        const first = yield* store.transactions.begin(root);
        const second = yield* store.transactions.begin(root);
        const late = root.attach(MemoryTransaction, second);
        yield* store.accounts.insert(late, accountFor(2));
        yield* store.accounts.insert(late, twin);
        yield* store.accounts.insert(
          root.attach(MemoryTransaction, first),
          accountFor(1),
        );
        yield* first.commit();
        return yield* Effect.flip(second.commit());
      }),
    );

    expect(error).toMatchObject({
      step: "memory.commit",
      message: "Account acc-9 or user1@example.com already exists",
      transient: true,
    });
    expect(store.committedAccount("acc-2")).toEqual(Option.none());
    expect(Option.isSome(store.committedAccount("acc-1"))).toBe(true);
  });

  it("writes straight to committed state without a transaction", async () => {
    const store = new InMemoryStore();
    const account = accountFor(2);

    await Effect.runPromise(store.accounts.insert(ExecutionContext.make(), account));

    const found = await Effect.runPromise(
      store.accounts.findByEmail(ExecutionContext.make(), account.email),
    );
    expect(found).toEqual(Option.some(account));
  });

  it("refuses a duplicate e-mail", async () => {
    const store = new InMemoryStore();
    const ctx = ExecutionContext.make();
    await Effect.runPromise(store.accounts.insert(ctx, accountFor(1)));
    const twin = Account.open({
      id: makeAccountId("acc-2"),
      email: EmailSchema.make("user1@example.com"),
      displayName: DisplayNameSchema.make("Twin"),
      at: AT,
    });

    const error = await Effect.runPromise(
      Effect.flip(store.accounts.insert(ctx, twin)),
    );

    expect(error._tag).toBe("DependencyError");
    if (error._tag === "DependencyError") {
      expect(error.step).toBe("memory.accounts.insert");
      expect(error.transient).toBe(false);
    }
  });

  it("reports a stale update as transient", async () => {
    const store = new InMemoryStore();
    const ctx = ExecutionContext.make();
    const account = accountFor(1);
    await Effect.runPromise(store.accounts.insert(ctx, account));
    const closed = await Effect.runPromise(account.close(AT));
    await Effect.runPromise(store.accounts.update(ctx, closed));

    const error = await Effect.runPromise(
      Effect.flip(store.accounts.update(ctx, closed)),
    );

    expect(error._tag).toBe("DependencyError");
    if (error._tag === "DependencyError") {
      expect(error.transient).toBe(true);
      expect(error.message).toBe("Account acc-1 changed since version 1");
    }
  });

  it("fails with CancelledError on a cancelled context", async () => {
    const store = new InMemoryStore();
    const { context, cancel } = ExecutionContext.make().withCancellation();
    cancel();

    const error = await Effect.runPromise(
      Effect.flip(store.accounts.findById(context, makeAccountId("acc-1"))),
    );

    expect(error).toMatchObject({
      _tag: "CancelledError",
      step: "memory.accounts.findById",
    });
  });
});
