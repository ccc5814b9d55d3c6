import type {
  AccountRepositoryPort,
  AuditEntry,
  AuditTrailPort,
} from "@workspace/application/ports";
import { DependencyError } from "@workspace/core/errors";
import type { ExecutionContext } from "@workspace/core/execution-context";
import {
  type TransactionalResource,
  type TransactionHandle,
  transactionTag,
} from "@workspace/core/transaction";
import type { Account } from "@workspace/domain/account";
import { Effect, Option } from "effect";

export const MEMORY_STORE = "memory";

interface Snapshot {
  readonly accounts: Map<string, Account>;
  readonly audit: Array<AuditEntry>;
}

type Write =
  | { readonly kind: "insert"; readonly account: Account }
  | { readonly kind: "update"; readonly account: Account }
  | { readonly kind: "append"; readonly entry: AuditEntry };

export interface MemoryTransaction extends TransactionHandle {
  /** Writes in the order they were made, applied to committed state at commit. */
  readonly writes: Array<Write>;
}

export const MemoryTransaction = transactionTag<MemoryTransaction>(MEMORY_STORE);

export interface StoreStatistics {
  readonly begun: number;
  readonly committed: number;
  readonly rolledBack: number;
}

interface Conflict {
  readonly message: string;
  readonly duplicate: boolean;
}

const copy = (snapshot: Snapshot): Snapshot => ({
  accounts: new Map(snapshot.accounts),
  audit: [...snapshot.audit],
});

const conflictOf = (state: Snapshot, write: Write): Option.Option<Conflict> => {
  switch (write.kind) {
    case "insert": {
      const { account } = write;
      const clash = [...state.accounts.values()].some(
        (existing) =>
          existing.id === account.id || existing.email === account.email,
      );
      return clash
        ? Option.some({
            message: `Account ${account.id} or ${account.email} already exists`,
            duplicate: true,
          })
        : Option.none();
    }
    case "update": {
      const { account } = write;
      const stored = state.accounts.get(account.id);
      return stored === undefined || stored.version !== account.version - 1
        ? Option.some({
            message: `Account ${account.id} changed since version ${account.version - 1}`,
            duplicate: false,
          })
        : Option.none();
    }
    case "append":
      return Option.none();
  }
};

const applyWrite = (state: Snapshot, write: Write): void => {
  if (write.kind === "append") {
    state.audit.push(write.entry);
  } else {
    state.accounts.set(write.account.id, write.account);
  }
};

const replay = (base: Snapshot, writes: ReadonlyArray<Write>): Snapshot => {
  const state = copy(base);
  writes.forEach((write) => applyWrite(state, write));
  return state;
};

const failure = (step: string, message: string, transient: boolean) =>
  new DependencyError({ step, message, cause: undefined, transient });

/**
 * In-process backing store with the same transactional contract as the
 * Postgres adapters. A transaction records its writes and reads through them
 * onto the latest committed state. `commit` re-checks every write against
 * committed state and publishes all of them or none; a conflict there fails
 * the commit as transient and counts as a rollback.
 */
export class InMemoryStore {
  private committed: Snapshot = { accounts: new Map(), audit: [] };
  private sequence = 0;
  private counters = { begun: 0, committed: 0, rolledBack: 0 };

  readonly transactions: TransactionalResource<MemoryTransaction> = {
    store: MEMORY_STORE,
    tag: MemoryTransaction,
    begin: (ctx) =>
      ctx.ensureActive("memory.begin").pipe(
        Effect.zipRight(
          Effect.sync(() => {
            this.sequence += 1;
            this.counters.begun += 1;
            const writes: Array<Write> = [];
            return {
              id: `memory-${this.sequence}`,
              store: MEMORY_STORE,
              writes,
              commit: () => this.publish(writes),
              rollback: () =>
                Effect.sync(() => {
                  this.counters.rolledBack += 1;
                }),
            };
          }),
        ),
      ),
  };

  readonly accounts: AccountRepositoryPort = {
    findById: (ctx, id) =>
      this.read(ctx, "memory.accounts.findById", (state) =>
        Option.fromNullable(state.accounts.get(id)),
      ),
    findByEmail: (ctx, email) =>
      this.read(ctx, "memory.accounts.findByEmail", (state) =>
        Option.fromNullable(
          [...state.accounts.values()].find((account) => account.email === email),
        ),
      ),
    insert: (ctx, account) =>
      this.write(ctx, "memory.accounts.insert", { kind: "insert", account }),
    update: (ctx, account) =>
      this.write(ctx, "memory.accounts.update", { kind: "update", account }),
  };

  readonly audit: AuditTrailPort = {
    append: (ctx, entry) =>
      this.write(ctx, "memory.audit.append", { kind: "append", entry }),
  };

  /** Committed audit entries, oldest first. */
  auditEntries(): ReadonlyArray<AuditEntry> {
    return [...this.committed.audit];
  }

  committedAccount(id: string): Option.Option<Account> {
    return Option.fromNullable(this.committed.accounts.get(id));
  }

  statistics(): StoreStatistics {
    return { ...this.counters };
  }

  private publish(writes: ReadonlyArray<Write>) {
    return Effect.suspend(() => {
      const next = copy(this.committed);
      for (const write of writes) {
        const conflict = conflictOf(next, write);
        if (Option.isSome(conflict)) {
          this.counters.rolledBack += 1;
          return Effect.fail(
            failure("memory.commit", conflict.value.message, true),
          );
        }
        applyWrite(next, write);
      }
      this.committed = next;
      this.counters.committed += 1;
      return Effect.void;
    });
  }

  private view(ctx: ExecutionContext): Snapshot {
    return Option.match(ctx.lookup(MemoryTransaction), {
      onNone: () => this.committed,
      onSome: (transaction) => replay(this.committed, transaction.writes),
    });
  }

  private read<A>(
    ctx: ExecutionContext,
    step: string,
    body: (state: Snapshot) => A,
  ) {
    return ctx
      .ensureActive(step)
      .pipe(Effect.zipRight(Effect.sync(() => body(this.view(ctx)))));
  }

  private write(ctx: ExecutionContext, step: string, write: Write) {
    return ctx.ensureActive(step).pipe(
      Effect.zipRight(
        Effect.suspend(() => {
          const conflict = conflictOf(this.view(ctx), write);
          if (Option.isSome(conflict)) {
            return Effect.fail(
              failure(step, conflict.value.message, !conflict.value.duplicate),
            );
          }
          const active = ctx.lookup(MemoryTransaction);
          if (Option.isSome(active)) {
            active.value.writes.push(write);
          } else {
            applyWrite(this.committed, write);
          }
          return Effect.void;
        }),
      ),
    );
  }
}
