/**
 * @file assembly.ts
 * @module @workspace/core/wiring
 * @description Explicit dependency graph built once at startup.
 *
 * Components are declared by name with their tier and the names they depend
 * on. `assemble` rejects an invalid graph (duplicates, unknown dependencies,
 * dependencies on a later tier, cycles) before building anything, then builds
 * every component exactly once, in topological order, inside the caller's
 * Scope. Builders only ever see the dependencies they declared.
 */

import { Context, Effect, Option, type Scope } from "effect";
import { AssemblyError } from "../errors.js";

export type Tier = "resource" | "operation" | "middleware" | "binding";

const TIER_RANK: Record<Tier, number> = {
  resource: 0,
  operation: 1,
  middleware: 2,
  binding: 3,
};

type Name<C> = keyof C & string;

export interface Dependencies<C, D extends Name<C>> {
  readonly get: <K extends D>(name: K) => C[K];
}

export interface Component<C> {
  readonly name: Name<C>;
  readonly tier: Tier;
  readonly dependsOn: ReadonlyArray<Name<C>>;
  readonly construct: (
    deps: Dependencies<C, Name<C>>,
    built: Context.Context<never>,
  ) => Effect.Effect<Context.Context<never>, unknown, Scope.Scope>;
}

export interface Assembly<C> {
  /** Build order; every component appears after its dependencies. */
  readonly order: ReadonlyArray<Name<C>>;
  readonly get: <K extends Name<C>>(name: K) => C[K];
  readonly lookup: <K extends Name<C>>(name: K) => Option.Option<C[K]>;
  readonly tierOf: (name: Name<C>) => Option.Option<Tier>;
  readonly dependenciesOf: (name: Name<C>) => ReadonlyArray<Name<C>>;
}

const componentTag = <C, K extends Name<C>>(name: K) =>
  Context.GenericTag<K, C[K]>(`@workspace/core/wiring/${name}`);

// ============================================================================
// DEFINITION
// ============================================================================

const define =
  <C>(tier: Tier) =>
  <K extends Name<C>, D extends Name<C> = never>(
    name: K,
    dependsOn: ReadonlyArray<D>,
    build: (deps: Dependencies<C, D>) => Effect.Effect<C[K], unknown, Scope.Scope>,
  ): Component<C> => ({
    name,
    tier,
    dependsOn,
    construct: (deps, built) =>
      build(deps).pipe(
        Effect.map((instance) =>
          Context.add(built, componentTag<C, K>(name), instance),
        ),
      ),
  });

/**
 * Typed definers for the component map `C` (name → instance type).
 *
 * @example
 * const { resource, operation } = components<{ ids: IdGenerator; create: CreateOp }>();
 * const graph = [
 *   resource("ids", [], () => Effect.succeed(makeIds())),
 *   operation("create", ["ids"], (deps) => Effect.succeed(makeCreate(deps.get("ids")))),
 * ];
 */
export const components = <C>() => ({
  resource: define<C>("resource"),
  operation: define<C>("operation"),
  wrapped: define<C>("middleware"),
  binding: define<C>("binding"),
});

// ============================================================================
// VALIDATION
// ============================================================================

const validate = <C>(
  definitions: ReadonlyArray<Component<C>>,
): Effect.Effect<ReadonlyArray<Component<C>>, AssemblyError> =>
  Effect.gen(function* () {
    const byName = new Map<string, Component<C>>();
    for (const definition of definitions) {
      if (byName.has(definition.name)) {
        return yield* new AssemblyError({
          component: definition.name,
          reason: "duplicate",
          message: `Component "${definition.name}" is declared more than once`,
        });
      }
      byName.set(definition.name, definition);
    }

    for (const definition of definitions) {
      for (const dependency of definition.dependsOn) {
        const target = byName.get(dependency);
        if (target === undefined) {
          return yield* new AssemblyError({
            component: definition.name,
            reason: "missing-dependency",
            message: `Component "${definition.name}" depends on undeclared "${dependency}"`,
          });
        }
        if (TIER_RANK[target.tier] > TIER_RANK[definition.tier]) {
          return yield* new AssemblyError({
            component: definition.name,
            reason: "tier-violation",
            message: `${definition.tier} "${definition.name}" cannot depend on ${target.tier} "${dependency}"`,
          });
        }
      }
    }

    // Depth-first post-order over declaration order: dependencies first, and
    // a stable order among independent components.
    const order: Array<Component<C>> = [];
    const done = new Set<string>();
    const path: Array<string> = [];

    const visit = (
      definition: Component<C>,
    ): Option.Option<ReadonlyArray<string>> => {
      if (done.has(definition.name)) {
        return Option.none();
      }
      const start = path.indexOf(definition.name);
      if (start >= 0) {
        return Option.some([...path.slice(start), definition.name]);
      }
      path.push(definition.name);
      for (const dependency of definition.dependsOn) {
        const target = byName.get(dependency);
        if (target !== undefined) {
          const cycle = visit(target);
          if (Option.isSome(cycle)) {
            return cycle;
          }
        }
      }
      path.pop();
      done.add(definition.name);
      order.push(definition);
      return Option.none();
    };

    for (const definition of definitions) {
      const cycle = visit(definition);
      if (Option.isSome(cycle)) {
        return yield* new AssemblyError({
          component: definition.name,
          reason: "cycle",
          message: `Dependency cycle: ${cycle.value.join(" -> ")}`,
        });
      }
    }

    return order;
  });

// ============================================================================
// BUILD
// ============================================================================

const dependenciesFor = <C>(
  owner: Component<C>,
  built: Context.Context<never>,
): Dependencies<C, Name<C>> => ({
  get: <K extends Name<C>>(name: K): C[K] => {
    if (!owner.dependsOn.includes(name)) {
      throw new Error(
        `Component "${owner.name}" used "${name}" without declaring it`,
      );
    }
    return Option.getOrThrowWith(
      Context.getOption(built, componentTag<C, K>(name)),
      () => new Error(`Component "${name}" is not built yet`),
    );
  },
});

const freeze = <C>(
  order: ReadonlyArray<Component<C>>,
  built: Context.Context<never>,
): Assembly<C> => {
  const byName = new Map<string, Component<C>>(
    order.map((definition) => [definition.name, definition] as const),
  );
  const lookup = <K extends Name<C>>(name: K): Option.Option<C[K]> =>
    Context.getOption(built, componentTag<C, K>(name));

  return Object.freeze({
    order: Object.freeze(order.map((definition) => definition.name)),
    lookup,
    get: <K extends Name<C>>(name: K): C[K] =>
      Option.getOrThrowWith(
        lookup(name),
        () => new Error(`Component "${name}" is not part of this assembly`),
      ),
    tierOf: (name: Name<C>) =>
      Option.fromNullable(byName.get(name)).pipe(
        Option.map((definition) => definition.tier),
      ),
    dependenciesOf: (name: Name<C>) => byName.get(name)?.dependsOn ?? [],
  });
};

/**
 * Validates and builds the graph. Any failure aborts the whole assembly;
 * resources acquired before the failure are released with the Scope.
 */
export const assemble = <C>(
  definitions: ReadonlyArray<Component<C>>,
): Effect.Effect<Assembly<C>, AssemblyError, Scope.Scope> =>
  Effect.gen(function* () {
    const order = yield* validate(definitions);

    const built = yield* Effect.reduce(
      order,
      Context.empty(),
      (context: Context.Context<never>, definition) =>
        Effect.suspend(() =>
          definition.construct(dependenciesFor(definition, context), context),
        ).pipe(
          Effect.tap(() =>
            Effect.logDebug(`Built ${definition.tier} "${definition.name}"`),
          ),
          Effect.mapError(
            (cause) =>
              new AssemblyError({
                component: definition.name,
                reason: "build-failed",
                message: `Failed to build ${definition.tier} "${definition.name}"`,
                cause,
              }),
          ),
        ),
    );

    yield* Effect.logInfo(`Assembled ${order.length} components`);
    return freeze(order, built);
  });
