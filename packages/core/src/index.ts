/**
 * @workspace/core
 *
 * Operations, the execution context they receive, the middleware that wraps
 * them and the wiring graph that builds them.
 */

export * from "./errors.js";
export * from "./execution-context.js";
export * from "./operation.js";
export * from "./middleware/index.js";
export * from "./ports/transaction.js";
export * from "./wiring/assembly.js";
