export * from "./compose.js";
export * from "./logging.js";
export * from "./timing.js";
export * from "./authorization.js";
export * from "./validation.js";
export * from "./timeout.js";
export * from "./retry.js";
export * from "./transaction.js";
