export * from "./db/pool.js";
export * from "./db/schema.js";
export * from "./errors/error-mapper.js";
export * from "./ids/uuid-generator.js";
export * from "./memory/in-memory-store.js";
export * from "./repositories/postgres-account.repository.js";
export * from "./repositories/postgres-audit-trail.js";
export * from "./services/system-clock.js";
export * from "./transactions/postgres-transactions.js";
