export * from "./account.repository.js";
export * from "./audit-trail.js";
export * from "./clock.js";
export * from "./id-generator.js";
