export * from "./operations/close-account.js";
export * from "./operations/create-account.js";
export * from "./operations/get-account.js";
export * from "./ports/index.js";
