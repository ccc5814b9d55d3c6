export * from "./account/account.js";
export * from "./kernel.js";
