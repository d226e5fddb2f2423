export * from "./account.js";
export * from "./command.js";
export * from "./config.js";
export * from "./directory.js";
export * from "./duration.js";
export * from "./quota.js";
export * from "./realm.js";
