export * from "./constants.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./utils.js";
export type * from "./types.js";
