export * from "./chains.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./keys.js";
export * from "./logger.js";
export * from "./ports.js";
export * from "./retry.js";
export * from "./risk.js";
export * from "./sync.js";
export * from "./types.js";
export * from "./units.js";
