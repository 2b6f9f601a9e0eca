export * from "./jupiter.js";
export * from "./provider.js";
export * from "./zerox.js";
