export * from "./abi.js";
export * from "./adapter.js";
export * from "./fees.js";
export * from "./scenarios.js";
