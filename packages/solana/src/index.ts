export * from "./adapter.js";
export * from "./mint.js";
export * from "./rpc.js";
