export * from "./gecko.js";
export * from "./goplus.js";
