export * from "./assessor.js";
export * from "./engine.js";
export * from "./executor.js";
export * from "./gate.js";
export * from "./honeypot.js";
export * from "./mirror.js";
export * from "./registry.js";
export * from "./signatures.js";
