export * from "./backends.js";
export * from "./config.js";
export * from "./conformance.js";
export * from "./engine.js";
export * from "./kernels.js";
export * from "./ledger.js";
export * from "./spectral.js";
export * from "./trends.js";
export * from "./union-find.js";
