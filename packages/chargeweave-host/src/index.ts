export * from "./cli-args.js";
export * from "./env.js";
export * from "./host.js";
export * from "./run.js";
