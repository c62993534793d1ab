export * from "./manifest.js";
export * from "./progress.js";
export * from "./run.js";
