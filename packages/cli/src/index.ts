export * from "./commands.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./summary.js";
