export * from "./aggregate.js";
export * from "./archive.js";
export * from "./markdown.js";
export * from "./schema.js";
export * from "./serialize.js";
export * from "./terminal.js";
