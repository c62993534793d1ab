export * from "./value.js";
export * from "./records.js";
export * from "./entity.js";
export * from "./finding.js";
export * from "./rule.js";
export * from "./errors.js";
export { stableStringify, compareBinary, sha256Hex, deepFreeze } from "./stable-json.js";
export { readFileBounded } from "./io.js";
