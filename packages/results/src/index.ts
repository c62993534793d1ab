// packages/results/src/index.ts
export * from "./container.js";
export * from "./glob.js";
export * from "./layouts.js";
export * from "./reader.js";
export * from "./interpret.js";
export { findSignature, assertSignature, sniffContainer, CONTAINER_SIGNATURE } from "./sniff.js";
export { widenValues, trimNul } from "./decode.js";
export { openResultContainer, readResultFile, type OpenOptions, type ResultFile } from "./h5-container.js";
