/**
 * Library entry point: the generation pipeline and its stages.
 */

export * from "./types/index.js";
export * from "./naming/index.js";
export * from "./schema/index.js";
export * from "./model/index.js";
export * from "./emitter/index.js";
export * from "./pipeline/index.js";
export { VERSION } from "./version.js";
