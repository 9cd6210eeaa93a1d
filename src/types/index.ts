// Core re-exports for the modelsmith type system
// This file provides a single import point for all project types

export * from "./json.js";
export * from "./diagnostics.js";
export * from "./schema-node.js";
export * from "./canonical-type.js";
export * from "./model.js";
export * from "./config.js";
export * from "../lib/merger/types.js";
export * from "../lib/emitter/types.js";
