/**
 * modelsmith: schema resolution and model synthesis for code emission
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/loader/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/merger/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/registry/index.js";
export * from "./lib/pass/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/sources/graphql.js";
export * from "./lib/sources/samples.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/diagnostics.js";
export * from "./utils/config-loader.js";
export * from "./utils/config-parser.js";
export * from "./utils/naming.js";
export * from "./utils/pointer.js";
