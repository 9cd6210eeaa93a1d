/**
 * Emitter module - back end contract, the JSON model graph back end and its stream writer
 */
export * from "./types.js";
export * from "./model-graph.js";
export * from "./json-writer.js";
