/**
 * Code graph pipeline: source registry, revision-gated database builds,
 * query battery and graph emission.
 *
 * @module
 */

export * from "./types.js";
export * from "./source-registry.js";
export * from "./analysis-cli.js";
export * from "./database-storage.js";
export * from "./database-builder.js";
export * from "./query-executor.js";
export * from "./graph-emitter.js";
export * from "./analysis-service.js";
