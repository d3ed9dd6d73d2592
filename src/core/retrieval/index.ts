/**
 * Retrieval: retrievers and the dispatcher that routes sources to them
 *
 * @module
 */

export * from "./types.js";
export * from "./retrievers/index.js";
export { RetrieverDispatcher, type RetrieverDispatcherOptions } from "./dispatcher.js";
