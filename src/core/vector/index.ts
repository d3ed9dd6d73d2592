/**
 * Vector index adapters
 */

export { QdrantVectorStore, buildQdrantFilter, pointIdFor, type QdrantVectorStoreOptions } from "./qdrant-store.js";
export { MemoryVectorStore, cosineSimilarity } from "./memory-store.js";
