/**
 * Code graph storage
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { Settings } from "../config/settings.js";
import { ArangoGraphStore } from "./arango-graph-store.js";
import { MemoryGraphStore } from "./memory-graph-store.js";

export type { IGraphStore } from "../interfaces/IGraphStore.js";
export { ArangoGraphStore, type ArangoGraphStoreOptions } from "./arango-graph-store.js";
export { MemoryGraphStore } from "./memory-graph-store.js";

/**
 * Create a graph store for the configured engine. The store is not yet
 * initialized.
 */
export function createGraphStore(config: Settings["graphStore"]): IGraphStore {
  if (config.engine === "mem") {
    return new MemoryGraphStore();
  }
  return new ArangoGraphStore({
    url: config.url,
    database: config.database,
    username: config.username,
    ...(config.password !== undefined ? { password: config.password } : {}),
  });
}
