/**
 * Shared utilities
 */

import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".knowledge-router";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getDataDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "data");
}

export function getCodeDatabaseDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "codeql-databases");
}

export function getRegistryPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "code_source_registry.json");
}

export function getIngestionMetadataPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "ingestion_metadata.json");
}

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Flatten a repository path into a single path segment (`org/repo` -> `org_repo`)
 */
export function normalizeRepoPath(repoPath: string): string {
  return repoPath.replace(/[\\/]/g, "_");
}
