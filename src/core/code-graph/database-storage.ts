/**
 * Code Database Storage
 *
 * Built databases live under `{base}/{area}/{normalized repo}/{language}/`,
 * next to a `build.json` marker recording the revision they were built from.
 *
 * @module
 */

import * as path from "node:path";
import * as fsPromises from "node:fs/promises";
import { z } from "zod";
import { ErrorCode, KnowledgeRouterError } from "../errors.js";
import {
  atomicWriteJson,
  fileExists,
  findDirectories,
  readJsonFile,
  removePath,
  replaceDirectory,
} from "../../utils/fs.js";
import { normalizeRepoPath } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("database-storage");

const MARKER_FILE = "build.json";

const BuildMarkerSchema = z.object({
  revision: z.string().nullable(),
  stored_at: z.string(),
});

export interface StoredDatabase {
  path: string;
  /** Revision recorded at store time; null when unknown */
  revision: string | null;
}

export interface StoredDatabaseEntry {
  businessArea: string;
  /** Normalized repository segment */
  repo: string;
  language: string;
  path: string;
}

export class DatabaseStorage {
  constructor(private readonly basePath: string) {}

  private databaseDir(businessArea: string, repoPath: string, language: string): string {
    return path.join(this.basePath, businessArea, normalizeRepoPath(repoPath), language);
  }

  /**
   * Copy a built database into place, replacing whatever was stored for
   * (area, repo, language).
   *
   * @returns the stored database path
   */
  async store(
    builtPath: string,
    businessArea: string,
    repoPath: string,
    language: string,
    revision: string | null = null
  ): Promise<string> {
    if (!(await fileExists(builtPath))) {
      throw new KnowledgeRouterError(`Database not found: ${builtPath}`, ErrorCode.FILE_SYSTEM_ERROR, { builtPath });
    }
    const dir = this.databaseDir(businessArea, repoPath, language);
    const target = path.join(dir, path.basename(builtPath));

    await removePath(dir);
    await replaceDirectory(builtPath, target);
    await atomicWriteJson(path.join(dir, MARKER_FILE), {
      revision,
      stored_at: new Date().toISOString(),
    });

    logger.info({ businessArea, repo: repoPath, language, path: target }, "Stored code database");
    return target;
  }

  /**
   * The stored database for (area, repo, language), or null when none exists
   */
  async getDatabase(businessArea: string, repoPath: string, language: string): Promise<StoredDatabase | null> {
    const dir = this.databaseDir(businessArea, repoPath, language);
    let entries: string[];
    try {
      entries = (await fsPromises.readdir(dir, { withFileTypes: true }))
        .filter((entry) => entry.isDirectory() && (entry.name.endsWith(".db") || entry.name.toLowerCase().includes("codeql")))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
      throw error;
    }
    const [name] = entries;
    if (name === undefined) return null;

    const marker = BuildMarkerSchema.safeParse(await readJsonFile(path.join(dir, MARKER_FILE)));
    return {
      path: path.join(dir, name),
      revision: marker.success ? marker.data.revision : null,
    };
  }

  async getDatabasePath(businessArea: string, repoPath: string, language: string): Promise<string | null> {
    return (await this.getDatabase(businessArea, repoPath, language))?.path ?? null;
  }

  async list(businessArea?: string): Promise<StoredDatabaseEntry[]> {
    const pattern = businessArea ? `${businessArea}/*/*` : "*/*/*";
    const dirs = await findDirectories([pattern], this.basePath);
    return dirs.flatMap((relative) => {
      const [area, repo, language] = relative.split("/");
      if (!area || !repo || !language) return [];
      return [{ businessArea: area, repo, language, path: path.join(this.basePath, relative) }];
    });
  }

  /**
   * @returns whether anything was stored
   */
  async delete(businessArea: string, repoPath: string, language: string): Promise<boolean> {
    const dir = this.databaseDir(businessArea, repoPath, language);
    if (!(await fileExists(dir))) return false;
    await removePath(dir);
    logger.info({ businessArea, repo: repoPath, language }, "Deleted code database");
    return true;
  }
}
