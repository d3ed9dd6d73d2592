/**
 * File System Utilities
 * Atomic persistence and directory-tree helpers for the registry, sync
 * metadata and stored code databases
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a file or directory exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * any other read or parse failure propagates.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  return JSON.parse(content);
}

/**
 * Write JSON via a sibling temp file and rename, so readers never observe a
 * partially written file.
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDirectory(dir);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(6).toString("hex")}.tmp`
  );
  try {
    await fsPromises.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
    await fsPromises.rename(tempPath, filePath);
  } catch (error) {
    await fsPromises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Replace `destination` with a recursive copy of `source`
 */
export async function replaceDirectory(source: string, destination: string): Promise<void> {
  await fsPromises.rm(destination, { recursive: true, force: true });
  await ensureDirectory(path.dirname(destination));
  await fsPromises.cp(source, destination, { recursive: true });
}

export async function removePath(target: string): Promise<void> {
  await fsPromises.rm(target, { recursive: true, force: true });
}

/**
 * Create a fresh temp directory under the OS temp dir
 */
export async function makeTempDirectory(prefix: string): Promise<string> {
  return fsPromises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Find directories matching glob patterns relative to `cwd`
 */
export async function findDirectories(patterns: string[], cwd: string): Promise<string[]> {
  if (!(await fileExists(cwd))) return [];
  const matches = await fg(patterns, {
    cwd,
    onlyDirectories: true,
    absolute: false,
    dot: false,
  });
  return matches.sort();
}

/**
 * Find files matching glob patterns relative to `cwd`
 */
export async function findFiles(patterns: string[], cwd: string): Promise<string[]> {
  if (!(await fileExists(cwd))) return [];
  const matches = await fg(patterns, { cwd, onlyFiles: true, absolute: false, dot: false });
  return matches.sort();
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
