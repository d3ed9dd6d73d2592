/**
 * CodeQL CLI Adapter
 *
 * Runs the `codeql` executable as a child process. Every invocation has a
 * hard timeout, after which the child is killed; a cancelled token kills it
 * too.
 *
 * @module
 */

import { spawn } from "node:child_process";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
  CancelledError,
  CommandFailedError,
  CommandTimeoutError,
  ErrorCode,
  ExternalUnavailableError,
  errorMessage,
} from "../errors.js";
import type { CancellationToken } from "../../utils/async.js";
import { fileExists, makeTempDirectory, removePath } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import type { QueryRow } from "./types.js";

const logger = createLogger("codeql-cli");

// =============================================================================
// Interface
// =============================================================================

export interface CommandOptions {
  token?: CancellationToken;
}

export interface DatabaseCreateOptions extends CommandOptions {
  /** Build command for compiled languages */
  buildCommand?: string;
}

/**
 * Operations the build pipeline needs from the static-analysis tool
 */
export interface IAnalysisCli {
  version(): Promise<string>;
  databaseCreate(databasePath: string, sourceRoot: string, language: string, options?: DatabaseCreateOptions): Promise<void>;
  queryRun(databasePath: string, queryFile: string, options?: CommandOptions): Promise<QueryRow[]>;
  /** `git rev-parse HEAD` of the checkout; null when it is not a git work tree */
  currentRevision(sourceRoot: string): Promise<string | null>;
}

export interface CodeqlCliOptions {
  /** Explicit executable; otherwise PATH and well-known install locations */
  executablePath?: string;
  buildTimeoutMs: number;
  queryTimeoutMs: number;
  versionTimeoutMs: number;
}

// =============================================================================
// Process runner
// =============================================================================

export interface RunOptions extends CommandOptions {
  cwd?: string;
  timeoutMs: number;
}

export interface RunOutput {
  stdout: string;
  stderr: string;
}

const STDERR_LIMIT = 2000;

/**
 * Run a command to completion.
 *
 * @throws CommandTimeoutError when the timeout expires (the child is killed)
 * @throws CommandFailedError on a non-zero exit or a spawn failure
 * @throws CancelledError when the token is cancelled (the child is killed)
 */
export function runCommand(command: string, args: readonly string[], options: RunOptions): Promise<RunOutput> {
  const display = [path.basename(command), ...args].join(" ");
  if (options.token?.cancelled) {
    return Promise.reject(new CancelledError(options.token.reason));
  }

  return new Promise<RunOutput>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (outcome: { ok: true; value: RunOutput } | { ok: false; error: Error }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      unsubscribe();
      if (outcome.ok) resolve(outcome.value);
      else reject(outcome.error);
    };

    const timer = setTimeout(() => {
      logger.warn({ command: display, timeoutMs: options.timeoutMs }, "Command timed out, killing");
      child.kill("SIGKILL");
      finish({ ok: false, error: new CommandTimeoutError(display, options.timeoutMs) });
    }, options.timeoutMs);

    const unsubscribe =
      options.token?.onCancel(() => {
        logger.info({ command: display }, "Command cancelled, killing");
        child.kill("SIGKILL");
        finish({ ok: false, error: new CancelledError(options.token?.reason) });
      }) ?? (() => {});

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      finish({ ok: false, error: new CommandFailedError(display, null, error.message) });
    });

    child.on("close", (code) => {
      if (code === 0) {
        finish({ ok: true, value: { stdout, stderr } });
      } else {
        finish({ ok: false, error: new CommandFailedError(display, code, stderr.trim().slice(-STDERR_LIMIT)) });
      }
    });
  });
}

// =============================================================================
// Result decoding
// =============================================================================

const DecodedResultsSchema = z.object({
  "#select": z
    .object({
      tuples: z.array(z.array(z.unknown())),
    })
    .optional(),
});

/**
 * Flatten `bqrs decode --format=json` output into rows keyed `#1`, `#2`, ...
 */
export function flattenDecodedResults(raw: unknown): QueryRow[] {
  const parsed = DecodedResultsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CommandFailedError("bqrs decode", 0, `unexpected result format: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return (parsed.data["#select"]?.tuples ?? []).map((tuple) =>
    Object.fromEntries(tuple.map((value, index) => [`#${index + 1}`, value]))
  );
}

// =============================================================================
// CodeQL CLI
// =============================================================================

function isExecutable(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export class CodeqlCli implements IAnalysisCli {
  private readonly options: CodeqlCliOptions;
  private executable: string | null = null;

  constructor(options: CodeqlCliOptions) {
    this.options = options;
  }

  /**
   * Locate the executable: configured path, then PATH, then well-known
   * install locations.
   *
   * @throws ExternalUnavailableError when no executable is found
   */
  resolveExecutable(): string {
    if (this.executable) return this.executable;

    const candidates: string[] = [];
    if (this.options.executablePath) {
      candidates.push(this.options.executablePath);
    } else {
      for (const dir of process.env.PATH?.split(path.delimiter) ?? []) {
        if (dir.trim()) candidates.push(path.join(dir.trim(), "codeql"));
      }
      candidates.push(
        "/usr/local/bin/codeql",
        "/opt/codeql/codeql",
        path.join(os.homedir(), "codeql-home", "codeql", "codeql")
      );
    }

    const found = candidates.find(isExecutable);
    if (!found) {
      throw new ExternalUnavailableError("codeql", "CodeQL CLI not found", ErrorCode.EXECUTABLE_NOT_FOUND, {
        configured: this.options.executablePath ?? null,
      });
    }
    logger.info({ path: found }, "Found CodeQL CLI");
    this.executable = found;
    return found;
  }

  async version(): Promise<string> {
    const { stdout } = await runCommand(this.resolveExecutable(), ["version"], {
      timeoutMs: this.options.versionTimeoutMs,
    });
    return stdout.trim().split("\n")[0] ?? "";
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.version();
      return true;
    } catch (error) {
      logger.debug({ err: error }, "CodeQL CLI unavailable");
      return false;
    }
  }

  async databaseCreate(
    databasePath: string,
    sourceRoot: string,
    language: string,
    options: DatabaseCreateOptions = {}
  ): Promise<void> {
    const args = ["database", "create", databasePath, `--language=${language}`, `--source-root=${sourceRoot}`];
    if (options.buildCommand) {
      args.push(`--command=${options.buildCommand}`);
    }

    logger.info({ databasePath, sourceRoot, language }, "Creating CodeQL database");
    const started = Date.now();
    await runCommand(this.resolveExecutable(), args, {
      cwd: sourceRoot,
      timeoutMs: this.options.buildTimeoutMs,
      token: options.token,
    });
    logger.info({ databasePath, language, durationMs: Date.now() - started }, "CodeQL database created");
  }

  /**
   * Run one query into a temporary BQRS file and decode its `#select`
   * result set.
   */
  async queryRun(databasePath: string, queryFile: string, options: CommandOptions = {}): Promise<QueryRow[]> {
    const executable = this.resolveExecutable();
    const workDir = await makeTempDirectory("kr-query-");
    const bqrsPath = path.join(workDir, "results.bqrs");

    try {
      await runCommand(executable, ["query", "run", `--database=${databasePath}`, `--output=${bqrsPath}`, queryFile], {
        timeoutMs: this.options.queryTimeoutMs,
        token: options.token,
      });
      const { stdout } = await runCommand(
        executable,
        ["bqrs", "decode", "--format=json", "--result-set=#select", bqrsPath],
        { timeoutMs: this.options.queryTimeoutMs, token: options.token }
      );
      let decoded: unknown;
      try {
        decoded = JSON.parse(stdout);
      } catch (error) {
        throw new CommandFailedError("bqrs decode", 0, `invalid JSON output: ${errorMessage(error)}`);
      }
      return flattenDecodedResults(decoded);
    } finally {
      await removePath(workDir);
    }
  }

  async currentRevision(sourceRoot: string): Promise<string | null> {
    if (!(await fileExists(sourceRoot))) {
      return null;
    }
    try {
      const { stdout } = await runCommand("git", ["rev-parse", "HEAD"], {
        cwd: sourceRoot,
        timeoutMs: this.options.versionTimeoutMs,
      });
      const revision = stdout.trim();
      return revision.length > 0 ? revision : null;
    } catch (error) {
      logger.debug({ err: error, sourceRoot }, "No git revision for source");
      return null;
    }
  }
}
