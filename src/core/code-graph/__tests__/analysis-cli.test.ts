import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CodeqlCli, flattenDecodedResults, runCommand } from "../analysis-cli.js";
import { CancelledError, CommandFailedError, ErrorCode, ExternalUnavailableError } from "../../errors.js";
import { CancellationTokenSource } from "../../../utils/async.js";
import { makeTempDir } from "./fakes.js";

const TIMEOUTS = { buildTimeoutMs: 1000, queryTimeoutMs: 1000, versionTimeoutMs: 1000 };

let tempDir: string;

beforeEach(async () => {
  tempDir = await makeTempDir("kr-cli-");
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await fs.rm(tempDir, { recursive: true, force: true });
});

async function fakeExecutable(dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, "codeql");
  await fs.writeFile(file, "#!/bin/sh\n");
  await fs.chmod(file, 0o755);
  return file;
}

describe("flattenDecodedResults", () => {
  it("keys tuple columns by position", () => {
    const rows = flattenDecodedResults({
      "#select": {
        columns: [{ kind: "Entity" }, { kind: "String" }],
        tuples: [
          [{ label: "process_refill" }, "scripts/notify.sh"],
          ["refills/service.py", "os"],
        ],
      },
    });
    expect(rows).toEqual([
      { "#1": { label: "process_refill" }, "#2": "scripts/notify.sh" },
      { "#1": "refills/service.py", "#2": "os" },
    ]);
  });

  it("returns no rows without a #select result set", () => {
    expect(flattenDecodedResults({})).toEqual([]);
  });

  it("rejects output of the wrong shape", () => {
    expect(() => flattenDecodedResults({ "#select": { tuples: "nope" } })).toThrow(CommandFailedError);
  });
});

describe("CodeqlCli.resolveExecutable", () => {
  it("uses the configured executable", async () => {
    const executable = await fakeExecutable(path.join(tempDir, "bin"));
    const cli = new CodeqlCli({ ...TIMEOUTS, executablePath: executable });
    expect(cli.resolveExecutable()).toBe(executable);
  });

  it("searches PATH when nothing is configured", async () => {
    const executable = await fakeExecutable(path.join(tempDir, "tools"));
    vi.stubEnv("PATH", [path.join(tempDir, "empty"), path.join(tempDir, "tools")].join(path.delimiter));
    expect(new CodeqlCli(TIMEOUTS).resolveExecutable()).toBe(executable);
  });

  it("ignores files that are not executable", async () => {
    const file = path.join(tempDir, "codeql");
    await fs.writeFile(file, "not a program");
    await fs.chmod(file, 0o644);
    expect(() => new CodeqlCli({ ...TIMEOUTS, executablePath: file }).resolveExecutable()).toThrow(
      ExternalUnavailableError
    );
  });

  it("reports a missing configured executable", () => {
    const cli = new CodeqlCli({ ...TIMEOUTS, executablePath: path.join(tempDir, "missing", "codeql") });
    try {
      cli.resolveExecutable();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExternalUnavailableError);
      expect(error instanceof ExternalUnavailableError ? error.code : null).toBe(ErrorCode.EXECUTABLE_NOT_FOUND);
    }
  });
});

describe("CodeqlCli.currentRevision", () => {
  it("returns null for a path that does not exist", async () => {
    const cli = new CodeqlCli(TIMEOUTS);
    expect(await cli.currentRevision(path.join(tempDir, "absent"))).toBeNull();
  });
});

describe("runCommand", () => {
  it("rejects before starting when the token is already cancelled", async () => {
    const cancellation = new CancellationTokenSource();
    cancellation.cancel("stopping");
    await expect(runCommand("codeql", ["version"], { timeoutMs: 1000, token: cancellation.token })).rejects.toThrow(
      new CancelledError("stopping")
    );
  });
});
