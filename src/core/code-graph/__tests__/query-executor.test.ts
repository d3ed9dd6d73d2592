import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_QUERIES_DIR, QUERY_BATTERY, QueryExecutor } from "../query-executor.js";
import { CancelledError, CommandFailedError } from "../../errors.js";
import { CancellationTokenSource } from "../../../utils/async.js";
import { FakeAnalysisCli, makeTempDir } from "./fakes.js";

describe("QueryExecutor", () => {
  let cli: FakeAnalysisCli;

  beforeEach(() => {
    cli = new FakeAnalysisCli();
  });

  it("ships a query file for every analysis in the battery", async () => {
    const executor = new QueryExecutor({ cli });
    const expected = Object.entries(QUERY_BATTERY)
      .flatMap(([language, analyses]) => analyses.map((analysis) => `${language}/${analysis}.ql`))
      .sort();
    expect(await executor.listAvailableQueries()).toEqual(expected);
    expect(await executor.listAvailableQueries("java")).toEqual(["java/call_graph.ql"]);
  });

  it("runs the battery in order", async () => {
    cli.rows.set("python/imports", [{ "#1": "refills/service.py", "#2": "os" }]);
    const executor = new QueryExecutor({ cli });

    const results = await executor.executeAll("/db/refills.db", "python");

    expect([...results.entries()]).toEqual([
      ["call_graph", []],
      ["subprocess_calls", []],
      ["imports", [{ "#1": "refills/service.py", "#2": "os" }]],
    ]);
    expect(cli.queryRun.mock.calls.map((call) => call[1])).toEqual([
      path.join(DEFAULT_QUERIES_DIR, "python", "call_graph.ql"),
      path.join(DEFAULT_QUERIES_DIR, "python", "subprocess_calls.ql"),
      path.join(DEFAULT_QUERIES_DIR, "python", "imports.ql"),
    ]);
  });

  it("returns an empty map for a language without queries", async () => {
    const results = await new QueryExecutor({ cli }).executeAll("/db/x.db", "cobol");
    expect(results.size).toBe(0);
  });

  it("yields no rows when a query fails", async () => {
    cli.queryRun.mockRejectedValueOnce(new CommandFailedError("codeql query run", 1, "compilation failed"));
    const executor = new QueryExecutor({ cli });
    expect(await executor.executeQuery("/db/x.db", "java", "call_graph")).toEqual([]);
  });

  it("propagates cancellation", async () => {
    const cancellation = new CancellationTokenSource();
    cancellation.cancel("stop");
    await expect(new QueryExecutor({ cli }).executeAll("/db/x.db", "python", cancellation.token)).rejects.toThrow(
      CancelledError
    );
    expect(cli.queryRun).not.toHaveBeenCalled();
  });

  describe("with a custom queries directory", () => {
    let queriesDir: string;

    beforeEach(async () => {
      queriesDir = await makeTempDir("kr-queries-");
      await fs.mkdir(path.join(queriesDir, "java"), { recursive: true });
      await fs.writeFile(path.join(queriesDir, "java", "call_graph.ql"), "select 1\n");
    });

    afterEach(async () => {
      await fs.rm(queriesDir, { recursive: true, force: true });
    });

    it("yields no rows for a missing query file without invoking the CLI", async () => {
      const executor = new QueryExecutor({ cli, queriesDir });
      expect(await executor.executeQuery("/db/x.db", "python", "call_graph")).toEqual([]);
      expect(cli.queryRun).not.toHaveBeenCalled();
      expect(await executor.listAvailableQueries()).toEqual(["java/call_graph.ql"]);
    });
  });
});
