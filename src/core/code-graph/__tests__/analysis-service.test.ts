import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CodeGraphAnalysisService } from "../analysis-service.js";
import { DatabaseBuilder } from "../database-builder.js";
import { DatabaseStorage } from "../database-storage.js";
import { GraphEmitter } from "../graph-emitter.js";
import { QueryExecutor } from "../query-executor.js";
import { CodeSourceRegistry } from "../source-registry.js";
import { SourceConfigResolver } from "../../config/source-config.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { graphNodeId } from "../../interfaces/IGraphStore.js";
import { CancellationTokenSource } from "../../../utils/async.js";
import { FakeAnalysisCli, fnEntity, makeTempDir } from "./fakes.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await makeTempDir("kr-analysis-");
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

const SOURCES = "pharmacy:codeql(enabled=true,repos=org/refills|org/claims);supply_chain:codeql(enabled=false,repos=org/stock)";

async function createService(options: { sourcesConfig?: string; codeGraphEnabled?: boolean } = {}) {
  const resolver = SourceConfigResolver.fromStrings(["pharmacy", "supply_chain"], options.sourcesConfig ?? SOURCES);
  const registry = new CodeSourceRegistry({
    registryPath: path.join(tempDir, "registry.json"),
    resolver,
    codeGraphEnabled: options.codeGraphEnabled ?? true,
  });
  await registry.load();
  const cli = new FakeAnalysisCli();
  const store = new MemoryGraphStore();
  const service = new CodeGraphAnalysisService({
    registry,
    builder: new DatabaseBuilder({ cli, storage: new DatabaseStorage(path.join(tempDir, "databases")), registry }),
    executor: new QueryExecutor({ cli }),
    emitter: new GraphEmitter(store),
    resolver,
    defaultLanguages: ["python", "java"],
  });
  return { service, registry, cli, store };
}

const processRefill = fnEntity("process_refill", "refills/service.py", 10, 42);
const validateRefill = fnEntity("validate_refill", "refills/rules.py", 5, 20);
const refillJob = fnEntity("RefillJob.run", "src/RefillJob.java", 12, 30);

describe("CodeGraphAnalysisService", () => {
  it("skips an area without code graph and leaves the registry untouched", async () => {
    const { service, registry, cli } = await createService({ sourcesConfig: "pharmacy:confluence(space=PHARM)" });
    const id = await registry.register("pharmacy", "gitlab", "org/repo", ["python", "java"]);

    const result = await service.analyzeSource(id);

    expect(result).toEqual({ status: "skipped", reason: "codeql_not_enabled_for_business_area" });
    expect(registry.get(id)?.lastAnalyzedCommit).toBeNull();
    expect(cli.currentRevision).not.toHaveBeenCalled();
    expect(cli.databaseCreate).not.toHaveBeenCalled();
  });

  it("skips every area while the global switch is off", async () => {
    const { service, registry } = await createService({ codeGraphEnabled: false });
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
    expect(await service.analyzeSource(id)).toEqual({ status: "skipped", reason: "codeql_not_enabled_for_business_area" });
  });

  it("reports unknown and disabled sources", async () => {
    const { service, registry } = await createService();
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"], { enabled: false });

    expect(await service.analyzeSource("missing")).toEqual({ status: "error", error: "Source not found: missing" });
    expect(await service.analyzeSource(id)).toEqual({ status: "skipped", reason: "source_disabled" });
  });

  it("builds, queries and emits one graph for all languages", async () => {
    const { service, registry, cli, store } = await createService();
    cli.rows.set("python/call_graph", [{ "#1": processRefill, "#2": validateRefill }]);
    cli.rows.set("python/subprocess_calls", [{ "#1": processRefill, "#2": "scripts/notify.sh" }]);
    cli.rows.set("java/call_graph", [{ "#1": refillJob, "#2": refillJob }]);
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python", "java"]);

    const result = await service.analyzeSource(id);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.languages.python).toEqual({
      status: "success",
      build: "built",
      databasePath: path.join(tempDir, "databases", "pharmacy", "org_refills", "python", "org_refills_python.db"),
      revision: "rev-1",
      queries: { call_graph: 1, subprocess_calls: 1, imports: 0 },
    });
    expect(result.languages.java?.status).toBe("success");
    expect(result.graph).toEqual({ nodes: 5, edges: 3 });
    expect(store.getNode(graphNodeId("pharmacy", "org/refills", "Function", "RefillJob.run"))?.filePath).toBe(
      "/repo/src/RefillJob.java"
    );
    expect(registry.get(id)?.lastAnalyzedCommit).toBe("rev-1");

    const again = await service.analyzeSource(id);
    expect(again.status === "success" ? again.languages.python : null).toMatchObject({ build: "cached" });
    expect(cli.databaseCreate).toHaveBeenCalledTimes(2);
  });

  it("isolates a failing language", async () => {
    const { service, registry, cli } = await createService();
    cli.failingLanguages.add("java");
    cli.rows.set("python/call_graph", [{ "#1": processRefill, "#2": validateRefill }]);
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["java", "python"]);

    const result = await service.analyzeSource(id);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.languages.java?.status).toBe("failed");
    expect(result.languages.python?.status).toBe("success");
    expect(result.graph).toEqual({ nodes: 2, edges: 1 });
  });

  it("leaves the graph alone when every language fails", async () => {
    const { service, registry, cli, store } = await createService();
    await store.upsertNodes([
      {
        id: graphNodeId("pharmacy", "org/refills", "Function", "legacy"),
        kind: "Function",
        name: "legacy",
        businessArea: "pharmacy",
        repo: "org/refills",
      },
    ]);
    cli.failingLanguages.add("python");
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);

    const result = await service.analyzeSource(id);

    expect(result.status === "success" ? result.graph : undefined).toBeNull();
    expect((await store.stats({ repo: "org/refills" })).nodes).toBe(1);
  });

  it("records an emission failure without failing the source", async () => {
    const { service, registry, store } = await createService();
    store.setAvailable(false);
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);

    const result = await service.analyzeSource(id);

    expect(result).toMatchObject({ status: "success", graph: null, graphError: "Graph store not available" });
  });

  it("stops between phases when cancelled", async () => {
    const { service, registry, cli } = await createService();
    const cancellation = new CancellationTokenSource();
    cli.onCreate = () => cancellation.cancel("shutdown requested");
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python", "java"]);

    const result = await service.analyzeSource(id, { token: cancellation.token });

    expect(result).toEqual({ status: "cancelled", sourceId: id, reason: "shutdown requested" });
    expect(cli.databaseCreate).toHaveBeenCalledTimes(1);
    expect(cli.queryRun).not.toHaveBeenCalled();
  });

  describe("analyzeBusinessArea", () => {
    it("skips disabled areas and areas without sources", async () => {
      const { service } = await createService();
      expect(await service.analyzeBusinessArea("supply_chain")).toEqual({
        status: "skipped",
        businessArea: "supply_chain",
        reason: "codeql_not_enabled_for_business_area",
      });
      expect(await service.analyzeBusinessArea("pharmacy")).toEqual({
        status: "skipped",
        businessArea: "pharmacy",
        reason: "no_sources_registered",
      });
    });

    it("analyzes every enabled source", async () => {
      const { service, registry, cli } = await createService();
      cli.failingLanguages.add("java");
      await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
      await registry.register("pharmacy", "gitlab", "org/claims", ["java"]);
      await registry.register("pharmacy", "gitlab", "org/archive", ["python"], { enabled: false });

      const result = await service.analyzeBusinessArea("pharmacy");

      expect(result.status).toBe("success");
      if (result.status !== "success") return;
      expect(Object.keys(result.sources)).toEqual(["pharmacy_gitlab_org_refills", "pharmacy_gitlab_org_claims"]);
      expect(result.sources.pharmacy_gitlab_org_refills?.status).toBe("success");
      const claims = result.sources.pharmacy_gitlab_org_claims;
      expect(claims?.status === "success" ? claims.languages.java?.status : undefined).toBe("failed");
    });
  });

  describe("registerSourcesFromConfig", () => {
    it("registers each repo with the default languages", async () => {
      const { service, registry } = await createService();

      const ids = await service.registerSourcesFromConfig("pharmacy", { enabled: "true", repos: ["org/refills", "org/claims"] });

      expect(ids).toEqual(["pharmacy_gitlab_org_refills", "pharmacy_gitlab_org_claims"]);
      expect(registry.get("pharmacy_gitlab_org_claims")).toMatchObject({
        sourceType: "gitlab",
        languages: ["python", "java"],
        name: "pharmacy - org/claims",
        enabled: true,
      });
    });

    it("returns nothing when disabled or without repos", async () => {
      const { service, registry } = await createService();
      expect(await service.registerSourcesFromConfig("pharmacy", { enabled: "false", repos: "org/refills" })).toEqual([]);
      expect(await service.registerSourcesFromConfig("pharmacy", { enabled: "true" })).toEqual([]);
      expect(registry.list()).toEqual([]);
    });

    it("reads the enabled flag the same way the area switch does", async () => {
      const { service } = await createService({ sourcesConfig: "pharmacy:codeql(enabled=yes,repos=org/refills)" });

      expect(await service.syncSourcesFromSettings()).toEqual(new Map([["pharmacy", ["pharmacy_gitlab_org_refills"]]]));
      expect(service.isCodeGraphEnabled("pharmacy")).toBe(true);
    });

    it("syncs every area that declares a codeql block", async () => {
      const { service } = await createService();
      const synced = await service.syncSourcesFromSettings();
      expect([...synced.entries()]).toEqual([
        ["pharmacy", ["pharmacy_gitlab_org_refills", "pharmacy_gitlab_org_claims"]],
        ["supply_chain", []],
      ]);
    });
  });
});
