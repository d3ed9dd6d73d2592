import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CodeSourceRegistry, makeSourceId } from "../source-registry.js";
import { SourceConfigResolver } from "../../config/source-config.js";
import { KnowledgeRouterError, SourceNotFoundError } from "../../errors.js";
import { makeTempDir } from "./fakes.js";

let tempDir: string;
let registryPath: string;

beforeEach(async () => {
  tempDir = await makeTempDir("kr-registry-");
  registryPath = path.join(tempDir, "data", "code_source_registry.json");
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

function createRegistry(
  sourcesConfig = "pharmacy:codeql(enabled=true,repos=org/refills)",
  codeGraphEnabled = true
): CodeSourceRegistry {
  return new CodeSourceRegistry({
    registryPath,
    resolver: SourceConfigResolver.fromStrings(["pharmacy", "supply_chain"], sourcesConfig),
    codeGraphEnabled,
  });
}

describe("CodeSourceRegistry", () => {
  it("derives the id from area, type and normalized path", async () => {
    const registry = createRegistry();
    await registry.load();

    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);

    expect(id).toBe("pharmacy_gitlab_org_refills");
    expect(makeSourceId("pharmacy", "filesystem", "C:\\code\\refills")).toBe("pharmacy_filesystem_C:_code_refills");
    expect(registry.get(id)).toMatchObject({
      businessArea: "pharmacy",
      sourceType: "gitlab",
      path: "org/refills",
      languages: ["python"],
      name: "org/refills",
      enabled: true,
      lastAnalyzedCommit: null,
      lastAnalyzedTime: null,
    });
  });

  it("overwrites on re-registration without duplicating ids", async () => {
    const registry = createRegistry();
    await registry.load();

    const first = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
    await registry.updateCommitHash(first, "abc123");
    const second = await registry.register("pharmacy", "gitlab", "org/refills", ["python", "java"], { name: "Refills" });

    expect(second).toBe(first);
    expect(registry.list()).toHaveLength(1);
    expect(registry.get(first)?.languages).toEqual(["python", "java"]);
    expect(registry.get(first)?.name).toBe("Refills");
    expect(registry.get(first)?.lastAnalyzedCommit).toBe("abc123");
  });

  it("honors an explicit source id", async () => {
    const registry = createRegistry();
    await registry.load();
    const id = await registry.register("pharmacy", "filesystem", "/srv/refills", ["java"], { sourceId: "refills-local" });
    expect(id).toBe("refills-local");
    expect(registry.get("refills-local")?.path).toBe("/srv/refills");
  });

  it("persists every mutation and reloads it", async () => {
    const registry = createRegistry();
    await registry.load();
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"], { metadata: { team: "rx" } });
    await registry.updateCommitHash(id, "abc123", new Date("2026-05-01T08:00:00.000Z"));

    const raw: unknown = JSON.parse(await fs.readFile(registryPath, "utf-8"));
    expect(raw).toEqual({
      pharmacy_gitlab_org_refills: {
        source_id: "pharmacy_gitlab_org_refills",
        business_area: "pharmacy",
        source_type: "gitlab",
        path: "org/refills",
        languages: ["python"],
        name: "org/refills",
        enabled: true,
        last_analyzed_commit: "abc123",
        last_analyzed_time: "2026-05-01T08:00:00.000Z",
        metadata: { team: "rx" },
      },
    });

    const reloaded = createRegistry();
    await reloaded.load();
    expect(reloaded.get(id)?.lastAnalyzedCommit).toBe("abc123");
    expect(reloaded.get(id)?.lastAnalyzedTime?.toISOString()).toBe("2026-05-01T08:00:00.000Z");
    expect(reloaded.get(id)?.metadata).toEqual({ team: "rx" });
  });

  it("leaves no temp files behind", async () => {
    const registry = createRegistry();
    await registry.load();
    await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
    await registry.register("pharmacy", "gitlab", "org/claims", ["python"]);
    expect(await fs.readdir(path.dirname(registryPath))).toEqual(["code_source_registry.json"]);
  });

  it("rejects a malformed registry file", async () => {
    await fs.mkdir(path.dirname(registryPath), { recursive: true });
    await fs.writeFile(registryPath, JSON.stringify({ x: { source_id: "x", business_area: "pharmacy" } }));
    await expect(createRegistry().load()).rejects.toThrow(KnowledgeRouterError);
  });

  it("filters listings", async () => {
    const registry = createRegistry();
    await registry.load();
    await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
    await registry.register("pharmacy", "filesystem", "/srv/claims", ["java"], { enabled: false });
    await registry.register("supply_chain", "gitlab", "org/stock", ["python"]);

    expect(registry.list({ businessArea: "pharmacy" }).map((s) => s.sourceId)).toEqual([
      "pharmacy_gitlab_org_refills",
      "pharmacy_filesystem__srv_claims",
    ]);
    expect(registry.list({ businessArea: "pharmacy", enabledOnly: true }).map((s) => s.sourceId)).toEqual([
      "pharmacy_gitlab_org_refills",
    ]);
    expect(registry.list({ sourceType: "gitlab" })).toHaveLength(2);
  });

  it("throws SourceNotFoundError for unknown ids", async () => {
    const registry = createRegistry();
    await registry.load();
    await expect(registry.updateCommitHash("nope", "abc")).rejects.toThrow(SourceNotFoundError);
    await expect(registry.delete("nope")).rejects.toThrow(SourceNotFoundError);
  });

  it("deletes a source", async () => {
    const registry = createRegistry();
    await registry.load();
    const id = await registry.register("pharmacy", "gitlab", "org/refills", ["python"]);
    await registry.delete(id);
    expect(registry.get(id)).toBeUndefined();
  });

  describe("isCodeGraphEnabled", () => {
    it("requires the global flag", () => {
      expect(createRegistry(undefined, false).isCodeGraphEnabled("pharmacy")).toBe(false);
      expect(createRegistry(undefined, true).isCodeGraphEnabled("pharmacy")).toBe(true);
    });

    it("requires a non-empty codeql block", () => {
      expect(createRegistry("pharmacy:confluence(space=PHARM)").isCodeGraphEnabled("pharmacy")).toBe(false);
      expect(createRegistry("pharmacy:codeql").isCodeGraphEnabled("pharmacy")).toBe(false);
      expect(createRegistry("pharmacy:codeql(repos=org/refills)").isCodeGraphEnabled("pharmacy")).toBe(true);
    });

    it("respects the block's enabled flag", () => {
      expect(createRegistry("pharmacy:codeql(enabled=false,repos=org/refills)").isCodeGraphEnabled("pharmacy")).toBe(false);
      expect(createRegistry("pharmacy:codeql(enabled=TRUE)").isCodeGraphEnabled("pharmacy")).toBe(true);
      expect(createRegistry("pharmacy:codeql(enabled=yes)").isCodeGraphEnabled("pharmacy")).toBe(true);
      expect(createRegistry("pharmacy:codeql(enabled=1)").isCodeGraphEnabled("pharmacy")).toBe(true);
      expect(createRegistry("pharmacy:codeql(enabled=no)").isCodeGraphEnabled("pharmacy")).toBe(false);
      expect(createRegistry().isCodeGraphEnabled("supply_chain")).toBe(false);
    });
  });
});
