import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadSettings, parseSettings } from "../settings.js";
import { ConfigurationError } from "../../errors.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "kr-settings-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("parseSettings", () => {
  it("fills every default", () => {
    const settings = parseSettings({});

    expect(settings.businessAreas).toEqual(["pharmacy", "supply_chain"]);
    expect(settings.codeGraph.enabled).toBe(false);
    expect(settings.codeGraph.defaultLanguages).toEqual(["python", "java"]);
    expect(settings.codeGraph.buildTimeoutMs).toBe(3_600_000);
    expect(settings.codeGraph.databasePath).toBe(
      path.join(process.cwd(), ".knowledge-router", "data", "codeql-databases")
    );
    expect(settings.search.topK).toBe(5);
    expect(settings.ingestion).toMatchObject({ chunkSize: 1000, chunkOverlap: 200, batchSize: 100 });
    expect(settings.qdrant.url).toBe("http://localhost:6333");
    expect(settings.embeddings).toEqual({ model: "text-embedding-004", dimension: 768 });
    expect(settings.graphStore).toEqual({
      engine: "arangodb",
      url: "http://localhost:8529",
      database: "knowledge_graph",
      username: "root",
    });
  });

  it("lists every invalid field", () => {
    expect(() => parseSettings({ businessAreas: " , ", graphStore: { engine: "neo4j" } })).toThrow(ConfigurationError);
    expect(() => parseSettings({ embeddings: { dimension: "wide" } })).toThrow(/embeddings\.dimension/);
    expect(() => parseSettings({ search: { topK: 51 } })).toThrow(/search\.topK/);
  });
});

describe("loadSettings", () => {
  it("overlays the environment on the config file", async () => {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({
        businessAreas: ["pharmacy"],
        codeGraph: { enabled: false, buildTimeoutMs: 1000 },
        qdrant: { url: "http://qdrant.internal:6333" },
      })
    );

    const settings = await loadSettings({
      configPath,
      env: {
        BUSINESS_AREAS: "pharmacy, supply_chain",
        CODE_GRAPH_ENABLED: "TRUE",
        CODE_GRAPH_DEFAULT_LANGUAGES: "python|java|go",
        TOP_K_RETRIEVAL: "7",
        ARANGODB_PASSWORD: "test-secret",
      },
    });

    expect(settings.businessAreas).toEqual(["pharmacy", "supply_chain"]);
    expect(settings.codeGraph.enabled).toBe(true);
    expect(settings.codeGraph.buildTimeoutMs).toBe(1000);
    expect(settings.codeGraph.defaultLanguages).toEqual(["python", "java", "go"]);
    expect(settings.search.topK).toBe(7);
    expect(settings.qdrant.url).toBe("http://qdrant.internal:6333");
    expect(settings.graphStore.password).toBe("test-secret");
  });

  it("applies explicit overrides last", async () => {
    const settings = await loadSettings({
      configPath: path.join(tempDir, "missing.json"),
      env: { GRAPH_STORE: "arangodb" },
      overrides: { graphStore: { engine: "mem" } },
    });
    expect(settings.graphStore.engine).toBe("mem");
  });

  it("rejects a config file that is not an object", async () => {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(configPath, "[1, 2]");
    await expect(loadSettings({ configPath, env: {} })).rejects.toThrow(ConfigurationError);
  });

  it("rejects unreadable JSON", async () => {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(configPath, "{ not json");
    await expect(loadSettings({ configPath, env: {} })).rejects.toThrow(ConfigurationError);
  });
});
