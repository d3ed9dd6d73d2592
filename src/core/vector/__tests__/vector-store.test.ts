import { describe, it, expect } from "vitest";
import { buildQdrantFilter, pointIdFor } from "../qdrant-store.js";
import { MemoryVectorStore, cosineSimilarity } from "../memory-store.js";
import { chunkFromPayload } from "../payload.js";
import type { ChunkPayload, EmbeddedChunk } from "../../../types/index.js";

function chunk(id: string, vector: number[], payload: Partial<ChunkPayload>): EmbeddedChunk {
  return {
    id,
    vector,
    payload: {
      content: `content of ${id}`,
      title: id,
      source: "confluence",
      document_type: "wiki",
      business_area: "pharmacy",
      parent_document_id: id.split("_")[0] ?? id,
      chunk_index: 0,
      total_chunks: 1,
      url: "",
      last_modified: "2026-03-01T00:00:00.000Z",
      ...payload,
    },
  };
}

describe("buildQdrantFilter", () => {
  it("maps scalars to match-value and arrays to match-any", () => {
    expect(buildQdrantFilter({ source: "gitlab", version: 2, tags: ["a", "b"], years: [2025, 2026], mixed: [1, "x"] })).toEqual({
      must: [
        { key: "source", match: { value: "gitlab" } },
        { key: "version", match: { value: 2 } },
        { key: "tags", match: { any: ["a", "b"] } },
        { key: "years", match: { any: [2025, 2026] } },
        { key: "mixed", match: { any: ["1", "x"] } },
      ],
    });
  });

  it("returns undefined without filters", () => {
    expect(buildQdrantFilter(undefined)).toBeUndefined();
    expect(buildQdrantFilter({})).toBeUndefined();
  });
});

describe("pointIdFor", () => {
  it("derives a stable name-based UUID per chunk id", () => {
    const id = pointIdFor("page-1_0");
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(pointIdFor("page-1_0")).toBe(id);
    expect(pointIdFor("page-1_1")).not.toBe(id);
  });
});

describe("MemoryVectorStore", () => {
  it("ranks by cosine similarity and applies filters", async () => {
    const store = new MemoryVectorStore(2);
    await store.upsert("pharmacy", [
      chunk("a_0", [1, 0], { source: "confluence" }),
      chunk("b_0", [0.6, 0.8], { source: "gitlab" }),
      chunk("c_0", [0, 1], { source: "confluence" }),
    ]);

    const all = await store.search("pharmacy", [1, 0], 10);
    expect(all.map((r) => r.id)).toEqual(["a_0", "b_0", "c_0"]);
    expect(all[1]?.score).toBeCloseTo(0.6);

    const wiki = await store.search("pharmacy", [1, 0], 10, { source: "confluence" });
    expect(wiki.map((r) => r.id)).toEqual(["a_0", "c_0"]);

    const either = await store.search("pharmacy", [0, 1], 1, { source: ["gitlab", "confluence"] });
    expect(either.map((r) => r.id)).toEqual(["c_0"]);
  });

  it("deletes by parent document and reports collection info", async () => {
    const store = new MemoryVectorStore(2);
    expect(await store.getCollectionInfo("pharmacy")).toBeNull();

    await store.upsert("pharmacy", [chunk("a_0", [1, 0], {}), chunk("a_1", [1, 0], { parent_document_id: "a" }), chunk("b_0", [0, 1], {})]);
    await store.deleteByDocumentIds("pharmacy", ["a"]);

    expect(await store.getCollectionInfo("pharmacy")).toEqual({
      name: "pharmacy_knowledge",
      pointsCount: 1,
      vectorSize: 2,
      status: "green",
    });
    expect(await store.search("supply_chain", [1, 0], 5)).toEqual([]);
  });

  it("lists stored chunks in document order without vectors", async () => {
    const store = new MemoryVectorStore(2);
    expect(await store.listChunks("pharmacy")).toEqual([]);

    await store.upsert("pharmacy", [
      chunk("b_0", [0, 1], {}),
      chunk("a_1", [1, 0], { chunk_index: 1, total_chunks: 2 }),
      chunk("a_0", [1, 0], { total_chunks: 2 }),
    ]);
    const chunks = await store.listChunks("pharmacy");

    expect(chunks.map((c) => c.id)).toEqual(["a_0", "a_1", "b_0"]);
    expect(chunks[0]?.payload.content).toBe("content of a_0");
    expect(chunks[0]?.payload.chunk_id).toBe("a_0");
    expect(chunks[0]).not.toHaveProperty("vector");
  });
});

describe("chunkFromPayload", () => {
  it("rejects a payload missing required fields", () => {
    expect(chunkFromPayload("x_0", { content: "orphan text", source: "confluence" })).toBeNull();
  });

  it("rejects an unknown document type", () => {
    expect(
      chunkFromPayload("x_0", {
        content: "text",
        title: "x",
        source: "confluence",
        document_type: "spreadsheet",
        business_area: "pharmacy",
        url: "",
        last_modified: "2026-03-01T00:00:00.000Z",
        parent_document_id: "x",
        chunk_index: 0,
        total_chunks: 1,
      })
    ).toBeNull();
  });
});

describe("cosineSimilarity", () => {
  it("is zero for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([2, 0], [3, 0])).toBe(1);
  });
});
