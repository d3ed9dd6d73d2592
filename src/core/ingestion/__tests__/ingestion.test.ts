import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ChangeDetector } from "../change-detector.js";
import { DocumentProcessor } from "../document-processor.js";
import { IngestionService } from "../ingestion-service.js";
import { SourceConfigResolver } from "../../config/source-config.js";
import { IngestionError } from "../../errors.js";
import type { IDocumentSource } from "../../interfaces/IDocumentSource.js";
import type { IEmbeddingService } from "../../interfaces/IEmbeddingService.js";
import { HybridSearchEngine } from "../../search/hybrid-service.js";
import { MemoryVectorStore } from "../../vector/memory-store.js";
import type { Document, EmbeddedChunk } from "../../../types/index.js";

// =============================================================================
// Fakes
// =============================================================================

function makeDoc(id: string, content: string, source = "confluence", lastModified = "2026-03-01T00:00:00.000Z"): Document {
  return {
    id,
    content,
    title: `Title ${id}`,
    source,
    documentType: "wiki",
    businessArea: "pharmacy",
    lastModified: new Date(lastModified),
    url: `https://wiki.example/${id}`,
    metadata: { space: "PHARM" },
  };
}

function storedChunk(documentId: string, content: string): EmbeddedChunk {
  return {
    id: `${documentId}_chunk_0`,
    vector: [1, 0],
    payload: {
      content,
      title: `Title ${documentId}`,
      source: "confluence",
      document_type: "wiki",
      business_area: "pharmacy",
      url: "",
      last_modified: "2026-03-01T00:00:00.000Z",
      parent_document_id: documentId,
      chunk_index: 0,
      total_chunks: 1,
    },
  };
}

class FakeSource implements IDocumentSource {
  readonly source: string;
  documents: Document[];
  fetchAll = vi.fn(async () => [...this.documents]);
  fetchSince = vi.fn(async (since: Date) => this.documents.filter((doc) => doc.lastModified > since));
  getAllDocumentIds = vi.fn(async () => this.documents.map((doc) => doc.id));

  constructor(source: string, documents: Document[]) {
    this.source = source;
    this.documents = documents;
  }
}

class FailingSource extends FakeSource {
  override fetchAll = vi.fn(async (): Promise<Document[]> => {
    throw new Error("source offline");
  });
}

function createEmbeddings(failOnCall?: number): IEmbeddingService {
  let calls = 0;
  return {
    embedQuery: vi.fn(async () => [1, 0]),
    embedDocuments: vi.fn(async (texts: readonly string[]) => {
      calls++;
      if (calls === failOnCall) throw new Error("quota exceeded");
      return texts.map(() => [1, 0]);
    }),
    getDimension: () => 2,
    getModelId: () => "test-embedding",
  };
}

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "kr-ingestion-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

// =============================================================================
// ChangeDetector
// =============================================================================

describe("ChangeDetector", () => {
  it("computes exact added, deleted and existing sets", async () => {
    const detector = new ChangeDetector(path.join(tempDir, "meta.json"));
    await detector.load();
    await detector.updateSyncMetadata("pharmacy", "confluence", ["a", "b", "c"]);

    const changes = detector.detectChanges("pharmacy", "confluence", ["b", "c", "d", "e"]);

    expect(changes).toEqual({ added: ["d", "e"], deleted: ["a"], existing: ["b", "c"] });
  });

  it("starts empty without a metadata file", async () => {
    const detector = new ChangeDetector(path.join(tempDir, "missing.json"));
    await detector.load();
    expect(detector.getLastSyncTimestamp("pharmacy", "confluence")).toBeNull();
    expect(detector.getStoredDocumentIds("pharmacy", "confluence")).toEqual([]);
  });

  it("persists sync metadata across instances", async () => {
    const file = path.join(tempDir, "meta.json");
    const first = new ChangeDetector(file);
    await first.load();
    await first.updateSyncMetadata("pharmacy", "confluence", ["a"], new Date("2026-04-01T12:00:00.000Z"));

    const second = new ChangeDetector(file);
    await second.load();

    expect(second.getLastSyncTimestamp("pharmacy", "confluence")?.toISOString()).toBe("2026-04-01T12:00:00.000Z");
    expect(second.getStoredDocumentIds("pharmacy", "confluence")).toEqual(["a"]);
    expect(JSON.parse(await fs.readFile(file, "utf-8"))).toEqual({
      pharmacy_confluence: {
        last_sync_timestamp: "2026-04-01T12:00:00.000Z",
        document_ids: ["a"],
        document_count: 1,
      },
    });
  });

  it("rejects a malformed metadata file", async () => {
    const file = path.join(tempDir, "meta.json");
    await fs.writeFile(file, JSON.stringify({ pharmacy_confluence: { document_ids: "nope" } }));
    await expect(new ChangeDetector(file).load()).rejects.toThrow(IngestionError);
  });
});

// =============================================================================
// DocumentProcessor
// =============================================================================

describe("DocumentProcessor", () => {
  it("builds chunk payloads with flattened metadata", async () => {
    const processor = new DocumentProcessor({ embeddings: createEmbeddings(), chunkSize: 1000, chunkOverlap: 0, batchSize: 10 });

    const chunks = await processor.chunkDocument(makeDoc("doc-1", "Refills need a valid prescription."));

    expect(chunks).toEqual([
      {
        id: "doc-1_chunk_0",
        payload: {
          space: "PHARM",
          content: "Refills need a valid prescription.",
          title: "Title doc-1",
          source: "confluence",
          document_type: "wiki",
          business_area: "pharmacy",
          url: "https://wiki.example/doc-1",
          last_modified: "2026-03-01T00:00:00.000Z",
          parent_document_id: "doc-1",
          chunk_index: 0,
          total_chunks: 1,
        },
      },
    ]);
  });

  it("splits long content into bounded chunks", async () => {
    const processor = new DocumentProcessor({ embeddings: createEmbeddings(), chunkSize: 20, chunkOverlap: 0, batchSize: 10 });

    const chunks = await processor.chunkDocument(makeDoc("doc-2", "alpha beta gamma delta epsilon zeta eta theta"));

    expect(chunks.length).toBeGreaterThan(1);
    chunks.forEach((chunk, i) => {
      expect(chunk.payload.content.length).toBeLessThanOrEqual(20);
      expect(chunk.payload.chunk_index).toBe(i);
      expect(chunk.payload.total_chunks).toBe(chunks.length);
    });
  });

  it("skips chunks of a failed embedding batch", async () => {
    const processor = new DocumentProcessor({ embeddings: createEmbeddings(2), chunkSize: 1000, chunkOverlap: 0, batchSize: 1 });

    const result = await processor.processDocuments([makeDoc("a", "one"), makeDoc("b", "two"), makeDoc("c", "three")]);

    expect(result.chunks.map((c) => c.id)).toEqual(["a_chunk_0", "b_chunk_0", "c_chunk_0"]);
    expect(result.embedded.map((c) => c.id)).toEqual(["a_chunk_0", "c_chunk_0"]);
    expect(result.failedBatches).toEqual([{ start: 1, size: 1, error: "quota exceeded" }]);
  });
});

// =============================================================================
// IngestionService
// =============================================================================

describe("IngestionService", () => {
  async function createService(sourcesConfig = "pharmacy:confluence(space=PHARM)") {
    const vectorStore = new MemoryVectorStore(2);
    const embeddings = createEmbeddings();
    const engine = new HybridSearchEngine({ vectorStore, embeddings });
    const changeDetector = new ChangeDetector(path.join(tempDir, "meta.json"));
    await changeDetector.load();
    const service = new IngestionService({
      processor: new DocumentProcessor({ embeddings, chunkSize: 1000, chunkOverlap: 0, batchSize: 10 }),
      vectorStore,
      search: engine,
      changeDetector,
      resolver: SourceConfigResolver.fromStrings(["pharmacy"], sourcesConfig),
    });
    return { service, vectorStore, engine, changeDetector };
  }

  it("falls back to a full sync on first incremental run", async () => {
    const { service, vectorStore, engine } = await createService();
    const source = new FakeSource("confluence", [
      makeDoc("a", "refill policy window"),
      makeDoc("b", "shipping schedule"),
      makeDoc("c", "store hours"),
    ]);
    service.registerSource("pharmacy", "confluence", source);

    const result = await service.ingest("pharmacy", "confluence");

    expect(result).toMatchObject({
      status: "success",
      mode: "full",
      documentsProcessed: 3,
      chunksCreated: 3,
      chunksSkipped: 0,
      documentsDeleted: 0,
    });
    expect(source.fetchAll).toHaveBeenCalledTimes(1);
    expect(source.fetchSince).not.toHaveBeenCalled();
    expect((await vectorStore.getCollectionInfo("pharmacy"))?.pointsCount).toBe(3);
    expect((await engine.lexicalSearch("pharmacy", "refill", 5)).map((r) => r.id)).toEqual(["a_chunk_0"]);
  });

  it("removes documents that disappeared from the source", async () => {
    const { service, vectorStore, engine, changeDetector } = await createService();
    const source = new FakeSource("confluence", [
      makeDoc("a", "refill policy window"),
      makeDoc("b", "shipping schedule"),
      makeDoc("c", "store hours"),
    ]);
    service.registerSource("pharmacy", "confluence", source);
    await service.ingest("pharmacy", "confluence");

    source.documents = source.documents.filter((doc) => doc.id !== "a");
    const result = await service.ingest("pharmacy", "confluence");

    expect(source.fetchSince).toHaveBeenCalledTimes(1);
    expect(result.mode).toBe("incremental");
    expect(result.documentsProcessed).toBe(0);
    expect(result.documentsDeleted).toBe(1);
    expect((await vectorStore.getCollectionInfo("pharmacy"))?.pointsCount).toBe(2);
    expect(engine.lexicalIndexSize("pharmacy")).toBe(2);
    expect(await engine.lexicalSearch("pharmacy", "refill", 5)).toEqual([]);
    expect(changeDetector.getStoredDocumentIds("pharmacy", "confluence")).toEqual(["b", "c"]);
  });

  it("indexes the whole area, not only the last source", async () => {
    const { service, engine } = await createService("pharmacy:confluence(space=PHARM);pharmacy:firestore(collection=faq)");
    service.registerSource("pharmacy", "confluence", new FakeSource("confluence", [makeDoc("a", "refill policy")]));
    service.registerSource("pharmacy", "firestore", new FakeSource("firestore", [makeDoc("f1", "faq entry", "firestore")]));

    await service.ingest("pharmacy", "confluence");
    await service.ingest("pharmacy", "firestore");

    expect(engine.lexicalIndexSize("pharmacy")).toBe(2);
  });

  it("refuses code graph sources", async () => {
    const { service } = await createService();
    await expect(service.ingest("pharmacy", "codeql")).rejects.toThrow(IngestionError);
    expect(() => service.registerSource("pharmacy", "codeql", new FakeSource("codeql", []))).toThrow(IngestionError);
  });

  it("records per-source outcomes when ingesting an area", async () => {
    const { service } = await createService(
      "pharmacy:confluence(space=PHARM);pharmacy:firestore(collection=faq);pharmacy:jira;pharmacy:codeql(enabled=true)"
    );
    service.registerSource("pharmacy", "confluence", new FakeSource("confluence", [makeDoc("a", "refill policy")]));
    service.registerSource("pharmacy", "firestore", new FailingSource("firestore", []));

    const outcomes = await service.ingestAll("pharmacy", "full");

    expect([...outcomes.keys()]).toEqual(["confluence", "firestore", "jira"]);
    expect(outcomes.get("confluence")?.status).toBe("success");
    expect(outcomes.get("firestore")).toEqual({ status: "error", error: "source offline" });
    expect(outcomes.get("jira")).toEqual({ status: "skipped", reason: "no_document_source" });
  });

  it("restores the lexical index from the vector index", async () => {
    const { service, vectorStore, engine } = await createService();
    await vectorStore.upsert("pharmacy", [storedChunk("a", "refill policy window"), storedChunk("b", "shipping schedule")]);

    expect(await service.restoreLexicalIndex("pharmacy")).toBe(2);
    expect((await engine.lexicalSearch("pharmacy", "refill", 5)).map((r) => r.id)).toEqual(["a_chunk_0"]);

    service.registerSource(
      "pharmacy",
      "confluence",
      new FakeSource("confluence", [makeDoc("a", "delivery window"), makeDoc("b", "shipping schedule")])
    );
    await service.ingest("pharmacy", "confluence");

    expect(engine.lexicalIndexSize("pharmacy")).toBe(2);
    expect(await engine.lexicalSearch("pharmacy", "refill", 5)).toEqual([]);
    expect((await engine.lexicalSearch("pharmacy", "delivery", 5)).map((r) => r.id)).toEqual(["a_chunk_0"]);
  });

  it("drops restored chunks of documents deleted at the source", async () => {
    const { service, vectorStore, engine, changeDetector } = await createService();
    await vectorStore.upsert("pharmacy", [storedChunk("a", "refill policy"), storedChunk("c", "recalled lot notice")]);
    await changeDetector.updateSyncMetadata("pharmacy", "confluence", ["a", "c"], new Date("2026-04-01T00:00:00.000Z"));
    await service.restoreLexicalIndex("pharmacy");
    service.registerSource("pharmacy", "confluence", new FakeSource("confluence", [makeDoc("a", "refill policy")]));

    const result = await service.ingest("pharmacy", "confluence");

    expect(result.mode).toBe("incremental");
    expect(result.documentsProcessed).toBe(0);
    expect(result.documentsDeleted).toBe(1);
    expect(engine.lexicalIndexSize("pharmacy")).toBe(1);
    expect((await engine.lexicalSearch("pharmacy", "refill", 5)).map((r) => r.id)).toEqual(["a_chunk_0"]);
    expect((await vectorStore.listChunks("pharmacy")).map((c) => c.id)).toEqual(["a_chunk_0"]);
  });

  it("leaves an empty area without a lexical index", async () => {
    const { service, engine } = await createService();
    expect(await service.restoreLexicalIndex("pharmacy")).toBe(0);
    expect(engine.hasLexicalIndex("pharmacy")).toBe(false);
  });
});
