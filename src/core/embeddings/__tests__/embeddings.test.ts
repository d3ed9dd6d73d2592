import { describe, it, expect, vi, afterEach } from "vitest";
import { GeminiEmbeddingService, type EmbedContentClient } from "../index.js";
import { ExternalUnavailableError } from "../../errors.js";

/** Returns `[text.length, 1]` for every input */
class FakeEmbedClient implements EmbedContentClient {
  embedContent = vi.fn(async (params: { contents: string[] }) => ({
    embeddings: params.contents.map((text) => ({ values: [text.length, 1] })),
  }));
}

function fakeClient(): FakeEmbedClient {
  return new FakeEmbedClient();
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("GeminiEmbeddingService", () => {
  it("embeds a query with the query task type and configured dimension", async () => {
    const client = fakeClient();
    const service = new GeminiEmbeddingService({ client, model: "test-model", dimension: 2 });

    expect(await service.embedQuery("refill")).toEqual([6, 1]);
    expect(client.embedContent).toHaveBeenCalledWith({
      model: "test-model",
      contents: ["refill"],
      config: { taskType: "RETRIEVAL_QUERY", outputDimensionality: 2 },
    });
    expect(service.getModelId()).toBe("test-model");
    expect(service.getDimension()).toBe(2);
  });

  it("splits documents into batches of one hundred", async () => {
    const client = fakeClient();
    const service = new GeminiEmbeddingService({ client, dimension: 2 });
    const texts = Array.from({ length: 150 }, (_, i) => `doc ${i}`);

    const vectors = await service.embedDocuments(texts);

    expect(vectors).toHaveLength(150);
    expect(vectors[149]).toEqual([7, 1]);
    expect(client.embedContent).toHaveBeenCalledTimes(2);
  });

  it("retries a transient failure", async () => {
    const client = fakeClient();
    client.embedContent.mockRejectedValueOnce(new Error("503 unavailable"));
    const service = new GeminiEmbeddingService({ client, dimension: 2 });

    expect(await service.embedQuery("stock")).toEqual([5, 1]);
    expect(client.embedContent).toHaveBeenCalledTimes(2);
  });

  it("rejects a short response", async () => {
    const client: EmbedContentClient = {
      embedContent: vi.fn(async () => ({ embeddings: [{ values: [1, 0] }] })),
    };
    const service = new GeminiEmbeddingService({ client, dimension: 2 });
    await expect(service.embedDocuments(["a", "b"])).rejects.toThrow("Expected 2 embeddings, received 1");
  });

  it("is unavailable without an API key", async () => {
    vi.stubEnv("GOOGLE_API_KEY", "");
    const service = new GeminiEmbeddingService();
    await expect(service.embedQuery("refill")).rejects.toThrow(ExternalUnavailableError);
  });
});
