/**
 * Gemini embeddings
 * Generates vector embeddings for dense retrieval via the @google/genai SDK.
 * Requires GOOGLE_API_KEY (or an explicit apiKey).
 */

import { GoogleGenAI } from "@google/genai";
import { ErrorCode, ExternalUnavailableError } from "../errors.js";
import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import { retry } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("embeddings");

/** Max inputs per embedContent request */
const MAX_BATCH = 100;

type TaskType = "RETRIEVAL_QUERY" | "RETRIEVAL_DOCUMENT";

/**
 * Subset of the SDK's `models` surface used here; lets tests pass a fake
 */
export interface EmbedContentClient {
  embedContent(params: {
    model: string;
    contents: string[];
    config?: { taskType?: string; outputDimensionality?: number };
  }): Promise<{ embeddings?: Array<{ values?: number[] }> }>;
}

export interface GeminiEmbeddingOptions {
  apiKey?: string;
  model?: string;
  dimension?: number;
  /** Overrides the SDK client */
  client?: EmbedContentClient;
}

export class GeminiEmbeddingService implements IEmbeddingService {
  private readonly model: string;
  private readonly dimension: number;
  private readonly client: EmbedContentClient | null;

  constructor(options: GeminiEmbeddingOptions = {}) {
    this.model = options.model ?? "text-embedding-004";
    this.dimension = options.dimension ?? 768;

    if (options.client) {
      this.client = options.client;
    } else {
      const apiKey = options.apiKey ?? process.env.GOOGLE_API_KEY;
      if (apiKey) {
        this.client = new GoogleGenAI({ apiKey }).models;
      } else {
        logger.warn("GOOGLE_API_KEY not set, embeddings unavailable");
        this.client = null;
      }
    }
  }

  getDimension(): number {
    return this.dimension;
  }

  getModelId(): string {
    return this.model;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embed([text], "RETRIEVAL_QUERY");
    if (!vector) {
      throw new ExternalUnavailableError("embeddings", "Embedding response was empty", ErrorCode.EMBEDDING_FAILED);
    }
    return vector;
  }

  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += MAX_BATCH) {
      vectors.push(...(await this.embed(texts.slice(i, i + MAX_BATCH), "RETRIEVAL_DOCUMENT")));
    }
    return vectors;
  }

  private async embed(texts: string[], taskType: TaskType): Promise<number[][]> {
    const client = this.client;
    if (!client) {
      throw new ExternalUnavailableError("embeddings", "Embedding client not configured (GOOGLE_API_KEY missing)", ErrorCode.EMBEDDING_FAILED);
    }
    if (texts.length === 0) return [];

    const response = await retry(
      () =>
        client.embedContent({
          model: this.model,
          contents: texts,
          config: { taskType, outputDimensionality: this.dimension },
        }),
      {
        maxAttempts: 3,
        initialDelayMs: 500,
        onRetry: (error, attempt) => logger.warn({ err: error, attempt }, "Embedding request failed, retrying"),
      }
    );

    const vectors = (response.embeddings ?? []).map((embedding) => embedding.values ?? []);
    if (vectors.length !== texts.length || vectors.some((v) => v.length === 0)) {
      throw new ExternalUnavailableError(
        "embeddings",
        `Expected ${texts.length} embeddings, received ${vectors.filter((v) => v.length > 0).length}`,
        ErrorCode.EMBEDDING_FAILED
      );
    }
    return vectors;
  }
}

export function createEmbeddingService(options?: GeminiEmbeddingOptions): GeminiEmbeddingService {
  return new GeminiEmbeddingService(options);
}
