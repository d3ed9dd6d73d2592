/**
 * IEmbeddingService - text to dense vector
 *
 * @module
 */

export interface IEmbeddingService {
  embedQuery(text: string): Promise<number[]>;

  /** One vector per input, in input order */
  embedDocuments(texts: readonly string[]): Promise<number[][]>;

  getDimension(): number;

  getModelId(): string;
}
