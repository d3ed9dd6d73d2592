/**
 * Search module - BM25 lexical index + hybrid dense/lexical search with RRF
 */

export {
  BM25Index,
  tokenize,
  DEFAULT_BM25_PARAMETERS,
  type BM25Parameters,
  type LexicalHit,
} from "./bm25-index.js";

export {
  HybridSearchEngine,
  reciprocalRankFusion,
  RRF_K,
  type FusedResult,
  type HybridSearchEngineOptions,
} from "./hybrid-service.js";
