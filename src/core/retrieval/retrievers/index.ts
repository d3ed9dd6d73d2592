export { DocumentationRetriever } from "./documentation-retriever.js";
export { CodeRetriever } from "./code-retriever.js";
export { LineageRetriever, extractRelatedEntities, RELATED_SCORE_FACTOR } from "./lineage-retriever.js";
export { GraphRetriever, formatNode, type ScriptCaller } from "./graph-retriever.js";
