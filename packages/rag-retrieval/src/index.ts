/**
 * @corrective-rag/retrieval
 *
 * Knowledge-base retrieval, graph enrichment and web search collaborators.
 */

export { normalizeVector, type EmbeddingProvider, type EmbeddingVector } from './embeddings/types.js';
export {
  createHashingEmbeddingProvider,
  tokenize,
  type HashingEmbeddingProviderOptions,
} from './embeddings/hashing.js';
export {
  createOpenAIEmbeddingProvider,
  type OpenAIEmbeddingProviderOptions,
} from './embeddings/openai.js';

export type { StoredChunk, VectorSearchMatch, VectorStore } from './vector-store/vector-store.js';
export { MemoryVectorStore } from './vector-store/memory.js';

export {
  VectorRetriever,
  createVectorRetriever,
  type Retriever,
  type RetrieveOptions,
  type VectorRetrieverOptions,
  type DocumentChunk,
} from './retriever.js';

export type { GraphStore, GraphHit, GraphMention, GraphLookupOptions } from './graph/graph-store.js';
export { MemoryGraphStore } from './graph/memory-graph-store.js';
export {
  GraphEnricher,
  extractTerms,
  passageKey,
  type GraphEnricherOptions,
  type PassageEnricher,
} from './graph/graph-enricher.js';

export {
  TavilyWebSearch,
  createTavilyWebSearch,
  type WebSearchProvider,
  type WebSearchOptions,
  type TavilyWebSearchOptions,
} from './web-search/tavily.js';
