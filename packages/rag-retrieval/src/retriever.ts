/**
 * @module @corrective-rag/retrieval/retriever
 * Query-time retrieval over a vector store
 */

import type { Passage } from '@corrective-rag/contracts';
import { clamp, createRagError, getLogger, isRagError } from '@corrective-rag/core';
import type { EmbeddingProvider } from './embeddings/types.js';
import type { StoredChunk, VectorStore } from './vector-store/vector-store.js';

export interface RetrieveOptions {
  k: number;
  similarityThreshold: number;
  signal?: AbortSignal;
}

/**
 * Knowledge-base retrieval. Returns at most `k` passages with `score >= similarityThreshold`,
 * best first. An empty array is a valid result.
 */
export interface Retriever {
  retrieve(query: string, options: RetrieveOptions): Promise<Passage[]>;
}

export interface VectorRetrieverOptions {
  store: VectorStore;
  embeddings: EmbeddingProvider;
}

export interface DocumentChunk {
  sourceId: string;
  text: string;
  chunkIndex?: number;
  metadata?: Record<string, unknown>;
}

const logger = getLogger('rag:retrieval:vector');

export class VectorRetriever implements Retriever {
  private readonly store: VectorStore;
  private readonly embeddings: EmbeddingProvider;

  constructor(options: VectorRetrieverOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
  }

  async retrieve(query: string, options: RetrieveOptions): Promise<Passage[]> {
    const { k, similarityThreshold, signal } = options;

    try {
      const [vector] = await this.embeddings.embed([query], { signal });
      if (!vector) {
        return [];
      }

      const matches = await this.store.search(vector, k);
      const passages = matches
        .map(({ chunk, score }) => ({
          sourceId: chunk.sourceId,
          content: chunk.text,
          score: clamp(score),
          chunkIndex: chunk.chunkIndex,
          origin: 'vector' as const,
          metadata: chunk.metadata,
        }))
        .filter(passage => passage.score >= similarityThreshold)
        .slice(0, k);

      logger.debug('Vector search complete', {
        matches: matches.length,
        kept: passages.length,
        threshold: similarityThreshold,
      });

      return passages;
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      throw createRagError(
        'RAG_RETRIEVAL_ERROR',
        `Vector search failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Embed and store pre-chunked document text
   */
  async index(chunks: DocumentChunk[]): Promise<number> {
    if (chunks.length === 0) {
      return 0;
    }

    const vectors = await this.embeddings.embed(chunks.map(chunk => chunk.text));
    const stored: StoredChunk[] = [];

    chunks.forEach((chunk, i) => {
      const embedding = vectors[i];
      if (!embedding) {
        return;
      }
      stored.push({
        chunkId: `${chunk.sourceId}#${chunk.chunkIndex ?? i}`,
        sourceId: chunk.sourceId,
        chunkIndex: chunk.chunkIndex,
        text: chunk.text,
        metadata: chunk.metadata,
        embedding,
      });
    });

    await this.store.upsert(stored);
    logger.info('Indexed chunks', { count: stored.length });
    return stored.length;
  }
}

export function createVectorRetriever(options: VectorRetrieverOptions): VectorRetriever {
  return new VectorRetriever(options);
}
