/**
 * @module @corrective-rag/retrieval/vector-store/vector-store
 * Vector store interface for abstracting storage backends
 */

import type { EmbeddingVector } from '../embeddings/types.js';

export interface StoredChunk {
  chunkId: string;
  sourceId: string;
  chunkIndex?: number;
  text: string;
  metadata?: Record<string, unknown>;
  embedding: EmbeddingVector;
}

export interface VectorSearchMatch {
  chunk: StoredChunk;
  /** Raw similarity reported by the backend (cosine for the in-memory store) */
  score: number;
}

export interface VectorStore {
  /**
   * Insert or replace chunks by `chunkId`
   */
  upsert(chunks: StoredChunk[]): Promise<void>;

  /**
   * Best matches first, at most `limit`
   */
  search(vector: EmbeddingVector, limit: number): Promise<VectorSearchMatch[]>;

  deleteBySource?(sourceId: string): Promise<number>;

  count?(): Promise<number>;
}
