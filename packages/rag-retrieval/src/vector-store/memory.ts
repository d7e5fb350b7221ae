/**
 * @module @corrective-rag/retrieval/vector-store/memory
 * In-process vector store with brute-force cosine search
 */

import { cosineSimilarity } from '@corrective-rag/core';
import type { EmbeddingVector } from '../embeddings/types.js';
import type { StoredChunk, VectorSearchMatch, VectorStore } from './vector-store.js';

export class MemoryVectorStore implements VectorStore {
  private readonly chunks = new Map<string, StoredChunk>();

  async upsert(chunks: StoredChunk[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, chunk);
    }
  }

  async search(vector: EmbeddingVector, limit: number): Promise<VectorSearchMatch[]> {
    if (limit <= 0) {
      return [];
    }

    const matches: VectorSearchMatch[] = [];
    for (const chunk of this.chunks.values()) {
      if (chunk.embedding.dim !== vector.dim) {
        continue;
      }
      matches.push({ chunk, score: cosineSimilarity(vector.values, chunk.embedding.values) });
    }

    // Stable on ties: insertion order
    return matches.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async deleteBySource(sourceId: string): Promise<number> {
    let removed = 0;
    for (const [chunkId, chunk] of this.chunks) {
      if (chunk.sourceId === sourceId) {
        this.chunks.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }
}
