/**
 * @module @corrective-rag/retrieval/embeddings/hashing
 * Feature-hashing embedding provider for local development and tests.
 *
 * Each lowercased word is hashed into one of `dimension` buckets, so texts that
 * share vocabulary get a positive cosine similarity and identical texts score 1.
 */

import { createHash } from 'node:crypto';
import { normalizeVector, type EmbeddingProvider, type EmbeddingVector } from './types.js';

const DEFAULT_DIMENSION = 256;

export interface HashingEmbeddingProviderOptions {
  dimension?: number;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function bucketOf(token: string, dimension: number): number {
  return createHash('sha256').update(token).digest().readUInt32BE(0) % dimension;
}

export function createHashingEmbeddingProvider(
  options: HashingEmbeddingProviderOptions = {},
): EmbeddingProvider {
  const dimension = options.dimension ?? DEFAULT_DIMENSION;

  const embedOne = (text: string): EmbeddingVector => {
    const values: number[] = new Array<number>(dimension).fill(0);
    for (const token of tokenize(text)) {
      const bucket = bucketOf(token, dimension);
      values[bucket] = (values[bucket] ?? 0) + 1;
    }
    return normalizeVector({ dim: dimension, values });
  };

  return {
    id: `hashing-${dimension}`,
    async embed(texts: string[]) {
      return texts.map(embedOne);
    },
  };
}
