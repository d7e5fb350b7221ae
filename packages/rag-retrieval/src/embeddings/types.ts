export interface EmbeddingVector {
  dim: number;
  values: number[];
}

export interface EmbeddingProvider {
  readonly id: string;
  embed(texts: string[], options?: { signal?: AbortSignal }): Promise<EmbeddingVector[]>;
}

export function normalizeVector(vector: EmbeddingVector): EmbeddingVector {
  const norm = Math.sqrt(vector.values.reduce((acc, value) => acc + value * value, 0));
  if (norm === 0) {
    return vector;
  }
  return {
    dim: vector.dim,
    values: vector.values.map(value => value / norm),
  };
}
