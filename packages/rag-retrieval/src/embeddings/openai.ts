/**
 * @module @corrective-rag/retrieval/embeddings/openai
 * OpenAI embedding provider over the REST API
 */

import { z } from 'zod';
import { createRagError, getLogger } from '@corrective-rag/core';
import type { EmbeddingProvider, EmbeddingVector } from './types.js';

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  model?: string;
  dimension?: number;
  batchSize?: number;
  timeout?: number;
  retries?: number;
  /** Base delay for exponential backoff between retries */
  retryDelayMs?: number;
  baseURL?: string;
}

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

const logger = getLogger('rag:retrieval:embeddings');

class ClientError extends Error {}

function errorMessageFrom(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = ErrorBodySchema.safeParse(json);
  return parsed.success ? parsed.data.error.message : undefined;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Create OpenAI embedding provider
 */
export function createOpenAIEmbeddingProvider(options: OpenAIEmbeddingProviderOptions): EmbeddingProvider {
  const {
    apiKey,
    model = DEFAULT_MODEL,
    dimension,
    batchSize = DEFAULT_BATCH_SIZE,
    timeout = DEFAULT_TIMEOUT,
    retries = DEFAULT_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    baseURL = DEFAULT_BASE_URL,
  } = options;

  const url = `${baseURL.replace(/\/$/, '')}/embeddings`;

  async function requestOnce(texts: string[], signal: AbortSignal | undefined): Promise<EmbeddingVector[]> {
    const body: Record<string, unknown> = { model, input: texts };
    // Only text-embedding-3 models accept a custom dimension
    if (dimension && model.includes('embedding-3')) {
      body.dimensions = dimension;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!response.ok) {
      const text = await response.text();
      const message =
        errorMessageFrom(text) ?? `OpenAI API error: ${response.status} ${response.statusText}`;

      // 4xx other than rate limiting will not succeed on retry
      if (response.status >= 400 && response.status < 500 && response.status !== 429) {
        throw new ClientError(message);
      }
      throw new Error(message);
    }

    const data = EmbeddingResponseSchema.parse(await response.json());
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map(item => ({ dim: item.embedding.length, values: item.embedding }));
  }

  async function embedBatch(texts: string[], signal: AbortSignal | undefined): Promise<EmbeddingVector[]> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await requestOnce(texts, signal);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (error instanceof ClientError || signal?.aborted) {
          break;
        }
        if (attempt < retries) {
          logger.warn('Embedding request failed, retrying', { attempt: attempt + 1, error: lastError });
          await sleep(retryDelayMs * 2 ** attempt);
        }
      }
    }

    throw createRagError(
      'RAG_RETRIEVAL_ERROR',
      `Embedding request failed: ${lastError?.message ?? 'unknown error'}`,
      { model },
    );
  }

  return {
    id: `openai-${model}`,
    async embed(texts: string[], embedOptions?: { signal?: AbortSignal }): Promise<EmbeddingVector[]> {
      if (texts.length === 0) {
        return [];
      }

      const vectors: EmbeddingVector[] = [];
      for (let i = 0; i < texts.length; i += batchSize) {
        vectors.push(...(await embedBatch(texts.slice(i, i + batchSize), embedOptions?.signal)));
      }
      return vectors;
    },
  };
}
