/**
 * @module @corrective-rag/retrieval/web-search/tavily
 * Tavily search API client
 */

import { z } from 'zod';
import type { Passage } from '@corrective-rag/contracts';
import { clamp, createRagError, getLogger } from '@corrective-rag/core';

export interface WebSearchOptions {
  signal?: AbortSignal;
}

export interface WebSearchProvider {
  readonly id: string;
  search(query: string, options?: WebSearchOptions): Promise<Passage[]>;
}

export interface TavilyWebSearchOptions {
  apiKey: string;
  maxResults?: number;
  searchDepth?: 'basic' | 'advanced';
  baseURL?: string;
  timeout?: number;
}

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().default(''),
      score: z.number().optional(),
    }),
  ),
});

const DEFAULT_BASE_URL = 'https://api.tavily.com';
// Tavily scores are unavailable for some result types
const DEFAULT_RESULT_SCORE = 0.5;

const logger = getLogger('rag:retrieval:web');

export class TavilyWebSearch implements WebSearchProvider {
  readonly id = 'tavily';

  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly searchDepth: 'basic' | 'advanced';
  private readonly baseURL: string;
  private readonly timeout: number;

  constructor(options: TavilyWebSearchOptions) {
    this.apiKey = options.apiKey;
    this.maxResults = options.maxResults ?? 5;
    this.searchDepth = options.searchDepth ?? 'basic';
    this.baseURL = (options.baseURL ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeout = options.timeout ?? 15000;
  }

  async search(query: string, options: WebSearchOptions = {}): Promise<Passage[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(`${this.baseURL}/search`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          query,
          search_depth: this.searchDepth,
          max_results: this.maxResults,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Tavily API error: ${response.status} ${response.statusText}`);
      }

      const data = TavilyResponseSchema.parse(await response.json());
      const passages = data.results.slice(0, this.maxResults).map((result): Passage => ({
        sourceId: result.url,
        content: result.title ? `${result.title}\n${result.content}` : result.content,
        score: clamp(result.score ?? DEFAULT_RESULT_SCORE),
        origin: 'web',
        metadata: { title: result.title, url: result.url },
      }));

      logger.info('Web search complete', { results: passages.length });
      return passages;
    } catch (error) {
      throw createRagError(
        'RAG_WEB_SEARCH_ERROR',
        `Web search failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

export function createTavilyWebSearch(options: TavilyWebSearchOptions): TavilyWebSearch {
  return new TavilyWebSearch(options);
}
