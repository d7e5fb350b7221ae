/**
 * Query Rewriter
 *
 * Produces a differently phrased search query after a failed grading.
 * Duplicate detection is left to the workflow, which knows every query tried.
 */

import { getLogger } from '@corrective-rag/core';
import type { LLMProvider } from '../llm/llm-provider.js';
import { fillTemplate } from '../utils/template.js';
import { REWRITER_PROMPT_TEMPLATE, REWRITER_SYSTEM_PROMPT } from './prompts.js';

const logger = getLogger('rag:orchestrator:rewriter');

export interface RewriteContext {
  /** Why the last retrieval was rejected (grader reasoning) */
  reason: string;
  triedQueries: readonly string[];
  signal?: AbortSignal;
}

export interface QueryRewriterOptions {
  llm: LLMProvider;
}

/**
 * Comparison key for detecting repeated queries
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * First line of the completion with wrapping quotes and a "Query:" label removed
 */
export function cleanRewrite(raw: string): string {
  const firstLine = raw.trim().split('\n')[0] ?? '';
  return firstLine
    .replace(/^(?:new\s+)?(?:search\s+)?query\s*:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();
}

export class QueryRewriter {
  private readonly llm: LLMProvider;

  constructor(options: QueryRewriterOptions) {
    this.llm = options.llm;
  }

  async rewrite(originalQuery: string, currentQuery: string, context: RewriteContext): Promise<string> {
    const tried = context.triedQueries.length > 0
      ? context.triedQueries.map(query => `- ${query}`).join('\n')
      : '- (none)';

    const raw = await this.llm.complete({
      prompt: fillTemplate(REWRITER_PROMPT_TEMPLATE, {
        original: originalQuery,
        current: currentQuery,
        reason: context.reason || 'passages were not relevant',
        tried,
      }),
      systemPrompt: REWRITER_SYSTEM_PROMPT,
      maxTokens: 100,
      temperature: 0.7,
      signal: context.signal,
    });

    const rewritten = cleanRewrite(raw);
    logger.info('Rewrote query', { from: currentQuery, to: rewritten });
    return rewritten;
  }
}

export function createQueryRewriter(options: QueryRewriterOptions): QueryRewriter {
  return new QueryRewriter(options);
}
