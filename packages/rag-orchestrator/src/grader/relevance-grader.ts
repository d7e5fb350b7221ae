/**
 * Relevance Grader
 *
 * Judges whether a passage set is sufficient grounding for a query.
 * Exactly two outcomes; an empty set or a grader fault is `not_relevant`.
 */

import { z } from 'zod';
import type { GradeResult, Passage } from '@corrective-rag/contracts';
import { describeError, getLogger } from '@corrective-rag/core';
import type { LLMProvider } from '../llm/llm-provider.js';
import { arrayToToon } from '../utils/toon.js';
import { fillTemplate } from '../utils/template.js';
import { GRADER_PROMPT_TEMPLATE, GRADER_SYSTEM_PROMPT } from './prompts.js';

const logger = getLogger('rag:orchestrator:grader');

export interface GradeOutcome {
  verdict: GradeResult;
  reasoning: string;
}

export interface RelevanceGraderOptions {
  llm: LLMProvider;
  /** Passages shown to the model per grading call */
  maxPassages?: number;
  /** Characters of each passage shown to the model */
  passageChars?: number;
}

const GraderResponseSchema = z.object({
  relevant: z.union([
    z.boolean(),
    z.enum(['relevant', 'not_relevant', 'not relevant', 'yes', 'no']).transform(
      value => value === 'relevant' || value === 'yes',
    ),
  ]),
  reasoning: z.string().default(''),
});

export class RelevanceGrader {
  private readonly llm: LLMProvider;
  private readonly maxPassages: number;
  private readonly passageChars: number;

  constructor(options: RelevanceGraderOptions) {
    this.llm = options.llm;
    this.maxPassages = options.maxPassages ?? 8;
    this.passageChars = options.passageChars ?? 600;
  }

  async grade(
    query: string,
    passages: readonly Passage[],
    options: { signal?: AbortSignal } = {},
  ): Promise<GradeOutcome> {
    if (passages.length === 0) {
      return { verdict: 'not_relevant', reasoning: 'No passages to grade' };
    }

    const table = arrayToToon(
      passages.slice(0, this.maxPassages).map((passage, i) => ({
        id: i + 1,
        source: passage.sourceId,
        score: passage.score.toFixed(2),
        text: passage.content.slice(0, this.passageChars),
      })),
      ['id', 'source', 'score', 'text'],
    );

    try {
      const response = await this.llm.completeJSON({
        prompt: fillTemplate(GRADER_PROMPT_TEMPLATE, { query, passages: table }),
        systemPrompt: GRADER_SYSTEM_PROMPT,
        maxTokens: 150,
        temperature: 0,
        signal: options.signal,
        schema: GraderResponseSchema,
      });

      const verdict: GradeResult = response.relevant ? 'relevant' : 'not_relevant';
      logger.info('Graded passages', { verdict, count: passages.length });
      return { verdict, reasoning: response.reasoning };
    } catch (error) {
      logger.warn('Grader failed, treating passages as not relevant', {
        error: describeError(error),
      });
      return { verdict: 'not_relevant', reasoning: 'Grader unavailable' };
    }
  }
}

export function createRelevanceGrader(options: RelevanceGraderOptions): RelevanceGrader {
  return new RelevanceGrader(options);
}
