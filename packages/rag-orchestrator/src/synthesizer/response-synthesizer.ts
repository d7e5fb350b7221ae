/**
 * Response Synthesizer
 *
 * Turns the final workflow state into an answer. Confidence and the prompt
 * context are fixed before generation starts, so callers can publish metadata
 * ahead of the token stream; citations are resolved once the answer is complete.
 */

import type { Citation, ConversationTurn, Intent, Passage } from '@corrective-rag/contracts';
import { clamp, getLogger, mean } from '@corrective-rag/core';
import { calculate, formatNumber } from '../calculator/calculator.js';
import type { LLMProvider } from '../llm/llm-provider.js';
import { arrayToToon } from '../utils/toon.js';
import { fillTemplate } from '../utils/template.js';
import { buildCitations } from './citations.js';
import {
  DECLINE_MESSAGE,
  DIRECT_PROMPT_TEMPLATE,
  DIRECT_SYSTEM_PROMPT,
  ERROR_DECLINE_MESSAGE,
  GREETING_MESSAGE,
  SYNTHESIS_PROMPT_TEMPLATE,
  SYNTHESIS_SYSTEM_PROMPT,
} from './prompts.js';

const logger = getLogger('rag:orchestrator:synthesizer');

export type Grounding = 'direct' | 'grounded' | 'insufficient';

export interface SynthesisInput {
  query: string;
  intent: Intent;
  /** Router confidence; the confidence of direct answers */
  intentConfidence: number;
  grounding: Grounding;
  passages: readonly Passage[];
  usedWebSearch: boolean;
  errorFlagged?: boolean;
  history?: readonly ConversationTurn[];
}

export interface SynthesisPlan {
  confidence: number;
  /** Passages placed in the prompt; citations only ever point at these */
  context: readonly Passage[];
  reasoning: string;
  tokens(signal?: AbortSignal): AsyncIterable<string>;
  citations(answer: string): Citation[];
}

export interface SynthesisResult {
  answer: string;
  citations: Citation[];
  confidence: number;
  reasoning: string;
}

export interface ResponseSynthesizerOptions {
  llm: LLMProvider;
  maxContextPassages?: number;
  /** Multiplier applied to grounded confidence when passages came from the web */
  webSearchConfidenceFactor?: number;
  historyTurns?: number;
}

const TOP_SCORES = 3;

/**
 * Split fixed text into word tokens that concatenate back to the original
 */
export function splitIntoTokens(text: string): string[] {
  return text.match(/\S+\s*/g) ?? [];
}

/**
 * Mean of the best three passage scores, reduced by `webFactor` for web results
 */
export function groundedConfidence(
  passages: readonly Passage[],
  usedWebSearch: boolean,
  webFactor: number,
): number {
  const top = passages
    .map(passage => passage.score)
    .sort((a, b) => b - a)
    .slice(0, TOP_SCORES);
  const base = clamp(mean(top));
  return usedWebSearch ? clamp(base * webFactor) : base;
}

/**
 * Prompt context for a passage set. Sets longer than `limit` keep up to half
 * the slots for graph passages; the rest go to the other passages in order.
 */
export function selectContext(passages: readonly Passage[], limit: number): Passage[] {
  if (passages.length <= limit) {
    return [...passages];
  }

  const graph = passages.filter(passage => passage.origin === 'graph');
  const reserved = Math.min(graph.length, Math.floor(limit / 2));
  const others = passages.filter(passage => passage.origin !== 'graph').slice(0, limit - reserved);
  return [...others, ...graph.slice(0, limit - others.length)];
}

async function* fixedTokens(text: string): AsyncIterable<string> {
  for (const token of splitIntoTokens(text)) {
    yield token;
  }
}

export class ResponseSynthesizer {
  private readonly llm: LLMProvider;
  private readonly maxContextPassages: number;
  private readonly webSearchConfidenceFactor: number;
  private readonly historyTurns: number;

  constructor(options: ResponseSynthesizerOptions) {
    this.llm = options.llm;
    this.maxContextPassages = options.maxContextPassages ?? 5;
    this.webSearchConfidenceFactor = options.webSearchConfidenceFactor ?? 0.7;
    this.historyTurns = options.historyTurns ?? 4;
  }

  plan(input: SynthesisInput): SynthesisPlan {
    if (input.grounding === 'direct') {
      return this.planDirect(input);
    }

    const context = input.grounding === 'grounded'
      ? selectContext(input.passages, this.maxContextPassages)
      : [];

    if (context.length === 0) {
      return this.planDecline(input.errorFlagged ?? false);
    }

    return this.planGrounded(input, context);
  }

  /**
   * Non-streaming synthesis: runs the plan to completion
   */
  async synthesize(input: SynthesisInput, options: { signal?: AbortSignal } = {}): Promise<SynthesisResult> {
    const plan = this.plan(input);
    let answer = '';
    for await (const token of plan.tokens(options.signal)) {
      answer += token;
    }
    return {
      answer,
      citations: plan.citations(answer),
      confidence: plan.confidence,
      reasoning: plan.reasoning,
    };
  }

  private planDecline(errorFlagged: boolean): SynthesisPlan {
    const text = errorFlagged ? ERROR_DECLINE_MESSAGE : DECLINE_MESSAGE;
    return {
      confidence: 0,
      context: [],
      reasoning: errorFlagged
        ? 'Declined after a workflow error'
        : 'Declined: no relevant grounding found',
      tokens: () => fixedTokens(text),
      citations: () => [],
    };
  }

  private planDirect(input: SynthesisInput): SynthesisPlan {
    const confidence = clamp(input.intentConfidence);
    const fixed = (text: string, reasoning: string): SynthesisPlan => ({
      confidence,
      context: [],
      reasoning,
      tokens: () => fixedTokens(text),
      citations: () => [],
    });

    if (input.intent === 'greeting') {
      return fixed(GREETING_MESSAGE, 'Answered greeting directly');
    }

    if (input.intent === 'calculation') {
      const calculation = calculate(input.query);
      if (calculation) {
        return fixed(
          `The result is ${formatNumber(calculation.result)}.`,
          `Evaluated ${calculation.expression}`,
        );
      }
      logger.debug('Expression not evaluable, answering with the model', { query: input.query });
    }

    const prompt = fillTemplate(DIRECT_PROMPT_TEMPLATE, {
      history: this.formatHistory(input.history),
      query: input.query,
    });

    return {
      confidence,
      context: [],
      reasoning: 'Answered directly without retrieval',
      tokens: signal =>
        this.llm.stream({
          prompt,
          systemPrompt: DIRECT_SYSTEM_PROMPT,
          maxTokens: 500,
          temperature: 0.5,
          signal,
        }),
      citations: () => [],
    };
  }

  private planGrounded(input: SynthesisInput, context: readonly Passage[]): SynthesisPlan {
    const table = arrayToToon(
      context.map((passage, i) => ({
        id: i + 1,
        source: passage.sourceId,
        score: passage.score.toFixed(2),
        text: passage.content,
      })),
      ['id', 'source', 'score', 'text'],
    );

    const prompt = fillTemplate(SYNTHESIS_PROMPT_TEMPLATE, {
      history: this.formatHistory(input.history),
      query: input.query,
      passages: table,
    });

    const confidence = groundedConfidence(context, input.usedWebSearch, this.webSearchConfidenceFactor);
    const origin = input.usedWebSearch ? 'web results' : 'knowledge base passages';

    return {
      confidence,
      context,
      reasoning: `Answered from ${context.length} ${origin}`,
      tokens: signal =>
        this.llm.stream({
          prompt,
          systemPrompt: SYNTHESIS_SYSTEM_PROMPT,
          maxTokens: 1024,
          temperature: 0,
          signal,
        }),
      citations: answer => buildCitations(answer, context),
    };
  }

  private formatHistory(history: readonly ConversationTurn[] | undefined): string {
    const recent = (history ?? []).slice(-this.historyTurns);
    if (recent.length === 0) {
      return '';
    }
    return `Conversation so far:\n${recent.map(turn => `${turn.role}: ${turn.content}`).join('\n')}\n\n`;
  }
}

export function createResponseSynthesizer(options: ResponseSynthesizerOptions): ResponseSynthesizer {
  return new ResponseSynthesizer(options);
}
