/**
 * Query Router
 *
 * Classifies a query into an intent. Greetings and bare arithmetic are caught by
 * patterns without a model call; everything else goes to the model, and any
 * doubt lands on `knowledge_search`.
 */

import { z } from 'zod';
import type { ConversationTurn, Intent } from '@corrective-rag/contracts';
import { clamp, describeError, getLogger } from '@corrective-rag/core';
import type { LLMProvider } from '../llm/llm-provider.js';
import { fillTemplate } from '../utils/template.js';
import { ROUTER_PROMPT_TEMPLATE, ROUTER_SYSTEM_PROMPT } from './prompts.js';

const logger = getLogger('rag:orchestrator:router');

export interface RouteResult {
  intent: Intent;
  confidence: number;
  reasoning: string;
  source: 'heuristic' | 'model' | 'fallback';
}

export interface QueryRouterOptions {
  llm: LLMProvider;
  /** Model classifications below this confidence fall back to knowledge search */
  minConfidence?: number;
  /** Number of recent turns included in the prompt */
  historyTurns?: number;
}

export interface ClassifyOptions {
  history?: readonly ConversationTurn[];
  signal?: AbortSignal;
}

const HEURISTIC_CONFIDENCE = 0.95;

const GREETINGS = new Set([
  'hi', 'hello', 'hey', 'hi there', 'hello there', 'hey there', 'greetings',
  'good morning', 'good afternoon', 'good evening', 'how are you',
  'thanks', 'thank you', 'thanks a lot', 'bye', 'goodbye',
]);

const CALCULATION_LEAD_IN = /^(?:what\s+is|what's|calculate|compute|evaluate)\s+/i;
const TRAILING_PUNCTUATION = /[?.!=\s]+$/;
const ARITHMETIC_CHARS = /^[\d.()+\-*/%^\s]+$/;
// A number, then an operator, then another number
const BINARY_OPERATION = /\d[\s)]*[-+*/%^][\s(]*-?\.?\d/;

/**
 * Whole message is an arithmetic expression, optionally after "what is" and friends
 */
function isArithmetic(query: string): boolean {
  const expression = query.trim().replace(CALCULATION_LEAD_IN, '').replace(TRAILING_PUNCTUATION, '');
  return ARITHMETIC_CHARS.test(expression) && BINARY_OPERATION.test(expression);
}

const RouterResponseSchema = z.object({
  intent: z.string(),
  confidence: z.number(),
  reasoning: z.string().default(''),
});

// Labels an older classifier emitted are folded into the conversational intent
const INTENT_LABELS = new Map<string, Intent>([
  ['knowledge_search', 'knowledge_search'],
  ['calculation', 'calculation'],
  ['greeting', 'greeting'],
  ['other_conversational', 'other_conversational'],
  ['api_lookup', 'other_conversational'],
  ['unknown', 'other_conversational'],
]);

/**
 * Pattern-only classification; `undefined` when the model should decide
 */
export function classifyByPattern(query: string): RouteResult | undefined {
  const normalized = query
    .toLowerCase()
    .replace(/[!?.,]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (GREETINGS.has(normalized)) {
    return {
      intent: 'greeting',
      confidence: HEURISTIC_CONFIDENCE,
      reasoning: 'Message is a greeting',
      source: 'heuristic',
    };
  }

  if (isArithmetic(query)) {
    return {
      intent: 'calculation',
      confidence: HEURISTIC_CONFIDENCE,
      reasoning: 'Message is an arithmetic expression',
      source: 'heuristic',
    };
  }

  return undefined;
}

export class QueryRouter {
  private readonly llm: LLMProvider;
  private readonly minConfidence: number;
  private readonly historyTurns: number;

  constructor(options: QueryRouterOptions) {
    this.llm = options.llm;
    this.minConfidence = options.minConfidence ?? 0.5;
    this.historyTurns = options.historyTurns ?? 4;
  }

  async classify(query: string, options: ClassifyOptions = {}): Promise<RouteResult> {
    const heuristic = classifyByPattern(query);
    if (heuristic) {
      logger.debug('Routed by pattern', { intent: heuristic.intent });
      return heuristic;
    }

    try {
      const prompt = fillTemplate(ROUTER_PROMPT_TEMPLATE, {
        history: this.formatHistory(options.history),
        query,
      });

      const response = await this.llm.completeJSON({
        prompt,
        systemPrompt: ROUTER_SYSTEM_PROMPT,
        maxTokens: 150,
        temperature: 0,
        signal: options.signal,
        schema: RouterResponseSchema,
      });

      const intent = INTENT_LABELS.get(response.intent.trim().toLowerCase());
      const confidence = clamp(response.confidence);

      if (!intent) {
        return {
          intent: 'knowledge_search',
          confidence,
          reasoning: `Unrecognized intent "${response.intent}", defaulting to knowledge search`,
          source: 'fallback',
        };
      }

      if (confidence < this.minConfidence) {
        return {
          intent: 'knowledge_search',
          confidence,
          reasoning: `Low confidence ${intent} (${confidence.toFixed(2)}), defaulting to knowledge search`,
          source: 'fallback',
        };
      }

      logger.info('Routed by model', { intent, confidence });
      return { intent, confidence, reasoning: response.reasoning, source: 'model' };
    } catch (error) {
      logger.warn('Router failed, defaulting to knowledge search', { error: describeError(error) });
      return {
        intent: 'knowledge_search',
        confidence: 0,
        reasoning: 'Router unavailable, defaulting to knowledge search',
        source: 'fallback',
      };
    }
  }

  private formatHistory(history: readonly ConversationTurn[] | undefined): string {
    const recent = (history ?? []).slice(-this.historyTurns);
    if (recent.length === 0) {
      return '';
    }
    const lines = recent.map(turn => `${turn.role}: ${turn.content}`);
    return `Recent conversation:\n${lines.join('\n')}\n\n`;
  }
}

export function createQueryRouter(options: QueryRouterOptions): QueryRouter {
  return new QueryRouter(options);
}
