/**
 * LLM Provider
 *
 * Wraps a `RagLLMEngine` for workflow nodes: plain completions, schema-checked
 * JSON completions and token streams, with per-invocation usage stats.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { estimateTokens, type RagLLMEngine } from '@corrective-rag/llm';
import { parseJSONResponse } from './json.js';

export interface LLMCompleteOptions {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  signal?: AbortSignal;
}

export interface LLMJSONOptions<T> {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface LLMStats {
  calls: number;
  tokensIn: number;
  tokensOut: number;
}

export interface LLMProvider {
  readonly name: string;

  complete(options: LLMCompleteOptions): Promise<string>;

  /**
   * Completion parsed as JSON and validated against `options.schema`.
   * Throws on unparseable or invalid output.
   */
  completeJSON<T>(options: LLMJSONOptions<T>): Promise<T>;

  stream(options: LLMCompleteOptions): AsyncIterable<string>;

  getStats(): LLMStats;

  resetStats(): void;
}

const JSON_INSTRUCTIONS = `
IMPORTANT: Respond with valid JSON only. No markdown, no code blocks, just raw JSON.
Do not include any text before or after the JSON object.
`;

/**
 * Create LLM provider from an engine
 */
export function createLLMProvider(engine: RagLLMEngine): LLMProvider {
  let stats: LLMStats = { calls: 0, tokensIn: 0, tokensOut: 0 };

  const track = (systemPrompt: string | undefined, prompt: string) => {
    stats.calls++;
    stats.tokensIn += estimateTokens((systemPrompt ?? '') + prompt);
  };

  return {
    name: `llm-provider:${engine.id}`,

    async complete(options: LLMCompleteOptions): Promise<string> {
      track(options.systemPrompt, options.prompt);

      const result = await engine.generate(options.prompt, {
        systemPrompt: options.systemPrompt,
        maxTokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.2,
        stop: options.stop,
        signal: options.signal,
      });

      stats.tokensOut += result.tokens;
      return result.text;
    },

    async completeJSON<T>(options: LLMJSONOptions<T>): Promise<T> {
      // Appended to the system prompt so the prompt prefix stays cacheable
      const systemPrompt = options.systemPrompt
        ? `${options.systemPrompt}\n\n${JSON_INSTRUCTIONS}`
        : JSON_INSTRUCTIONS;

      track(systemPrompt, options.prompt);

      const result = await engine.generate(options.prompt, {
        systemPrompt,
        maxTokens: options.maxTokens ?? 512,
        temperature: options.temperature ?? 0,
        signal: options.signal,
      });

      stats.tokensOut += result.tokens;
      return options.schema.parse(parseJSONResponse(result.text));
    },

    async *stream(options: LLMCompleteOptions): AsyncIterable<string> {
      track(options.systemPrompt, options.prompt);

      for await (const fragment of engine.stream(options.prompt, {
        systemPrompt: options.systemPrompt,
        maxTokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.2,
        stop: options.stop,
        signal: options.signal,
      })) {
        stats.tokensOut += estimateTokens(fragment);
        yield fragment;
      }
    },

    getStats(): LLMStats {
      return { ...stats };
    },

    resetStats(): void {
      stats = { calls: 0, tokensIn: 0, tokensOut: 0 };
    },
  };
}
