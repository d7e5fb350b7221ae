/**
 * @module @corrective-rag/llm/openai
 * OpenAI chat-completions engine
 */

import OpenAI from 'openai';
import { createRagError, getLogger } from '@corrective-rag/core';
import {
  estimateTokens,
  type RagLLMEngine,
  type RagLLMGenerateOptions,
  type RagLLMGenerateResult,
} from './types.js';

export interface OpenAILLMEngineOptions {
  /**
   * OpenAI API key (required)
   */
  apiKey: string;

  /**
   * Model to use
   * Default: 'gpt-4o'
   */
  model?: string;

  /**
   * Base URL for API (optional, for compatible endpoints)
   */
  baseURL?: string;

  /**
   * Maximum retries for API calls
   * Default: 3
   */
  maxRetries?: number;

  /**
   * Timeout in milliseconds
   * Default: 30000
   */
  timeout?: number;
}

const logger = getLogger('rag:llm:openai');

function buildMessages(prompt: string, systemPrompt: string | undefined) {
  return [
    ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
    { role: 'user' as const, content: prompt },
  ];
}

function failure(error: unknown, model: string): Error {
  const message = error instanceof Error ? error.message : 'Unknown error';
  return createRagError('RAG_LLM_ERROR', `OpenAI LLM generation failed: ${message}`, { model });
}

/**
 * Create OpenAI LLM engine
 */
export function createOpenAILLMEngine(options: OpenAILLMEngineOptions): RagLLMEngine {
  const { apiKey, model = 'gpt-4o', baseURL, maxRetries = 3, timeout = 30000 } = options;

  const client = new OpenAI({
    apiKey,
    baseURL,
    maxRetries,
    timeout,
  });

  return {
    id: 'openai',
    description: `OpenAI LLM engine (${model})`,

    async generate(prompt: string, generateOptions?: RagLLMGenerateOptions): Promise<RagLLMGenerateResult> {
      try {
        const response = await client.chat.completions.create(
          {
            model,
            messages: buildMessages(prompt, generateOptions?.systemPrompt),
            max_tokens: generateOptions?.maxTokens ?? 512,
            temperature: generateOptions?.temperature ?? 0.2,
            stop: generateOptions?.stop,
          },
          { signal: generateOptions?.signal },
        );

        const choice = response.choices[0];
        if (!choice) {
          throw new Error('No response from OpenAI');
        }

        const text = choice.message.content ?? '';

        return {
          text,
          tokens: response.usage?.completion_tokens ?? estimateTokens(text),
          finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
          metadata: {
            ...generateOptions?.metadata,
            model: response.model,
          },
        };
      } catch (error) {
        logger.warn('Generation failed', { model, error });
        throw failure(error, model);
      }
    },

    async *stream(prompt: string, generateOptions?: RagLLMGenerateOptions): AsyncIterable<string> {
      let completion;
      try {
        completion = await client.chat.completions.create(
          {
            model,
            messages: buildMessages(prompt, generateOptions?.systemPrompt),
            max_tokens: generateOptions?.maxTokens ?? 1024,
            temperature: generateOptions?.temperature ?? 0.2,
            stop: generateOptions?.stop,
            stream: true,
          },
          { signal: generateOptions?.signal },
        );
      } catch (error) {
        logger.warn('Stream request failed', { model, error });
        throw failure(error, model);
      }

      try {
        for await (const chunk of completion) {
          const content = chunk.choices[0]?.delta?.content;
          if (content) {
            yield content;
          }
        }
      } catch (error) {
        logger.warn('Stream interrupted', { model, error });
        throw failure(error, model);
      }
    },
  };
}
