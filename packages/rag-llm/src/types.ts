/**
 * @module @corrective-rag/llm/types
 * Engine contract every chat model adapter implements
 */

export interface RagLLMGenerateOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
}

export interface RagLLMGenerateResult {
  text: string;
  /** Completion tokens, estimated when the provider does not report usage */
  tokens: number;
  finishReason: 'stop' | 'length';
  metadata?: Record<string, unknown>;
}

export interface RagLLMEngine {
  readonly id: string;
  readonly description?: string;

  generate(prompt: string, options?: RagLLMGenerateOptions): Promise<RagLLMGenerateResult>;

  /**
   * Yield completion text fragments as the provider produces them
   */
  stream(prompt: string, options?: RagLLMGenerateOptions): AsyncIterable<string>;
}

/**
 * Rough token estimate (4 characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
