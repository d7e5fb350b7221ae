/**
 * @corrective-rag/llm
 */

export {
  estimateTokens,
  type RagLLMEngine,
  type RagLLMGenerateOptions,
  type RagLLMGenerateResult,
} from './types.js';

export { createOpenAILLMEngine, type OpenAILLMEngineOptions } from './openai.js';
