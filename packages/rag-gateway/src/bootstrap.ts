/**
 * Wire the workflow from environment settings: OpenAI chat and embedding
 * models, an in-memory vector store unless one is given, and Tavily web
 * search when a key is configured.
 */

import type { WorkflowConfigInput } from '@corrective-rag/contracts';
import {
  createLogger,
  createRagError,
  getLogger,
  parseLogLevel,
  setRootLogger,
  type LogSink,
  type Settings,
} from '@corrective-rag/core';
import { createOpenAILLMEngine } from '@corrective-rag/llm';
import { CorrectiveRagOrchestrator } from '@corrective-rag/orchestrator';
import {
  GraphEnricher,
  MemoryVectorStore,
  createOpenAIEmbeddingProvider,
  createTavilyWebSearch,
  createVectorRetriever,
  type GraphStore,
  type VectorRetriever,
  type VectorStore,
} from '@corrective-rag/retrieval';

const logger = getLogger('rag:gateway:bootstrap');

export interface AssistantOverrides {
  store?: VectorStore;
  graph?: GraphStore;
  /** Destination for log lines; console by default */
  logSink?: LogSink;
}

export interface Assistant {
  orchestrator: CorrectiveRagOrchestrator;
  /** Retriever over the configured store; also used to index documents */
  retriever: VectorRetriever;
  config: WorkflowConfigInput;
}

export function workflowConfigFromSettings(settings: Settings): WorkflowConfigInput {
  return {
    maxIterations: settings.MAX_ITERATIONS,
    retrievalK: settings.RETRIEVAL_K,
    similarityThreshold: settings.SIMILARITY_THRESHOLD,
    webSearchEnabled: settings.TAVILY_API_KEY !== undefined,
  };
}

export function createAssistant(settings: Settings, overrides: AssistantOverrides = {}): Assistant {
  const apiKey = settings.OPENAI_API_KEY;
  if (!apiKey) {
    throw createRagError('RAG_CONFIG_ERROR', 'Invalid settings: OPENAI_API_KEY is required');
  }

  setRootLogger(createLogger({ level: parseLogLevel(settings.LOG_LEVEL), sink: overrides.logSink }));

  const retriever = createVectorRetriever({
    store: overrides.store ?? new MemoryVectorStore(),
    embeddings: createOpenAIEmbeddingProvider({
      apiKey,
      model: settings.OPENAI_EMBEDDING_MODEL,
      baseURL: settings.OPENAI_BASE_URL,
    }),
  });

  const config = workflowConfigFromSettings(settings);

  const orchestrator = new CorrectiveRagOrchestrator({
    llm: createOpenAILLMEngine({ apiKey, model: settings.OPENAI_MODEL, baseURL: settings.OPENAI_BASE_URL }),
    graderLlm: createOpenAILLMEngine({
      apiKey,
      model: settings.OPENAI_GRADER_MODEL,
      baseURL: settings.OPENAI_BASE_URL,
    }),
    retriever,
    webSearch: settings.TAVILY_API_KEY ? createTavilyWebSearch({ apiKey: settings.TAVILY_API_KEY }) : undefined,
    graph: overrides.graph ? new GraphEnricher({ store: overrides.graph }) : undefined,
    config,
  });

  logger.info('Assistant ready', {
    model: settings.OPENAI_MODEL,
    graderModel: settings.OPENAI_GRADER_MODEL,
    webSearch: config.webSearchEnabled,
    graph: overrides.graph !== undefined,
  });

  return { orchestrator, retriever, config };
}
