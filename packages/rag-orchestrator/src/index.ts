/**
 * @corrective-rag/orchestrator
 *
 * Corrective RAG workflow: route, retrieve, grade, rewrite, web search, synthesize.
 */

export {
  CorrectiveRagOrchestrator,
  createCorrectiveRagOrchestrator,
  SYNTHESIS_FAILURE_MESSAGE,
  CANCELLED_MESSAGE,
  type CorrectiveRagOrchestratorOptions,
  type RunOptions,
} from './orchestrator.js';

export { collectResponse } from './workflow/collect.js';
export { createInitialState, type WorkflowState } from './workflow/state.js';
export { nextStage, stepOf, type Stage, type NodeStage, type TransitionConfig } from './workflow/stages.js';

export {
  createLLMProvider,
  type LLMProvider,
  type LLMStats,
  type LLMCompleteOptions,
  type LLMJSONOptions,
} from './llm/llm-provider.js';
export { parseJSONResponse } from './llm/json.js';

export {
  QueryRouter,
  createQueryRouter,
  classifyByPattern,
  type RouteResult,
  type QueryRouterOptions,
  type ClassifyOptions,
} from './router/query-router.js';

export {
  RelevanceGrader,
  createRelevanceGrader,
  type GradeOutcome,
  type RelevanceGraderOptions,
} from './grader/relevance-grader.js';

export {
  QueryRewriter,
  createQueryRewriter,
  normalizeQuery,
  cleanRewrite,
  type RewriteContext,
  type QueryRewriterOptions,
} from './rewriter/query-rewriter.js';

export {
  ResponseSynthesizer,
  createResponseSynthesizer,
  groundedConfidence,
  selectContext,
  splitIntoTokens,
  type Grounding,
  type SynthesisInput,
  type SynthesisPlan,
  type SynthesisResult,
  type ResponseSynthesizerOptions,
} from './synthesizer/response-synthesizer.js';
export { buildCitations, citedIds, toCitation } from './synthesizer/citations.js';
export { DECLINE_MESSAGE, ERROR_DECLINE_MESSAGE, GREETING_MESSAGE } from './synthesizer/prompts.js';

export { calculate, evaluateExpression, extractExpression, formatNumber, CalculationError } from './calculator/calculator.js';
