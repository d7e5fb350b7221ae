/**
 * Corrective RAG Orchestrator
 *
 * Drives one invocation through the stage machine in `workflow/stages.ts` and
 * yields the event stream: step events, one metadata event, tokens, one
 * citations event and a single terminal `done` or `error`.
 */

import { randomUUID } from 'node:crypto';
import {
  STEP_LABELS,
  WorkflowConfigSchema,
  type ChatResponse,
  type Passage,
  type QueryRequest,
  type WorkflowConfig,
  type WorkflowConfigInput,
  type WorkflowEvent,
} from '@corrective-rag/contracts';
import { createRagError, describeError, getLogger } from '@corrective-rag/core';
import type { RagLLMEngine } from '@corrective-rag/llm';
import type { PassageEnricher, Retriever, WebSearchProvider } from '@corrective-rag/retrieval';
import { createLLMProvider, type LLMProvider, type LLMStats } from './llm/llm-provider.js';
import { QueryRouter } from './router/query-router.js';
import { RelevanceGrader } from './grader/relevance-grader.js';
import { QueryRewriter, normalizeQuery } from './rewriter/query-rewriter.js';
import { ResponseSynthesizer, selectContext } from './synthesizer/response-synthesizer.js';
import { createInitialState, type WorkflowState } from './workflow/state.js';
import { nextStage, stepOf, type NodeStage, type Stage, type TransitionConfig } from './workflow/stages.js';
import { collectResponse } from './workflow/collect.js';

const logger = getLogger('rag:orchestrator');

export const SYNTHESIS_FAILURE_MESSAGE = 'Failed to generate a response';
export const CANCELLED_MESSAGE = 'Request cancelled';

export interface CorrectiveRagOrchestratorOptions {
  /** Engine for rewriting and answer generation */
  llm: RagLLMEngine;
  /** Engine for routing and grading; defaults to `llm` */
  graderLlm?: RagLLMEngine;
  retriever: Retriever;
  webSearch?: WebSearchProvider;
  /** Graph enrichment applied inside retrieval, per `config.graphEnrichment` */
  graph?: PassageEnricher;
  /** Defaults applied to every run, overridable per run */
  config?: WorkflowConfigInput;
}

export interface RunOptions {
  config?: WorkflowConfigInput;
  signal?: AbortSignal;
}

interface RunContext {
  requestId: string;
  config: WorkflowConfig;
  transitions: TransitionConfig;
  signal?: AbortSignal;
  llm: LLMProvider;
  graderLlm: LLMProvider;
  router: QueryRouter;
  grader: RelevanceGrader;
  rewriter: QueryRewriter;
  synthesizer: ResponseSynthesizer;
}

class CancelledError extends Error {}

function parseConfig(input: WorkflowConfigInput): WorkflowConfig {
  const parsed = WorkflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
    throw createRagError('RAG_INVALID_CONFIG', `Invalid workflow configuration: ${fields}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function mergeStats(a: LLMStats, b: LLMStats): LLMStats {
  return { calls: a.calls + b.calls, tokensIn: a.tokensIn + b.tokensIn, tokensOut: a.tokensOut + b.tokensOut };
}

/**
 * Corrective RAG Orchestrator
 *
 * Collaborators are shared and read-only; every `run` builds its own state,
 * LLM usage counters and node instances.
 */
export class CorrectiveRagOrchestrator {
  private readonly engine: RagLLMEngine;
  private readonly graderEngine: RagLLMEngine;
  private readonly retriever: Retriever;
  private readonly webSearch?: WebSearchProvider;
  private readonly graph?: PassageEnricher;
  private readonly defaults: WorkflowConfigInput;

  constructor(options: CorrectiveRagOrchestratorOptions) {
    this.engine = options.llm;
    this.graderEngine = options.graderLlm ?? options.llm;
    this.retriever = options.retriever;
    this.webSearch = options.webSearch;
    this.graph = options.graph;
    this.defaults = options.config ?? {};
    // Fail at construction on bad defaults
    parseConfig(this.defaults);
  }

  /**
   * Start an invocation. Configuration is validated before any node runs;
   * invalid configuration throws `RAG_INVALID_CONFIG` here, not from the stream.
   */
  run(request: QueryRequest, options: RunOptions = {}): AsyncGenerator<WorkflowEvent> {
    const config = parseConfig({ ...this.defaults, ...options.config });
    return this.execute(request, this.createContext(config, options.signal));
  }

  /**
   * Run to completion and aggregate the event stream
   */
  async answer(request: QueryRequest, options: RunOptions = {}): Promise<ChatResponse> {
    return collectResponse(this.run(request, options));
  }

  private createContext(config: WorkflowConfig, signal: AbortSignal | undefined): RunContext {
    const llm = createLLMProvider(this.engine);
    const graderLlm = this.graderEngine === this.engine ? llm : createLLMProvider(this.graderEngine);

    return {
      requestId: `rq-${randomUUID().slice(0, 12)}`,
      config,
      transitions: {
        maxIterations: config.maxIterations,
        webSearchEnabled: config.webSearchEnabled && this.webSearch !== undefined,
      },
      signal,
      llm,
      graderLlm,
      router: new QueryRouter({ llm: graderLlm }),
      grader: new RelevanceGrader({ llm: graderLlm, maxPassages: config.maxContextPassages }),
      rewriter: new QueryRewriter({ llm }),
      synthesizer: new ResponseSynthesizer({
        llm,
        maxContextPassages: config.maxContextPassages,
        webSearchConfidenceFactor: config.webSearchConfidenceFactor,
      }),
    };
  }

  private async *execute(request: QueryRequest, ctx: RunContext): AsyncGenerator<WorkflowEvent> {
    const startedAt = Date.now();
    const state = createInitialState(request);
    const log = logger.child(ctx.requestId);
    let stage: Stage = { kind: 'route' };

    log.info('Workflow started', { sessionId: request.sessionId, config: ctx.config });

    try {
      while (stage.kind !== 'end') {
        if (ctx.signal?.aborted) {
          log.info('Workflow cancelled', { stage: stage.kind });
          yield { type: 'error', message: CANCELLED_MESSAGE };
          return;
        }

        yield { type: 'step', step: stepOf(stage), label: STEP_LABELS[stepOf(stage)], timestamp: new Date().toISOString() };

        if (stage.kind === 'synthesize') {
          yield* this.synthesize(stage, state, ctx, startedAt);
          return;
        }

        try {
          await this.runNode(stage, state, ctx);
          stage = nextStage(stage, state, ctx.transitions);
        } catch (error) {
          if (error instanceof CancelledError || ctx.signal?.aborted) {
            log.info('Workflow cancelled', { stage: stage.kind });
            yield { type: 'error', message: CANCELLED_MESSAGE };
            return;
          }
          state.error = describeError(error);
          state.reasoningTrace.push(`[Error] ${stage.kind} failed: ${state.error}`);
          log.error('Workflow node failed', { stage: stage.kind, error: state.error });
          stage = { kind: 'synthesize', grounding: 'insufficient', errorFlagged: true };
        }
      }
    } finally {
      log.info('Workflow finished', {
        intent: state.intent,
        verdict: state.relevanceVerdict,
        iterations: state.iterationCount,
        webSearchUsed: state.usedWebSearch,
        durationMs: Date.now() - startedAt,
        llm: mergeStats(ctx.llm.getStats(), ctx.graderLlm === ctx.llm ? { calls: 0, tokensIn: 0, tokensOut: 0 } : ctx.graderLlm.getStats()),
      });
    }
  }

  private async runNode(stage: NodeStage, state: WorkflowState, ctx: RunContext): Promise<void> {
    switch (stage.kind) {
      case 'route':
        return this.route(state, ctx);
      case 'retrieve':
        return this.retrieve(state, ctx);
      case 'grade':
        return this.grade(state, ctx);
      case 'rewrite':
        return this.rewrite(state, ctx);
      case 'web_search':
        return this.searchWeb(state, ctx);
      case 'synthesize':
        return;
    }
  }

  private async route(state: WorkflowState, ctx: RunContext): Promise<void> {
    const route = await ctx.router.classify(state.originalQuery, {
      history: state.history,
      signal: ctx.signal,
    });
    state.intent = route.intent;
    state.intentConfidence = route.confidence;
    state.reasoningTrace.push(`[Router] ${route.intent} (${route.confidence.toFixed(2)}): ${route.reasoning}`);
  }

  private async retrieve(state: WorkflowState, ctx: RunContext): Promise<void> {
    let vector: Passage[];
    try {
      vector = await this.retriever.retrieve(state.currentQuery, {
        k: ctx.config.retrievalK,
        similarityThreshold: ctx.config.similarityThreshold,
        signal: ctx.signal,
      });
    } catch (error) {
      this.throwIfCancelled(ctx);
      logger.warn('Retrieval failed, continuing with no passages', { error: describeError(error) });
      vector = [];
    }

    let graph: Passage[] = [];
    if (this.graph && ctx.config.graphEnrichment !== 'off') {
      try {
        graph = await this.graph.enrich(state.currentQuery, vector);
      } catch (error) {
        this.throwIfCancelled(ctx);
        logger.warn('Graph enrichment failed, continuing without it', {
          code: 'RAG_GRAPH_ERROR',
          error: describeError(error),
        });
      }
    }

    if (ctx.config.graphEnrichment === 'separate') {
      state.retrievedPassages = vector;
      state.pendingGraphPassages = graph;
    } else {
      state.retrievedPassages = [...vector, ...graph];
      state.pendingGraphPassages = [];
    }

    state.reasoningTrace.push(
      `[Retrieve] ${vector.length} passages for "${state.currentQuery}"` +
        (graph.length > 0 ? `, ${graph.length} from the knowledge graph` : ''),
    );
  }

  private async grade(state: WorkflowState, ctx: RunContext): Promise<void> {
    // Grade only what synthesis can place in the prompt
    const vector = selectContext(state.retrievedPassages, ctx.config.maxContextPassages);
    const graph = selectContext(state.pendingGraphPassages, ctx.config.maxContextPassages);
    state.pendingGraphPassages = [];

    const vectorGrade = await ctx.grader.grade(state.originalQuery, vector, { signal: ctx.signal });
    this.throwIfCancelled(ctx);

    if (graph.length === 0) {
      state.relevanceVerdict = vectorGrade.verdict;
      state.gradeReasoning = vectorGrade.reasoning;
      state.reasoningTrace.push(`[Grade] ${vectorGrade.verdict}: ${vectorGrade.reasoning}`);
      return;
    }

    const graphGrade = await ctx.grader.grade(state.originalQuery, graph, { signal: ctx.signal });
    this.throwIfCancelled(ctx);

    const kept = [
      ...(vectorGrade.verdict === 'relevant' ? vector : []),
      ...(graphGrade.verdict === 'relevant' ? graph : []),
    ];
    state.relevanceVerdict = kept.length > 0 ? 'relevant' : 'not_relevant';
    state.retrievedPassages = kept.length > 0 ? kept : vector;
    state.gradeReasoning = vectorGrade.reasoning;
    state.reasoningTrace.push(
      `[Grade] vector ${vectorGrade.verdict}, graph ${graphGrade.verdict}: ${vectorGrade.reasoning}`,
    );
  }

  private async rewrite(state: WorkflowState, ctx: RunContext): Promise<void> {
    state.iterationCount += 1;

    let rewritten = '';
    try {
      rewritten = await ctx.rewriter.rewrite(state.originalQuery, state.currentQuery, {
        reason: state.gradeReasoning,
        triedQueries: state.triedQueries,
        signal: ctx.signal,
      });
    } catch (error) {
      this.throwIfCancelled(ctx);
      logger.warn('Rewriter failed, treating as a stall', { error: describeError(error) });
    }

    const key = normalizeQuery(rewritten);
    if (key.length === 0 || state.triedQueries.includes(key)) {
      state.rewriteStalled = true;
      state.reasoningTrace.push(`[Rewrite ${state.iterationCount}] stalled, no new query`);
      return;
    }

    state.currentQuery = rewritten;
    state.triedQueries.push(key);
    state.reasoningTrace.push(`[Rewrite ${state.iterationCount}] "${rewritten}"`);
  }

  private async searchWeb(state: WorkflowState, ctx: RunContext): Promise<void> {
    state.usedWebSearch = true;
    state.pendingGraphPassages = [];

    if (!this.webSearch) {
      state.retrievedPassages = [];
      return;
    }

    try {
      state.retrievedPassages = await this.webSearch.search(state.currentQuery, { signal: ctx.signal });
    } catch (error) {
      this.throwIfCancelled(ctx);
      logger.warn('Web search failed, continuing with no passages', { error: describeError(error) });
      state.retrievedPassages = [];
    }

    state.reasoningTrace.push(`[Web Search] ${state.retrievedPassages.length} results`);
  }

  private async *synthesize(
    stage: Extract<Stage, { kind: 'synthesize' }>,
    state: WorkflowState,
    ctx: RunContext,
    startedAt: number,
  ): AsyncGenerator<WorkflowEvent> {
    const plan = ctx.synthesizer.plan({
      query: state.originalQuery,
      intent: state.intent,
      intentConfidence: state.intentConfidence,
      grounding: stage.grounding,
      passages: state.retrievedPassages,
      usedWebSearch: state.usedWebSearch,
      errorFlagged: stage.errorFlagged,
      history: state.history,
    });

    state.confidence = plan.confidence;
    state.reasoningTrace.push(`[Synthesize] ${plan.reasoning}`);

    yield {
      type: 'metadata',
      intent: state.intent,
      confidence: state.confidence,
      reasoning: state.reasoningTrace.join('\n'),
      retrievalGrade: state.relevanceVerdict,
      webSearchUsed: state.usedWebSearch,
      iterationCount: state.iterationCount,
    };

    let index = 0;
    try {
      for await (const token of plan.tokens(ctx.signal)) {
        state.finalAnswer += token;
        yield { type: 'token', content: token, index: index++ };
      }
    } catch (error) {
      const cancelled = ctx.signal?.aborted ?? false;
      if (!cancelled) {
        logger.error('Synthesis failed', { code: 'RAG_SYNTHESIS_ERROR', error: describeError(error) });
      }
      yield { type: 'citations', citations: [] };
      yield { type: 'error', message: cancelled ? CANCELLED_MESSAGE : SYNTHESIS_FAILURE_MESSAGE };
      return;
    }

    state.citations = plan.citations(state.finalAnswer);
    yield { type: 'citations', citations: state.citations };
    yield { type: 'done', totalTokens: index, processingTimeMs: Date.now() - startedAt };
  }

  private throwIfCancelled(ctx: RunContext): void {
    if (ctx.signal?.aborted) {
      throw new CancelledError(CANCELLED_MESSAGE);
    }
  }
}

export function createCorrectiveRagOrchestrator(
  options: CorrectiveRagOrchestratorOptions,
): CorrectiveRagOrchestrator {
  return new CorrectiveRagOrchestrator(options);
}
