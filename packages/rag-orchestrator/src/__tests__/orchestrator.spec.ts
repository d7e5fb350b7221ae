import { afterEach, describe, it, expect, vi } from 'vitest';
import type { QueryRequest, WorkflowConfigInput } from '@corrective-rag/contracts';
import { RagError } from '@corrective-rag/core';
import { CorrectiveRagOrchestrator } from '../orchestrator.js';
import { QueryRouter } from '../router/query-router.js';
import { DECLINE_MESSAGE, ERROR_DECLINE_MESSAGE, GREETING_MESSAGE } from '../synthesizer/prompts.js';
import { splitIntoTokens } from '../synthesizer/response-synthesizer.js';
import {
  FakeEnricher,
  FakeRetriever,
  FakeWebSearch,
  NOT_RELEVANT,
  RELEVANT,
  ScriptedEngine,
  citationsOf,
  drain,
  metadataOf,
  passage,
  routeReply,
  stepsOf,
  textOf,
  typesOf,
  type EngineScript,
} from './fakes.js';

const request: QueryRequest = { query: 'What is the refund policy?', sessionId: 'session-1' };

const policy = passage('policy.md', 0.9, 'Refunds are accepted within 30 days of purchase.', { chunkIndex: 0 });
const faq = passage('faq.md', 0.8, 'Contact support for refund questions.', { chunkIndex: 2 });
const webResult = passage('https://example.com/refunds', 0.8, 'Refund FAQ', { origin: 'web' });

interface Setup {
  script?: EngineScript;
  retriever?: FakeRetriever;
  webSearch?: FakeWebSearch;
  graph?: FakeEnricher;
  config?: WorkflowConfigInput;
}

function setup(options: Setup = {}) {
  const engine = new ScriptedEngine(options.script);
  const retriever = options.retriever ?? new FakeRetriever([], [policy, faq]);
  const orchestrator = new CorrectiveRagOrchestrator({
    llm: engine,
    retriever,
    webSearch: options.webSearch,
    graph: options.graph,
    config: options.config,
  });
  return { engine, retriever, orchestrator };
}

describe('CorrectiveRagOrchestrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('knowledge search', () => {
    it('answers from relevant passages on the first retrieval', async () => {
      const { engine, retriever, orchestrator } = setup({
        script: { synthesize: [['Refunds are accepted ', 'within 30 days [1].']] },
      });

      const events = await drain(orchestrator.run(request));

      expect(typesOf(events)).toEqual([
        'step', 'step', 'step', 'step', 'metadata', 'token', 'token', 'citations', 'done',
      ]);
      expect(stepsOf(events)).toEqual(['route', 'retrieve', 'grade', 'synthesize']);
      expect(retriever.queries).toEqual(['What is the refund policy?']);
      expect(engine.callsOf('rewrite')).toHaveLength(0);

      const metadata = metadataOf(events);
      expect(metadata).toMatchObject({
        intent: 'knowledge_search',
        retrievalGrade: 'relevant',
        webSearchUsed: false,
        iterationCount: 0,
      });
      expect(metadata.confidence).toBeCloseTo(0.85);
      expect(metadata.reasoning).toContain('[Router] knowledge_search (0.90): Factual question');

      expect(textOf(events)).toBe('Refunds are accepted within 30 days [1].');
      expect(citationsOf(events)).toEqual([
        {
          source: 'policy.md',
          contentPreview: 'Refunds are accepted within 30 days of purchase.',
          similarityScore: 0.9,
          chunkId: 0,
        },
      ]);
      expect(events.at(-1)).toMatchObject({ type: 'done', totalTokens: 2 });
    });

    it('labels steps and numbers tokens from zero', async () => {
      const { orchestrator } = setup({ script: { synthesize: [['a ', 'b ', 'c']] } });

      const events = await drain(orchestrator.run(request));

      expect(events[0]).toMatchObject({ type: 'step', step: 'route', label: 'Analyzing query intent' });
      expect(events.flatMap(event => (event.type === 'token' ? [event.index] : []))).toEqual([0, 1, 2]);
    });

    it('grades against the original query after a rewrite', async () => {
      const { engine, retriever, orchestrator } = setup({
        script: {
          grade: [NOT_RELEVANT, RELEVANT],
          rewrite: ['Query: "refund policy for damaged items"'],
        },
        retriever: new FakeRetriever([[passage('misc.md', 0.6)], [passage('returns.md', 0.7)]]),
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'retrieve', 'grade', 'synthesize',
      ]);
      expect(retriever.queries).toEqual(['What is the refund policy?', 'refund policy for damaged items']);
      expect(engine.callsOf('grade')[1]).toContain('Question: "What is the refund policy?"');

      const metadata = metadataOf(events);
      expect(metadata.iterationCount).toBe(1);
      expect(metadata.confidence).toBeCloseTo(0.7);
      expect(citationsOf(events).map(citation => citation.source)).toEqual(['returns.md']);
    });

    it('falls back to web search once rewrites are exhausted', async () => {
      const webSearch = new FakeWebSearch([webResult]);
      const { engine, retriever, orchestrator } = setup({
        retriever: new FakeRetriever([], []),
        webSearch,
        config: { maxIterations: 1 },
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'retrieve', 'grade', 'web_search', 'grade', 'synthesize',
      ]);
      expect(retriever.queries).toEqual(['What is the refund policy?', 'rewritten query']);
      expect(webSearch.queries).toEqual(['rewritten query']);
      // Empty passage sets are rejected without a model call
      expect(engine.callsOf('grade')).toHaveLength(1);

      const metadata = metadataOf(events);
      expect(metadata.webSearchUsed).toBe(true);
      expect(metadata.retrievalGrade).toBe('relevant');
      expect(metadata.confidence).toBeCloseTo(0.56);
      expect(citationsOf(events)).toEqual([
        { source: 'https://example.com/refunds', contentPreview: 'Refund FAQ', similarityScore: 0.8 },
      ]);
    });

    it('reports lower confidence for web results than for equally scored internal passages', async () => {
      const internal = setup({ retriever: new FakeRetriever([], [passage('kb.md', 0.8)]) });
      const web = setup({
        retriever: new FakeRetriever([], []),
        webSearch: new FakeWebSearch([webResult]),
        config: { maxIterations: 1 },
      });

      const internalMetadata = metadataOf(await drain(internal.orchestrator.run(request)));
      const webMetadata = metadataOf(await drain(web.orchestrator.run(request)));

      expect(internalMetadata.webSearchUsed).toBe(false);
      expect(internalMetadata.confidence).toBeCloseTo(0.8);
      expect(webMetadata.webSearchUsed).toBe(true);
      expect(webMetadata.confidence).toBeCloseTo(0.56);
      expect(webMetadata.confidence).toBeGreaterThan(0);
      expect(webMetadata.confidence).toBeLessThan(internalMetadata.confidence);
    });

    it('declines with zero confidence when nothing relevant is found', async () => {
      const { engine, orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, NOT_RELEVANT] },
        retriever: new FakeRetriever([], [passage('misc.md', 0.6)]),
        config: { maxIterations: 1, webSearchEnabled: false },
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'retrieve', 'grade', 'synthesize',
      ]);
      expect(textOf(events)).toBe(DECLINE_MESSAGE);
      expect(citationsOf(events)).toEqual([]);
      expect(engine.callsOf('synthesize')).toHaveLength(0);

      const metadata = metadataOf(events);
      expect(metadata.confidence).toBe(0);
      expect(metadata.retrievalGrade).toBe('not_relevant');
      expect(events.at(-1)).toMatchObject({
        type: 'done',
        totalTokens: splitIntoTokens(DECLINE_MESSAGE).length,
      });
    });

    it('tries three distinct rewrites and one web search before declining', async () => {
      const webSearch = new FakeWebSearch([webResult]);
      const { engine, retriever, orchestrator } = setup({
        script: {
          grade: [NOT_RELEVANT],
          rewrite: ['refund rules', 'return policy', 'money back guarantee'],
        },
        retriever: new FakeRetriever([], []),
        webSearch,
      });

      const events = await drain(orchestrator.run(request));

      expect(retriever.queries).toEqual([
        'What is the refund policy?', 'refund rules', 'return policy', 'money back guarantee',
      ]);
      expect(engine.callsOf('rewrite')).toHaveLength(3);
      expect(webSearch.queries).toEqual(['money back guarantee']);
      expect(metadataOf(events)).toMatchObject({
        webSearchUsed: true,
        iterationCount: 3,
        confidence: 0,
        retrievalGrade: 'not_relevant',
      });
      expect(citationsOf(events)).toEqual([]);
      expect(textOf(events)).toBe(DECLINE_MESSAGE);
      expect(events.at(-1)?.type).toBe('done');
    });

    it('skips web search when no provider is configured', async () => {
      const { orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, NOT_RELEVANT] },
        config: { maxIterations: 1, webSearchEnabled: true },
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).not.toContain('web_search');
      expect(textOf(events)).toBe(DECLINE_MESSAGE);
    });

    it('performs at most maxIterations rewrites', async () => {
      const { engine, retriever, orchestrator } = setup({
        script: {
          grade: [NOT_RELEVANT, NOT_RELEVANT, NOT_RELEVANT],
          rewrite: ['first rewrite', 'second rewrite'],
        },
        config: { maxIterations: 2, webSearchEnabled: false },
      });

      const events = await drain(orchestrator.run(request));

      expect(engine.callsOf('rewrite')).toHaveLength(2);
      expect(retriever.queries).toEqual(['What is the refund policy?', 'first rewrite', 'second rewrite']);
      expect(metadataOf(events).iterationCount).toBe(2);
    });

    it('runs web search at most once', async () => {
      const webSearch = new FakeWebSearch([webResult]);
      const { orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, NOT_RELEVANT, NOT_RELEVANT] },
        webSearch,
        config: { maxIterations: 1 },
      });

      const events = await drain(orchestrator.run(request));

      expect(webSearch.queries).toHaveLength(1);
      expect(stepsOf(events).filter(step => step === 'web_search')).toHaveLength(1);
      expect(metadataOf(events)).toMatchObject({ webSearchUsed: true, confidence: 0 });
      expect(textOf(events)).toBe(DECLINE_MESSAGE);
    });

    it('goes straight to web search when the rewrite repeats a tried query', async () => {
      const webSearch = new FakeWebSearch([webResult]);
      const { retriever, orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, RELEVANT], rewrite: ['  WHAT is the Refund   policy?  '] },
        webSearch,
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'web_search', 'grade', 'synthesize',
      ]);
      expect(retriever.queries).toHaveLength(1);
      expect(webSearch.queries).toEqual(['What is the refund policy?']);
      expect(metadataOf(events).iterationCount).toBe(1);
    });

    it('treats a failing rewriter as a stall', async () => {
      const webSearch = new FakeWebSearch([webResult]);
      const { orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, RELEVANT], rewrite: [new Error('rate limited')] },
        webSearch,
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'web_search', 'grade', 'synthesize',
      ]);
      expect(events.at(-1)?.type).toBe('done');
    });

    it('continues with no passages when retrieval fails', async () => {
      const { engine, orchestrator } = setup({
        retriever: new FakeRetriever([new Error('store offline')], []),
        config: { maxIterations: 1, webSearchEnabled: false },
      });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual([
        'route', 'retrieve', 'grade', 'rewrite', 'retrieve', 'grade', 'synthesize',
      ]);
      expect(engine.callsOf('grade')).toHaveLength(0);
      expect(textOf(events)).toBe(DECLINE_MESSAGE);
      expect(events.at(-1)?.type).toBe('done');
    });

    it('answers from vector passages when graph enrichment fails', async () => {
      const { engine, orchestrator } = setup({ graph: new FakeEnricher(new Error('graph down')) });

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual(['route', 'retrieve', 'grade', 'synthesize']);
      expect(engine.callsOf('grade')).toHaveLength(1);
      expect(textOf(events)).toBe('Answer [1].');
      expect(metadataOf(events).confidence).toBeCloseTo(0.85);
      expect(metadataOf(events).reasoning).not.toContain('[Error]');
      expect(citationsOf(events).map(citation => citation.source)).toEqual(['policy.md']);
      expect(events.at(-1)?.type).toBe('done');
    });

    it('declines with the error message when a node throws', async () => {
      vi.spyOn(QueryRouter.prototype, 'classify').mockRejectedValueOnce(new Error('router crashed'));
      const { retriever, orchestrator } = setup();

      const events = await drain(orchestrator.run(request));

      expect(stepsOf(events)).toEqual(['route', 'synthesize']);
      expect(retriever.queries).toEqual([]);
      expect(textOf(events)).toBe(ERROR_DECLINE_MESSAGE);
      expect(metadataOf(events).reasoning).toContain('[Error] route failed: router crashed');
      expect(metadataOf(events).confidence).toBe(0);
      expect(citationsOf(events)).toEqual([]);
      expect(events.at(-1)?.type).toBe('done');
    });

    it('passes retrieval settings to the retriever', async () => {
      const { retriever, orchestrator } = setup({ config: { retrievalK: 3, similarityThreshold: 0.4 } });

      await drain(orchestrator.run(request));

      expect(retriever.options[0]).toMatchObject({ k: 3, similarityThreshold: 0.4 });
    });

    it('lets per-run config override the defaults', async () => {
      const { retriever, orchestrator } = setup({ config: { retrievalK: 3 } });

      await drain(orchestrator.run(request, { config: { retrievalK: 7 } }));

      expect(retriever.options[0]).toMatchObject({ k: 7, similarityThreshold: 0.5 });
    });

    it('includes conversation history in the routing prompt', async () => {
      const { engine, orchestrator } = setup();

      await drain(
        orchestrator.run({
          ...request,
          query: 'When was it last updated?',
          history: [
            { role: 'user', content: 'Who wrote the handbook?' },
            { role: 'assistant', content: 'The HR team.' },
          ],
        }),
      );

      expect(engine.callsOf('route')[0]).toContain('user: Who wrote the handbook?\nassistant: The HR team.');
    });

    it('routes and grades with a separate grader engine', async () => {
      const engine = new ScriptedEngine();
      const graderEngine = new ScriptedEngine();
      const orchestrator = new CorrectiveRagOrchestrator({
        llm: engine,
        graderLlm: graderEngine,
        retriever: new FakeRetriever([], [policy]),
      });

      await drain(orchestrator.run(request));

      expect(graderEngine.calls.map(call => call.kind)).toEqual(['route', 'grade']);
      expect(engine.calls.map(call => call.kind)).toEqual(['synthesize']);
    });
  });

  describe('graph enrichment', () => {
    const related = passage('graph.md', 0.6, 'Graph fact', { origin: 'graph', chunkIndex: 1 });

    it('grades graph passages together with vector passages under merge', async () => {
      const graph = new FakeEnricher([related]);
      const { engine, orchestrator } = setup({
        retriever: new FakeRetriever([], [passage('kb.md', 0.9)]),
        graph,
      });

      const events = await drain(orchestrator.run(request));

      expect(graph.calls).toHaveLength(1);
      const grades = engine.callsOf('grade');
      expect(grades).toHaveLength(1);
      expect(grades[0]).toContain('content of kb.md');
      expect(grades[0]).toContain('Graph fact');
      expect(metadataOf(events).confidence).toBeCloseTo(0.75);
    });

    it('keeps graph passages in the answer context when retrieval fills k', async () => {
      const vector = [0.9, 0.85, 0.8, 0.75, 0.7].map((score, i) => passage(`kb${i + 1}.md`, score));
      const { engine, orchestrator } = setup({
        script: { synthesize: [['Per [5].']] },
        retriever: new FakeRetriever([], vector),
        graph: new FakeEnricher([related]),
      });

      const events = await drain(orchestrator.run(request));

      const [graded] = engine.callsOf('grade');
      const [synthesized] = engine.callsOf('synthesize');
      expect(graded).toContain('Graph fact');
      expect(graded).not.toContain('content of kb5.md');
      expect(synthesized).toContain('Graph fact');
      expect(synthesized).not.toContain('content of kb5.md');
      expect(metadataOf(events).confidence).toBeCloseTo(0.85);
      expect(citationsOf(events)).toEqual([
        { source: 'graph.md', contentPreview: 'Graph fact', similarityScore: 0.6, chunkId: 1 },
      ]);
    });

    it('keeps only the relevant set under separate', async () => {
      const { engine, orchestrator } = setup({
        script: { grade: [NOT_RELEVANT, RELEVANT] },
        retriever: new FakeRetriever([], [passage('kb.md', 0.9)]),
        graph: new FakeEnricher([related]),
        config: { graphEnrichment: 'separate' },
      });

      const events = await drain(orchestrator.run(request));

      const grades = engine.callsOf('grade');
      expect(grades).toHaveLength(2);
      expect(grades[0]).not.toContain('Graph fact');
      expect(grades[1]).toContain('Graph fact');
      expect(stepsOf(events)).toEqual(['route', 'retrieve', 'grade', 'synthesize']);
      expect(metadataOf(events).confidence).toBeCloseTo(0.6);
      expect(citationsOf(events)).toEqual([
        { source: 'graph.md', contentPreview: 'Graph fact', similarityScore: 0.6, chunkId: 1 },
      ]);
    });

    it('does not consult the graph when enrichment is off', async () => {
      const graph = new FakeEnricher([related]);
      const { orchestrator } = setup({ graph, config: { graphEnrichment: 'off' } });

      await drain(orchestrator.run(request));

      expect(graph.calls).toHaveLength(0);
    });
  });

  describe('direct answers', () => {
    it('greets without retrieval or model calls', async () => {
      const { engine, retriever, orchestrator } = setup();

      const events = await drain(orchestrator.run({ ...request, query: 'Hello!' }));

      expect(stepsOf(events)).toEqual(['route', 'synthesize']);
      expect(retriever.queries).toHaveLength(0);
      expect(engine.calls).toHaveLength(0);
      expect(textOf(events)).toBe(GREETING_MESSAGE);
      expect(citationsOf(events)).toEqual([]);
      expect(metadataOf(events)).toMatchObject({
        intent: 'greeting',
        confidence: 0.95,
        retrievalGrade: 'unset',
        webSearchUsed: false,
        iterationCount: 0,
      });
    });

    it('evaluates arithmetic', async () => {
      const { retriever, orchestrator } = setup();

      const events = await drain(orchestrator.run({ ...request, query: 'What is 2+2?' }));

      expect(retriever.queries).toHaveLength(0);
      expect(textOf(events)).toBe('The result is 4.');
      expect(metadataOf(events).reasoning).toContain('Evaluated 2+2');
      expect(events.at(-1)).toMatchObject({ type: 'done', totalTokens: 4 });
    });

    it('answers conversational messages with the model', async () => {
      const { retriever, orchestrator } = setup({
        script: {
          route: [routeReply('other_conversational', 0.8)],
          direct: [['Why did ', 'the chicken cross?']],
        },
      });

      const events = await drain(orchestrator.run({ ...request, query: 'Tell me a joke' }));

      expect(stepsOf(events)).toEqual(['route', 'synthesize']);
      expect(retriever.queries).toHaveLength(0);
      expect(textOf(events)).toBe('Why did the chicken cross?');
      expect(metadataOf(events)).toMatchObject({ intent: 'other_conversational', confidence: 0.8 });
    });

    it('asks the model when a calculation has no evaluable expression', async () => {
      const { engine, orchestrator } = setup({
        script: {
          route: [routeReply('calculation', 0.9)],
          direct: [['About ten.']],
        },
      });

      const events = await drain(orchestrator.run({ ...request, query: 'Roughly how many days are in a fortnight?' }));

      expect(engine.callsOf('direct')).toHaveLength(1);
      expect(textOf(events)).toBe('About ten.');
    });
  });

  describe('failures', () => {
    it('ends with citations and an error when generation fails', async () => {
      const { orchestrator } = setup({ script: { synthesize: [new Error('socket hang up')] } });

      const events = await drain(orchestrator.run(request));

      expect(typesOf(events).slice(-3)).toEqual(['metadata', 'citations', 'error']);
      expect(citationsOf(events)).toEqual([]);
      expect(events.at(-1)).toEqual({ type: 'error', message: 'Failed to generate a response' });
    });

    it('keeps streamed tokens when generation fails midway', async () => {
      const { orchestrator } = setup({
        script: { synthesize: [{ fragments: ['Partial '], error: new Error('socket hang up') }] },
      });

      const events = await drain(orchestrator.run(request));

      expect(typesOf(events).slice(-4)).toEqual(['metadata', 'token', 'citations', 'error']);
      expect(typesOf(events)).not.toContain('done');
    });

    it('throws synchronously on invalid per-run config', () => {
      const { orchestrator } = setup();

      let thrown: unknown;
      try {
        orchestrator.run(request, { config: { maxIterations: 0 } });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(RagError);
      expect(thrown).toMatchObject({ code: 'RAG_INVALID_CONFIG' });
    });

    it('rejects invalid default config at construction', () => {
      expect(() => setup({ config: { similarityThreshold: 1.5 } })).toThrow(RagError);
    });

    it('emits only a cancellation error when aborted before starting', async () => {
      const { engine, orchestrator } = setup();
      const controller = new AbortController();
      controller.abort();

      const events = await drain(orchestrator.run(request, { signal: controller.signal }));

      expect(events).toEqual([{ type: 'error', message: 'Request cancelled' }]);
      expect(engine.calls).toHaveLength(0);
    });

    it('stops before the next node when aborted mid-run', async () => {
      const controller = new AbortController();
      const { engine, orchestrator } = setup({
        retriever: new FakeRetriever([], [policy], () => controller.abort()),
      });

      const events = await drain(orchestrator.run(request, { signal: controller.signal }));

      expect(stepsOf(events)).toEqual(['route', 'retrieve']);
      expect(events.at(-1)).toEqual({ type: 'error', message: 'Request cancelled' });
      expect(engine.callsOf('grade')).toHaveLength(0);
    });
  });

  describe('answer', () => {
    it('aggregates the stream into a response', async () => {
      const { orchestrator } = setup({ script: { synthesize: [['Refunds ', 'take 30 days [2].']] } });

      const response = await orchestrator.answer(request);

      expect(response).toMatchObject({
        response: 'Refunds take 30 days [2].',
        intent: 'knowledge_search',
        retrievalGrade: 'relevant',
        webSearchUsed: false,
        iterationCount: 0,
      });
      expect(response.citations.map(citation => citation.source)).toEqual(['faq.md']);
      expect(response.error).toBeUndefined();
    });

    it('reports a generation failure in the error field', async () => {
      const { orchestrator } = setup({ script: { synthesize: [new Error('socket hang up')] } });

      const response = await orchestrator.answer(request);

      expect(response.response).toBe('');
      expect(response.error).toBe('Failed to generate a response');
      expect(response.citations).toEqual([]);
    });
  });
});
