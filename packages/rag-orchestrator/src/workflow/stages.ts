/**
 * Workflow stages and the transition function.
 *
 * | From      | Condition                                          | To                          |
 * |-----------|----------------------------------------------------|-----------------------------|
 * | route     | intent ≠ knowledge_search                          | synthesize (direct)         |
 * | route     | intent = knowledge_search                          | retrieve                    |
 * | retrieve  | always                                             | grade                       |
 * | grade     | relevant                                           | synthesize (grounded)       |
 * | grade     | not relevant, rewrites left, no stall              | rewrite                     |
 * | grade     | not relevant, rewrites exhausted or stalled, web   | web_search                  |
 * | grade     | not relevant, web search used or unavailable       | synthesize (insufficient)   |
 * | rewrite   | new query                                          | retrieve                    |
 * | rewrite   | stall                                              | web_search or insufficient  |
 * | web_search| always                                             | grade                       |
 * | synthesize| always                                             | end                         |
 */

import type { StepName } from '@corrective-rag/contracts';
import type { Grounding } from '../synthesizer/response-synthesizer.js';
import type { WorkflowState } from './state.js';

export type Stage =
  | { kind: 'route' }
  | { kind: 'retrieve' }
  | { kind: 'grade' }
  | { kind: 'rewrite' }
  | { kind: 'web_search' }
  | { kind: 'synthesize'; grounding: Grounding; errorFlagged?: boolean }
  | { kind: 'end' };

export type NodeStage = Exclude<Stage, { kind: 'end' }>;

export interface TransitionConfig {
  maxIterations: number;
  /** False when disabled by config or when no web search provider is wired */
  webSearchEnabled: boolean;
}

export function stepOf(stage: NodeStage): StepName {
  return stage.kind;
}

function fallbackAfterRetrievalExhausted(state: WorkflowState, config: TransitionConfig): Stage {
  if (config.webSearchEnabled && !state.usedWebSearch) {
    return { kind: 'web_search' };
  }
  return { kind: 'synthesize', grounding: 'insufficient' };
}

/**
 * Pure transition: reads `state`, never mutates it
 */
export function nextStage(stage: Stage, state: WorkflowState, config: TransitionConfig): Stage {
  switch (stage.kind) {
    case 'route':
      return state.intent === 'knowledge_search'
        ? { kind: 'retrieve' }
        : { kind: 'synthesize', grounding: 'direct' };

    case 'retrieve':
      return { kind: 'grade' };

    case 'grade':
      if (state.relevanceVerdict === 'relevant') {
        return { kind: 'synthesize', grounding: 'grounded' };
      }
      if (!state.rewriteStalled && state.iterationCount < config.maxIterations) {
        return { kind: 'rewrite' };
      }
      return fallbackAfterRetrievalExhausted(state, config);

    case 'rewrite':
      return state.rewriteStalled
        ? fallbackAfterRetrievalExhausted(state, config)
        : { kind: 'retrieve' };

    case 'web_search':
      return { kind: 'grade' };

    case 'synthesize':
    case 'end':
      return { kind: 'end' };
  }
}
