/**
 * Per-invocation workflow state. Created by the driver for one request and
 * never shared between invocations.
 */

import type {
  Citation,
  ConversationTurn,
  Intent,
  Passage,
  QueryRequest,
  RelevanceVerdict,
} from '@corrective-rag/contracts';
import { normalizeQuery } from '../rewriter/query-rewriter.js';

export interface WorkflowState {
  readonly originalQuery: string;
  readonly sessionId: string;
  readonly history: readonly ConversationTurn[];
  currentQuery: string;
  intent: Intent;
  intentConfidence: number;
  /** Replaced on every retrieval or web search */
  retrievedPassages: Passage[];
  /** Graph passages held back for independent grading under the `separate` policy */
  pendingGraphPassages: Passage[];
  relevanceVerdict: RelevanceVerdict;
  gradeReasoning: string;
  iterationCount: number;
  usedWebSearch: boolean;
  /** Normalized form of every query searched so far, the original included */
  triedQueries: string[];
  rewriteStalled: boolean;
  finalAnswer: string;
  citations: Citation[];
  confidence: number;
  reasoningTrace: string[];
  error?: string;
}

export function createInitialState(request: QueryRequest): WorkflowState {
  return {
    originalQuery: request.query,
    sessionId: request.sessionId,
    history: request.history ?? [],
    currentQuery: request.query,
    intent: 'knowledge_search',
    intentConfidence: 0,
    retrievedPassages: [],
    pendingGraphPassages: [],
    relevanceVerdict: 'unset',
    gradeReasoning: '',
    iterationCount: 0,
    usedWebSearch: false,
    triedQueries: [normalizeQuery(request.query)],
    rewriteStalled: false,
    finalAnswer: '',
    citations: [],
    confidence: 0,
    reasoningTrace: [],
  };
}
