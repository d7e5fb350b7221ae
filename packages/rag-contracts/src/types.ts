/**
 * Domain types shared by retrieval, orchestration and transport packages.
 */

// === INTENT & VERDICTS ===

export type Intent =
  | 'knowledge_search'
  | 'calculation'
  | 'greeting'
  | 'other_conversational';

export type RelevanceVerdict = 'relevant' | 'not_relevant' | 'unset';

export type GradeResult = Exclude<RelevanceVerdict, 'unset'>;

// === PASSAGES ===

/**
 * Where a passage came from: vector similarity, knowledge-graph enrichment, or web search
 */
export type PassageOrigin = 'vector' | 'graph' | 'web';

export interface Passage {
  readonly sourceId: string;
  readonly content: string;
  /** Similarity score in [0, 1] */
  readonly score: number;
  readonly chunkIndex?: number;
  readonly origin: PassageOrigin;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface Citation {
  source: string;
  contentPreview: string;
  similarityScore: number;
  chunkId?: number;
}

// === QUERY ===

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface QueryRequest {
  readonly query: string;
  readonly sessionId: string;
  readonly userId?: string;
  /** Recent turns for the same session, oldest first */
  readonly history?: readonly ConversationTurn[];
}

// === STEPS ===

export type StepName =
  | 'route'
  | 'retrieve'
  | 'grade'
  | 'rewrite'
  | 'web_search'
  | 'synthesize';

export interface StepEvent {
  step: StepName;
  label: string;
  timestamp: string;
}

// === EVENTS ===

export interface MetadataPayload {
  intent: Intent;
  confidence: number;
  reasoning: string;
  retrievalGrade: RelevanceVerdict;
  webSearchUsed: boolean;
  iterationCount: number;
}

export type WorkflowEvent =
  | ({ type: 'step' } & StepEvent)
  | ({ type: 'metadata' } & MetadataPayload)
  | { type: 'token'; content: string; index: number }
  | { type: 'citations'; citations: Citation[] }
  | { type: 'done'; totalTokens: number; processingTimeMs: number }
  | { type: 'error'; message: string };

export type WorkflowEventType = WorkflowEvent['type'];

// === AGGREGATED RESPONSE ===

export interface ChatResponse {
  response: string;
  intent: Intent;
  confidence: number;
  citations: Citation[];
  reasoning: string;
  processingTimeMs: number;
  retrievalGrade: RelevanceVerdict;
  webSearchUsed: boolean;
  iterationCount: number;
  error?: string;
}
