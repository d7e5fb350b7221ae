/**
 * Request and response shapes on the wire (snake_case, as clients see them)
 */

import type { Intent, RelevanceVerdict, StepName } from '@corrective-rag/contracts';

export interface WireCitation {
  source: string;
  content_preview: string;
  similarity_score: number;
  chunk_id?: number;
}

export type WireEvent =
  | { type: 'step'; step: StepName; label: string; timestamp: string }
  | {
      type: 'metadata';
      intent: Intent;
      confidence: number;
      reasoning: string;
      retrieval_grade: RelevanceVerdict;
      web_search_used: boolean;
      iteration_count: number;
    }
  | { type: 'token'; content: string; index: number }
  | { type: 'citations'; citations: WireCitation[] }
  | { type: 'done'; total_tokens: number; processing_time_ms: number }
  | { type: 'error'; message: string };

export interface ChatResponseBody {
  ok: true;
  session_id: string;
  response: string;
  intent: Intent;
  confidence: number;
  citations: WireCitation[];
  reasoning: string;
  processing_time_ms: number;
  retrieval_grade: RelevanceVerdict;
  web_search_used: boolean;
  iteration_count: number;
}

export interface ChatStream {
  ok: true;
  session_id: string;
  /** `data: <json>\n\n` frames, one per workflow event */
  frames: AsyncIterable<string>;
}

export interface GatewayError {
  ok: false;
  code: string;
  message: string;
  hint?: string;
}
