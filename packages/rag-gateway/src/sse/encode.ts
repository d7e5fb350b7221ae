import type { Citation, WorkflowEvent } from '@corrective-rag/contracts';
import type { WireCitation, WireEvent } from '../types/wire.js';

export function toWireCitation(citation: Citation): WireCitation {
  return {
    source: citation.source,
    content_preview: citation.contentPreview,
    similarity_score: citation.similarityScore,
    ...(citation.chunkId !== undefined ? { chunk_id: citation.chunkId } : {}),
  };
}

export function toWireEvent(event: WorkflowEvent): WireEvent {
  switch (event.type) {
    case 'step':
      return { type: 'step', step: event.step, label: event.label, timestamp: event.timestamp };
    case 'metadata':
      return {
        type: 'metadata',
        intent: event.intent,
        confidence: event.confidence,
        reasoning: event.reasoning,
        retrieval_grade: event.retrievalGrade,
        web_search_used: event.webSearchUsed,
        iteration_count: event.iterationCount,
      };
    case 'token':
      return { type: 'token', content: event.content, index: event.index };
    case 'citations':
      return { type: 'citations', citations: event.citations.map(toWireCitation) };
    case 'done':
      return { type: 'done', total_tokens: event.totalTokens, processing_time_ms: event.processingTimeMs };
    case 'error':
      return { type: 'error', message: event.message };
  }
}

/**
 * One Server-Sent Events frame
 */
export function encodeSSE(event: WorkflowEvent): string {
  return `data: ${JSON.stringify(toWireEvent(event))}\n\n`;
}

export async function* encodeEventStream(events: AsyncIterable<WorkflowEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield encodeSSE(event);
  }
}
