import type { ChatResponse, WorkflowEvent } from '@corrective-rag/contracts';

/**
 * Drain an event stream into the aggregated response shape.
 * Tokens are concatenated in index order; a terminal `error` lands in `error`.
 */
export async function collectResponse(events: AsyncIterable<WorkflowEvent>): Promise<ChatResponse> {
  const startedAt = Date.now();
  const tokens: string[] = [];
  const response: ChatResponse = {
    response: '',
    intent: 'knowledge_search',
    confidence: 0,
    citations: [],
    reasoning: '',
    processingTimeMs: 0,
    retrievalGrade: 'unset',
    webSearchUsed: false,
    iterationCount: 0,
  };
  let finished = false;

  for await (const event of events) {
    switch (event.type) {
      case 'metadata':
        response.intent = event.intent;
        response.confidence = event.confidence;
        response.reasoning = event.reasoning;
        response.retrievalGrade = event.retrievalGrade;
        response.webSearchUsed = event.webSearchUsed;
        response.iterationCount = event.iterationCount;
        break;
      case 'token':
        tokens[event.index] = event.content;
        break;
      case 'citations':
        response.citations = event.citations;
        break;
      case 'done':
        response.processingTimeMs = event.processingTimeMs;
        finished = true;
        break;
      case 'error':
        response.error = event.message;
        break;
      case 'step':
        break;
    }
  }

  response.response = tokens.join('');
  if (!finished) {
    response.processingTimeMs = Date.now() - startedAt;
  }
  return response;
}
