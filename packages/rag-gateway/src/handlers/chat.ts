/**
 * Gateway handlers for the chat endpoints: streaming (SSE frames) and aggregated
 */

import {
  ChatRequestSchema,
  type ChatRequest,
  type QueryRequest,
  type WorkflowConfigInput,
  type WorkflowEvent,
} from '@corrective-rag/contracts';
import { ERROR_HINTS, describeError, getLogger, isRagError } from '@corrective-rag/core';
import { CANCELLED_MESSAGE, collectResponse, type RunOptions } from '@corrective-rag/orchestrator';
import type { ConversationMemory } from '../memory/conversation-memory.js';
import { encodeEventStream, toWireCitation } from '../sse/encode.js';
import type { ChatResponseBody, ChatStream, GatewayError } from '../types/wire.js';

const logger = getLogger('rag:gateway');

/**
 * Anything that runs the workflow for one request
 */
export interface WorkflowRunner {
  run(request: QueryRequest, options?: RunOptions): AsyncIterable<WorkflowEvent>;
}

export interface ChatHandlerDeps {
  orchestrator: WorkflowRunner;
  memory?: ConversationMemory;
  config?: WorkflowConfigInput;
}

export interface ChatHandlerOptions {
  signal?: AbortSignal;
}

export function parseChatRequest(body: unknown): { ok: true; request: ChatRequest } | GatewayError {
  const parsed = ChatRequestSchema.safeParse(body);
  if (parsed.success) {
    return { ok: true, request: parsed.data };
  }

  const message = parsed.error.issues
    .map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
    .join('; ');

  return {
    ok: false,
    code: 'RAG_INVALID_REQUEST',
    message,
    hint: ERROR_HINTS.RAG_INVALID_REQUEST,
  };
}

function toGatewayError(error: unknown): GatewayError {
  if (isRagError(error)) {
    return { ok: false, code: error.code, message: error.message, hint: error.hint };
  }
  return {
    ok: false,
    code: 'RAG_GATEWAY_ERROR',
    message: describeError(error),
    hint: ERROR_HINTS.RAG_GATEWAY_ERROR,
  };
}

function start(
  request: ChatRequest,
  deps: ChatHandlerDeps,
  options: ChatHandlerOptions,
): { ok: true; events: AsyncIterable<WorkflowEvent> } | GatewayError {
  try {
    const events = deps.orchestrator.run(
      {
        query: request.query,
        sessionId: request.sessionId,
        userId: request.userId,
        history: deps.memory?.history(request.sessionId) ?? [],
      },
      { config: deps.config, signal: options.signal },
    );
    return { ok: true, events };
  } catch (error) {
    logger.warn('Rejected chat request', { sessionId: request.sessionId, error: describeError(error) });
    return toGatewayError(error);
  }
}

/**
 * Pass events through and store the exchange once the run completes
 */
async function* remember(
  events: AsyncIterable<WorkflowEvent>,
  request: ChatRequest,
  memory: ConversationMemory | undefined,
): AsyncGenerator<WorkflowEvent> {
  let answer = '';
  for await (const event of events) {
    if (event.type === 'token') {
      answer += event.content;
    }
    if (event.type === 'done') {
      memory?.append(
        request.sessionId,
        { role: 'user', content: request.query },
        { role: 'assistant', content: answer },
      );
    }
    yield event;
  }
}

/**
 * Validate the body and start a streaming run. Validation and configuration
 * failures are returned before any frame is produced.
 */
export function handleChatStream(
  body: unknown,
  deps: ChatHandlerDeps,
  options: ChatHandlerOptions = {},
): ChatStream | GatewayError {
  const parsed = parseChatRequest(body);
  if (!parsed.ok) {
    return parsed;
  }

  const started = start(parsed.request, deps, options);
  if (!started.ok) {
    return started;
  }

  return {
    ok: true,
    session_id: parsed.request.sessionId,
    frames: encodeEventStream(remember(started.events, parsed.request, deps.memory)),
  };
}

/**
 * Validate the body, run to completion and return the aggregated response
 */
export async function handleChat(
  body: unknown,
  deps: ChatHandlerDeps,
  options: ChatHandlerOptions = {},
): Promise<ChatResponseBody | GatewayError> {
  const parsed = parseChatRequest(body);
  if (!parsed.ok) {
    return parsed;
  }

  const started = start(parsed.request, deps, options);
  if (!started.ok) {
    return started;
  }

  try {
    const response = await collectResponse(remember(started.events, parsed.request, deps.memory));

    if (response.error !== undefined) {
      const code = response.error === CANCELLED_MESSAGE ? 'RAG_CANCELLED' : 'RAG_SYNTHESIS_ERROR';
      return { ok: false, code, message: response.error, hint: ERROR_HINTS[code] };
    }

    return {
      ok: true,
      session_id: parsed.request.sessionId,
      response: response.response,
      intent: response.intent,
      confidence: response.confidence,
      citations: response.citations.map(toWireCitation),
      reasoning: response.reasoning,
      processing_time_ms: response.processingTimeMs,
      retrieval_grade: response.retrievalGrade,
      web_search_used: response.webSearchUsed,
      iteration_count: response.iterationCount,
    };
  } catch (error) {
    logger.error('Chat request failed', { sessionId: parsed.request.sessionId, error: describeError(error) });
    return toGatewayError(error);
  }
}
