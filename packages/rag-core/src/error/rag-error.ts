/**
 * @module @corrective-rag/core/error
 * Standardized error class for the corrective RAG packages
 */

export class RagError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RagError';
  }
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  RAG_INVALID_CONFIG: 'Workflow configuration is invalid - check maxIterations, retrievalK and similarityThreshold',
  RAG_CONFIG_ERROR: 'Environment settings are invalid - check the variables listed in the message',
  RAG_INVALID_REQUEST: 'Request body is invalid - provide a non-empty query of at most 2000 characters',
  RAG_LLM_ERROR: 'Language model call failed - check API key, model name and network access',
  RAG_RETRIEVAL_ERROR: 'Knowledge base search failed - check the vector store and embedding provider',
  RAG_GRAPH_ERROR: 'Knowledge graph lookup failed - enrichment was skipped',
  RAG_WEB_SEARCH_ERROR: 'Web search provider failed - check TAVILY_API_KEY and network access',
  RAG_SYNTHESIS_ERROR: 'Answer generation failed - retry the request',
  RAG_CANCELLED: 'Request was cancelled by the caller',
  RAG_GATEWAY_ERROR: 'Unexpected failure while handling the request - check the server logs',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

/**
 * Create a RagError with standardized code and hint
 */
export function createRagError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>,
): RagError {
  return new RagError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a RagError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'RAG_LLM_ERROR'): RagError {
  if (error instanceof RagError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createRagError(code, message, { originalError: error });
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/**
 * Human-readable message for logs; never for user-facing payloads
 */
export function describeError(error: unknown): string {
  if (error instanceof RagError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
