/**
 * Gateway handlers for the corrective RAG assistant
 */

export {
  handleChat,
  handleChatStream,
  parseChatRequest,
  type ChatHandlerDeps,
  type ChatHandlerOptions,
  type WorkflowRunner,
} from './handlers/chat.js';
export { encodeSSE, encodeEventStream, toWireEvent, toWireCitation } from './sse/encode.js';
export { ConversationMemory, type ConversationMemoryOptions } from './memory/conversation-memory.js';
export {
  createAssistant,
  workflowConfigFromSettings,
  type Assistant,
  type AssistantOverrides,
} from './bootstrap.js';

export type {
  ChatResponseBody,
  ChatStream,
  GatewayError,
  WireCitation,
  WireEvent,
} from './types/wire.js';
