/**
 * @agentloom/agent-runtime-core
 *
 * Shared building blocks for the agent runtime: conversation items and
 * context, the error taxonomy, the partial JSON parser, the event stream
 * and the pino logger.
 */

// ============================================================================
// Conversation
// ============================================================================
export {
  type ChildContextOptions,
  ConversationContext,
  type ConversationContextInit,
  conversationItemSchema,
  type SerializedConversationContext,
  serializedConversationContextSchema,
} from "./context/conversationContext";
export {
  generateSpanId,
  generateTraceId,
  type TraceContext,
} from "./context/trace";
export {
  type ConversationItem,
  createMessage,
  createToolCallItem,
  createToolResultItem,
  isMessageItem,
  type MessageItem,
  type MessageRole,
  type ToolCall,
  type ToolCallItem,
  type ToolExecution,
  type ToolResultItem,
} from "./types/conversation";

// ============================================================================
// Errors
// ============================================================================
export {
  AgentConfigurationError,
  AgentRunError,
  type AgentRunErrorCode,
  type AgentRunErrorOptions,
  getErrorMessage,
  InvalidResumeStateError,
} from "./errors";

// ============================================================================
// Streaming
// ============================================================================
export { BackpressureEventStream, type EventStreamOptions } from "./streaming/eventStream";
export {
  completePartialJson,
  type JsonObject,
  type JsonValue,
  PartialJsonParser,
  parsePartialJson,
} from "./streaming/partialJson";

// ============================================================================
// Logging
// ============================================================================
export {
  createRuntimeLogger,
  getLogger,
  type LogFields,
  type LogLevel,
  logLevelSchema,
  readLoggerSettings,
  type RuntimeLogger,
  type RuntimeLoggerOptions,
} from "./logging/logger";
