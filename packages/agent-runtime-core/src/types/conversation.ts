/**
 * Conversation Types
 *
 * Items that make up an agent conversation history, plus the records a run
 * keeps about the tools it invoked.
 */

// ============================================================================
// Messages
// ============================================================================

export type MessageRole = "system" | "developer" | "user" | "assistant";

/**
 * A textual message in the conversation.
 */
export interface MessageItem {
  readonly type: "message";
  readonly role: MessageRole;
  readonly content: string;
}

/**
 * A tool call requested by the model.
 */
export interface ToolCall {
  /** Identifier of the output item that carried the call */
  readonly id: string;
  /** Correlation id used to match the result back to this call */
  readonly callId: string;
  /** Tool name */
  readonly name: string;
  /** Raw JSON argument text, decoded by the tool */
  readonly arguments: string;
}

export interface ToolCallItem extends ToolCall {
  readonly type: "tool_call";
}

/**
 * The output of a tool call, as the model sees it.
 */
export interface ToolResultItem {
  readonly type: "tool_result";
  readonly callId: string;
  readonly name: string;
  readonly output: string;
  readonly success: boolean;
}

export type ConversationItem = MessageItem | ToolCallItem | ToolResultItem;

// ============================================================================
// Tool Executions
// ============================================================================

/**
 * Record of a completed tool invocation within a run.
 */
export interface ToolExecution {
  readonly toolName: string;
  readonly callId: string;
  readonly arguments: string;
  readonly output: string;
  readonly success: boolean;
  readonly latencyMs: number;
}

// ============================================================================
// Factories
// ============================================================================

export function createMessage(role: MessageRole, content: string): MessageItem {
  return { type: "message", role, content };
}

export function createToolCallItem(call: ToolCall): ToolCallItem {
  return {
    type: "tool_call",
    id: call.id,
    callId: call.callId,
    name: call.name,
    arguments: call.arguments,
  };
}

export function createToolResultItem(
  call: Pick<ToolCall, "callId" | "name">,
  output: string,
  success: boolean
): ToolResultItem {
  return { type: "tool_result", callId: call.callId, name: call.name, output, success };
}

export function isMessageItem(item: ConversationItem): item is MessageItem {
  return item.type === "message";
}
