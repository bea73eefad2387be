/**
 * Model Transport Types
 *
 * Contract between the execution engine and a model provider.
 * Implement `IModelTransport` to connect an agent to your completion API.
 */

import type { ConversationItem, ToolCall, TraceContext } from "@agentloom/agent-runtime-core";

/**
 * Interface for model completion.
 */
export interface IModelTransport {
  /** Generate a response with tool use support */
  send(request: ModelRequest, options?: TransportCallOptions): Promise<ModelResponse>;

  /** Stream a response (optional); must end with a `response_completed` event */
  stream?(request: ModelRequest, options?: TransportCallOptions): AsyncIterable<ModelStreamEvent>;
}

export interface TransportCallOptions {
  readonly signal?: AbortSignal;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
}

export interface ModelRequest {
  readonly model: string;
  readonly instructions: string;
  readonly input: readonly ConversationItem[];
  readonly tools: readonly ToolDefinition[];
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly trace?: TraceContext;
}

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface ModelResponse {
  readonly id?: string;
  /** Concatenated text output (empty when the model only called tools) */
  readonly text: string;
  readonly toolCalls: readonly ToolCall[];
  readonly usage?: TokenUsage;
}

export type ModelStreamEvent =
  | { readonly type: "text_delta"; readonly delta: string }
  | {
      readonly type: "tool_call_delta";
      readonly callId: string;
      readonly name?: string;
      readonly argumentsDelta: string;
    }
  | { readonly type: "response_completed"; readonly response: ModelResponse };
