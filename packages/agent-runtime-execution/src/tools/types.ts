/**
 * Tool Types
 *
 * A tool is resolved by name and invoked with the raw JSON argument text the
 * model produced. Nested invocations receive their parent context explicitly
 * through `ToolInvocationContext`.
 */

import type { ConversationContext, ToolCall } from "@agentloom/agent-runtime-core";
import type { ApprovalHandler, RunObserver } from "../runOptions";
import type { ToolDefinition } from "../transport/types";

export interface ToolInvocationContext {
  /** Name of the agent invoking the tool */
  readonly agentName: string;
  /** The call being executed */
  readonly call: ToolCall;
  /** Conversation context of the invoking run */
  readonly context: ConversationContext;
  readonly signal?: AbortSignal;
  /** Forwarded to nested runs so their events reach the same stream */
  readonly observer?: RunObserver;
  /** Forwarded to nested runs */
  readonly approvalHandler?: ApprovalHandler;
  /** User the run acts for, from the run options */
  readonly userId?: string;
}

export interface AgentTool extends ToolDefinition {
  /** Pause the run for approval before executing */
  readonly requiresConfirmation: boolean;
  /**
   * Execute the tool.
   * @returns The result text shown to the model; throw to report a failure
   */
  invoke(argumentsJson: string, context: ToolInvocationContext): Promise<string>;
}

/**
 * Abstract registry interface
 */
export interface IToolRegistry {
  resolve(name: string): AgentTool | undefined;
  has(name: string): boolean;
  list(): readonly AgentTool[];
  definitions(): ToolDefinition[];
}
