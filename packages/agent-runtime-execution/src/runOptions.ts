/**
 * Run Options
 *
 * Per-invocation settings shared by agents and orchestration primitives.
 */

import type { ConversationContext, ToolCall } from "@agentloom/agent-runtime-core";
import type { AgentStateTransition } from "./orchestrator/stateMachine";
import type { RunObserver } from "./streaming/events";

export type { RunObserver } from "./streaming/events";

/**
 * Decision for a tool call that requires confirmation.
 * `pause` externalizes the run into a PausedRunState.
 */
export type ApprovalDecision =
  | { readonly type: "approve"; readonly output?: string }
  | { readonly type: "reject"; readonly reason?: string }
  | { readonly type: "pause" };

export type ApprovalHandler = (
  call: ToolCall,
  context: ConversationContext
) => ApprovalDecision | Promise<ApprovalDecision>;

export interface RunOptions {
  /** Cancels the run before its next model or tool call */
  readonly signal?: AbortSignal;
  /** Consulted for confirmation-required tools before the run pauses */
  readonly approvalHandler?: ApprovalHandler;
  readonly observer?: RunObserver;
  /** Scopes memory tools to one user; set by the caller, never by the model */
  readonly userId?: string;
  readonly onStatusChange?: (transition: AgentStateTransition) => void;
}

export interface StreamOptions extends Omit<RunOptions, "observer"> {
  /** Buffered events before the run waits for the consumer (default: 100) */
  readonly highWaterMark?: number;
  readonly lowWaterMark?: number;
}
