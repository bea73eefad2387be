/**
 * Paused Run State
 *
 * Snapshot of a run externalized while a tool call waits for approval.
 * The resolution is the only mutable part: it moves from `pending` to
 * `approved` or `rejected` once, and the resolved state is consumed once by
 * `Agent.resume`. The snapshot serializes to plain JSON so a run can resume
 * in another process.
 *
 * @example
 * ```typescript
 * const result = await agent.run("Delete the staging bucket");
 * if (result.status === "paused") {
 *   const saved = JSON.stringify(result.pausedState);
 *   // ... later, possibly elsewhere
 *   const state = PausedRunState.fromJSON(JSON.parse(saved));
 *   state.approve();
 *   const final = await agent.resume(state);
 * }
 * ```
 */

import {
  ConversationContext,
  InvalidResumeStateError,
  type SerializedConversationContext,
  serializedConversationContextSchema,
  type ToolCall,
  type ToolExecution,
} from "@agentloom/agent-runtime-core";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export type ApprovalStatus = "pending" | "approved" | "rejected";

export type ApprovalResolution =
  | { readonly status: "pending" }
  | { readonly status: "approved"; readonly output?: string }
  | { readonly status: "rejected"; readonly reason?: string };

export type ResolvedApproval = Exclude<ApprovalResolution, { status: "pending" }>;

export interface PausedRunStateInit {
  readonly agentName: string;
  readonly context: ConversationContext;
  readonly pendingCall: ToolCall;
  /** Calls from the same model turn queued behind the pending one */
  readonly deferredCalls?: readonly ToolCall[];
  readonly toolExecutions: readonly ToolExecution[];
  readonly turn: number;
  readonly resolution?: ApprovalResolution;
}

export interface SerializedPausedRunState {
  readonly version: 1;
  readonly agentName: string;
  readonly context: SerializedConversationContext;
  readonly pendingCall: ToolCall;
  readonly deferredCalls: ToolCall[];
  readonly toolExecutions: ToolExecution[];
  readonly turn: number;
  readonly resolution: ApprovalResolution;
}

// ============================================================================
// Schema
// ============================================================================

const toolCallSchema = z.object({
  id: z.string(),
  callId: z.string(),
  name: z.string(),
  arguments: z.string(),
});

const toolExecutionSchema = z.object({
  toolName: z.string(),
  callId: z.string(),
  arguments: z.string(),
  output: z.string(),
  success: z.boolean(),
  latencyMs: z.number().nonnegative(),
});

const resolutionSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("pending") }),
  z.object({ status: z.literal("approved"), output: z.string().optional() }),
  z.object({ status: z.literal("rejected"), reason: z.string().optional() }),
]);

export const serializedPausedRunStateSchema = z.object({
  version: z.literal(1),
  agentName: z.string().min(1),
  context: serializedConversationContextSchema,
  pendingCall: toolCallSchema,
  deferredCalls: z.array(toolCallSchema),
  toolExecutions: z.array(toolExecutionSchema),
  turn: z.number().int().nonnegative(),
  resolution: resolutionSchema,
});

// ============================================================================
// Implementation
// ============================================================================

export class PausedRunState {
  readonly agentName: string;
  readonly context: ConversationContext;
  readonly pendingCall: ToolCall;
  readonly deferredCalls: readonly ToolCall[];
  readonly toolExecutions: readonly ToolExecution[];
  readonly turn: number;
  private current: ApprovalResolution;
  private consumed = false;

  constructor(init: PausedRunStateInit) {
    this.agentName = init.agentName;
    this.context = init.context;
    this.pendingCall = init.pendingCall;
    this.deferredCalls = [...(init.deferredCalls ?? [])];
    this.toolExecutions = [...init.toolExecutions];
    this.turn = init.turn;
    this.current = init.resolution ?? { status: "pending" };
  }

  static fromJSON(data: unknown): PausedRunState {
    const parsed = serializedPausedRunStateSchema.parse(data);
    return new PausedRunState({
      agentName: parsed.agentName,
      context: ConversationContext.fromJSON(parsed.context),
      pendingCall: parsed.pendingCall,
      deferredCalls: parsed.deferredCalls,
      toolExecutions: parsed.toolExecutions,
      turn: parsed.turn,
      resolution: parsed.resolution,
    });
  }

  get resolution(): ApprovalResolution {
    return this.current;
  }

  get status(): ApprovalStatus {
    return this.current.status;
  }

  isPending(): boolean {
    return this.current.status === "pending";
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  /**
   * Approve the pending call. With `output` that text becomes the tool's
   * result; without it the tool is executed when the run resumes.
   */
  approve(output?: string): void {
    this.resolve(output === undefined ? { status: "approved" } : { status: "approved", output });
  }

  reject(reason?: string): void {
    this.resolve(reason === undefined ? { status: "rejected" } : { status: "rejected", reason });
  }

  /**
   * Take the resolution for resuming. Succeeds once per resolved state.
   */
  consume(): ResolvedApproval {
    const resolution = this.current;
    if (resolution.status === "pending") {
      throw new InvalidResumeStateError(
        this.agentName,
        `Cannot resume: tool call "${this.pendingCall.name}" has not been approved or rejected`
      );
    }
    if (this.consumed) {
      throw new InvalidResumeStateError(this.agentName, "Cannot resume: paused run was already resumed");
    }
    this.consumed = true;
    return resolution;
  }

  toJSON(): SerializedPausedRunState {
    return {
      version: 1,
      agentName: this.agentName,
      context: this.context.toJSON(),
      pendingCall: { ...this.pendingCall },
      deferredCalls: this.deferredCalls.map((call) => ({ ...call })),
      toolExecutions: this.toolExecutions.map((execution) => ({ ...execution })),
      turn: this.turn,
      resolution: this.current,
    };
  }

  private resolve(resolution: ResolvedApproval): void {
    if (this.current.status !== "pending") {
      throw new InvalidResumeStateError(
        this.agentName,
        `Tool call "${this.pendingCall.name}" was already ${this.current.status}`
      );
    }
    this.current = resolution;
  }
}
