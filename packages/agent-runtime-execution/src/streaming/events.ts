/**
 * Agent Stream Events
 *
 * Ordered lifecycle events a run emits. Every event names the agent that
 * produced it, so nested and parallel runs can share one stream.
 */

import type {
  AgentRunError,
  JsonValue,
  ToolCall,
  ToolExecution,
} from "@agentloom/agent-runtime-core";
import type { GuardrailStage } from "../guardrails/guardrail";
import type { RunResult } from "../results/runResult";
import type { PausedRunState } from "../state/pausedRunState";
import type { ModelResponse } from "../transport/types";

export type AgentStreamEvent =
  | { readonly type: "turn_start"; readonly agentName: string; readonly turn: number }
  | {
      readonly type: "text_delta";
      readonly agentName: string;
      readonly turn: number;
      readonly delta: string;
    }
  | {
      readonly type: "partial_output";
      readonly agentName: string;
      readonly turn: number;
      readonly value: JsonValue;
    }
  | {
      readonly type: "turn_complete";
      readonly agentName: string;
      readonly turn: number;
      readonly response: ModelResponse;
    }
  | { readonly type: "tool_pending"; readonly agentName: string; readonly call: ToolCall }
  | {
      readonly type: "tool_executed";
      readonly agentName: string;
      readonly execution: ToolExecution;
    }
  | {
      readonly type: "guardrail_failed";
      readonly agentName: string;
      readonly stage: GuardrailStage;
      readonly reason: string;
    }
  | { readonly type: "handoff"; readonly agentName: string; readonly target: string }
  | { readonly type: "paused"; readonly agentName: string; readonly state: PausedRunState }
  | { readonly type: "complete"; readonly agentName: string; readonly result: RunResult }
  | { readonly type: "error"; readonly agentName: string; readonly error: AgentRunError };

export type AgentStreamEventType = AgentStreamEvent["type"];

/**
 * Receives events as they happen. A returned promise is awaited before the
 * run continues, which is how stream consumers apply backpressure.
 */
export type RunObserver = (event: AgentStreamEvent) => void | Promise<void>;
