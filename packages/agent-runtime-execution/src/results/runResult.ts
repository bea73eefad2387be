/**
 * Run Results
 *
 * Terminal outcome of one agent or orchestration invocation. Callers must
 * branch on `status` before reading output.
 */

import type {
  AgentRunError,
  ConversationContext,
  ConversationItem,
  ToolExecution,
} from "@agentloom/agent-runtime-core";
import type { PausedRunState } from "../state/pausedRunState";

// ============================================================================
// Types
// ============================================================================

export type RunStatusKind = "success" | "handoff" | "error" | "paused";

interface RunResultBase {
  readonly agentName: string;
  /** Snapshot of the context history when the run ended */
  readonly history: readonly ConversationItem[];
  readonly toolExecutions: readonly ToolExecution[];
  readonly turnsUsed: number;
  /** Results kept alongside the primary one (parallel members, peers) */
  readonly related: readonly RunResult[];
}

export interface SuccessRunResult extends RunResultBase {
  readonly status: "success";
  readonly output: string;
  /** Structured output, when the agent declares an output schema */
  readonly parsed?: unknown;
}

export interface HandoffRunResult extends RunResultBase {
  readonly status: "handoff";
  readonly handoffTo: string;
  /** The target agent's own result */
  readonly inner: RunResult;
}

export interface ErrorRunResult extends RunResultBase {
  readonly status: "error";
  readonly error: AgentRunError;
}

export interface PausedRunResult extends RunResultBase {
  readonly status: "paused";
  readonly pausedState: PausedRunState;
}

export type RunResult = SuccessRunResult | HandoffRunResult | ErrorRunResult | PausedRunResult;

export interface RunSummary {
  readonly agentName: string;
  readonly context: ConversationContext;
  readonly toolExecutions: readonly ToolExecution[];
  readonly turnsUsed: number;
}

// ============================================================================
// Factories
// ============================================================================

function base(summary: RunSummary): RunResultBase {
  return {
    agentName: summary.agentName,
    history: summary.context.getHistory(),
    toolExecutions: [...summary.toolExecutions],
    turnsUsed: summary.turnsUsed,
    related: [],
  };
}

export function successResult(
  summary: RunSummary,
  output: string,
  parsed?: unknown
): SuccessRunResult {
  const result: SuccessRunResult = { ...base(summary), status: "success", output };
  return parsed === undefined ? result : { ...result, parsed };
}

export function errorResult(summary: RunSummary, error: AgentRunError): ErrorRunResult {
  return { ...base(summary), status: "error", error };
}

export function handoffResult(
  summary: RunSummary,
  handoffTo: string,
  inner: RunResult
): HandoffRunResult {
  return { ...base(summary), status: "handoff", handoffTo, inner };
}

export function pausedResult(summary: RunSummary, pausedState: PausedRunState): PausedRunResult {
  return { ...base(summary), status: "paused", pausedState };
}

/**
 * Attach related results to a primary result.
 */
export function composite(primary: RunResult, related: readonly RunResult[]): RunResult {
  return { ...primary, related: [...primary.related, ...related] };
}

// ============================================================================
// Guards
// ============================================================================

export function isSuccess(result: RunResult): result is SuccessRunResult {
  return result.status === "success";
}

export function isError(result: RunResult): result is ErrorRunResult {
  return result.status === "error";
}

export function isPaused(result: RunResult): result is PausedRunResult {
  return result.status === "paused";
}

export function isHandoff(result: RunResult): result is HandoffRunResult {
  return result.status === "handoff";
}

/**
 * The result of the agent that ended the run, following handoffs.
 */
export function finalResult(result: RunResult): Exclude<RunResult, HandoffRunResult> {
  return result.status === "handoff" ? finalResult(result.inner) : result;
}

/**
 * Text output of a result, following handoffs to the agent that answered.
 */
export function resultOutput(result: RunResult): string | undefined {
  switch (result.status) {
    case "success":
      return result.output;
    case "handoff":
      return resultOutput(result.inner);
    default:
      return undefined;
  }
}

/**
 * Error of a result, following handoffs.
 */
export function resultError(result: RunResult): AgentRunError | undefined {
  switch (result.status) {
    case "error":
      return result.error;
    case "handoff":
      return resultError(result.inner);
    default:
      return undefined;
  }
}
