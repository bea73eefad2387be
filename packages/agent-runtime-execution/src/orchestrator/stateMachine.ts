/**
 * Run State Machine
 *
 * Deterministic state machine enforcing the lifecycle of one agent
 * invocation. Each `run` or `resume` call drives its own instance.
 *
 * @example
 * ```typescript
 * const sm = createRunStateMachine();
 *
 * sm.onTransition((transition) => {
 *   console.log(`${transition.from} -> ${transition.to} via ${transition.event}`);
 * });
 *
 * sm.transition("start");   // idle -> awaiting_model
 * sm.transition("respond"); // awaiting_model -> model_responded
 * sm.transition("finish");  // model_responded -> done
 * ```
 *
 * @module orchestrator/stateMachine
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Possible run statuses.
 * - `idle`: not started
 * - `awaiting_model`: waiting for the model transport
 * - `model_responded`: response received, not yet acted upon
 * - `executing_tools`: running the requested tool calls
 * - `paused`: externalized for approval of a tool call
 * - `done`: finished with output or a handoff
 * - `failed`: finished with an error
 */
export type RunStatus =
  | "idle"
  | "awaiting_model"
  | "model_responded"
  | "executing_tools"
  | "paused"
  | "done"
  | "failed";

export type RunStateEvent =
  | "start"
  | "resume"
  | "respond"
  | "execute"
  | "continue"
  | "pause"
  | "finish"
  | "fail";

export interface AgentStateTransition {
  readonly from: RunStatus;
  readonly to: RunStatus;
  readonly event: RunStateEvent;
  readonly timestamp: number;
}

export type TransitionHandler = (transition: AgentStateTransition) => void;

export interface RunStateMachineConfig {
  /** Maximum number of transitions to keep in history (default: 100) */
  readonly maxHistorySize?: number;
}

export interface IRunStateMachine {
  getStatus(): RunStatus;
  canTransition(event: RunStateEvent): boolean;
  transition(event: RunStateEvent): RunStatus;
  getHistory(): readonly AgentStateTransition[];
  onTransition(handler: TransitionHandler): () => void;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_HISTORY_SIZE = 100;

const VALID_TRANSITIONS: Readonly<
  Record<RunStatus, Readonly<Partial<Record<RunStateEvent, RunStatus>>>>
> = {
  idle: {
    start: "awaiting_model",
    resume: "executing_tools",
    fail: "failed",
  },
  awaiting_model: {
    respond: "model_responded",
    fail: "failed",
  },
  model_responded: {
    execute: "executing_tools",
    finish: "done",
    fail: "failed",
  },
  executing_tools: {
    continue: "awaiting_model",
    pause: "paused",
    fail: "failed",
  },
  paused: {},
  done: {},
  failed: {},
} as const;

// ============================================================================
// State Machine Implementation
// ============================================================================

export class RunStateMachine implements IRunStateMachine {
  private status: RunStatus = "idle";
  private readonly history: AgentStateTransition[] = [];
  private readonly maxHistorySize: number;
  private readonly handlers = new Set<TransitionHandler>();

  constructor(config: RunStateMachineConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? DEFAULT_MAX_HISTORY_SIZE;
  }

  getStatus(): RunStatus {
    return this.status;
  }

  /**
   * Transition history, most recent last.
   */
  getHistory(): readonly AgentStateTransition[] {
    return this.history;
  }

  canTransition(event: RunStateEvent): boolean {
    return event in VALID_TRANSITIONS[this.status];
  }

  /**
   * Apply an event and move to the next status.
   *
   * @throws InvalidTransitionError if the event is not accepted in the current status
   */
  transition(event: RunStateEvent): RunStatus {
    const nextStatus = VALID_TRANSITIONS[this.status][event];

    if (!nextStatus) {
      throw new InvalidTransitionError(this.status, event);
    }

    const transition: AgentStateTransition = {
      from: this.status,
      to: nextStatus,
      event,
      timestamp: Date.now(),
    };

    this.status = nextStatus;
    this.recordTransition(transition);
    for (const handler of this.handlers) {
      handler(transition);
    }

    return this.status;
  }

  /**
   * @returns Unsubscribe function
   */
  onTransition(handler: TransitionHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  private recordTransition(transition: AgentStateTransition): void {
    this.history.push(transition);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class InvalidTransitionError extends Error {
  readonly status: RunStatus;
  readonly event: RunStateEvent;

  constructor(status: RunStatus, event: RunStateEvent) {
    super(`Invalid state transition: cannot apply event "${event}" from status "${status}"`);
    this.name = "InvalidTransitionError";
    this.status = status;
    this.event = event;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createRunStateMachine(config?: RunStateMachineConfig): IRunStateMachine {
  return new RunStateMachine(config);
}
