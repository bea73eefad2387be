/**
 * Runtime Errors
 *
 * Failures that end a run travel inside an error RunResult as an
 * AgentRunError. Caller mistakes (bad configuration, resuming an
 * unresolved or already consumed run) are thrown.
 */

export type AgentRunErrorCode =
  | "INPUT_REJECTED"
  | "OUTPUT_REJECTED"
  | "TOOL_RESOLUTION_FAILED"
  | "TOOL_EXECUTION_FAILED"
  | "TURN_LIMIT_EXCEEDED"
  | "TRANSPORT_FAILED"
  | "CANCELLED"
  | "ROUTING_FAILED"
  | "HANDOFF_FAILED"
  | "OUTPUT_PARSE_FAILED"
  | "MEMBER_FAILED";

export interface AgentRunErrorOptions {
  readonly agentName?: string;
  readonly turn?: number;
  readonly cause?: unknown;
}

/**
 * Error describing why a run ended unsuccessfully.
 */
export class AgentRunError extends Error {
  readonly agentName?: string;
  readonly turn?: number;

  constructor(
    public readonly code: AgentRunErrorCode,
    message: string,
    options: AgentRunErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AgentRunError";
    this.agentName = options.agentName;
    this.turn = options.turn;
  }
}

/**
 * Thrown when resume is called on a state that is unresolved or already consumed.
 */
export class InvalidResumeStateError extends Error {
  constructor(
    public readonly agentName: string,
    message: string
  ) {
    super(message);
    this.name = "InvalidResumeStateError";
  }
}

/**
 * Thrown when an agent or orchestration primitive is built with invalid settings.
 */
export class AgentConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AgentConfigurationError";
  }
}

/**
 * Normalize an unknown thrown value into a message.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
