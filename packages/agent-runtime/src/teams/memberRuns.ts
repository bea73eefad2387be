/**
 * Member Run Helpers
 *
 * Shared plumbing for orchestration primitives: running a member without
 * letting its rejection escape, building error results for the primitive
 * itself, and deriving cancellable signals for fan-out.
 */

import {
  AgentRunError,
  type AgentRunErrorCode,
  type ConversationContext,
  getErrorMessage,
  type RuntimeLogger,
} from "@agentloom/agent-runtime-core";
import {
  errorResult,
  type Interactable,
  type RunOptions,
  type RunResult,
} from "@agentloom/agent-runtime-execution";

/**
 * Error result for a primitive that stopped before or between member runs.
 */
export function orchestrationError(
  agentName: string,
  context: ConversationContext,
  code: AgentRunErrorCode,
  message: string,
  cause?: unknown
): RunResult {
  return errorResult(
    { agentName, context, toolExecutions: [], turnsUsed: 0 },
    new AgentRunError(code, message, { agentName, cause })
  );
}

/**
 * Run a member; a rejected run becomes a MEMBER_FAILED error result.
 */
export async function runMember(
  member: Interactable,
  context: ConversationContext,
  options: RunOptions,
  logger: RuntimeLogger
): Promise<RunResult> {
  try {
    return await member.run(context, options);
  } catch (error) {
    logger.warn("Member run threw", { member: member.name, error: getErrorMessage(error) });
    return orchestrationError(
      member.name,
      context,
      "MEMBER_FAILED",
      `Member "${member.name}" failed: ${getErrorMessage(error)}`,
      error
    );
  }
}

export interface LinkedController {
  readonly signal: AbortSignal;
  abort(reason?: unknown): void;
  /** Stop following the parent signal */
  unlink(): void;
}

/**
 * Controller aborted when it is aborted itself or when `parent` fires.
 * Aborting it, or calling `unlink`, removes its listener from `parent`.
 */
export function createLinkedController(parent?: AbortSignal): LinkedController {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const unlink = (): void => parent?.removeEventListener("abort", onParentAbort);
  return {
    signal: controller.signal,
    abort: (reason) => {
      unlink();
      controller.abort(reason);
    },
    unlink,
  };
}
