/**
 * Interactable
 *
 * The one capability orchestration depends on. Agents, routers, parallel
 * groups, networks and supervisors all implement it, so any of them can be a
 * member of another.
 */

import { ConversationContext, type RuntimeLogger } from "@agentloom/agent-runtime-core";
import type { RunResult } from "./results/runResult";
import type { RunOptions, StreamOptions } from "./runOptions";
import { type AgentStreamSession, createStreamSession } from "./streaming/agentStreamSession";

export type InteractableInput = string | ConversationContext;

export interface Interactable {
  readonly name: string;
  /** Shown to routers and supervisors choosing between members */
  readonly description?: string;
  run(input: InteractableInput, options?: RunOptions): Promise<RunResult>;
  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession;
}

/**
 * Normalize input: text starts a new context holding one user message.
 */
export function toContext(input: InteractableInput): ConversationContext {
  if (typeof input === "string") {
    return ConversationContext.create().addUserMessage(input);
  }
  return input;
}

/**
 * Expose a run as an event stream; the run receives the stream's observer.
 */
export function createRunStream(
  name: string,
  run: (options: RunOptions) => Promise<RunResult>,
  options: StreamOptions = {},
  logger?: RuntimeLogger
): AgentStreamSession {
  const { highWaterMark, lowWaterMark, ...runOptions } = options;
  return createStreamSession(name, (observer) => run({ ...runOptions, observer }), {
    highWaterMark,
    lowWaterMark,
    logger,
  });
}
