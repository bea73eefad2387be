/**
 * Scripted Interactable members for orchestration tests.
 */

import { type Mock, vi } from "vitest";
import {
  AgentRunError,
  type AgentRunErrorCode,
  type ConversationContext,
  createRunStream,
  errorResult,
  type Interactable,
  type InteractableInput,
  type RunOptions,
  type RunResult,
  successResult,
  toContext,
} from "../index";

export interface ScriptedMember {
  readonly member: Interactable;
  /** Context of every run, in call order */
  readonly contexts: ConversationContext[];
  readonly run: Mock<(input: InteractableInput, options?: RunOptions) => Promise<RunResult>>;
}

export function scriptedMember(
  name: string,
  respond: (context: ConversationContext, options: RunOptions) => RunResult | Promise<RunResult>
): ScriptedMember {
  const contexts: ConversationContext[] = [];
  const run = vi.fn(async (input: InteractableInput, options: RunOptions = {}) => {
    const context = toContext(input);
    contexts.push(context);
    return respond(context, options);
  });
  const member: Interactable = {
    name,
    description: `${name} member`,
    run,
    runStreaming: (input, options) =>
      createRunStream(name, (runOptions) => run(input, runOptions), options),
  };
  return { member, contexts, run };
}

export function replyingMember(name: string, reply: string): ScriptedMember {
  return scriptedMember(name, (context) => {
    context.addAssistantMessage(reply);
    return successResult({ agentName: name, context, toolExecutions: [], turnsUsed: 1 }, reply);
  });
}

export function failingMember(name: string, code: AgentRunErrorCode, message: string): ScriptedMember {
  return scriptedMember(name, (context) =>
    errorResult(
      { agentName: name, context, toolExecutions: [], turnsUsed: 1 },
      new AgentRunError(code, message, { agentName: name })
    )
  );
}
