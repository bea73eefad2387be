/**
 * Sub-Agent Tool
 *
 * Exposes any Interactable as a tool. The nested run gets a child context
 * derived from the invoking run's context (passed explicitly through the
 * ToolInvocationContext) and the model's `request` as its user message.
 *
 * A nested run that errors or pauses is reported to the calling model as a
 * failed tool execution.
 */

import {
  type AgentTool,
  decodeToolArguments,
  finalResult,
  type Interactable,
  type RunResult,
  type ToolInvocationContext,
  toSnakeCase,
} from "@agentloom/agent-runtime-execution";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export interface SubAgentToolOptions {
  /** Tool name (default: `invoke_<snake_case target name>`) */
  readonly name?: string;
  readonly description?: string;
  /** Copy the invoking run's state into the nested run (default: true) */
  readonly shareState?: boolean;
  /** Copy the invoking run's history into the nested run (default: false) */
  readonly shareHistory?: boolean;
}

export class SubAgentError extends Error {
  constructor(
    public readonly targetName: string,
    message: string
  ) {
    super(`'${targetName}' failed: ${message}`);
    this.name = "SubAgentError";
  }
}

const requestArgumentsSchema = z.object({
  request: z.string().min(1, "Request cannot be empty"),
});

const REQUEST_INPUT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {
    request: {
      type: "string",
      description: "The message/request to send to the sub-agent",
    },
  },
  required: ["request"],
  additionalProperties: false,
};

// ============================================================================
// Implementation
// ============================================================================

export class SubAgentTool implements AgentTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema = REQUEST_INPUT_SCHEMA;
  readonly requiresConfirmation = false;
  readonly shareState: boolean;
  readonly shareHistory: boolean;

  constructor(
    readonly target: Interactable,
    options: SubAgentToolOptions = {}
  ) {
    this.name = options.name ?? `invoke_${toSnakeCase(target.name)}`;
    this.description = options.description ?? target.description ?? `Invoke ${target.name}`;
    this.shareState = options.shareState ?? true;
    this.shareHistory = options.shareHistory ?? false;
  }

  async invoke(argumentsJson: string, invocation: ToolInvocationContext): Promise<string> {
    const { request } = decodeToolArguments(this.name, argumentsJson, requestArgumentsSchema);
    const child = invocation.context.createChildContext(
      { shareState: this.shareState, shareHistory: this.shareHistory },
      request
    );

    const result = await this.target.run(child, {
      signal: invocation.signal,
      observer: invocation.observer,
      approvalHandler: invocation.approvalHandler,
      userId: invocation.userId,
    });
    return outputOrThrow(this.target.name, result);
  }
}

function outputOrThrow(targetName: string, result: RunResult): string {
  const final = finalResult(result);
  switch (final.status) {
    case "success":
      return final.output;
    case "paused":
      throw new SubAgentError(
        targetName,
        `paused waiting for approval of tool "${final.pausedState.pendingCall.name}"`
      );
    case "error":
      throw new SubAgentError(targetName, final.error.message);
  }
}

export function createSubAgentTool(target: Interactable, options?: SubAgentToolOptions): SubAgentTool {
  return new SubAgentTool(target, options);
}
