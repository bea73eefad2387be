/**
 * Handoffs
 *
 * A handoff is offered to the model as a tool. When the model calls it the
 * current run ends and the target continues the conversation.
 */

import type { ToolCall } from "@agentloom/agent-runtime-core";
import { z } from "zod";
import type { Interactable } from "../interactable";
import type { ToolDefinition } from "../transport/types";
import { toSnakeCase } from "../utils/naming";

export interface Handoff {
  /** Tool name shown to the model */
  readonly name: string;
  readonly description: string;
  readonly target: Interactable;
}

export interface HandoffOptions {
  readonly name?: string;
  readonly description?: string;
}

const handoffArgumentsSchema = z.object({ message: z.string() });

const HANDOFF_INPUT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {
    message: {
      type: "string",
      description: "The message to pass to the agent taking over the conversation",
    },
  },
  required: ["message"],
};

export function createHandoff(target: Interactable, options: HandoffOptions = {}): Handoff {
  return {
    name: options.name ?? `transfer_to_${toSnakeCase(target.name)}`,
    description:
      options.description ??
      target.description ??
      `Transfer the conversation to ${target.name}`,
    target,
  };
}

export function handoffToolDefinition(handoff: Handoff): ToolDefinition {
  return {
    name: handoff.name,
    description: handoff.description,
    inputSchema: HANDOFF_INPUT_SCHEMA,
  };
}

/**
 * The `message` argument of a handoff call, if the model supplied one.
 */
export function readHandoffMessage(call: ToolCall): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(call.arguments);
  } catch {
    return undefined;
  }
  const parsed = handoffArgumentsSchema.safeParse(raw);
  return parsed.success ? parsed.data.message : undefined;
}
