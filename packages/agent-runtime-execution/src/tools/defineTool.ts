/**
 * Tool Definitions
 *
 * `defineTool` builds an AgentTool from a zod parameter schema. Argument
 * text is decoded and validated before `execute` runs; decoding failures are
 * reported to the model as tool failures.
 *
 * @example
 * ```typescript
 * const weather = defineTool({
 *   name: "get_weather",
 *   description: "Current weather for a city",
 *   parameters: z.object({ city: z.string() }),
 *   inputSchema: {
 *     type: "object",
 *     properties: { city: { type: "string" } },
 *     required: ["city"],
 *   },
 *   execute: ({ city }) => `Sunny in ${city}`,
 * });
 * ```
 */

import { getErrorMessage } from "@agentloom/agent-runtime-core";
import type { z } from "zod";
import type { AgentTool, ToolInvocationContext } from "./types";

export interface ToolSpec<TArgs> {
  readonly name: string;
  readonly description: string;
  readonly parameters: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  /** JSON schema sent to the model (defaults to an open object) */
  readonly inputSchema?: Record<string, unknown>;
  readonly requiresConfirmation?: boolean;
  /** Non-string results are serialized as JSON */
  execute(args: TArgs, context: ToolInvocationContext): unknown;
}

export class ToolArgumentsError extends Error {
  constructor(
    public readonly toolName: string,
    message: string
  ) {
    super(`Invalid arguments for tool "${toolName}": ${message}`);
    this.name = "ToolArgumentsError";
  }
}

const OPEN_OBJECT_SCHEMA: Record<string, unknown> = { type: "object" };

export function decodeToolArguments<TArgs>(
  toolName: string,
  argumentsJson: string,
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>
): TArgs {
  let raw: unknown;
  try {
    raw = argumentsJson.trim().length === 0 ? {} : JSON.parse(argumentsJson);
  } catch (error) {
    throw new ToolArgumentsError(toolName, getErrorMessage(error));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ToolArgumentsError(toolName, details);
  }
  return parsed.data;
}

export function formatToolOutput(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? "";
}

export function defineTool<TArgs>(spec: ToolSpec<TArgs>): AgentTool {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema ?? OPEN_OBJECT_SCHEMA,
    requiresConfirmation: spec.requiresConfirmation ?? false,
    async invoke(argumentsJson, context) {
      const args = decodeToolArguments(spec.name, argumentsJson, spec.parameters);
      return formatToolOutput(await spec.execute(args, context));
    },
  };
}
