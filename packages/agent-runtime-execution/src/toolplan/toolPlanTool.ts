/**
 * Tool Plan Tool
 *
 * `execute_tool_plan` lets the model batch several tool calls, with data
 * flowing between them, into one call. Agents offer it when created with
 * `enableToolPlanning`.
 */

import { defineTool } from "../tools/defineTool";
import type { AgentTool, IToolRegistry } from "../tools/types";
import {
  summarizeToolPlanResult,
  TOOL_PLAN_TOOL_NAME,
  ToolPlanExecutor,
  toolPlanSchema,
} from "./toolPlanExecutor";

const TOOL_PLAN_DESCRIPTION =
  "Execute a plan of multiple tool calls with data flow between them. " +
  "Use this when you need to call multiple tools where some depend on results of others, " +
  "or when you want to run independent tool calls in parallel for efficiency. " +
  "Each step has an id, a tool name, and arguments (a JSON string). " +
  'Use "$ref:step_id" in arguments to reference the full output of a previous step. ' +
  'Use "$ref:step_id.field" to extract a specific JSON field from a previous step\'s output. ' +
  "List which step IDs you need in output_steps (or omit for all results).";

const TOOL_PLAN_INPUT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {
    steps: {
      type: "array",
      description: "The ordered list of tool call steps to execute",
      items: {
        type: "object",
        properties: {
          id: {
            type: "string",
            description: "Unique identifier for this step, used by $ref references",
          },
          tool: { type: "string", description: "The name of the function tool to call" },
          arguments: {
            type: "string",
            description:
              'JSON string of arguments for the tool. May contain "$ref:step_id" to reference ' +
              'previous step output or "$ref:step_id.field" to extract a specific JSON field',
          },
        },
        required: ["id", "tool", "arguments"],
        additionalProperties: false,
      },
    },
    output_steps: {
      type: "array",
      description:
        "IDs of steps whose results should be returned. Omit or leave empty to return all results.",
      items: { type: "string" },
    },
  },
  required: ["steps"],
  additionalProperties: false,
};

/**
 * Plan tool over the tools of `registry`. An invalid plan fails the call;
 * failed steps are listed after the results.
 */
export function createToolPlanTool(registry: IToolRegistry): AgentTool {
  const executor = new ToolPlanExecutor(registry);

  return defineTool({
    name: TOOL_PLAN_TOOL_NAME,
    description: TOOL_PLAN_DESCRIPTION,
    parameters: toolPlanSchema,
    inputSchema: TOOL_PLAN_INPUT_SCHEMA,
    execute: async (plan, invocation) => {
      const result = await executor.execute(plan, invocation);
      const summary = summarizeToolPlanResult(result);
      const errors = Object.entries(result.errors);
      if (errors.length === 0) {
        return summary;
      }
      const details = errors.map(([stepId, message]) => `${stepId}: ${message}`).join("; ");
      return `Plan completed with errors.\nResults: ${summary}\nErrors: ${details}`;
    },
  });
}
