/**
 * Tool Plan Executor
 *
 * Runs a batch of tool calls planned by the model in one turn. Steps are
 * ordered into waves by their `$ref` dependencies; the steps of a wave run
 * concurrently, and a step whose dependency failed is skipped.
 *
 * @example
 * ```typescript
 * const executor = new ToolPlanExecutor(registry);
 * const result = await executor.execute(
 *   {
 *     steps: [
 *       { id: "user", tool: "get_user", arguments: '{"id":"u-1"}' },
 *       { id: "orders", tool: "list_orders", arguments: '{"email":"$ref:user.email"}' },
 *     ],
 *     output_steps: ["orders"],
 *   },
 *   invocation
 * );
 * ```
 */

import { randomUUID } from "node:crypto";
import { getErrorMessage, type ToolCall } from "@agentloom/agent-runtime-core";
import { z } from "zod";
import type { IToolRegistry, ToolInvocationContext } from "../tools/types";
import { extractPlanDependencies, resolvePlanReferences } from "./planReferences";
import { ToolPlanError } from "./toolPlanError";

// ============================================================================
// Types
// ============================================================================

export const TOOL_PLAN_TOOL_NAME = "execute_tool_plan";

export const toolPlanSchema = z.object({
  steps: z.array(
    z.object({
      id: z.string(),
      tool: z.string(),
      /** JSON argument text; an object is accepted and serialized */
      arguments: z.union([
        z.string(),
        z.record(z.unknown()).transform((value) => JSON.stringify(value)),
      ]),
    })
  ),
  output_steps: z.array(z.string()).optional(),
});

export type ToolPlan = z.output<typeof toolPlanSchema>;

export type ToolPlanStep = ToolPlan["steps"][number];

export interface ToolPlanStepResult {
  readonly stepId: string;
  readonly toolName: string;
  /** Tool output, or the failure message */
  readonly output: string;
  readonly success: boolean;
  readonly durationMs: number;
}

export interface ToolPlanResult {
  /** Every step, in execution order */
  readonly steps: readonly ToolPlanStepResult[];
  /** The steps named in `output_steps`, or all of them */
  readonly outputs: readonly ToolPlanStepResult[];
  /** Failure message by step id */
  readonly errors: Readonly<Record<string, string>>;
  readonly durationMs: number;
}

// ============================================================================
// Executor
// ============================================================================

export class ToolPlanExecutor {
  constructor(private readonly tools: IToolRegistry) {}

  /**
   * @throws ToolPlanError when the plan is invalid; step failures are reported in the result
   */
  async execute(plan: ToolPlan, invocation: ToolInvocationContext): Promise<ToolPlanResult> {
    const startTime = performance.now();
    this.validate(plan.steps);
    const waves = orderIntoWaves(plan.steps);

    const outputs = new Map<string, string>();
    const failed = new Set<string>();
    const errors: Record<string, string> = {};
    const results: ToolPlanStepResult[] = [];

    for (const wave of waves) {
      const waveResults = await Promise.all(
        wave.map((step) => this.executeStep(step, outputs, failed, invocation))
      );
      for (const result of waveResults) {
        results.push(result);
        if (result.success) {
          outputs.set(result.stepId, result.output);
        } else {
          failed.add(result.stepId);
          errors[result.stepId] = result.output;
        }
      }
    }

    const wanted = plan.output_steps ?? [];
    return {
      steps: results,
      outputs: wanted.length === 0 ? results : results.filter((result) => wanted.includes(result.stepId)),
      errors,
      durationMs: Math.round(performance.now() - startTime),
    };
  }

  private validate(steps: readonly ToolPlanStep[]): void {
    if (steps.length === 0) {
      throw new ToolPlanError("Plan must contain at least one step");
    }

    const ids = new Set<string>();
    for (const step of steps) {
      if (step.id.trim().length === 0) {
        throw new ToolPlanError("Step ID cannot be blank");
      }
      if (ids.has(step.id)) {
        throw new ToolPlanError(`Duplicate step ID: '${step.id}'`, step.id);
      }
      ids.add(step.id);

      if (step.tool === TOOL_PLAN_TOOL_NAME) {
        throw new ToolPlanError(
          `Step '${step.id}' cannot call '${TOOL_PLAN_TOOL_NAME}' (recursive plans are not allowed)`,
          step.id
        );
      }
      const tool = this.tools.resolve(step.tool);
      if (!tool) {
        throw new ToolPlanError(`Unknown tool '${step.tool}' in step '${step.id}'`, step.id);
      }
      if (tool.requiresConfirmation) {
        throw new ToolPlanError(
          `Tool '${step.tool}' in step '${step.id}' requires confirmation and cannot run in a plan`,
          step.id
        );
      }
    }
  }

  private async executeStep(
    step: ToolPlanStep,
    outputs: ReadonlyMap<string, string>,
    failed: ReadonlySet<string>,
    invocation: ToolInvocationContext
  ): Promise<ToolPlanStepResult> {
    const startTime = performance.now();
    const finish = (output: string, success: boolean): ToolPlanStepResult => ({
      stepId: step.id,
      toolName: step.tool,
      output,
      success,
      durationMs: Math.round(performance.now() - startTime),
    });

    const failedDependency = extractPlanDependencies(step.arguments).find((id) => failed.has(id));
    if (failedDependency !== undefined) {
      return finish(`Skipped because dependency '${failedDependency}' failed`, false);
    }
    if (invocation.signal?.aborted) {
      return finish("Skipped because the run was cancelled", false);
    }

    const tool = this.tools.resolve(step.tool);
    if (!tool) {
      return finish(`Unknown tool '${step.tool}'`, false);
    }

    try {
      const argumentsJson = resolvePlanReferences(step.arguments, outputs);
      const callId = `plan_${step.id}_${randomUUID()}`;
      const call: ToolCall = { id: `fc_${callId}`, callId, name: step.tool, arguments: argumentsJson };
      return finish(await tool.invoke(argumentsJson, { ...invocation, call }), true);
    } catch (error) {
      if (error instanceof ToolPlanError) {
        return finish(error.message, false);
      }
      return finish(`Tool execution failed: ${getErrorMessage(error)}`, false);
    }
  }
}

/**
 * Group steps so that each wave depends only on earlier waves. References to
 * ids outside the plan are not dependencies; they fail when resolved.
 *
 * @throws ToolPlanError when the references form a cycle
 */
export function orderIntoWaves(steps: readonly ToolPlanStep[]): ToolPlanStep[][] {
  const ids = new Set(steps.map((step) => step.id));
  const pending = new Map(
    steps.map((step) => [step.id, extractPlanDependencies(step.arguments).filter((id) => ids.has(id))])
  );

  const waves: ToolPlanStep[][] = [];
  const done = new Set<string>();
  while (done.size < steps.length) {
    const wave = steps.filter(
      (step) => !done.has(step.id) && (pending.get(step.id) ?? []).every((id) => done.has(id))
    );
    if (wave.length === 0) {
      throw new ToolPlanError("Cycle detected in tool plan dependencies");
    }
    for (const step of wave) {
      done.add(step.id);
    }
    waves.push(wave);
  }
  return waves;
}

/**
 * JSON object of output text by step id; failed steps read `ERROR: <message>`.
 * Outputs that are JSON objects or arrays are embedded as values.
 */
export function summarizeToolPlanResult(result: ToolPlanResult): string {
  const summary: Record<string, unknown> = {};
  for (const step of result.outputs) {
    summary[step.stepId] = step.success ? embedOutput(step.output) : `ERROR: ${step.output}`;
  }
  return JSON.stringify(summary);
}

function embedOutput(output: string): unknown {
  const trimmed = output.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return output;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return output;
  }
}
