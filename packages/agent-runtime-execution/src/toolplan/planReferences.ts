/**
 * Plan References
 *
 * Step arguments refer to earlier outputs with `"$ref:step_id"` (the whole
 * output) or `"$ref:step_id.field.path"` (one field of a JSON output). The
 * quoted reference is replaced by a JSON value before the step runs.
 */

import { ToolPlanError } from "./toolPlanError";

const REFERENCE_PATTERN = /"\$ref:([a-zA-Z0-9_]+)(?:\.([a-zA-Z0-9_.]+))?"/g;

/**
 * Ids of the steps an argument string refers to, in first-seen order.
 */
export function extractPlanDependencies(argumentsJson: string): string[] {
  const ids = new Set<string>();
  for (const match of argumentsJson.matchAll(REFERENCE_PATTERN)) {
    ids.add(match[1]);
  }
  return [...ids];
}

/**
 * Replace every reference with the output it names.
 *
 * @throws ToolPlanError for a step without output, or a field path into output that is not JSON
 */
export function resolvePlanReferences(
  argumentsJson: string,
  outputs: ReadonlyMap<string, string>
): string {
  return argumentsJson.replace(REFERENCE_PATTERN, (_match, stepId: string, fieldPath?: string) => {
    const output = outputs.get(stepId);
    if (output === undefined) {
      throw new ToolPlanError(
        `Reference to unresolved step '${stepId}'. Available steps: ${[...outputs.keys()].join(", ")}`,
        stepId
      );
    }
    return fieldPath === undefined ? formatOutput(output) : extractField(stepId, output, fieldPath);
  });
}

function extractField(stepId: string, output: string, fieldPath: string): string {
  let value: unknown;
  try {
    value = JSON.parse(output);
  } catch (error) {
    throw new ToolPlanError(
      `Cannot extract field '${fieldPath}' from step '${stepId}' output: not valid JSON`,
      stepId,
      error
    );
  }

  for (const segment of fieldPath.split(".")) {
    value = readSegment(value, segment);
    if (value === undefined) {
      return "null";
    }
  }
  return JSON.stringify(value);
}

function readSegment(value: unknown, segment: string): unknown {
  if (Array.isArray(value)) {
    return /^\d+$/.test(segment) ? value[Number(segment)] : undefined;
  }
  if (typeof value === "object" && value !== null) {
    return Object.entries(value).find(([key]) => key === segment)?.[1];
  }
  return undefined;
}

/** JSON outputs are inlined as they are; anything else becomes a JSON string */
function formatOutput(output: string): string {
  const trimmed = output.trim();
  if (trimmed.length === 0) {
    return '""';
  }
  try {
    JSON.parse(trimmed);
    return trimmed;
  } catch {
    return JSON.stringify(output);
  }
}
