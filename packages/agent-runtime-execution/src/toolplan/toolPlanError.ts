/**
 * Raised for a tool plan that cannot run, or a step whose references cannot be resolved.
 */
export class ToolPlanError extends Error {
  constructor(
    message: string,
    public readonly stepId?: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ToolPlanError";
  }
}
