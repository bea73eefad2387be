/**
 * Supervisor Agent
 *
 * A coordinator agent whose tools are its workers. Each worker is wrapped in
 * a SubAgentTool that shares the supervisor's state but starts with a fresh
 * history, so decomposition, delegation and aggregation all happen inside the
 * coordinator's own agentic loop.
 *
 * @example
 * ```typescript
 * const lead = createSupervisorAgent({
 *   instructions: "You lead a small research team.",
 *   transport,
 *   workers: [
 *     { worker: searcher, description: "Finds and summarizes sources" },
 *     { worker: writer, description: "Drafts the final report" },
 *   ],
 * });
 * ```
 */

import { AgentConfigurationError, getLogger, type RuntimeLogger } from "@agentloom/agent-runtime-core";
import {
  Agent,
  type AgentStreamSession,
  type IModelTransport,
  type Interactable,
  type InteractableInput,
  type PausedRunState,
  type RunOptions,
  type RunResult,
  type StreamOptions,
  type ToolApprovalPolicy,
  toContext,
} from "@agentloom/agent-runtime-execution";
import { SubAgentTool } from "../tools/subAgentTool";

// ============================================================================
// Types
// ============================================================================

export interface SupervisedWorker {
  readonly worker: Interactable;
  /** Defaults to the worker's own description */
  readonly description?: string;
}

export interface SupervisorAgentConfig {
  readonly name?: string;
  readonly description?: string;
  readonly instructions: string;
  readonly transport: IModelTransport;
  readonly model?: string;
  readonly maxTurns?: number;
  readonly workers: readonly SupervisedWorker[];
  /** Applied to the supervisor's own tool calls */
  readonly autoApprove?: ToolApprovalPolicy;
  readonly logger?: RuntimeLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class SupervisorAgent implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly workers: readonly SupervisedWorker[];
  /** The coordinator loop; exposed for resuming paused runs and inspection */
  readonly agent: Agent;
  private readonly logger: RuntimeLogger;

  constructor(config: SupervisorAgentConfig) {
    if (config.workers.length === 0) {
      throw new AgentConfigurationError("SupervisorAgent requires at least one worker");
    }
    this.name = config.name ?? "Supervisor";
    this.description = config.description;
    this.workers = [...config.workers];
    this.logger = (config.logger ?? getLogger()).child({ module: "supervisor", supervisor: this.name });

    const tools = this.workers.map(
      ({ worker, description }) =>
        new SubAgentTool(worker, {
          description: description ?? worker.description ?? `Delegate work to ${worker.name}`,
          shareState: true,
          shareHistory: false,
        })
    );

    this.agent = new Agent({
      name: this.name,
      description: config.description,
      instructions: buildSupervisorInstructions(config.instructions, this.workers),
      transport: config.transport,
      model: config.model,
      maxTurns: config.maxTurns,
      tools,
      autoApprove: config.autoApprove,
      logger: config.logger,
    });
  }

  async run(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const context = toContext(input).ensureTraceContext();
    this.logger.debug("Supervising run", {
      workers: this.workers.length,
      traceId: context.parentTraceId,
    });
    return this.agent.run(context, options);
  }

  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return this.agent.runStreaming(toContext(input).ensureTraceContext(), options);
  }

  resume(state: PausedRunState, options?: RunOptions): Promise<RunResult> {
    return this.agent.resume(state, options);
  }
}

// ============================================================================
// Prompt
// ============================================================================

function buildSupervisorInstructions(
  instructions: string,
  workers: readonly SupervisedWorker[]
): string {
  let prompt = `${instructions}\n\nYou are a supervisor agent with the following workers available:\n\n`;
  for (const { worker, description } of workers) {
    prompt += `- **${worker.name}**: ${description ?? worker.description ?? ""}\n`;
  }
  prompt +=
    "\nTo complete tasks:\n" +
    "1. Analyze the task and break it into subtasks\n" +
    "2. Delegate subtasks to appropriate workers using their tools\n" +
    "3. Wait for worker outputs and synthesize them\n" +
    "4. Provide the final coordinated response\n";
  return prompt;
}

// ============================================================================
// Factory
// ============================================================================

export function createSupervisorAgent(config: SupervisorAgentConfig): SupervisorAgent {
  return new SupervisorAgent(config);
}
