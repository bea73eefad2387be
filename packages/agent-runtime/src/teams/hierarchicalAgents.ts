/**
 * Hierarchical Agents
 *
 * Two-level delegation tree. Each department is a supervisor run by its
 * manager over the department's workers; the executive is a supervisor whose
 * workers are the department supervisors. Delegation recurses through
 * SubAgentTool calls, so no extra control flow is needed beyond the agentic
 * loop of each coordinator.
 */

import { AgentConfigurationError, getLogger, type RuntimeLogger } from "@agentloom/agent-runtime-core";
import type {
  AgentStreamSession,
  IModelTransport,
  Interactable,
  InteractableInput,
  RunOptions,
  RunResult,
  StreamOptions,
} from "@agentloom/agent-runtime-execution";
import { SupervisorAgent } from "./supervisorAgent";

// ============================================================================
// Types
// ============================================================================

/** A coordinating agent: the executive or a department manager */
export interface CoordinatorSpec {
  readonly name: string;
  readonly instructions: string;
  readonly transport: IModelTransport;
  readonly model?: string;
  readonly maxTurns?: number;
}

export interface DepartmentSpec {
  readonly manager: CoordinatorSpec;
  readonly workers: readonly Interactable[];
}

export interface HierarchicalAgentsConfig {
  readonly executive: CoordinatorSpec;
  /** Keyed by department name */
  readonly departments: Readonly<Record<string, DepartmentSpec>>;
  readonly description?: string;
  readonly logger?: RuntimeLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class HierarchicalAgents implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly executive: SupervisorAgent;
  private readonly departments: ReadonlyMap<string, SupervisorAgent>;
  private readonly logger: RuntimeLogger;

  constructor(config: HierarchicalAgentsConfig) {
    const entries = Object.entries(config.departments);
    if (entries.length === 0) {
      throw new AgentConfigurationError("HierarchicalAgents requires at least one department");
    }
    for (const [department, spec] of entries) {
      if (spec.workers.length === 0) {
        throw new AgentConfigurationError(`Department "${department}" requires at least one worker`);
      }
    }

    this.name = `${config.executive.name}_Hierarchy`;
    this.description = config.description;
    this.logger = (config.logger ?? getLogger()).child({ module: "hierarchy", hierarchy: this.name });

    const built = entries.map(([department, spec]) => ({
      department,
      spec,
      supervisor: createDepartmentSupervisor(department, spec, config.logger),
    }));
    this.departments = new Map(built.map(({ department, supervisor }) => [department, supervisor]));

    const { executive } = config;
    this.executive = new SupervisorAgent({
      name: `${executive.name}_Executive`,
      instructions: buildExecutiveInstructions(executive.instructions, entries),
      transport: executive.transport,
      model: executive.model,
      maxTurns: executive.maxTurns,
      workers: built.map(({ department, spec, supervisor }) => ({
        worker: supervisor,
        description: `${department} department - ${spec.manager.instructions}`,
      })),
      logger: config.logger,
    });
  }

  get departmentNames(): string[] {
    return [...this.departments.keys()];
  }

  run(input: InteractableInput, options?: RunOptions): Promise<RunResult> {
    return this.executive.run(input, options);
  }

  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return this.executive.runStreaming(input, options);
  }

  /**
   * Run one department's supervisor directly, bypassing the executive.
   */
  sendToDepartment(department: string, input: InteractableInput, options?: RunOptions): Promise<RunResult> {
    const supervisor = this.departments.get(department);
    if (!supervisor) {
      throw new AgentConfigurationError(`Department not found: ${department}`);
    }
    this.logger.debug("Sending directly to department", { department });
    return supervisor.run(input, options);
  }
}

// ============================================================================
// Builders
// ============================================================================

function createDepartmentSupervisor(
  department: string,
  spec: DepartmentSpec,
  logger?: RuntimeLogger
): SupervisorAgent {
  const { manager, workers } = spec;
  const team = workers.map((worker) => `- **${worker.name}**`).join("\n");

  return new SupervisorAgent({
    name: `${manager.name}_Supervisor`,
    description: `${department} department`,
    instructions:
      `${manager.instructions}\n\nYou manage the following team:\n\n${team}\n\n` +
      "Delegate subtasks to your team members. Coordinate their outputs into a cohesive result.",
    transport: manager.transport,
    model: manager.model,
    maxTurns: manager.maxTurns,
    workers: workers.map((worker) => ({
      worker,
      description: `Worker in ${department} department`,
    })),
    logger,
  });
}

function buildExecutiveInstructions(
  instructions: string,
  departments: ReadonlyArray<readonly [string, DepartmentSpec]>
): string {
  let prompt = `${instructions}\n\nYou are the executive overseeing the following departments:\n\n`;
  for (const [department, spec] of departments) {
    prompt += `- **${department}**: Managed by ${spec.manager.name} with ${spec.workers.length} workers\n`;
  }
  return `${prompt}\nDelegate tasks to appropriate departments. Aggregate their results for final response.`;
}

// ============================================================================
// Factory
// ============================================================================

export function createHierarchicalAgents(config: HierarchicalAgentsConfig): HierarchicalAgents {
  return new HierarchicalAgents(config);
}
