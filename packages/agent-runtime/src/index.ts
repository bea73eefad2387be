/**
 * @agentloom/agent-runtime
 *
 * Multi-agent orchestration on top of the execution engine:
 * - sub-agents exposed as tools
 * - parallel fan-out/fan-in with first-wins cancellation
 * - round-based peer networks
 * - classify-then-delegate routing
 * - supervisor and hierarchical delegation
 *
 * Every primitive implements Interactable, so they nest freely. The core and
 * execution packages are re-exported.
 *
 * @example
 * ```typescript
 * import { createAgent, createRouterAgent, createParallelAgents } from "@agentloom/agent-runtime";
 *
 * const router = createRouterAgent({
 *   transport,
 *   routes: [
 *     { target: billingAgent, description: "billing questions" },
 *     { target: createParallelAgents({ members: [triage, oncall] }), description: "incidents" },
 *   ],
 * });
 * const result = await router.run("The checkout page returns 500");
 * ```
 */

export * from "@agentloom/agent-runtime-core";
export * from "@agentloom/agent-runtime-execution";

// ============================================================================
// Tools
// ============================================================================
export {
  createSubAgentTool,
  SubAgentError,
  SubAgentTool,
  type SubAgentToolOptions,
} from "./tools/subAgentTool";

// ============================================================================
// Teams
// ============================================================================
export {
  AgentNetwork,
  type AgentNetworkConfig,
  type Contribution,
  createAgentNetwork,
  type NetworkResult,
} from "./teams/agentNetwork";
export {
  type CoordinatorSpec,
  createHierarchicalAgents,
  type DepartmentSpec,
  HierarchicalAgents,
  type HierarchicalAgentsConfig,
} from "./teams/hierarchicalAgents";
export {
  createLinkedController,
  type LinkedController,
  orchestrationError,
  runMember,
} from "./teams/memberRuns";
export { createParallelAgents, ParallelAgents, type ParallelAgentsConfig } from "./teams/parallelAgents";
export {
  type ClassifyOptions,
  createRouterAgent,
  type Route,
  RouterAgent,
  type RouterAgentConfig,
} from "./teams/routerAgent";
export {
  createSupervisorAgent,
  type SupervisedWorker,
  SupervisorAgent,
  type SupervisorAgentConfig,
} from "./teams/supervisorAgent";
