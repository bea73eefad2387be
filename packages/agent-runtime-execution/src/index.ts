/**
 * @agentloom/agent-runtime-execution
 *
 * Execution engine for LLM agents:
 * - the agentic loop with tools, guardrails and handoffs
 * - pause for approval and resume, in process or from serialized state
 * - streaming sessions with ordered lifecycle events
 * - per-user memory tools, batched tool plans and context summarization
 *
 * @example
 * ```typescript
 * import { createAgent, defineTool } from "@agentloom/agent-runtime-execution";
 *
 * const agent = createAgent({
 *   name: "Assistant",
 *   instructions: "You are a helpful assistant.",
 *   transport,
 *   tools: [searchTool],
 * });
 *
 * const result = await agent.run("Find the latest release notes");
 * ```
 */

// ============================================================================
// Agent
// ============================================================================
export { Agent, type AgentConfig, createAgent, type ToolApprovalPolicy } from "./agents/agent";
export {
  createHandoff,
  type Handoff,
  type HandoffOptions,
  handoffToolDefinition,
  readHandoffMessage,
} from "./agents/handoff";
export {
  createRunStream,
  type Interactable,
  type InteractableInput,
  toContext,
} from "./interactable";
export type {
  ApprovalDecision,
  ApprovalHandler,
  RunObserver,
  RunOptions,
  StreamOptions,
} from "./runOptions";

// ============================================================================
// Configuration
// ============================================================================
export {
  type AgentRuntimeConfig,
  agentRuntimeConfigSchema,
  DEFAULT_AGENT_RUNTIME_CONFIG,
  resolveAgentRuntimeConfig,
} from "./config/runtimeConfig";
export {
  applyContextWindow,
  type ContextWindowConfig,
  type ContextWindowStrategy,
  createCharacterTokenCounter,
  DEFAULT_CHARS_PER_TOKEN,
  dropOrphanToolResults,
  type SlidingWindowOptions,
  SlidingWindowStrategy,
  type TokenCounter,
} from "./context/contextWindow";
export {
  createSummarizationStrategy,
  SUMMARIZATION_FAILED,
  type SummarizationOptions,
  SummarizationStrategy,
  SUMMARY_PREFIX,
} from "./context/summarization";

// ============================================================================
// Guardrails
// ============================================================================
export {
  createGuardrail,
  GUARDRAIL_PASSED,
  type Guardrail,
  guardrailFailed,
  type GuardrailRef,
  GuardrailRegistry,
  type GuardrailResult,
  type GuardrailStage,
  resolveGuardrails,
  runGuardrails,
} from "./guardrails/guardrail";

// ============================================================================
// Memory
// ============================================================================
export {
  createInMemoryMemory,
  createMemoryEntry,
  InMemoryMemory,
  type Memory,
  type MemoryEntry,
  MemoryNotFoundError,
} from "./memory/memory";
export { createMemoryTools } from "./memory/memoryTools";

// ============================================================================
// Orchestrator
// ============================================================================
export {
  type AgentStateTransition,
  createRunStateMachine,
  InvalidTransitionError,
  type IRunStateMachine,
  type RunStateEvent,
  RunStateMachine,
  type RunStatus,
} from "./orchestrator/stateMachine";
export {
  createTurnExecutor,
  type ITurnExecutor,
  StreamIncompleteError,
  type TurnExecuteOptions,
  TurnExecutor,
  type TurnOutcome,
} from "./orchestrator/turnExecutor";

// ============================================================================
// Results & State
// ============================================================================
export {
  composite,
  type ErrorRunResult,
  errorResult,
  finalResult,
  type HandoffRunResult,
  handoffResult,
  isError,
  isHandoff,
  isPaused,
  isSuccess,
  type PausedRunResult,
  pausedResult,
  type RunResult,
  type RunStatusKind,
  type RunSummary,
  resultError,
  resultOutput,
  type SuccessRunResult,
  successResult,
} from "./results/runResult";
export {
  type ApprovalResolution,
  type ApprovalStatus,
  PausedRunState,
  type PausedRunStateInit,
  type ResolvedApproval,
  type SerializedPausedRunState,
  serializedPausedRunStateSchema,
} from "./state/pausedRunState";

// ============================================================================
// Streaming
// ============================================================================
export {
  AgentStreamSession,
  type AgentStreamSessionOptions,
  createStreamSession,
  type StreamExecutor,
} from "./streaming/agentStreamSession";
export type { AgentStreamEvent, AgentStreamEventType } from "./streaming/events";

// ============================================================================
// Tools
// ============================================================================
export {
  decodeToolArguments,
  defineTool,
  formatToolOutput,
  ToolArgumentsError,
  type ToolSpec,
} from "./tools/defineTool";
export { createToolRegistry, ToolRegistry } from "./tools/registry";
export type { AgentTool, IToolRegistry, ToolInvocationContext } from "./tools/types";

// ============================================================================
// Tool Plans
// ============================================================================
export { extractPlanDependencies, resolvePlanReferences } from "./toolplan/planReferences";
export { ToolPlanError } from "./toolplan/toolPlanError";
export {
  orderIntoWaves,
  summarizeToolPlanResult,
  TOOL_PLAN_TOOL_NAME,
  type ToolPlan,
  ToolPlanExecutor,
  type ToolPlanResult,
  type ToolPlanStep,
  type ToolPlanStepResult,
  toolPlanSchema,
} from "./toolplan/toolPlanExecutor";
export { createToolPlanTool } from "./toolplan/toolPlanTool";

// ============================================================================
// Tool Search
// ============================================================================
export {
  type BM25Options,
  BM25ToolSearchStrategy,
  RegexToolSearchStrategy,
  selectTools,
  type ToolSearchConfig,
  type ToolSearchStrategy,
} from "./toolsearch/toolSearch";

// ============================================================================
// Transport
// ============================================================================
export type {
  IModelTransport,
  ModelRequest,
  ModelResponse,
  ModelStreamEvent,
  TokenUsage,
  ToolDefinition,
  TransportCallOptions,
} from "./transport/types";
export { toSnakeCase } from "./utils/naming";
export {
  createMockTransport,
  type MockResponder,
  MockModelTransport,
  type MockTransportOptions,
  mockToolCall,
  TransportAbortedError,
  textResponse,
  toolCallResponse,
} from "./transport/mockTransport";
