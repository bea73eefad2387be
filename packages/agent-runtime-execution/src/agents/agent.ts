/**
 * Agent
 *
 * Execution engine for one LLM-backed agent. Each invocation runs the
 * agentic loop: call the model, check its output, execute the tool calls it
 * requested, and repeat until the model answers without tools, hands off to
 * another agent, a tool call needs approval, or the turn limit is reached.
 *
 * Tool calls that require confirmation go through, in order: the agent's
 * `autoApprove` policy, the run's `approvalHandler`, and otherwise pause the
 * run into a PausedRunState that `resume` continues later.
 *
 * @example
 * ```typescript
 * const agent = createAgent({
 *   name: "Ops",
 *   instructions: "You operate the deployment tools.",
 *   transport,
 *   tools: [deployTool],
 * });
 *
 * const result = await agent.run("Deploy build 42 to staging");
 * if (result.status === "paused") {
 *   result.pausedState.approve();
 *   const resumed = await agent.resume(result.pausedState);
 * }
 * ```
 *
 * @module agents/agent
 */

import {
  AgentConfigurationError,
  AgentRunError,
  type AgentRunErrorCode,
  type ConversationContext,
  getErrorMessage,
  getLogger,
  InvalidResumeStateError,
  PartialJsonParser,
  type RuntimeLogger,
  type ToolCall,
  type ToolExecution,
} from "@agentloom/agent-runtime-core";
import type { z } from "zod";
import { type AgentRuntimeConfig, resolveAgentRuntimeConfig } from "../config/runtimeConfig";
import { applyContextWindow, type ContextWindowConfig } from "../context/contextWindow";
import {
  type Guardrail,
  type GuardrailRef,
  type GuardrailRegistry,
  resolveGuardrails,
  runGuardrails,
} from "../guardrails/guardrail";
import { createRunStream, type Interactable, type InteractableInput, toContext } from "../interactable";
import type { Memory } from "../memory/memory";
import { createMemoryTools } from "../memory/memoryTools";
import { createRunStateMachine, type IRunStateMachine } from "../orchestrator/stateMachine";
import { createTurnExecutor, type ITurnExecutor } from "../orchestrator/turnExecutor";
import {
  errorResult,
  handoffResult,
  pausedResult,
  type RunResult,
  type RunSummary,
  successResult,
} from "../results/runResult";
import type { ApprovalDecision, RunOptions, StreamOptions } from "../runOptions";
import { PausedRunState } from "../state/pausedRunState";
import type { AgentStreamSession } from "../streaming/agentStreamSession";
import type { AgentStreamEvent } from "../streaming/events";
import { createToolPlanTool } from "../toolplan/toolPlanTool";
import { ToolRegistry } from "../tools/registry";
import type { AgentTool, IToolRegistry } from "../tools/types";
import { selectTools, type ToolSearchConfig } from "../toolsearch/toolSearch";
import type { IModelTransport, ModelRequest, ToolDefinition } from "../transport/types";
import { createHandoff, type Handoff, type HandoffOptions, handoffToolDefinition, readHandoffMessage } from "./handoff";

// ============================================================================
// Types
// ============================================================================

/** `true` approves every confirmation-required call; a predicate approves per call */
export type ToolApprovalPolicy = boolean | ((call: ToolCall) => boolean);

export interface AgentConfig {
  readonly name: string;
  readonly description?: string;
  readonly instructions: string;
  readonly transport: IModelTransport;
  /** Model id; falls back to the runtime config */
  readonly model?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  /** Falls back to the runtime config (default: 10) */
  readonly maxTurns?: number;
  readonly tools?: readonly AgentTool[];
  /** Shared registry, used instead of `tools` */
  readonly toolRegistry?: IToolRegistry;
  readonly handoffs?: readonly Handoff[];
  /** Adds the memory tools over this store; runs pass `userId` to use them */
  readonly memory?: Memory;
  /** Adds `execute_tool_plan`, which batches calls to the other tools */
  readonly enableToolPlanning?: boolean;
  /** Registers deferred tools, offered only when they match the latest user message */
  readonly toolSearch?: ToolSearchConfig;
  readonly inputGuardrails?: readonly GuardrailRef[];
  readonly outputGuardrails?: readonly GuardrailRef[];
  /** Resolves guardrails referenced by id */
  readonly guardrailRegistry?: GuardrailRegistry;
  readonly autoApprove?: ToolApprovalPolicy;
  /** Final output is parsed as JSON and validated against this schema */
  readonly outputSchema?: z.ZodType<unknown, z.ZodTypeDef, unknown>;
  readonly contextWindow?: ContextWindowConfig;
  /** Overrides for model, maxTurns, temperature and context budget defaults */
  readonly runtime?: Partial<AgentRuntimeConfig>;
  readonly logger?: RuntimeLogger;
}

interface LoopState {
  readonly context: ConversationContext;
  readonly toolExecutions: ToolExecution[];
  turn: number;
  readonly machine: IRunStateMachine;
  readonly options: RunOptions;
  readonly logger: RuntimeLogger;
}

const REJECTED_BY_USER = "Tool execution was rejected by user";

// ============================================================================
// Agent Implementation
// ============================================================================

export class Agent implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly instructions: string;
  readonly model: string;
  readonly maxTurns: number;
  private readonly temperature?: number;
  private readonly maxOutputTokens?: number;
  private readonly tools: IToolRegistry;
  private readonly toolSearch?: ToolSearchConfig;
  private readonly handoffs: ReadonlyMap<string, Handoff>;
  private readonly inputGuardrails: readonly Guardrail[];
  private readonly outputGuardrails: readonly Guardrail[];
  private readonly autoApprove: ToolApprovalPolicy;
  private readonly outputSchema?: z.ZodType<unknown, z.ZodTypeDef, unknown>;
  private readonly contextWindow?: ContextWindowConfig;
  private readonly turnExecutor: ITurnExecutor;
  private readonly logger: RuntimeLogger;

  constructor(config: AgentConfig) {
    if (config.name.trim().length === 0) {
      throw new AgentConfigurationError("Agent name must not be empty");
    }
    if (config.tools && config.toolRegistry) {
      throw new AgentConfigurationError(
        `Agent "${config.name}" takes either tools or a toolRegistry, not both`
      );
    }

    const runtime = resolveAgentRuntimeConfig({
      ...config.runtime,
      ...(config.model === undefined ? {} : { model: config.model }),
      ...(config.maxTurns === undefined ? {} : { maxTurns: config.maxTurns }),
      ...(config.temperature === undefined ? {} : { temperature: config.temperature }),
    });

    this.name = config.name;
    this.description = config.description;
    this.instructions = config.instructions;
    this.model = runtime.model;
    this.maxTurns = runtime.maxTurns;
    this.temperature = runtime.temperature;
    this.maxOutputTokens = config.maxOutputTokens;
    this.tools = buildToolRegistry(config);
    this.toolSearch = config.toolSearch;
    this.handoffs = indexHandoffs(config.name, config.handoffs ?? [], this.tools);
    this.inputGuardrails = resolveGuardrails(config.inputGuardrails ?? [], config.guardrailRegistry);
    this.outputGuardrails = resolveGuardrails(config.outputGuardrails ?? [], config.guardrailRegistry);
    this.autoApprove = config.autoApprove ?? false;
    this.outputSchema = config.outputSchema;
    this.contextWindow =
      config.contextWindow ??
      (runtime.contextMaxTokens === undefined ? undefined : { maxTokens: runtime.contextMaxTokens });
    this.turnExecutor = createTurnExecutor({ transport: config.transport });
    this.logger = (config.logger ?? getLogger()).child({ module: "agent", agent: config.name });
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Run the agentic loop on the given input. A context passed in is
   * appended to in place.
   */
  async run(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const context = toContext(input);
    const loop = this.createLoop(context, options, [], 0);
    loop.logger.debug("Run started", { historySize: context.historySize });

    const inputText = context.lastUserMessageText() ?? "";
    const inputCheck = await runGuardrails(this.inputGuardrails, inputText, context);
    if (!inputCheck.passed) {
      await this.emit(loop, {
        type: "guardrail_failed",
        agentName: this.name,
        stage: "input",
        reason: inputCheck.reason,
      });
      return this.fail(loop, "INPUT_REJECTED", `Input guardrail failed: ${inputCheck.reason}`);
    }

    loop.machine.transition("start");
    return this.executeLoop(loop, []);
  }

  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return createRunStream(this.name, (runOptions) => this.run(input, runOptions), options, this.logger);
  }

  /**
   * Continue a paused run from its resolved state.
   *
   * @throws InvalidResumeStateError if the state belongs to another agent,
   * is unresolved, or was already resumed
   */
  async resume(state: PausedRunState, options: RunOptions = {}): Promise<RunResult> {
    this.assertOwnState(state);
    const resolution = state.consume();
    const loop = this.createLoop(state.context, options, state.toolExecutions, state.turn);
    loop.logger.info("Resuming paused run", {
      tool: state.pendingCall.name,
      callId: state.pendingCall.callId,
      resolution: resolution.status,
    });

    loop.machine.transition("resume");
    const call = state.pendingCall;
    if (resolution.status === "rejected") {
      await this.recordExecution(loop, call, resolution.reason ?? REJECTED_BY_USER, false, 0);
    } else if (resolution.output !== undefined) {
      await this.recordExecution(loop, call, resolution.output, true, 0);
    } else {
      await this.executeTool(loop, call);
    }

    return this.executeLoop(loop, state.deferredCalls);
  }

  /**
   * Streaming variant of `resume`. State problems throw before the stream is created.
   */
  resumeStreaming(state: PausedRunState, options?: StreamOptions): AgentStreamSession {
    this.assertOwnState(state);
    if (state.isPending() || state.isConsumed) {
      throw new InvalidResumeStateError(
        this.name,
        "Cannot resume: paused run must be resolved exactly once before resuming"
      );
    }
    return createRunStream(this.name, (runOptions) => this.resume(state, runOptions), options, this.logger);
  }

  /**
   * Offer this agent to another agent as a handoff target.
   */
  asHandoff(options?: HandoffOptions): Handoff {
    return createHandoff(this, options);
  }

  /** Tools offered to the model; with tool search, deferred tools must match `query` */
  toolDefinitions(query = ""): ToolDefinition[] {
    const tools = this.toolSearch ? selectTools(this.tools.list(), this.toolSearch, query) : this.tools.list();
    return [
      ...tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
      ...[...this.handoffs.values()].map(handoffToolDefinition),
    ];
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private async executeLoop(loop: LoopState, queued: readonly ToolCall[]): Promise<RunResult> {
    if (loop.machine.getStatus() === "executing_tools") {
      const stopped = await this.processToolCalls(loop, queued);
      if (stopped) {
        return stopped;
      }
      loop.machine.transition("continue");
    }

    for (;;) {
      if (loop.options.signal?.aborted) {
        return this.fail(loop, "CANCELLED", "Run was cancelled");
      }
      if (loop.turn >= this.maxTurns) {
        return this.fail(loop, "TURN_LIMIT_EXCEEDED", `Exceeded maximum turns (${this.maxTurns})`);
      }

      loop.turn += 1;
      loop.context.incrementTurn();
      const turn = loop.turn;
      await this.emit(loop, { type: "turn_start", agentName: this.name, turn });

      const outcome = await this.turnExecutor.execute(await this.buildRequest(loop.context), {
        signal: loop.options.signal,
        onTextDelta: loop.options.observer ? this.createTextDeltaHandler(loop, turn) : undefined,
      });

      if (outcome.type === "error") {
        if (loop.options.signal?.aborted) {
          return this.fail(loop, "CANCELLED", "Run was cancelled", outcome.cause);
        }
        loop.logger.warn("Model call failed", { turn, error: outcome.error });
        return this.fail(loop, "TRANSPORT_FAILED", `Model call failed: ${outcome.error}`, outcome.cause);
      }

      loop.machine.transition("respond");
      const { response } = outcome;
      if (response.text.length > 0) {
        loop.context.addAssistantMessage(response.text);
      }
      for (const call of response.toolCalls) {
        loop.context.addToolCall(call);
      }
      loop.logger.debug("Model responded", {
        turn,
        toolCalls: response.toolCalls.length,
        durationMs: Math.round(outcome.durationMs),
      });
      await this.emit(loop, { type: "turn_complete", agentName: this.name, turn, response });

      if (response.toolCalls.length === 0 || response.text.length > 0) {
        const outputCheck = await runGuardrails(this.outputGuardrails, response.text, loop.context);
        if (!outputCheck.passed) {
          await this.emit(loop, {
            type: "guardrail_failed",
            agentName: this.name,
            stage: "output",
            reason: outputCheck.reason,
          });
          return this.fail(loop, "OUTPUT_REJECTED", `Output guardrail failed: ${outputCheck.reason}`);
        }
      }

      if (response.toolCalls.length === 0) {
        return this.complete(loop, response.text);
      }

      for (const call of response.toolCalls) {
        const handoff = this.handoffs.get(call.name);
        if (handoff) {
          return this.executeHandoff(loop, response.toolCalls, call, handoff);
        }
      }

      loop.machine.transition("execute");
      const stopped = await this.processToolCalls(loop, response.toolCalls);
      if (stopped) {
        return stopped;
      }
      loop.machine.transition("continue");
    }
  }

  /**
   * Execute calls in order.
   * @returns A terminal result when the run pauses or is cancelled
   */
  private async processToolCalls(
    loop: LoopState,
    calls: readonly ToolCall[]
  ): Promise<RunResult | undefined> {
    for (let index = 0; index < calls.length; index++) {
      const call = calls[index];
      if (loop.options.signal?.aborted) {
        return this.fail(loop, "CANCELLED", "Run was cancelled");
      }

      const tool = this.tools.resolve(call.name);
      if (tool?.requiresConfirmation) {
        const decision = await this.decideApproval(loop, call);
        if (decision.type === "pause") {
          return this.pause(loop, call, calls.slice(index + 1));
        }
        if (decision.type === "reject") {
          await this.recordExecution(loop, call, decision.reason ?? REJECTED_BY_USER, false, 0);
          continue;
        }
        if (decision.output !== undefined) {
          await this.recordExecution(loop, call, decision.output, true, 0);
          continue;
        }
      }

      await this.executeTool(loop, call);
    }
    return undefined;
  }

  private async decideApproval(loop: LoopState, call: ToolCall): Promise<ApprovalDecision> {
    if (this.isAutoApproved(call)) {
      return { type: "approve" };
    }
    await this.emit(loop, { type: "tool_pending", agentName: this.name, call });
    const handler = loop.options.approvalHandler;
    return handler ? handler(call, loop.context) : { type: "pause" };
  }

  private isAutoApproved(call: ToolCall): boolean {
    return typeof this.autoApprove === "function" ? this.autoApprove(call) : this.autoApprove;
  }

  private async executeTool(loop: LoopState, call: ToolCall): Promise<void> {
    const tool = this.tools.resolve(call.name);
    if (!tool) {
      const code: AgentRunErrorCode = "TOOL_RESOLUTION_FAILED";
      loop.logger.warn("Unknown tool requested", { code, tool: call.name, callId: call.callId });
      await this.recordExecution(
        loop,
        call,
        `Tool execution failed: unknown tool "${call.name}"`,
        false,
        0
      );
      return;
    }

    const startTime = performance.now();
    let output: string;
    let success: boolean;
    try {
      output = await tool.invoke(call.arguments, {
        agentName: this.name,
        call,
        context: loop.context,
        signal: loop.options.signal,
        observer: loop.options.observer,
        approvalHandler: loop.options.approvalHandler,
        userId: loop.options.userId,
      });
      success = true;
    } catch (error) {
      const code: AgentRunErrorCode = "TOOL_EXECUTION_FAILED";
      loop.logger.warn("Tool execution failed", {
        code,
        tool: call.name,
        callId: call.callId,
        error: getErrorMessage(error),
      });
      output = `Tool execution failed: ${getErrorMessage(error)}`;
      success = false;
    }

    await this.recordExecution(loop, call, output, success, performance.now() - startTime);
  }

  private async recordExecution(
    loop: LoopState,
    call: ToolCall,
    output: string,
    success: boolean,
    latencyMs: number
  ): Promise<void> {
    const execution: ToolExecution = {
      toolName: call.name,
      callId: call.callId,
      arguments: call.arguments,
      output,
      success,
      latencyMs: Math.round(latencyMs),
    };
    loop.toolExecutions.push(execution);
    loop.context.addToolResult(call, output, success);
    await this.emit(loop, { type: "tool_executed", agentName: this.name, execution });
  }

  /**
   * Transfer the run to the target agent. Every other call of the turn gets
   * a failed result so the history stays balanced.
   */
  private async executeHandoff(
    loop: LoopState,
    calls: readonly ToolCall[],
    handoffCall: ToolCall,
    handoff: Handoff
  ): Promise<RunResult> {
    const target = handoff.target.name;
    loop.logger.info("Handing off", { target, skippedCalls: calls.length - 1 });
    await this.emit(loop, { type: "handoff", agentName: this.name, target });

    for (const call of calls) {
      if (call === handoffCall) {
        loop.context.addToolResult(call, `Transferred to ${target}`, true);
      } else {
        await this.recordExecution(loop, call, `Skipped: control transferred to ${target}`, false, 0);
      }
    }
    const child = loop.context.fork();
    child.addUserMessage(readHandoffMessage(handoffCall) ?? loop.context.lastUserMessageText() ?? "");

    let inner: RunResult;
    try {
      inner = await handoff.target.run(child, {
        signal: loop.options.signal,
        approvalHandler: loop.options.approvalHandler,
        observer: loop.options.observer,
        userId: loop.options.userId,
      });
    } catch (error) {
      return this.fail(
        loop,
        "HANDOFF_FAILED",
        `Handoff to ${target} failed: ${getErrorMessage(error)}`,
        error
      );
    }
    loop.machine.transition("finish");
    return handoffResult(this.summary(loop), target, inner);
  }

  private complete(loop: LoopState, output: string): RunResult {
    let parsed: unknown;
    if (this.outputSchema) {
      const outcome = parseStructuredOutput(output, this.outputSchema);
      if (!outcome.ok) {
        return this.fail(loop, "OUTPUT_PARSE_FAILED", `Structured output invalid: ${outcome.error}`);
      }
      parsed = outcome.value;
    }

    loop.machine.transition("finish");
    loop.logger.debug("Run completed", {
      turnsUsed: loop.turn,
      toolExecutions: loop.toolExecutions.length,
    });
    return successResult(this.summary(loop), output, parsed);
  }

  private pause(loop: LoopState, call: ToolCall, deferred: readonly ToolCall[]): RunResult {
    loop.machine.transition("pause");
    loop.logger.info("Run paused for approval", { tool: call.name, callId: call.callId });
    const state = new PausedRunState({
      agentName: this.name,
      context: loop.context.copy(),
      pendingCall: call,
      deferredCalls: deferred,
      toolExecutions: loop.toolExecutions,
      turn: loop.turn,
    });
    return pausedResult(this.summary(loop), state);
  }

  private fail(
    loop: LoopState,
    code: AgentRunErrorCode,
    message: string,
    cause?: unknown
  ): RunResult {
    loop.machine.transition("fail");
    loop.logger.warn("Run failed", { code, message, turn: loop.turn });
    const error = new AgentRunError(code, message, { agentName: this.name, turn: loop.turn, cause });
    return errorResult(this.summary(loop), error);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private createLoop(
    context: ConversationContext,
    options: RunOptions,
    toolExecutions: readonly ToolExecution[],
    turn: number
  ): LoopState {
    const logger = this.logger.child({ traceId: context.parentTraceId, requestId: context.requestId });
    const machine = createRunStateMachine();
    machine.onTransition((transition) => {
      logger.trace("Run status changed", { from: transition.from, to: transition.to });
    });
    if (options.onStatusChange) {
      machine.onTransition(options.onStatusChange);
    }
    return { context, toolExecutions: [...toolExecutions], turn, machine, options, logger };
  }

  private async buildRequest(context: ConversationContext): Promise<ModelRequest> {
    return {
      model: this.model,
      instructions: this.instructions,
      input: await applyContextWindow(context.getHistory(), this.contextWindow),
      tools: this.toolDefinitions(context.lastUserMessageText()),
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
      trace: context.getTraceContext(),
    };
  }

  private createTextDeltaHandler(loop: LoopState, turn: number): (delta: string) => Promise<void> {
    const parser = this.outputSchema ? new PartialJsonParser() : undefined;
    let lastPartial: string | undefined;

    return async (delta) => {
      await this.emit(loop, { type: "text_delta", agentName: this.name, turn, delta });
      if (!parser) {
        return;
      }
      const value = parser.append(delta);
      const serialized = JSON.stringify(value);
      if (value !== null && serialized !== lastPartial) {
        lastPartial = serialized;
        await this.emit(loop, { type: "partial_output", agentName: this.name, turn, value });
      }
    };
  }

  private async emit(loop: LoopState, event: AgentStreamEvent): Promise<void> {
    if (loop.options.observer) {
      await loop.options.observer(event);
    }
  }

  private summary(loop: LoopState): RunSummary {
    return {
      agentName: this.name,
      context: loop.context,
      toolExecutions: loop.toolExecutions,
      turnsUsed: loop.turn,
    };
  }

  private assertOwnState(state: PausedRunState): void {
    if (state.agentName !== this.name) {
      throw new InvalidResumeStateError(
        this.name,
        `Cannot resume: paused run belongs to agent "${state.agentName}"`
      );
    }
  }
}

// ============================================================================
// Module Helpers
// ============================================================================

function buildToolRegistry(config: AgentConfig): IToolRegistry {
  const extraTools = [
    ...(config.memory ? createMemoryTools(config.memory) : []),
    ...(config.toolSearch?.deferredTools ?? []),
  ];
  if (extraTools.length === 0 && !config.enableToolPlanning && config.toolRegistry) {
    return config.toolRegistry;
  }

  const base = new ToolRegistry([...(config.toolRegistry?.list() ?? config.tools ?? []), ...extraTools]);
  return config.enableToolPlanning ? new ToolRegistry([...base.list(), createToolPlanTool(base)]) : base;
}

function indexHandoffs(
  agentName: string,
  handoffs: readonly Handoff[],
  tools: IToolRegistry
): ReadonlyMap<string, Handoff> {
  const index = new Map<string, Handoff>();
  for (const handoff of handoffs) {
    if (index.has(handoff.name) || tools.has(handoff.name)) {
      throw new AgentConfigurationError(
        `Agent "${agentName}" has more than one tool or handoff named "${handoff.name}"`
      );
    }
    index.set(handoff.name, handoff);
  }
  return index;
}

type StructuredOutcome = { ok: true; value: unknown } | { ok: false; error: string };

function parseStructuredOutput(
  output: string,
  schema: z.ZodType<unknown, z.ZodTypeDef, unknown>
): StructuredOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { ok: true, value: parsed.data };
}

// ============================================================================
// Factory
// ============================================================================

export function createAgent(config: AgentConfig): Agent {
  return new Agent(config);
}
