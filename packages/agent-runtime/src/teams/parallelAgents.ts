/**
 * Parallel Agents
 *
 * Fan-out/fan-in over a fixed set of members. Every member runs on its own
 * copy of the input context; the copies share one trace id.
 *
 * - `runAll` waits for every member and returns results in member order
 * - `runFirst` returns the first member to settle and cancels the rest
 * - `runAndSynthesize` hands all outputs to a synthesizer
 *
 * @example
 * ```typescript
 * const reviewers = createParallelAgents({
 *   name: "Reviewers",
 *   members: [securityReviewer, styleReviewer],
 * });
 * const results = await reviewers.runAll("Review this patch: ...");
 * ```
 */

import {
  AgentConfigurationError,
  getLogger,
  type RuntimeLogger,
} from "@agentloom/agent-runtime-core";
import {
  type AgentStreamSession,
  composite,
  createRunStream,
  finalResult,
  type Interactable,
  type InteractableInput,
  type RunOptions,
  type RunResult,
  type StreamOptions,
  toContext,
} from "@agentloom/agent-runtime-execution";
import { createLinkedController, runMember } from "./memberRuns";

// ============================================================================
// Types
// ============================================================================

export interface ParallelAgentsConfig {
  readonly name?: string;
  readonly description?: string;
  readonly members: readonly Interactable[];
  readonly logger?: RuntimeLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class ParallelAgents implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly members: readonly Interactable[];
  private readonly logger: RuntimeLogger;

  constructor(config: ParallelAgentsConfig) {
    if (config.members.length === 0) {
      throw new AgentConfigurationError("ParallelAgents requires at least one member");
    }
    this.name = config.name ?? "ParallelAgents";
    this.description = config.description;
    this.members = [...config.members];
    this.logger = (config.logger ?? getLogger()).child({ module: "parallel", group: this.name });
  }

  /**
   * Run every member concurrently. A failing member does not cancel its siblings.
   */
  async runAll(input: InteractableInput, options: RunOptions = {}): Promise<RunResult[]> {
    const context = toContext(input).ensureTraceContext();
    this.logger.debug("Running all members", {
      members: this.members.length,
      traceId: context.parentTraceId,
    });

    return Promise.all(
      this.members.map((member) => runMember(member, context.copy(), options, this.logger))
    );
  }

  /**
   * Run every member concurrently and return the first to settle, success or
   * error. The others are aborted through their signals and make no further
   * model or tool calls.
   */
  async runFirst(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const context = toContext(input).ensureTraceContext();
    const controllers = this.members.map(() => createLinkedController(options.signal));

    const runs = this.members.map((member, index) =>
      runMember(
        member,
        context.copy(),
        { ...options, signal: controllers[index].signal },
        this.logger
      ).then((result) => ({ index, result }))
    );

    const winner = await Promise.race(runs);
    controllers.forEach((controller, index) => {
      if (index === winner.index) {
        controller.unlink();
      } else {
        controller.abort();
      }
    });
    this.logger.debug("First member settled", {
      member: this.members[winner.index].name,
      status: winner.result.status,
    });
    return winner.result;
  }

  /**
   * Run every member, then ask the synthesizer to combine their outputs. The
   * synthesizer starts from a fresh context; member results are attached as
   * related results.
   */
  async runAndSynthesize(
    input: InteractableInput,
    synthesizer: Interactable,
    options: RunOptions = {}
  ): Promise<RunResult> {
    const context = toContext(input).ensureTraceContext();
    const results = await this.runAll(context, options);

    const prompt = buildSynthesisPrompt(context.lastUserMessageText() ?? "", this.members, results);
    const synthesisContext = context.createChildContext(
      { shareState: false, shareHistory: false },
      prompt
    );
    const synthesis = await runMember(synthesizer, synthesisContext, options, this.logger);
    return composite(synthesis, results);
  }

  /**
   * Run every member; the first member's result is primary, the rest are related.
   */
  async run(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const [first, ...rest] = await this.runAll(input, options);
    return composite(first, rest);
  }

  /**
   * Events of all members are forwarded as they happen, tagged with each
   * member's name.
   */
  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return createRunStream(this.name, (runOptions) => this.run(input, runOptions), options, this.logger);
  }
}

// ============================================================================
// Prompt
// ============================================================================

function buildSynthesisPrompt(
  query: string,
  members: readonly Interactable[],
  results: readonly RunResult[]
): string {
  const sections = members.map((member, index) => {
    const result = finalResult(results[index]);
    let body = "[No output]";
    if (result.status === "error") {
      body = `[ERROR: ${result.error.message}]`;
    } else if (result.status === "success" && result.output.length > 0) {
      body = result.output;
    }
    return `--- ${member.name} ---\n${body}\n`;
  });

  return [
    `Original query: ${query}`,
    "",
    "The following participants have provided their outputs:",
    "",
    ...sections,
    "Please synthesize these outputs into a coherent response.",
  ].join("\n");
}

// ============================================================================
// Factory
// ============================================================================

export function createParallelAgents(config: ParallelAgentsConfig): ParallelAgents {
  return new ParallelAgents(config);
}
