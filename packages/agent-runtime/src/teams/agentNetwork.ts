/**
 * Agent Network
 *
 * Round-based peer discussion. Within a round peers speak in order, and each
 * one sees every earlier contribution because successful outputs are appended
 * to the shared context as `[peer]: output`. An optional synthesizer
 * summarizes the discussion once the rounds are done.
 *
 * @example
 * ```typescript
 * const panel = createAgentNetwork({
 *   name: "DesignReview",
 *   peers: [architect, securityLead, productOwner],
 *   maxRounds: 2,
 *   synthesizer: editor,
 * });
 * const { contributions, synthesis } = await panel.discuss("Should we shard the orders table?");
 * ```
 */

import {
  AgentConfigurationError,
  type ConversationContext,
  type ConversationItem,
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
import { orchestrationError, runMember } from "./memberRuns";
import { ParallelAgents } from "./parallelAgents";

// ============================================================================
// Types
// ============================================================================

export interface AgentNetworkConfig {
  readonly name?: string;
  readonly description?: string;
  readonly peers: readonly Interactable[];
  /** Discussion rounds (default: 2) */
  readonly maxRounds?: number;
  readonly synthesizer?: Interactable;
  readonly logger?: RuntimeLogger;
}

export interface Contribution {
  readonly peer: string;
  /** 1-based */
  readonly round: number;
  /** Present when the peer finished successfully */
  readonly output?: string;
  readonly isError: boolean;
  readonly result: RunResult;
}

export interface NetworkResult {
  /** Ordered by round, then peer order */
  readonly contributions: readonly Contribution[];
  readonly synthesis?: RunResult;
  /** Shared discussion history after the last round */
  readonly history: readonly ConversationItem[];
}

const DEFAULT_MAX_ROUNDS = 2;

// ============================================================================
// Implementation
// ============================================================================

export class AgentNetwork implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly peers: readonly Interactable[];
  readonly maxRounds: number;
  private readonly synthesizer?: Interactable;
  private readonly logger: RuntimeLogger;

  constructor(config: AgentNetworkConfig) {
    if (config.peers.length < 2) {
      throw new AgentConfigurationError("AgentNetwork requires at least two peers");
    }
    const maxRounds = config.maxRounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new AgentConfigurationError("AgentNetwork maxRounds must be a positive integer");
    }
    this.name = config.name ?? "AgentNetwork";
    this.description = config.description;
    this.peers = [...config.peers];
    this.maxRounds = maxRounds;
    this.synthesizer = config.synthesizer;
    this.logger = (config.logger ?? getLogger()).child({ module: "network", group: this.name });
  }

  /**
   * Run the discussion. The caller's context is left untouched; the returned
   * history is the shared copy the peers wrote to.
   */
  async discuss(input: InteractableInput, options: RunOptions = {}): Promise<NetworkResult> {
    const shared = toContext(input).ensureTraceContext().copy();
    const topic = shared.lastUserMessageText() ?? "";
    const contributions: Contribution[] = [];

    for (let round = 1; round <= this.maxRounds; round++) {
      for (const peer of this.peers) {
        if (options.signal?.aborted) {
          this.logger.info("Discussion cancelled", { round, peer: peer.name });
          return { contributions, history: shared.getHistory() };
        }

        const peerContext = shared.copy().addDeveloperMessage(roleReminder(peer.name, round));
        const result = await runMember(peer, peerContext, options, this.logger);
        const contribution = toContribution(peer.name, round, result);
        contributions.push(contribution);

        if (contribution.output !== undefined) {
          shared.addAssistantMessage(`[${peer.name}]: ${contribution.output}`);
        }
        this.logger.debug("Peer contributed", {
          round,
          peer: peer.name,
          isError: contribution.isError,
        });
      }
    }

    const synthesis = this.synthesizer
      ? await this.synthesize(this.synthesizer, topic, contributions, shared, options)
      : undefined;
    return { contributions, synthesis, history: shared.getHistory() };
  }

  /**
   * Every peer answers the original message independently and concurrently.
   * Contributions are all round 1, in peer order.
   */
  async broadcast(input: InteractableInput, options: RunOptions = {}): Promise<NetworkResult> {
    const context = toContext(input).ensureTraceContext();
    const fresh = context.createChildContext(
      { shareState: false, shareHistory: false },
      context.lastUserMessageText() ?? ""
    );
    const group = new ParallelAgents({
      name: `${this.name}_Broadcast`,
      members: this.peers,
      logger: this.logger,
    });
    const results = await group.runAll(fresh, options);

    return {
      contributions: results.map((result, index) => toContribution(this.peers[index].name, 1, result)),
      history: fresh.getHistory(),
    };
  }

  /**
   * Discuss, then return the synthesis, or the last successful contribution
   * when there is no synthesizer. Every peer result is attached as related.
   */
  async run(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const context = toContext(input);
    const { contributions, synthesis } = await this.discuss(context, options);
    const peerResults = contributions.map((contribution) => contribution.result);

    if (synthesis) {
      return composite(synthesis, peerResults);
    }

    const last = [...contributions].reverse().find((contribution) => !contribution.isError);
    if (!last) {
      return composite(
        orchestrationError(this.name, context, "MEMBER_FAILED", "No peer produced a contribution"),
        peerResults
      );
    }
    return composite(
      last.result,
      peerResults.filter((result) => result !== last.result)
    );
  }

  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return createRunStream(this.name, (runOptions) => this.run(input, runOptions), options, this.logger);
  }

  private async synthesize(
    synthesizer: Interactable,
    topic: string,
    contributions: readonly Contribution[],
    shared: ConversationContext,
    options: RunOptions
  ): Promise<RunResult> {
    const prompt = buildSynthesisPrompt(topic, contributions);
    const context = shared.createChildContext({ shareState: false, shareHistory: false }, prompt);
    return runMember(synthesizer, context, options, this.logger);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function roleReminder(peerName: string, round: number): string {
  return (
    `You are ${peerName} participating in round ${round} of a discussion. ` +
    "Consider the previous contributions and add your unique perspective. " +
    "Be constructive and build on others' ideas."
  );
}

function toContribution(peer: string, round: number, result: RunResult): Contribution {
  const final = finalResult(result);
  if (final.status === "success") {
    return { peer, round, output: final.output, isError: false, result };
  }
  return { peer, round, isError: true, result };
}

function buildSynthesisPrompt(topic: string, contributions: readonly Contribution[]): string {
  let prompt = `Original discussion topic: ${topic}\n\nThe following contributions were made:\n\n`;
  for (const contribution of contributions) {
    const text = contribution.output ?? "[Error occurred]";
    prompt += `**${contribution.peer}** (Round ${contribution.round}): ${text}\n\n`;
  }
  return `${prompt}Please synthesize these viewpoints into a coherent summary.`;
}

// ============================================================================
// Factory
// ============================================================================

export function createAgentNetwork(config: AgentNetworkConfig): AgentNetwork {
  return new AgentNetwork(config);
}
