/**
 * Router Agent
 *
 * Classify-then-delegate. One cheap model call sees only the route
 * descriptions and answers with a route number; the chosen target then runs
 * on the original context.
 *
 * @example
 * ```typescript
 * const router = createRouterAgent({
 *   transport,
 *   routes: [
 *     { target: billingAgent, description: "invoices, refunds and payment issues" },
 *     { target: techAgent, description: "bugs, outages and error messages" },
 *   ],
 *   fallback: generalAgent,
 * });
 * const result = await router.run("I was charged twice this month");
 * ```
 */

import {
  AgentConfigurationError,
  type ConversationContext,
  createMessage,
  getErrorMessage,
  getLogger,
  type RuntimeLogger,
} from "@agentloom/agent-runtime-core";
import {
  type AgentStreamSession,
  createRunStream,
  type IModelTransport,
  type Interactable,
  type InteractableInput,
  type ModelRequest,
  resolveAgentRuntimeConfig,
  type RunOptions,
  type RunResult,
  type StreamOptions,
  toContext,
} from "@agentloom/agent-runtime-execution";
import { orchestrationError, runMember } from "./memberRuns";

// ============================================================================
// Types
// ============================================================================

export interface Route {
  readonly target: Interactable;
  /** What the target handles, shown to the classifier */
  readonly description: string;
}

export interface RouterAgentConfig {
  readonly name?: string;
  readonly description?: string;
  readonly routes: readonly Route[];
  /** Used when the classifier picks no valid route */
  readonly fallback?: Interactable;
  /** Transport for the classification call */
  readonly transport: IModelTransport;
  /** Classification model; falls back to the runtime config */
  readonly model?: string;
  readonly logger?: RuntimeLogger;
}

export interface ClassifyOptions {
  readonly signal?: AbortSignal;
}

const ROUTE_NUMBER = /^[+-]?\d+$/;

// ============================================================================
// Implementation
// ============================================================================

export class RouterAgent implements Interactable {
  readonly name: string;
  readonly description?: string;
  readonly routes: readonly Route[];
  readonly fallback?: Interactable;
  private readonly transport: IModelTransport;
  private readonly model: string;
  private readonly logger: RuntimeLogger;

  constructor(config: RouterAgentConfig) {
    if (config.routes.length === 0) {
      throw new AgentConfigurationError("RouterAgent requires at least one route");
    }
    this.name = config.name ?? "Router";
    this.description = config.description;
    this.routes = [...config.routes];
    this.fallback = config.fallback;
    this.transport = config.transport;
    this.model = config.model ?? resolveAgentRuntimeConfig().model;
    this.logger = (config.logger ?? getLogger()).child({ module: "router", router: this.name });
  }

  /**
   * Pick a target without running it. Resolves to the fallback when the
   * reply names no route, or to `undefined` without a fallback. Rejects when
   * the classification call fails.
   */
  async classify(
    input: InteractableInput,
    options: ClassifyOptions = {}
  ): Promise<Interactable | undefined> {
    const text = toContext(input).lastUserMessageText();
    if (text === undefined) {
      return this.fallback;
    }

    const request: ModelRequest = {
      model: this.model,
      instructions: "",
      input: [createMessage("user", buildClassificationPrompt(this.routes, text))],
      tools: [],
    };
    const response = await this.transport.send(request, { signal: options.signal });
    const target = this.parseSelection(response.text);

    this.logger.debug("Classified input", {
      reply: response.text.trim(),
      target: target?.name,
    });
    return target;
  }

  /**
   * Classify, then run the chosen target on the original context. The
   * target's result is returned as is; a target that throws yields MEMBER_FAILED.
   */
  async route(input: InteractableInput, options: RunOptions = {}): Promise<RunResult> {
    const context = toContext(input);
    if (context.lastUserMessageText() === undefined) {
      return orchestrationError(
        this.name,
        context,
        "ROUTING_FAILED",
        "No user message found in context for routing"
      );
    }
    if (options.signal?.aborted) {
      return orchestrationError(this.name, context, "CANCELLED", "Run was cancelled");
    }

    let target: Interactable | undefined;
    try {
      target = await this.classify(context, { signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) {
        return orchestrationError(this.name, context, "CANCELLED", "Run was cancelled", error);
      }
      this.logger.warn("Classification failed", { error: getErrorMessage(error) });
      return orchestrationError(
        this.name,
        context,
        "TRANSPORT_FAILED",
        `Routing classification failed: ${getErrorMessage(error)}`,
        error
      );
    }

    if (!target) {
      return orchestrationError(this.name, context, "ROUTING_FAILED", "No suitable route found for input");
    }

    this.logger.info("Routing input", { target: target.name });
    return runMember(target, context.ensureTraceContext(), options, this.logger);
  }

  run(input: InteractableInput, options?: RunOptions): Promise<RunResult> {
    return this.route(input, options);
  }

  runStreaming(input: InteractableInput, options?: StreamOptions): AgentStreamSession {
    return createRunStream(this.name, (runOptions) => this.route(input, runOptions), options, this.logger);
  }

  private parseSelection(reply: string): Interactable | undefined {
    const trimmed = reply.trim();
    if (ROUTE_NUMBER.test(trimmed)) {
      const index = Number.parseInt(trimmed, 10) - 1;
      if (index >= 0 && index < this.routes.length) {
        return this.routes[index].target;
      }
    }
    return this.fallback;
  }
}

// ============================================================================
// Prompt
// ============================================================================

function buildClassificationPrompt(routes: readonly Route[], input: string): string {
  let prompt =
    "You are a routing classifier. Based on the user input, select the most appropriate handler.\n\n" +
    "Available handlers:\n";
  routes.forEach((route, index) => {
    prompt += `${index + 1}. ${route.target.name} - handles: ${route.description}\n`;
  });
  prompt += `\nUser input: "${input}"\n\n`;
  prompt += 'Respond with ONLY the handler number (e.g., "1" or "2"). Nothing else.';
  return prompt;
}

// ============================================================================
// Factory
// ============================================================================

export function createRouterAgent(config: RouterAgentConfig): RouterAgent {
  return new RouterAgent(config);
}
