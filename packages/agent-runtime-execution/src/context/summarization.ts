/**
 * Summarization Strategy
 *
 * Context window strategy that keeps the most recent items and replaces the
 * older ones with a model-written summary, sent as a developer message. When
 * the recent items alone, or the summary with them, exceed the budget it
 * falls back to the sliding window.
 *
 * @example
 * ```typescript
 * const agent = createAgent({
 *   name: "Support",
 *   instructions: "...",
 *   transport,
 *   contextWindow: {
 *     maxTokens: 4000,
 *     strategy: new SummarizationStrategy({ transport, model: "gpt-4o-mini" }),
 *   },
 * });
 * ```
 */

import {
  type ConversationItem,
  createMessage,
  getErrorMessage,
  getLogger,
  type RuntimeLogger,
} from "@agentloom/agent-runtime-core";
import type { IModelTransport } from "../transport/types";
import {
  type ContextWindowStrategy,
  dropOrphanToolResults,
  SlidingWindowStrategy,
  type TokenCounter,
} from "./contextWindow";

export const SUMMARY_PREFIX = "[Previous conversation summary] ";

export const SUMMARIZATION_FAILED = "[Summarization failed - context truncated]";

const DEFAULT_KEEP_RECENT_ITEMS = 5;

function defaultPrompt(conversation: string): string {
  return (
    "Summarize the following conversation history concisely, preserving key information,\n" +
    "decisions made, and any context that would be important for continuing the conversation.\n" +
    "Focus on facts, user preferences, and any commitments made.\n\n" +
    `Conversation to summarize:\n${conversation}\n`
  );
}

export interface SummarizationOptions {
  readonly transport: IModelTransport;
  readonly model: string;
  /** Items kept verbatim at the end of the history (default: 5) */
  readonly keepRecentItems?: number;
  readonly buildPrompt?: (conversation: string) => string;
  readonly logger?: RuntimeLogger;
}

export class SummarizationStrategy implements ContextWindowStrategy {
  readonly keepRecentItems: number;
  private readonly transport: IModelTransport;
  private readonly model: string;
  private readonly buildPrompt: (conversation: string) => string;
  private readonly fallback = new SlidingWindowStrategy();
  private readonly logger: RuntimeLogger;
  /** The last summary, keyed by the items it covers */
  private cached?: { readonly key: string; readonly summary: string };

  constructor(options: SummarizationOptions) {
    this.transport = options.transport;
    this.model = options.model;
    this.keepRecentItems =
      options.keepRecentItems !== undefined && options.keepRecentItems > 0
        ? options.keepRecentItems
        : DEFAULT_KEEP_RECENT_ITEMS;
    this.buildPrompt = options.buildPrompt ?? defaultPrompt;
    this.logger = (options.logger ?? getLogger()).child({ module: "summarization" });
  }

  async manage(
    history: readonly ConversationItem[],
    maxTokens: number,
    counter: TokenCounter
  ): Promise<readonly ConversationItem[]> {
    if (maxTokens <= 0 || history.length === 0) {
      return history;
    }
    if (countAll(history, counter) <= maxTokens) {
      return history;
    }

    const splitIndex = Math.max(0, history.length - this.keepRecentItems);
    const older = history.slice(0, splitIndex);
    const recent = dropOrphanToolResults(history.slice(splitIndex));
    const recentTokens = countAll(recent, counter);
    if (recentTokens >= maxTokens) {
      return this.fallback.manage(history, maxTokens, counter);
    }
    if (older.length === 0) {
      return recent;
    }

    const summary = createMessage("developer", SUMMARY_PREFIX + (await this.summarize(older)));
    if (recentTokens + counter.countItem(summary) > maxTokens) {
      this.logger.debug("Summary exceeds the budget, using the sliding window", {
        maxTokens,
        recentTokens,
      });
      return this.fallback.manage(history, maxTokens, counter);
    }
    return [summary, ...recent];
  }

  private async summarize(items: readonly ConversationItem[]): Promise<string> {
    const key = JSON.stringify(items);
    if (this.cached?.key === key) {
      return this.cached.summary;
    }

    try {
      const response = await this.transport.send({
        model: this.model,
        instructions: "",
        input: [createMessage("user", this.buildPrompt(items.map(formatItem).join("\n")))],
        tools: [],
      });
      this.cached = { key, summary: response.text };
      this.logger.debug("Summarized history", { items: items.length });
      return response.text;
    } catch (error) {
      this.logger.warn("Summarization failed", { error: getErrorMessage(error) });
      return SUMMARIZATION_FAILED;
    }
  }
}

function countAll(items: readonly ConversationItem[], counter: TokenCounter): number {
  return items.reduce((sum, item) => sum + counter.countItem(item), 0);
}

function formatItem(item: ConversationItem): string {
  switch (item.type) {
    case "message":
      return `${item.role}: ${item.content}`;
    case "tool_call":
      return `Tool Call: ${item.name}(${item.arguments})`;
    case "tool_result":
      return `Tool Result: ${item.output}`;
  }
}

export function createSummarizationStrategy(options: SummarizationOptions): SummarizationStrategy {
  return new SummarizationStrategy(options);
}
