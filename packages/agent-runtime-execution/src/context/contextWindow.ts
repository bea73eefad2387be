/**
 * Context Window Management
 *
 * Trims the history sent to the model so it fits a token budget. Only the
 * request is trimmed; the stored conversation history is left intact.
 * Strategies may be asynchronous, like the summarization strategy.
 */

import type { ConversationItem } from "@agentloom/agent-runtime-core";

// ============================================================================
// Token Estimation
// ============================================================================

export const DEFAULT_CHARS_PER_TOKEN = 4;

/** Fixed per-item overhead for role and framing */
const ITEM_OVERHEAD_TOKENS = 4;

export interface TokenCounter {
  countText(text: string): number;
  countItem(item: ConversationItem): number;
}

export function createCharacterTokenCounter(charsPerToken = DEFAULT_CHARS_PER_TOKEN): TokenCounter {
  if (charsPerToken < 1) {
    throw new RangeError("charsPerToken must be at least 1");
  }

  const countText = (text: string): number =>
    text.length === 0 ? 0 : Math.max(1, Math.floor(text.length / charsPerToken));

  return {
    countText,
    countItem(item) {
      switch (item.type) {
        case "message":
          return countText(item.content) + ITEM_OVERHEAD_TOKENS;
        case "tool_call":
          return countText(item.name) + countText(item.arguments) + ITEM_OVERHEAD_TOKENS;
        case "tool_result":
          return countText(item.output) + ITEM_OVERHEAD_TOKENS;
      }
    },
  };
}

// ============================================================================
// Strategies
// ============================================================================

export interface ContextWindowStrategy {
  manage(
    history: readonly ConversationItem[],
    maxTokens: number,
    counter: TokenCounter
  ): readonly ConversationItem[] | Promise<readonly ConversationItem[]>;
}

export interface SlidingWindowOptions {
  /** Keep the developer messages that open the history */
  readonly preserveLeadingDeveloperMessages?: boolean;
}

/**
 * Keeps the most recent items that fit the budget.
 */
export class SlidingWindowStrategy implements ContextWindowStrategy {
  private readonly preserveLeading: boolean;

  constructor(options: SlidingWindowOptions = {}) {
    this.preserveLeading = options.preserveLeadingDeveloperMessages ?? false;
  }

  manage(
    history: readonly ConversationItem[],
    maxTokens: number,
    counter: TokenCounter
  ): readonly ConversationItem[] {
    if (maxTokens <= 0) {
      return history;
    }

    const total = history.reduce((sum, item) => sum + counter.countItem(item), 0);
    if (total <= maxTokens) {
      return history;
    }

    let preserveCount = 0;
    let usedTokens = 0;
    if (this.preserveLeading) {
      for (const item of history) {
        if (item.type !== "message" || item.role !== "developer") {
          break;
        }
        usedTokens += counter.countItem(item);
        preserveCount++;
      }
    }

    const recent: ConversationItem[] = [];
    for (let index = history.length - 1; index >= preserveCount; index--) {
      const itemTokens = counter.countItem(history[index]);
      if (usedTokens + itemTokens > maxTokens) {
        break;
      }
      recent.unshift(history[index]);
      usedTokens += itemTokens;
    }

    return dropOrphanToolResults([...history.slice(0, preserveCount), ...recent]);
  }
}

/**
 * A window that starts mid-turn may open with results whose calls were cut.
 */
export function dropOrphanToolResults(items: readonly ConversationItem[]): ConversationItem[] {
  const callIds = new Set<string>();
  return items.filter((item) => {
    if (item.type === "tool_call") {
      callIds.add(item.callId);
      return true;
    }
    return item.type !== "tool_result" || callIds.has(item.callId);
  });
}

export interface ContextWindowConfig {
  readonly maxTokens: number;
  readonly strategy?: ContextWindowStrategy;
  readonly counter?: TokenCounter;
}

export async function applyContextWindow(
  history: readonly ConversationItem[],
  config: ContextWindowConfig | undefined
): Promise<readonly ConversationItem[]> {
  if (!config) {
    return history;
  }
  const strategy = config.strategy ?? new SlidingWindowStrategy();
  return strategy.manage(history, config.maxTokens, config.counter ?? createCharacterTokenCounter());
}
