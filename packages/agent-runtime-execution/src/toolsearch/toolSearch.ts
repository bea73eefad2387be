/**
 * Tool Search
 *
 * Agents with many tools can defer some of them: deferred tools stay
 * callable, but a request only offers those that match the latest user
 * message. Eager tools are always offered.
 *
 * @example
 * ```typescript
 * const agent = createAgent({
 *   name: "Ops",
 *   instructions: "...",
 *   transport,
 *   tools: [getStatus],
 *   toolSearch: { strategy: new BM25ToolSearchStrategy(), deferredTools: [restartService, rotateLogs] },
 * });
 * ```
 */

import type { AgentTool } from "../tools/types";

// ============================================================================
// Types
// ============================================================================

export interface ToolSearchStrategy {
  /** Tools relevant to `query`, most relevant first */
  search(query: string, tools: readonly AgentTool[]): AgentTool[];
}

export interface ToolSearchConfig {
  readonly strategy: ToolSearchStrategy;
  /** Offered only when the strategy selects them */
  readonly deferredTools: readonly AgentTool[];
}

const DEFAULT_MAX_RESULTS = 5;

function checkMaxResults(maxResults: number): number {
  if (!Number.isInteger(maxResults) || maxResults < 1) {
    throw new RangeError(`maxResults must be at least 1, got: ${maxResults}`);
  }
  return maxResults;
}

function searchText(tool: AgentTool): string {
  return `${tool.name} ${tool.description}`;
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Case-insensitive match of any query word against tool names and
 * descriptions, in registration order.
 */
export class RegexToolSearchStrategy implements ToolSearchStrategy {
  readonly maxResults: number;

  constructor(maxResults = DEFAULT_MAX_RESULTS) {
    this.maxResults = checkMaxResults(maxResults);
  }

  search(query: string, tools: readonly AgentTool[]): AgentTool[] {
    const words = query.trim().split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) {
      return [];
    }
    const pattern = new RegExp(words.map(escapeRegExp).join("|"), "i");
    return tools.filter((tool) => pattern.test(searchText(tool))).slice(0, this.maxResults);
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface BM25Options {
  readonly maxResults?: number;
  /** Term frequency saturation (default: 1.5) */
  readonly k1?: number;
  /** Document length normalization (default: 0.75) */
  readonly b?: number;
}

/**
 * Okapi BM25 ranking over tool names and descriptions. Names are split on
 * snake_case and camelCase boundaries, so `get_weather` matches "weather".
 */
export class BM25ToolSearchStrategy implements ToolSearchStrategy {
  readonly maxResults: number;
  private readonly k1: number;
  private readonly b: number;

  constructor(options: BM25Options = {}) {
    this.maxResults = checkMaxResults(options.maxResults ?? DEFAULT_MAX_RESULTS);
    this.k1 = options.k1 ?? 1.5;
    this.b = options.b ?? 0.75;
  }

  search(query: string, tools: readonly AgentTool[]): AgentTool[] {
    const terms = tokenize(query);
    if (terms.length === 0 || tools.length === 0) {
      return [];
    }

    const documents = tools.map((tool) => tokenize(searchText(tool)));
    const averageLength = documents.reduce((sum, doc) => sum + doc.length, 0) / documents.length || 1;
    const idf = new Map(
      terms.map((term) => {
        const frequency = documents.filter((doc) => doc.includes(term)).length;
        return [term, Math.log((documents.length - frequency + 0.5) / (frequency + 0.5) + 1)];
      })
    );

    return tools
      .map((tool, index) => ({ tool, score: this.score(terms, documents[index], averageLength, idf) }))
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.maxResults)
      .map(({ tool }) => tool);
  }

  private score(
    terms: readonly string[],
    document: readonly string[],
    averageLength: number,
    idf: ReadonlyMap<string, number>
  ): number {
    let score = 0;
    for (const term of terms) {
      const frequency = document.filter((token) => token === term).length;
      if (frequency === 0) {
        continue;
      }
      const norm = this.k1 * (1 - this.b + (this.b * document.length) / averageLength);
      score += ((idf.get(term) ?? 0) * (frequency * (this.k1 + 1))) / (frequency + norm);
    }
    return score;
  }
}

function tokenize(text: string): string[] {
  return text
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/\s+/)
    .map((part) => part.replace(/[^a-z0-9]/g, ""))
    .filter((part) => part.length > 0);
}

// ============================================================================
// Selection
// ============================================================================

/**
 * The tools to offer for `query`: every tool that is not deferred, then the
 * deferred tools the strategy selects.
 */
export function selectTools(
  tools: readonly AgentTool[],
  config: ToolSearchConfig,
  query: string
): AgentTool[] {
  const deferred = new Set(config.deferredTools.map((tool) => tool.name));
  const eager = tools.filter((tool) => !deferred.has(tool.name));
  if (deferred.size === 0 || query.trim().length === 0) {
    return eager;
  }
  const found = config.strategy.search(query, config.deferredTools);
  return [...eager, ...found.filter((tool) => !eager.includes(tool))];
}
