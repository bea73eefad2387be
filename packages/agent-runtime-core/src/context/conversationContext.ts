/**
 * Conversation Context
 *
 * The unit of conversation history, key/value state and turn counting that
 * an agent run reads and appends to. Contexts are owned by the caller; the
 * engine only appends history and increments the turn counter.
 *
 * Fan-out paths never share a context by reference. `copy()` and `fork()`
 * produce independent contexts, `forkSharedState()` copies the state map
 * into a context with an empty history.
 *
 * @example
 * ```typescript
 * const context = ConversationContext.create();
 * context.addUserMessage("Summarize the release notes");
 * context.setState("userId", "u-1");
 *
 * const child = context.fork();
 * child.addUserMessage("Only the breaking changes");
 * context.historySize; // still 1
 * ```
 */

import { z } from "zod";
import {
  type ConversationItem,
  createMessage,
  createToolCallItem,
  createToolResultItem,
  isMessageItem,
  type ToolCall,
} from "../types/conversation";
import { generateSpanId, generateTraceId, type TraceContext } from "./trace";

// ============================================================================
// Types
// ============================================================================

export interface ConversationContextInit {
  readonly history?: readonly ConversationItem[];
  readonly state?: Readonly<Record<string, unknown>>;
  readonly turnCount?: number;
  readonly trace?: TraceContext;
}

/**
 * Options for deriving a context for a nested agent.
 */
export interface ChildContextOptions {
  /** Copy the parent's state map into the child */
  readonly shareState: boolean;
  /** Copy the parent's history into the child */
  readonly shareHistory: boolean;
}

export interface SerializedConversationContext {
  readonly history: ConversationItem[];
  readonly state: Record<string, unknown>;
  readonly turnCount: number;
  readonly trace: TraceContext;
}

// ============================================================================
// Schema
// ============================================================================

export const conversationItemSchema: z.ZodType<ConversationItem> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("message"),
    role: z.enum(["system", "developer", "user", "assistant"]),
    content: z.string(),
  }),
  z.object({
    type: z.literal("tool_call"),
    id: z.string(),
    callId: z.string(),
    name: z.string(),
    arguments: z.string(),
  }),
  z.object({
    type: z.literal("tool_result"),
    callId: z.string(),
    name: z.string(),
    output: z.string(),
    success: z.boolean(),
  }),
]);

export const serializedConversationContextSchema = z.object({
  history: z.array(conversationItemSchema),
  state: z.record(z.unknown()),
  turnCount: z.number().int().nonnegative(),
  trace: z.object({
    traceId: z.string().optional(),
    spanId: z.string().optional(),
    requestId: z.string().optional(),
  }),
});

// ============================================================================
// Implementation
// ============================================================================

export class ConversationContext {
  private readonly history: ConversationItem[];
  private readonly state: Map<string, unknown>;
  private turns: number;
  private trace: TraceContext;

  private constructor(init: ConversationContextInit) {
    this.history = [...(init.history ?? [])];
    this.state = new Map();
    for (const [key, value] of Object.entries(init.state ?? {})) {
      if (value !== undefined && value !== null) {
        this.state.set(key, structuredClone(value));
      }
    }
    this.turns = init.turnCount ?? 0;
    this.trace = { ...init.trace };
  }

  static create(init: ConversationContextInit = {}): ConversationContext {
    return new ConversationContext(init);
  }

  /**
   * Restore a context previously produced by `toJSON()`.
   */
  static fromJSON(data: unknown): ConversationContext {
    const parsed = serializedConversationContextSchema.parse(data);
    return new ConversationContext(parsed);
  }

  // --------------------------------------------------------------------------
  // History
  // --------------------------------------------------------------------------

  addItem(item: ConversationItem): this {
    this.history.push(item);
    return this;
  }

  addUserMessage(content: string): this {
    return this.addItem(createMessage("user", content));
  }

  addAssistantMessage(content: string): this {
    return this.addItem(createMessage("assistant", content));
  }

  addDeveloperMessage(content: string): this {
    return this.addItem(createMessage("developer", content));
  }

  addToolCall(call: ToolCall): this {
    return this.addItem(createToolCallItem(call));
  }

  addToolResult(call: Pick<ToolCall, "callId" | "name">, output: string, success: boolean): this {
    return this.addItem(createToolResultItem(call, output, success));
  }

  getHistory(): readonly ConversationItem[] {
    return [...this.history];
  }

  get historySize(): number {
    return this.history.length;
  }

  /**
   * Text of the most recent user message, if any.
   */
  lastUserMessageText(): string | undefined {
    for (let index = this.history.length - 1; index >= 0; index--) {
      const item = this.history[index];
      if (isMessageItem(item) && item.role === "user") {
        return item.content;
      }
    }
    return undefined;
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  /**
   * Set a state value. `undefined` or `null` removes the key.
   */
  setState(key: string, value: unknown): this {
    if (value === undefined || value === null) {
      this.state.delete(key);
    } else {
      this.state.set(key, value);
    }
    return this;
  }

  getState(key: string): unknown {
    return this.state.get(key);
  }

  hasState(key: string): boolean {
    return this.state.has(key);
  }

  getAllState(): Readonly<Record<string, unknown>> {
    return Object.fromEntries(this.state);
  }

  clearState(): this {
    this.state.clear();
    return this;
  }

  // --------------------------------------------------------------------------
  // Turns
  // --------------------------------------------------------------------------

  incrementTurn(): number {
    this.turns += 1;
    return this.turns;
  }

  get turnCount(): number {
    return this.turns;
  }

  // --------------------------------------------------------------------------
  // Trace
  // --------------------------------------------------------------------------

  get parentTraceId(): string | undefined {
    return this.trace.traceId;
  }

  get parentSpanId(): string | undefined {
    return this.trace.spanId;
  }

  get requestId(): string | undefined {
    return this.trace.requestId;
  }

  getTraceContext(): TraceContext {
    return { ...this.trace };
  }

  withTraceContext(traceId: string, spanId: string): this {
    this.trace = { ...this.trace, traceId, spanId };
    return this;
  }

  withRequestId(requestId: string): this {
    this.trace = { ...this.trace, requestId };
    return this;
  }

  hasTraceContext(): boolean {
    return this.trace.traceId !== undefined;
  }

  /**
   * Assign a fresh trace and span id when none is set.
   */
  ensureTraceContext(): this {
    if (!this.hasTraceContext()) {
      this.withTraceContext(generateTraceId(), generateSpanId());
    }
    return this;
  }

  // --------------------------------------------------------------------------
  // Forking
  // --------------------------------------------------------------------------

  /**
   * Independent copy with the same history, state, turn count and trace.
   */
  copy(): ConversationContext {
    return new ConversationContext({
      history: this.history,
      state: this.getAllState(),
      turnCount: this.turns,
      trace: this.trace,
    });
  }

  /**
   * Independent copy for a child run: turn counter reset and a new parent span.
   */
  fork(spanId: string = generateSpanId()): ConversationContext {
    return new ConversationContext({
      history: this.history,
      state: this.getAllState(),
      turnCount: 0,
      trace: { ...this.trace, spanId },
    });
  }

  /**
   * Copy of the state map with an empty history.
   */
  forkSharedState(): ConversationContext {
    return new ConversationContext({
      state: this.getAllState(),
      trace: { ...this.trace, spanId: generateSpanId() },
    });
  }

  /**
   * Derive a context for a nested agent and seed it with a request.
   */
  createChildContext(options: ChildContextOptions, request?: string): ConversationContext {
    const child = new ConversationContext({
      history: options.shareHistory ? this.history : [],
      state: options.shareState ? this.getAllState() : {},
      trace: {
        traceId: this.trace.traceId,
        spanId: generateSpanId(),
        requestId: this.trace.requestId,
      },
    });
    if (request !== undefined) {
      child.addUserMessage(request);
    }
    return child;
  }

  // --------------------------------------------------------------------------
  // Serialization
  // --------------------------------------------------------------------------

  toJSON(): SerializedConversationContext {
    return {
      history: [...this.history],
      state: Object.fromEntries(this.state),
      turnCount: this.turns,
      trace: { ...this.trace },
    };
  }
}
