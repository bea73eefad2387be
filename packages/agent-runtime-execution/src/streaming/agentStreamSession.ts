/**
 * Agent Stream Session
 *
 * Wraps a run as an ordered channel of lifecycle events. The run starts when
 * the caller begins iterating or asks for the result, and ends with exactly
 * one terminal event: `complete`, `paused` or `error`.
 *
 * While the caller iterates, a full buffer makes the run wait for the
 * consumer. A caller that only awaits `result()`, or stops iterating
 * early, is never blocked.
 *
 * @example
 * ```typescript
 * const session = agent.runStreaming("Draft the changelog");
 * for await (const event of session) {
 *   if (event.type === "text_delta") {
 *     process.stdout.write(event.delta);
 *   }
 * }
 * const result = await session.result();
 * ```
 */

import {
  BackpressureEventStream,
  type EventStreamOptions,
  getLogger,
  type RuntimeLogger,
} from "@agentloom/agent-runtime-core";
import type { RunResult } from "../results/runResult";
import type { AgentStreamEvent, RunObserver } from "./events";

type Settled = { readonly ok: true; readonly result: RunResult } | { readonly ok: false; readonly error: unknown };

export type StreamExecutor = (observer: RunObserver) => Promise<RunResult>;

export interface AgentStreamSessionOptions extends EventStreamOptions {
  readonly logger?: RuntimeLogger;
}

export class AgentStreamSession implements AsyncIterable<AgentStreamEvent> {
  private readonly stream: BackpressureEventStream<AgentStreamEvent>;
  private readonly logger: RuntimeLogger;
  private settled?: Promise<Settled>;
  private iterating = false;

  constructor(
    readonly agentName: string,
    private readonly execute: StreamExecutor,
    options: AgentStreamSessionOptions = {}
  ) {
    this.stream = new BackpressureEventStream<AgentStreamEvent>(options);
    this.logger = (options.logger ?? getLogger()).child({ module: "stream", agent: agentName });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<AgentStreamEvent> {
    this.iterating = true;
    const settled = this.start();
    try {
      yield* this.stream.consume();
    } finally {
      // Breaking out of the loop leaves the run unthrottled
      this.iterating = false;
    }
    const outcome = await settled;
    if (!outcome.ok) {
      throw outcome.error;
    }
  }

  /**
   * Final result of the run. Starts the run if iteration has not.
   */
  async result(): Promise<RunResult> {
    const outcome = await this.start();
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Drain every event into an array and return it with the result.
   */
  async collect(): Promise<{ events: AgentStreamEvent[]; result: RunResult }> {
    const events: AgentStreamEvent[] = [];
    for await (const event of this) {
      events.push(event);
    }
    return { events, result: await this.result() };
  }

  private start(): Promise<Settled> {
    if (!this.settled) {
      this.settled = this.execute((event) => this.emit(event)).then(
        (result): Settled => {
          this.stream.push(terminalEvent(result));
          this.stream.close();
          return { ok: true, result };
        },
        (error: unknown): Settled => {
          this.logger.error("Stream run failed", error instanceof Error ? error : { error });
          this.stream.close();
          return { ok: false, error };
        }
      );
    }
    return this.settled;
  }

  private async emit(event: AgentStreamEvent): Promise<void> {
    const accepted = this.stream.push(event);
    if (!accepted && this.iterating) {
      await this.stream.drained();
    }
  }
}

function terminalEvent(result: RunResult): AgentStreamEvent {
  switch (result.status) {
    case "paused":
      return { type: "paused", agentName: result.agentName, state: result.pausedState };
    case "error":
      return { type: "error", agentName: result.agentName, error: result.error };
    default:
      return { type: "complete", agentName: result.agentName, result };
  }
}

export function createStreamSession(
  agentName: string,
  execute: StreamExecutor,
  options?: AgentStreamSessionOptions
): AgentStreamSession {
  return new AgentStreamSession(agentName, execute, options);
}
