/**
 * Turn Executor
 *
 * Performs the model call of a single agent turn. Uses the transport's
 * streaming variant when text deltas are wanted and the transport has one,
 * otherwise the plain `send`.
 *
 * @example
 * ```typescript
 * const executor = createTurnExecutor({ transport });
 * const outcome = await executor.execute(request, { onTextDelta: print });
 * if (outcome.type === "response") {
 *   handle(outcome.response.toolCalls);
 * }
 * ```
 *
 * @module orchestrator/turnExecutor
 */

import { getErrorMessage } from "@agentloom/agent-runtime-core";
import type { IModelTransport, ModelRequest, ModelResponse } from "../transport/types";

// ============================================================================
// Types
// ============================================================================

export type TurnOutcome =
  | {
      readonly type: "response";
      readonly response: ModelResponse;
      readonly durationMs: number;
      readonly streamed: boolean;
    }
  | {
      readonly type: "error";
      readonly error: string;
      readonly cause: unknown;
      readonly durationMs: number;
    };

export interface TurnExecuteOptions {
  readonly signal?: AbortSignal;
  /** Receives text as it arrives; enables streaming */
  readonly onTextDelta?: (delta: string) => void | Promise<void>;
}

export interface TurnExecutorDependencies {
  readonly transport: IModelTransport;
}

export interface ITurnExecutor {
  execute(request: ModelRequest, options?: TurnExecuteOptions): Promise<TurnOutcome>;
}

export class StreamIncompleteError extends Error {
  constructor() {
    super("Model stream ended without a completed response");
    this.name = "StreamIncompleteError";
  }
}

// ============================================================================
// Implementation
// ============================================================================

export class TurnExecutor implements ITurnExecutor {
  constructor(private readonly deps: TurnExecutorDependencies) {}

  async execute(request: ModelRequest, options: TurnExecuteOptions = {}): Promise<TurnOutcome> {
    const startTime = performance.now();
    const { transport } = this.deps;
    const streamed = options.onTextDelta !== undefined && transport.stream !== undefined;

    try {
      const response = streamed
        ? await this.executeStreaming(request, options)
        : await transport.send(request, { signal: options.signal });

      if (!streamed && options.onTextDelta && response.text.length > 0) {
        await options.onTextDelta(response.text);
      }

      return {
        type: "response",
        response,
        durationMs: performance.now() - startTime,
        streamed,
      };
    } catch (error) {
      return {
        type: "error",
        error: getErrorMessage(error),
        cause: error,
        durationMs: performance.now() - startTime,
      };
    }
  }

  private async executeStreaming(
    request: ModelRequest,
    options: TurnExecuteOptions
  ): Promise<ModelResponse> {
    const { transport } = this.deps;
    if (!transport.stream) {
      return transport.send(request, { signal: options.signal });
    }

    let completed: ModelResponse | undefined;
    for await (const event of transport.stream(request, { signal: options.signal })) {
      switch (event.type) {
        case "text_delta":
          await options.onTextDelta?.(event.delta);
          break;
        case "tool_call_delta":
          // Calls are taken whole from the completed response
          break;
        case "response_completed":
          completed = event.response;
          break;
      }
    }

    if (!completed) {
      throw new StreamIncompleteError();
    }
    return completed;
  }
}

export function createTurnExecutor(deps: TurnExecutorDependencies): ITurnExecutor {
  return new TurnExecutor(deps);
}
