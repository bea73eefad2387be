/**
 * Mock Model Transport
 *
 * Scripted transport for tests and examples. Responses come from, in
 * order: the queue, the responder function, the default response. Every
 * request is recorded.
 */

import { randomUUID } from "node:crypto";
import type { ToolCall } from "@agentloom/agent-runtime-core";
import type {
  IModelTransport,
  ModelRequest,
  ModelResponse,
  ModelStreamEvent,
  TransportCallOptions,
} from "./types";

export type MockResponder = (
  request: ModelRequest,
  callIndex: number,
  options: TransportCallOptions
) => ModelResponse | Promise<ModelResponse>;

export interface MockTransportOptions {
  /** Characters per streamed text delta (default: 8) */
  readonly chunkSize?: number;
}

export class TransportAbortedError extends Error {
  constructor() {
    super("Model call aborted");
    this.name = "TransportAbortedError";
  }
}

export class MockModelTransport implements IModelTransport {
  readonly requests: ModelRequest[] = [];
  private readonly queue: ModelResponse[] = [];
  private responder?: MockResponder;
  private defaultResponse: ModelResponse = {
    text: "I understand. How can I help you?",
    toolCalls: [],
  };
  private readonly chunkSize: number;

  constructor(options: MockTransportOptions = {}) {
    this.chunkSize = Math.max(1, options.chunkSize ?? 8);
  }

  /** Queue responses returned by the next calls, in order */
  enqueue(...responses: ModelResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  /** Compute responses once the queue is empty */
  respondWith(responder: MockResponder): this {
    this.responder = responder;
    return this;
  }

  setDefaultResponse(response: ModelResponse): this {
    this.defaultResponse = response;
    return this;
  }

  get callCount(): number {
    return this.requests.length;
  }

  async send(request: ModelRequest, options: TransportCallOptions = {}): Promise<ModelResponse> {
    if (options.signal?.aborted) {
      throw new TransportAbortedError();
    }
    const callIndex = this.requests.length;
    this.requests.push(request);

    const queued = this.queue.shift();
    if (queued) {
      return queued;
    }
    if (this.responder) {
      return this.responder(request, callIndex, options);
    }
    return this.defaultResponse;
  }

  async *stream(
    request: ModelRequest,
    options: TransportCallOptions = {}
  ): AsyncIterable<ModelStreamEvent> {
    const response = await this.send(request, options);

    for (let offset = 0; offset < response.text.length; offset += this.chunkSize) {
      yield { type: "text_delta", delta: response.text.slice(offset, offset + this.chunkSize) };
    }
    for (const call of response.toolCalls) {
      yield {
        type: "tool_call_delta",
        callId: call.callId,
        name: call.name,
        argumentsDelta: call.arguments,
      };
    }
    yield { type: "response_completed", response };
  }
}

export function createMockTransport(options?: MockTransportOptions): MockModelTransport {
  return new MockModelTransport(options);
}

// ============================================================================
// Response Builders
// ============================================================================

export function mockToolCall(name: string, args: unknown = {}, callId?: string): ToolCall {
  const id = callId ?? `call_${randomUUID()}`;
  return {
    id: `fc_${id}`,
    callId: id,
    name,
    arguments: typeof args === "string" ? args : JSON.stringify(args),
  };
}

export function textResponse(text: string): ModelResponse {
  return { text, toolCalls: [] };
}

export function toolCallResponse(...calls: ToolCall[]): ModelResponse {
  return { text: "", toolCalls: calls };
}
