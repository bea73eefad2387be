/**
 * Trace Identifiers
 *
 * W3C-style ids used to correlate nested and parallel runs.
 */

import { randomBytes } from "node:crypto";

export interface TraceContext {
  readonly traceId?: string;
  readonly spanId?: string;
  readonly requestId?: string;
}

/** 32 hex characters */
export function generateTraceId(): string {
  return randomBytes(16).toString("hex");
}

/** 16 hex characters */
export function generateSpanId(): string {
  return randomBytes(8).toString("hex");
}
