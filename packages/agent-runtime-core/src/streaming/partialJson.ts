/**
 * Partial JSON Parser
 *
 * Produces the best decoding of a JSON document that is still streaming in.
 * After every chunk the accumulated text is parsed directly; when that fails
 * a single scan repairs the text:
 *
 * - an open string value is closed (a dangling escape is dropped first)
 * - partial keys, `key:` pairs without a value and trailing commas are cut
 * - numbers and literals are never completed mid-token; they are cut until a
 *   delimiter shows they are whole
 * - unmatched `{` / `[` are closed in reverse nesting order
 *
 * Nothing in this module throws on malformed input.
 */

// ============================================================================
// Types
// ============================================================================

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

interface Frame {
  readonly kind: "object" | "array";
  expectingKey: boolean;
}

interface Checkpoint {
  /** Text before this index is a valid prefix once closers are appended */
  readonly index: number;
  readonly closers: string;
}

const PRIMITIVE_CHAR = /[0-9A-Za-z.+-]/;
const WHITESPACE = /\s/;
const PARTIAL_UNICODE_ESCAPE = /\\u[0-9A-Fa-f]{0,3}$/;

// ============================================================================
// Repair
// ============================================================================

/**
 * Repair truncated JSON text into a parseable document.
 *
 * @returns The repaired text, or undefined when no complete structure has been seen yet
 */
export function completePartialJson(text: string): string | undefined {
  const stack: Frame[] = [];
  let checkpoint: Checkpoint | undefined;
  let inString = false;
  let escaped = false;
  let stringIsKey = false;
  let inPrimitive = false;

  const closers = (): string => {
    let result = "";
    for (let index = stack.length - 1; index >= 0; index--) {
      result += stack[index].kind === "object" ? "}" : "]";
    }
    return result;
  };
  const mark = (index: number): void => {
    checkpoint = { index, closers: closers() };
  };

  for (let index = 0; index < text.length; index++) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
        if (!stringIsKey) {
          mark(index + 1);
        }
      }
      continue;
    }

    if (inPrimitive) {
      if (PRIMITIVE_CHAR.test(char)) {
        continue;
      }
      inPrimitive = false;
      mark(index);
    }

    const top = stack.length > 0 ? stack[stack.length - 1] : undefined;
    switch (char) {
      case '"':
        inString = true;
        stringIsKey = top?.kind === "object" && top.expectingKey;
        break;
      case "{":
        stack.push({ kind: "object", expectingKey: true });
        mark(index + 1);
        break;
      case "[":
        stack.push({ kind: "array", expectingKey: false });
        mark(index + 1);
        break;
      case "}":
      case "]":
        stack.pop();
        mark(index + 1);
        break;
      case ":":
        if (top) {
          top.expectingKey = false;
        }
        break;
      case ",":
        if (top?.kind === "object") {
          top.expectingKey = true;
        }
        break;
      default:
        if (!WHITESPACE.test(char)) {
          inPrimitive = true;
        }
    }
  }

  if (inString && !stringIsKey) {
    const body = escaped ? text.slice(0, -1) : text.replace(PARTIAL_UNICODE_ESCAPE, "");
    return `${body}"${closers()}`;
  }

  if (!checkpoint) {
    return undefined;
  }
  return text.slice(0, checkpoint.index) + checkpoint.closers;
}

function tryParse(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Parse possibly truncated JSON text.
 *
 * @returns The decoded value, or undefined when nothing usable can be recovered
 */
export function parsePartialJson(text: string): JsonValue | undefined {
  if (text.trim().length === 0) {
    return undefined;
  }

  const direct = tryParse(text);
  if (direct !== undefined) {
    return direct;
  }

  const repaired = completePartialJson(text);
  return repaired === undefined ? undefined : tryParse(repaired);
}

// ============================================================================
// Stateful Parser
// ============================================================================

/**
 * Accumulates streamed text and keeps the last successful decoding.
 *
 * @example
 * ```typescript
 * const parser = new PartialJsonParser();
 * parser.append('{"title": "Rel');     // { title: "Rel" }
 * parser.append('ease", "count": 1');  // { title: "Release" }
 * parser.append("2}");                 // { title: "Release", count: 12 }
 * ```
 */
export class PartialJsonParser {
  private buffer = "";
  private lastValue: JsonValue = null;

  append(chunk: string): JsonValue {
    this.buffer += chunk;
    return this.current();
  }

  /**
   * Best decoding so far. Falls back to the previous successful value, or null.
   */
  current(): JsonValue {
    const value = parsePartialJson(this.buffer);
    if (value !== undefined) {
      this.lastValue = value;
    }
    return this.lastValue;
  }

  get text(): string {
    return this.buffer;
  }

  reset(): void {
    this.buffer = "";
    this.lastValue = null;
  }
}
