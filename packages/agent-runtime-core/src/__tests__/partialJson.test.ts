/**
 * @file partialJson.test.ts
 * @description Tests for repairing and parsing truncated JSON streams
 */

import { describe, expect, it } from "vitest";
import { completePartialJson, PartialJsonParser, parsePartialJson } from "../streaming/partialJson";

describe("parsePartialJson", () => {
  it("parses complete documents directly", () => {
    expect(parsePartialJson('{"a": 1, "b": [true, null]}')).toEqual({ a: 1, b: [true, null] });
  });

  it("closes an open string value", () => {
    expect(parsePartialJson('{"title": "Rel')).toEqual({ title: "Rel" });
  });

  it("drops a partial key", () => {
    expect(parsePartialJson('{"a": 1, "na')).toEqual({ a: 1 });
  });

  it("drops a key whose value has not started", () => {
    expect(parsePartialJson('{"a": 1, "b":')).toEqual({ a: 1 });
  });

  it("drops a trailing comma", () => {
    expect(parsePartialJson('{"a": 1,')).toEqual({ a: 1 });
  });

  it("omits a number cut mid-token", () => {
    expect(parsePartialJson('{"a": "x", "count": 12')).toEqual({ a: "x" });
  });

  it("keeps a number followed by whitespace", () => {
    expect(parsePartialJson('{"count": 12 ')).toEqual({ count: 12 });
  });

  it("omits a partial literal", () => {
    expect(parsePartialJson('{"ok": tru')).toEqual({});
  });

  it("closes nested containers in reverse order", () => {
    expect(parsePartialJson('{"user": {"name": "Ada", "tags": ["x", "y')).toEqual({
      user: { name: "Ada", tags: ["x", "y"] },
    });
  });

  it("keeps an opened nested object empty until a field completes", () => {
    expect(parsePartialJson('[{"a": 1}, {"b": 2')).toEqual([{ a: 1 }, {}]);
  });

  it("drops a dangling escape inside a string", () => {
    expect(parsePartialJson('{"text": "line\\')).toEqual({ text: "line" });
  });

  it("drops a partial unicode escape", () => {
    expect(parsePartialJson('{"text": "caf\\u00e')).toEqual({ text: "caf" });
  });

  it("keeps escaped quotes inside strings", () => {
    expect(parsePartialJson('{"q": "say \\"hi')).toEqual({ q: 'say "hi' });
  });

  it("ignores brackets inside strings", () => {
    expect(parsePartialJson('{"code": "if (x) { return [')).toEqual({
      code: "if (x) { return [",
    });
  });

  it("returns undefined when nothing is recoverable", () => {
    expect(parsePartialJson("")).toBeUndefined();
    expect(parsePartialJson("hello")).toBeUndefined();
    expect(parsePartialJson('{"na')).toEqual({});
  });

  it("never throws on any prefix and converges on the full document", () => {
    const document = {
      id: "run-7",
      score: -12.5e2,
      done: false,
      nothing: null,
      notes: 'quote " and brace } and bracket ]',
      steps: [
        { name: "plan", children: [{ depth: 2, tags: ["a", "b"] }] },
        { name: "act", children: [] },
      ],
      meta: { nested: { deeper: { deepest: [1, [2, [3]]] } } },
    };
    const text = JSON.stringify(document, null, 2);

    for (let length = 0; length <= text.length; length++) {
      expect(() => parsePartialJson(text.slice(0, length))).not.toThrow();
    }
    expect(parsePartialJson(text)).toEqual(document);

    const parser = new PartialJsonParser();
    let last: unknown = null;
    for (const char of text) {
      last = parser.append(char);
    }
    expect(last).toEqual(document);
  });
});

describe("completePartialJson", () => {
  it("cuts an incomplete array element and closes containers", () => {
    expect(completePartialJson('{"a": [1, 2')).toBe('{"a": [1]}');
  });

  it("closes an open string and its containers", () => {
    expect(completePartialJson('{"a": ["x", "y')).toBe('{"a": ["x", "y"]}');
  });

  it("returns undefined before any structure opens", () => {
    expect(completePartialJson("  ")).toBeUndefined();
  });
});

describe("PartialJsonParser", () => {
  it("returns progressively richer values", () => {
    const parser = new PartialJsonParser();
    expect(parser.append('{"title": "Rel')).toEqual({ title: "Rel" });
    expect(parser.append('ease", "count": 1')).toEqual({ title: "Release" });
    expect(parser.append("2}")).toEqual({ title: "Release", count: 12 });
  });

  it("falls back to the previous value when repair fails", () => {
    const parser = new PartialJsonParser();
    parser.append('{"a": "x"}');
    expect(parser.append("}")).toEqual({ a: "x" });
  });

  it("returns null before anything parses", () => {
    const parser = new PartialJsonParser();
    expect(parser.append("  ")).toBeNull();
  });

  it("resets its buffer and last value", () => {
    const parser = new PartialJsonParser();
    parser.append('{"a": 1}');
    parser.reset();
    expect(parser.text).toBe("");
    expect(parser.current()).toBeNull();
  });
});
