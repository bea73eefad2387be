/**
 * Parallel Agents Tests
 */

import { getEventListeners } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  AgentConfigurationError,
  ConversationContext,
  createAgent,
  createLinkedController,
  createMockTransport,
  createParallelAgents,
  defineTool,
  type MockModelTransport,
  mockToolCall,
  resultError,
  resultOutput,
  type RunResult,
  textResponse,
  toolCallResponse,
} from "../index";
import { failingMember, replyingMember, scriptedMember } from "./members";

function createGate() {
  let release: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, open: () => release() };
}

describe("ParallelAgents", () => {
  it("should require at least one member", () => {
    expect(() => createParallelAgents({ members: [] })).toThrow(AgentConfigurationError);
  });

  describe("runAll", () => {
    it("should return results in member order on isolated copies sharing one trace", async () => {
      const a = replyingMember("A", "alpha");
      const b = replyingMember("B", "beta");
      const c = replyingMember("C", "gamma");
      const context = ConversationContext.create().addUserMessage("Compare plans").ensureTraceContext();
      const group = createParallelAgents({ members: [a.member, b.member, c.member] });

      const results = await group.runAll(context);

      expect(results.map(resultOutput)).toEqual(["alpha", "beta", "gamma"]);
      expect(b.contexts[0].getHistory()).toEqual([
        { type: "message", role: "user", content: "Compare plans" },
        { type: "message", role: "assistant", content: "beta" },
      ]);
      expect(context.historySize).toBe(1);
      for (const member of [a, b, c]) {
        expect(member.contexts[0]).not.toBe(context);
        expect(member.contexts[0].parentTraceId).toBe(context.parentTraceId);
      }
    });

    it("should keep running siblings when one member fails", async () => {
      const group = createParallelAgents({
        members: [
          replyingMember("A", "alpha").member,
          failingMember("B", "TRANSPORT_FAILED", "Model call failed: offline").member,
          replyingMember("C", "gamma").member,
        ],
      });

      const results = await group.runAll("Compare plans");

      expect(results.map((result) => result.status)).toEqual(["success", "error", "success"]);
    });

    it("should turn a rejected member run into a MEMBER_FAILED result", async () => {
      const broken = scriptedMember("Broken", () => {
        throw new Error("socket closed");
      });
      const group = createParallelAgents({ members: [broken.member, replyingMember("B", "beta").member] });

      const [first, second] = await group.runAll("Compare plans");

      expect(resultError(first)?.code).toBe("MEMBER_FAILED");
      expect(resultError(first)?.message).toBe('Member "Broken" failed: socket closed');
      expect(resultOutput(second)).toBe("beta");
    });
  });

  describe("runFirst", () => {
    it("should return the fastest member and cancel the rest", async () => {
      const gate = createGate();
      const lookup = vi.fn(() => "found");
      const lookupTool = defineTool({
        name: "lookup",
        description: "Look something up",
        parameters: z.object({}),
        execute: lookup,
      });
      const transports: MockModelTransport[] = [];
      const runs: Promise<RunResult>[] = [];

      const members = ["A", "B", "C", "D", "E"].map((name, index) => {
        const transport = createMockTransport();
        if (index === 1) {
          transport.enqueue(textResponse("fast answer"));
        } else {
          transport.respondWith(async () => {
            await gate.opened;
            return toolCallResponse(mockToolCall("lookup", {}, `${name}-1`));
          });
        }
        transports.push(transport);
        const agent = createAgent({ name, instructions: "Answer.", transport, tools: [lookupTool] });
        return scriptedMember(name, (context, options) => {
          const run = agent.run(context, options);
          runs.push(run);
          return run;
        }).member;
      });

      const winner = await createParallelAgents({ members }).runFirst("Question");

      expect(winner.agentName).toBe("B");
      expect(resultOutput(winner)).toBe("fast answer");

      gate.open();
      const losers = (await Promise.all(runs)).filter((result) => result.agentName !== "B");
      expect(losers.map((result) => resultError(result)?.code)).toEqual([
        "CANCELLED",
        "CANCELLED",
        "CANCELLED",
        "CANCELLED",
      ]);
      expect(losers.every((result) => result.toolExecutions.length === 0)).toBe(true);
      expect(lookup).not.toHaveBeenCalled();
      expect(transports.every((transport) => transport.callCount <= 1)).toBe(true);
    });

    it("should leave no listeners on the caller's signal", async () => {
      const parent = new AbortController();
      const group = createParallelAgents({
        members: [replyingMember("A", "alpha").member, replyingMember("B", "beta").member],
      });

      await group.runFirst("Question", { signal: parent.signal });
      await group.runFirst("Question", { signal: parent.signal });

      expect(getEventListeners(parent.signal, "abort")).toHaveLength(0);
    });

    it("should settle on the first member even when it failed", async () => {
      const gate = createGate();
      const slow = scriptedMember("Slow", async (context) => {
        await gate.opened;
        return replyingMember("Slow", "late").run(context);
      });
      const group = createParallelAgents({
        members: [slow.member, failingMember("Fast", "OUTPUT_REJECTED", "Output guardrail failed: pii").member],
      });

      const first = await group.runFirst("Question");
      gate.open();

      expect(first.agentName).toBe("Fast");
      expect(resultError(first)?.code).toBe("OUTPUT_REJECTED");
      expect(slow.run.mock.calls[0][1]?.signal?.aborted).toBe(true);
    });
  });

  describe("runAndSynthesize", () => {
    it("should hand every output to the synthesizer on a fresh context", async () => {
      const synthesizer = replyingMember("Editor", "combined view");
      const group = createParallelAgents({
        members: [
          replyingMember("A", "alpha").member,
          failingMember("B", "TURN_LIMIT_EXCEEDED", "Exceeded maximum turns (3)").member,
          replyingMember("C", "").member,
        ],
      });
      const context = ConversationContext.create()
        .addUserMessage("Compare plans")
        .setState("tenant", "acme")
        .ensureTraceContext();

      const result = await group.runAndSynthesize(context, synthesizer.member);

      expect(resultOutput(result)).toBe("combined view");
      expect(result.related.map((related) => related.agentName)).toEqual(["A", "B", "C"]);

      const [synthesisContext] = synthesizer.contexts;
      expect(synthesisContext.getHistory()[0]).toEqual({
        type: "message",
        role: "user",
        content:
          "Original query: Compare plans\n\n" +
          "The following participants have provided their outputs:\n\n" +
          "--- A ---\nalpha\n\n" +
          "--- B ---\n[ERROR: Exceeded maximum turns (3)]\n\n" +
          "--- C ---\n[No output]\n\n" +
          "Please synthesize these outputs into a coherent response.",
      });
      expect(synthesisContext.historySize).toBe(2);
      expect(synthesisContext.hasState("tenant")).toBe(false);
      expect(synthesisContext.parentTraceId).toBe(context.parentTraceId);
    });
  });

  describe("run", () => {
    it("should make the first member primary and attach the rest", async () => {
      const group = createParallelAgents({
        members: [replyingMember("A", "alpha").member, replyingMember("B", "beta").member],
      });

      const result = await group.run("Compare plans");

      expect(result.agentName).toBe("A");
      expect(resultOutput(result)).toBe("alpha");
      expect(result.related.map(resultOutput)).toEqual(["beta"]);
    });
  });

  describe("runStreaming", () => {
    it("should forward every member's events tagged with its name", async () => {
      const members = ["A", "B"].map((name) =>
        createAgent({
          name,
          instructions: "",
          transport: createMockTransport().enqueue(textResponse("ok")),
        })
      );

      const { events, result } = await createParallelAgents({ members }).runStreaming("Hi").collect();

      const typesFor = (name: string) =>
        events.filter((event) => event.agentName === name).map((event) => event.type);
      expect(typesFor("B")).toEqual(["turn_start", "text_delta", "turn_complete"]);
      expect(typesFor("A")).toEqual(["turn_start", "text_delta", "turn_complete", "complete"]);
      expect(events[events.length - 1].type).toBe("complete");
      expect(result.related).toHaveLength(1);
    });
  });
});

describe("createLinkedController", () => {
  it("should follow the parent signal", () => {
    const parent = new AbortController();
    const child = createLinkedController(parent.signal);

    expect(child.signal.aborted).toBe(false);
    parent.abort();
    expect(child.signal.aborted).toBe(true);
  });

  it("should start aborted under an aborted parent", () => {
    const parent = new AbortController();
    parent.abort();

    expect(createLinkedController(parent.signal).signal.aborted).toBe(true);
  });

  it("should stop following the parent once unlinked", () => {
    const parent = new AbortController();
    const child = createLinkedController(parent.signal);

    child.unlink();
    parent.abort();

    expect(child.signal.aborted).toBe(false);
    expect(getEventListeners(parent.signal, "abort")).toHaveLength(0);
  });

  it("should abort without affecting the parent", () => {
    const parent = new AbortController();
    const child = createLinkedController(parent.signal);

    child.abort();

    expect(parent.signal.aborted).toBe(false);
  });
});
