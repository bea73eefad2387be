/**
 * Sub-Agent Tool Tests
 */

import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  ConversationContext,
  createAgent,
  createMockTransport,
  createSubAgentTool,
  defineTool,
  mockToolCall,
  resultOutput,
  SubAgentError,
  textResponse,
  ToolArgumentsError,
  type ToolInvocationContext,
  toolCallResponse,
} from "../index";
import { failingMember, replyingMember } from "./members";

function invocationFor(context: ConversationContext): ToolInvocationContext {
  return {
    agentName: "Lead",
    call: mockToolCall("invoke_writer", { request: "Draft" }, "c1"),
    context,
  };
}

describe("SubAgentTool", () => {
  it("should derive its name and description from the target", () => {
    const { member } = replyingMember("Release Writer", "ok");

    const tool = createSubAgentTool(member);

    expect(tool.name).toBe("invoke_release_writer");
    expect(tool.description).toBe("Release Writer member");
    expect(tool.inputSchema).toEqual({
      type: "object",
      properties: {
        request: {
          type: "string",
          description: "The message/request to send to the sub-agent",
        },
      },
      required: ["request"],
      additionalProperties: false,
    });
  });

  it("should accept explicit name and description", () => {
    const { member } = replyingMember("Writer", "ok");

    const tool = createSubAgentTool(member, { name: "draft", description: "Drafts text" });

    expect(tool.name).toBe("draft");
    expect(tool.description).toBe("Drafts text");
  });

  it("should run the target on a child context with shared state and fresh history", async () => {
    const { member, contexts } = replyingMember("Writer", "draft ready");
    const parent = ConversationContext.create()
      .addUserMessage("Write release notes")
      .setState("tenant", "acme")
      .ensureTraceContext();

    const output = await createSubAgentTool(member).invoke(
      '{"request":"Draft the summary"}',
      invocationFor(parent)
    );

    expect(output).toBe("draft ready");
    const [child] = contexts;
    expect(child.getHistory()).toEqual([
      { type: "message", role: "user", content: "Draft the summary" },
      { type: "message", role: "assistant", content: "draft ready" },
    ]);
    expect(child.getState("tenant")).toBe("acme");
    expect(child.parentTraceId).toBe(parent.parentTraceId);
    expect(child.parentSpanId).not.toBe(parent.parentSpanId);
  });

  it("should copy history and drop state when configured", async () => {
    const { member, contexts } = replyingMember("Writer", "ok");
    const parent = ConversationContext.create().addUserMessage("Earlier").setState("tenant", "acme");

    await createSubAgentTool(member, { shareState: false, shareHistory: true }).invoke(
      '{"request":"Now"}',
      invocationFor(parent)
    );

    const [child] = contexts;
    expect(child.getHistory().slice(0, 2)).toEqual([
      { type: "message", role: "user", content: "Earlier" },
      { type: "message", role: "user", content: "Now" },
    ]);
    expect(child.hasState("tenant")).toBe(false);
  });

  it("should reject an empty request", async () => {
    const { member, run } = replyingMember("Writer", "ok");

    await expect(
      createSubAgentTool(member).invoke('{"request":""}', invocationFor(ConversationContext.create()))
    ).rejects.toThrow(ToolArgumentsError);
    expect(run).not.toHaveBeenCalled();
  });

  it("should surface a failed nested run as an error", async () => {
    const { member } = failingMember("Writer", "TURN_LIMIT_EXCEEDED", "Exceeded maximum turns (1)");

    const invocation = createSubAgentTool(member).invoke(
      '{"request":"Draft"}',
      invocationFor(ConversationContext.create())
    );

    await expect(invocation).rejects.toThrow(SubAgentError);
    await expect(invocation).rejects.toThrow("'Writer' failed: Exceeded maximum turns (1)");
  });

  it("should surface a paused nested run as an error", async () => {
    const deploy = defineTool({
      name: "deploy",
      description: "Deploy a build",
      parameters: z.object({}),
      requiresConfirmation: true,
      execute: () => "deployed",
    });
    const ops = createAgent({
      name: "Ops",
      instructions: "Operate deployments.",
      transport: createMockTransport().enqueue(toolCallResponse(mockToolCall("deploy", {}, "d1"))),
      tools: [deploy],
    });

    await expect(
      createSubAgentTool(ops).invoke('{"request":"Ship it"}', invocationFor(ConversationContext.create()))
    ).rejects.toThrow(`'Ops' failed: paused waiting for approval of tool "deploy"`);
  });

  describe("inside an agent loop", () => {
    it("should return the nested output as the tool result", async () => {
      const { member } = replyingMember("Writer", "draft ready");
      const transport = createMockTransport().enqueue(
        toolCallResponse(mockToolCall("invoke_writer", { request: "Draft" }, "c1")),
        textResponse("Published the draft")
      );
      const lead = createAgent({
        name: "Lead",
        instructions: "Coordinate writing.",
        transport,
        tools: [createSubAgentTool(member)],
      });

      const result = await lead.run("Prepare the release");

      expect(resultOutput(result)).toBe("Published the draft");
      expect(result.toolExecutions.map(({ toolName, output, success }) => ({ toolName, output, success }))).toEqual([
        { toolName: "invoke_writer", output: "draft ready", success: true },
      ]);
    });

    it("should report a failed nested run to the model as a failed tool", async () => {
      const { member } = failingMember("Writer", "TRANSPORT_FAILED", "Model call failed: offline");
      const transport = createMockTransport().enqueue(
        toolCallResponse(mockToolCall("invoke_writer", { request: "Draft" }, "c1")),
        textResponse("Writer is unavailable")
      );
      const lead = createAgent({
        name: "Lead",
        instructions: "Coordinate writing.",
        transport,
        tools: [createSubAgentTool(member)],
      });

      const result = await lead.run("Prepare the release");

      expect(result.status).toBe("success");
      expect(result.toolExecutions[0].success).toBe(false);
      expect(result.toolExecutions[0].output).toBe(
        "Tool execution failed: 'Writer' failed: Model call failed: offline"
      );
    });
  });
});
