/**
 * Pause and Resume Tests
 */

import {
  ConversationContext,
  InvalidResumeStateError,
  type ToolExecution,
} from "@agentloom/agent-runtime-core";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  type AgentTool,
  createAgent,
  createMockTransport,
  defineTool,
  type MockModelTransport,
  mockToolCall,
  PausedRunState,
  resultOutput,
  textResponse,
  toolCallResponse,
  type ToolApprovalPolicy,
} from "../index";

function createTools() {
  const deploy = vi.fn(({ env }: { env: string }) => `deployed to ${env}`);
  const tools: AgentTool[] = [
    defineTool({
      name: "deploy",
      description: "Deploy the current build",
      parameters: z.object({ env: z.string() }),
      requiresConfirmation: true,
      execute: deploy,
    }),
    defineTool({
      name: "echo",
      description: "Echo text back",
      parameters: z.object({ text: z.string() }),
      execute: ({ text }) => `echo:${text}`,
    }),
  ];
  return { tools, deploy };
}

function scriptedTransport(): MockModelTransport {
  return createMockTransport().respondWith((_request, index) =>
    index === 0
      ? toolCallResponse(
          mockToolCall("deploy", { env: "staging" }, "d1"),
          mockToolCall("echo", { text: "after" }, "e1")
        )
      : textResponse("Deployed")
  );
}

function buildAgent(transport: MockModelTransport, autoApprove?: ToolApprovalPolicy) {
  const { tools, deploy } = createTools();
  const agent = createAgent({ name: "Ops", instructions: "", transport, tools, autoApprove });
  return { agent, deploy };
}

function withoutLatency(executions: readonly ToolExecution[]): ToolExecution[] {
  return executions.map((execution) => ({ ...execution, latencyMs: 0 }));
}

async function runToPause(transport: MockModelTransport = scriptedTransport()) {
  const { agent, deploy } = buildAgent(transport);
  const result = await agent.run("Deploy to staging");
  if (result.status !== "paused") {
    throw new Error(`expected a paused run, got ${result.status}`);
  }
  return { agent, deploy, transport, result, state: result.pausedState };
}

describe("Pause and resume", () => {
  describe("pausing", () => {
    it("should pause before a confirmation-required tool runs", async () => {
      const { deploy, result, state } = await runToPause();

      expect(deploy).not.toHaveBeenCalled();
      expect(state.pendingCall.name).toBe("deploy");
      expect(state.deferredCalls.map((call) => call.callId)).toEqual(["e1"]);
      expect(state.status).toBe("pending");
      expect(result.turnsUsed).toBe(1);
      expect(result.history.map((item) => item.type)).toEqual(["message", "tool_call", "tool_call"]);
    });

    it("should snapshot the context at pause time", async () => {
      const { agent } = buildAgent(scriptedTransport());
      const context = ConversationContext.create().addUserMessage("Deploy to staging");

      const result = await agent.run(context);
      if (result.status !== "paused") {
        throw new Error(`expected a paused run, got ${result.status}`);
      }
      context.addUserMessage("Actually, deploy to production");

      expect(result.pausedState.context.historySize).toBe(3);
      expect(result.pausedState.toJSON().context.history).toEqual(result.history);
      expect(context.historySize).toBe(4);
    });

    it("should emit tool_pending before pausing", async () => {
      const { agent } = buildAgent(scriptedTransport());
      const observer = vi.fn();

      await agent.run("Deploy to staging", { observer });

      expect(observer).toHaveBeenCalledWith(
        expect.objectContaining({ type: "tool_pending", agentName: "Ops" })
      );
    });
  });

  describe("resuming", () => {
    it("should execute the approved call, then the deferred calls, then continue", async () => {
      const { agent, deploy, state, transport } = await runToPause();

      state.approve();
      const resumed = await agent.resume(state);

      expect(resumed.status).toBe("success");
      expect(resultOutput(resumed)).toBe("Deployed");
      expect(deploy).toHaveBeenCalledTimes(1);
      expect(resumed.toolExecutions.map((execution) => execution.output)).toEqual([
        "deployed to staging",
        "echo:after",
      ]);
      expect(resumed.turnsUsed).toBe(2);
      expect(transport.callCount).toBe(2);
    });

    it("should match a run that approved the call up front", async () => {
      const { agent, state } = await runToPause();
      state.approve();
      const resumed = await agent.resume(state);

      const direct = await buildAgent(scriptedTransport(), true).agent.run("Deploy to staging");

      expect(resumed.status).toBe(direct.status);
      expect(resumed.history).toEqual(direct.history);
      expect(withoutLatency(resumed.toolExecutions)).toEqual(withoutLatency(direct.toolExecutions));
      expect(resumed.turnsUsed).toBe(direct.turnsUsed);
    });

    it("should use the approval output instead of running the tool", async () => {
      const { agent, deploy, state } = await runToPause();

      state.approve("deployed manually");
      const resumed = await agent.resume(state);

      expect(deploy).not.toHaveBeenCalled();
      expect(resumed.toolExecutions[0]).toEqual({
        toolName: "deploy",
        callId: "d1",
        arguments: '{"env":"staging"}',
        output: "deployed manually",
        success: true,
        latencyMs: 0,
      });
    });

    it("should record a rejection with its reason", async () => {
      const { agent, deploy, state } = await runToPause();

      state.reject("change freeze");
      const resumed = await agent.resume(state);

      expect(deploy).not.toHaveBeenCalled();
      expect(resumed.toolExecutions[0]).toMatchObject({ output: "change freeze", success: false });
      expect(resumed.history[3]).toEqual({
        type: "tool_result",
        callId: "d1",
        name: "deploy",
        output: "change freeze",
        success: false,
      });
    });

    it("should record a rejection without a reason", async () => {
      const { agent, state } = await runToPause();

      state.reject();
      const resumed = await agent.resume(state);

      expect(resumed.toolExecutions[0].output).toBe("Tool execution was rejected by user");
    });

    it("should pause again on a later confirmation-required call", async () => {
      const transport = createMockTransport().enqueue(
        toolCallResponse(mockToolCall("deploy", { env: "staging" }, "d1")),
        toolCallResponse(mockToolCall("deploy", { env: "production" }, "d2")),
        textResponse("Both deployed")
      );
      const { agent, state } = await runToPause(transport);

      state.approve();
      const second = await agent.resume(state);
      expect(second.status).toBe("paused");
      if (second.status !== "paused") {
        return;
      }
      expect(second.pausedState.pendingCall.callId).toBe("d2");

      second.pausedState.approve();
      const final = await agent.resume(second.pausedState);
      expect(resultOutput(final)).toBe("Both deployed");
      expect(final.toolExecutions.map((execution) => execution.output)).toEqual([
        "deployed to staging",
        "deployed to production",
      ]);
    });
  });

  describe("invalid resumes", () => {
    it("should refuse an unresolved state", async () => {
      const { agent, state } = await runToPause();

      await expect(agent.resume(state)).rejects.toThrow(InvalidResumeStateError);
    });

    it("should refuse a second resume of the same state", async () => {
      const { agent, state } = await runToPause();
      state.approve();
      await agent.resume(state);

      await expect(agent.resume(state)).rejects.toThrow("paused run was already resumed");
    });

    it("should refuse a second resolution", async () => {
      const { state } = await runToPause();
      state.approve();

      expect(() => state.reject()).toThrow('Tool call "deploy" was already approved');
    });

    it("should refuse a state owned by another agent", async () => {
      const { state } = await runToPause();
      state.approve();
      const other = createAgent({ name: "Other", instructions: "", transport: createMockTransport() });

      await expect(other.resume(state)).rejects.toThrow(
        'Cannot resume: paused run belongs to agent "Ops"'
      );
    });

    it("should refuse to stream an unresolved state synchronously", async () => {
      const { agent, state } = await runToPause();

      expect(() => agent.resumeStreaming(state)).toThrow(InvalidResumeStateError);
    });
  });

  describe("serialization", () => {
    it("should resume from serialized state on a rebuilt agent", async () => {
      const { state } = await runToPause();

      const restored = PausedRunState.fromJSON(JSON.parse(JSON.stringify(state)));
      expect(restored.pendingCall).toEqual(state.pendingCall);
      expect(restored.deferredCalls).toEqual(state.deferredCalls);
      expect(restored.context.getHistory()).toEqual(state.context.getHistory());
      expect(restored.turn).toBe(1);

      const rebuilt = buildAgent(createMockTransport().enqueue(textResponse("Deployed")));
      restored.approve();
      const resumed = await rebuilt.agent.resume(restored);

      expect(resultOutput(resumed)).toBe("Deployed");
      expect(rebuilt.deploy).toHaveBeenCalledTimes(1);
      expect(resumed.turnsUsed).toBe(2);
    });

    it("should keep a resolution made before serializing", async () => {
      const { state } = await runToPause();
      state.reject("not today");

      const restored = PausedRunState.fromJSON(JSON.parse(JSON.stringify(state)));

      expect(restored.resolution).toEqual({ status: "rejected", reason: "not today" });
    });

    it("should reject malformed state", () => {
      expect(() => PausedRunState.fromJSON({ version: 2 })).toThrow();
    });
  });

  describe("approval precedence", () => {
    it("should run auto-approved calls without consulting the handler", async () => {
      const { agent, deploy } = buildAgent(scriptedTransport(), (call) => call.name === "deploy");
      const approvalHandler = vi.fn();

      const result = await agent.run("Deploy to staging", { approvalHandler });

      expect(result.status).toBe("success");
      expect(deploy).toHaveBeenCalledTimes(1);
      expect(approvalHandler).not.toHaveBeenCalled();
    });

    it("should let the approval handler approve in process", async () => {
      const { agent, deploy } = buildAgent(scriptedTransport());

      const result = await agent.run("Deploy to staging", {
        approvalHandler: () => ({ type: "approve" }),
      });

      expect(result.status).toBe("success");
      expect(deploy).toHaveBeenCalledTimes(1);
    });

    it("should let the approval handler reject in process", async () => {
      const { agent, deploy } = buildAgent(scriptedTransport());

      const result = await agent.run("Deploy to staging", {
        approvalHandler: async () => ({ type: "reject", reason: "denied by policy" }),
      });

      expect(result.status).toBe("success");
      expect(deploy).not.toHaveBeenCalled();
      expect(result.toolExecutions[0]).toMatchObject({ output: "denied by policy", success: false });
    });

    it("should pause when the approval handler defers", async () => {
      const { agent } = buildAgent(scriptedTransport());

      const result = await agent.run("Deploy to staging", {
        approvalHandler: () => ({ type: "pause" }),
      });

      expect(result.status).toBe("paused");
    });
  });
});
