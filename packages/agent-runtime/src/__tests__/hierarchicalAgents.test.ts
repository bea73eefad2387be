/**
 * Hierarchical Agents Tests
 */

import { describe, expect, it } from "vitest";
import {
  AgentConfigurationError,
  createHierarchicalAgents,
  createMockTransport,
  mockToolCall,
  resultOutput,
  textResponse,
  toolCallResponse,
} from "../index";
import { replyingMember } from "./members";

const SUPERVISOR_STEPS =
  "\nTo complete tasks:\n" +
  "1. Analyze the task and break it into subtasks\n" +
  "2. Delegate subtasks to appropriate workers using their tools\n" +
  "3. Wait for worker outputs and synthesize them\n" +
  "4. Provide the final coordinated response\n";

function setup() {
  const executiveTransport = createMockTransport();
  const engineeringTransport = createMockTransport();
  const marketingTransport = createMockTransport();
  const backend = replyingMember("Backend", "endpoint added");
  const frontend = replyingMember("Frontend", "form built");
  const copywriter = replyingMember("Copywriter", "Log in faster");

  const hierarchy = createHierarchicalAgents({
    executive: { name: "CEO", instructions: "Run the company.", transport: executiveTransport },
    departments: {
      Engineering: {
        manager: { name: "EngLead", instructions: "Ship features.", transport: engineeringTransport },
        workers: [backend.member, frontend.member],
      },
      Marketing: {
        manager: { name: "MktLead", instructions: "Grow the audience.", transport: marketingTransport },
        workers: [copywriter.member],
      },
    },
  });

  return {
    hierarchy,
    executiveTransport,
    engineeringTransport,
    marketingTransport,
    backend,
    frontend,
    copywriter,
  };
}

describe("HierarchicalAgents", () => {
  it("should require at least one department", () => {
    expect(() =>
      createHierarchicalAgents({
        executive: { name: "CEO", instructions: "", transport: createMockTransport() },
        departments: {},
      })
    ).toThrow(AgentConfigurationError);
  });

  it("should require workers in every department", () => {
    expect(() =>
      createHierarchicalAgents({
        executive: { name: "CEO", instructions: "", transport: createMockTransport() },
        departments: {
          Legal: {
            manager: { name: "Counsel", instructions: "", transport: createMockTransport() },
            workers: [],
          },
        },
      })
    ).toThrow('Department "Legal" requires at least one worker');
  });

  it("should build the executive over one supervisor per department", () => {
    const { hierarchy } = setup();

    expect(hierarchy.name).toBe("CEO_Hierarchy");
    expect(hierarchy.executive.name).toBe("CEO_Executive");
    expect(hierarchy.departmentNames).toEqual(["Engineering", "Marketing"]);
    expect(
      hierarchy.executive.agent.toolDefinitions().map(({ name, description }) => ({ name, description }))
    ).toEqual([
      { name: "invoke_eng_lead_supervisor", description: "Engineering department - Ship features." },
      { name: "invoke_mkt_lead_supervisor", description: "Marketing department - Grow the audience." },
    ]);
  });

  it("should brief the executive on its departments", async () => {
    const { hierarchy, executiveTransport } = setup();
    executiveTransport.enqueue(textResponse("Nothing to do"));

    await hierarchy.run("Status?");

    expect(executiveTransport.requests[0].instructions).toBe(
      "Run the company.\n\n" +
        "You are the executive overseeing the following departments:\n\n" +
        "- **Engineering**: Managed by EngLead with 2 workers\n" +
        "- **Marketing**: Managed by MktLead with 1 workers\n" +
        "\nDelegate tasks to appropriate departments. Aggregate their results for final response." +
        "\n\nYou are a supervisor agent with the following workers available:\n\n" +
        "- **EngLead_Supervisor**: Engineering department - Ship features.\n" +
        "- **MktLead_Supervisor**: Marketing department - Grow the audience.\n" +
        SUPERVISOR_STEPS
    );
  });

  it("should brief each manager on its team", async () => {
    const { hierarchy, marketingTransport } = setup();
    marketingTransport.enqueue(textResponse("Tagline ready"));

    await hierarchy.sendToDepartment("Marketing", "Write a tagline");

    expect(marketingTransport.requests[0].instructions).toBe(
      "Grow the audience.\n\n" +
        "You manage the following team:\n\n" +
        "- **Copywriter**\n\n" +
        "Delegate subtasks to your team members. Coordinate their outputs into a cohesive result." +
        "\n\nYou are a supervisor agent with the following workers available:\n\n" +
        "- **Copywriter**: Worker in Marketing department\n" +
        SUPERVISOR_STEPS
    );
  });

  it("should delegate through departments down to workers", async () => {
    const { hierarchy, executiveTransport, engineeringTransport, backend } = setup();
    executiveTransport.enqueue(
      toolCallResponse(mockToolCall("invoke_eng_lead_supervisor", { request: "Build login" }, "e1")),
      textResponse("Login shipped")
    );
    engineeringTransport.enqueue(
      toolCallResponse(mockToolCall("invoke_backend", { request: "Add auth endpoint" }, "b1")),
      textResponse("Engineering done")
    );

    const result = await hierarchy.run("Launch login");

    expect(resultOutput(result)).toBe("Login shipped");
    expect(result.toolExecutions[0].output).toBe("Engineering done");
    expect(engineeringTransport.requests[0].input).toEqual([
      { type: "message", role: "user", content: "Build login" },
    ]);
    expect(backend.contexts[0].getHistory()[0]).toEqual({
      type: "message",
      role: "user",
      content: "Add auth endpoint",
    });
  });

  it("should send work straight to a department", async () => {
    const { hierarchy, executiveTransport, marketingTransport, copywriter } = setup();
    marketingTransport.enqueue(
      toolCallResponse(mockToolCall("invoke_copywriter", { request: "Tagline for login" }, "m1")),
      textResponse("Tagline: Log in faster")
    );

    const result = await hierarchy.sendToDepartment("Marketing", "Write a tagline");

    expect(result.agentName).toBe("MktLead_Supervisor");
    expect(resultOutput(result)).toBe("Tagline: Log in faster");
    expect(copywriter.run).toHaveBeenCalledTimes(1);
    expect(executiveTransport.callCount).toBe(0);
  });

  it("should reject an unknown department", () => {
    const { hierarchy } = setup();

    expect(() => hierarchy.sendToDepartment("Legal", "Review the contract")).toThrow(
      "Department not found: Legal"
    );
  });
});
