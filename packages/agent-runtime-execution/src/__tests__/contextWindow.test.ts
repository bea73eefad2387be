/**
 * Context Window Tests
 */

import {
  type ConversationItem,
  ConversationContext,
  createMessage,
  createToolCallItem,
  createToolResultItem,
} from "@agentloom/agent-runtime-core";
import { describe, expect, it } from "vitest";
import {
  applyContextWindow,
  createAgent,
  createCharacterTokenCounter,
  createMockTransport,
  createSummarizationStrategy,
  SlidingWindowStrategy,
  SUMMARIZATION_FAILED,
  SUMMARY_PREFIX,
  textResponse,
} from "../index";

const counter = createCharacterTokenCounter();

describe("createCharacterTokenCounter", () => {
  it("should estimate four characters per token plus item overhead", () => {
    expect(counter.countText("")).toBe(0);
    expect(counter.countText("ab")).toBe(1);
    expect(counter.countText("a".repeat(40))).toBe(10);
    expect(counter.countItem(createMessage("user", "a".repeat(40)))).toBe(14);
  });

  it("should reject a ratio below one", () => {
    expect(() => createCharacterTokenCounter(0)).toThrow(RangeError);
  });
});

describe("SlidingWindowStrategy", () => {
  const history: ConversationItem[] = [
    createMessage("developer", "x".repeat(8)),
    createMessage("user", "u".repeat(40)),
    createMessage("assistant", "a".repeat(40)),
    createMessage("user", "v".repeat(40)),
  ];

  it("should return the history unchanged when it fits", () => {
    expect(new SlidingWindowStrategy().manage(history, 100, counter)).toBe(history);
  });

  it("should keep the most recent items that fit", () => {
    const window = new SlidingWindowStrategy().manage(history, 30, counter);
    expect(window).toEqual([history[2], history[3]]);
  });

  it("should keep leading developer messages when asked", () => {
    const strategy = new SlidingWindowStrategy({ preserveLeadingDeveloperMessages: true });
    expect(strategy.manage(history, 30, counter)).toEqual([history[0], history[3]]);
  });

  it("should drop tool results whose calls were cut", () => {
    const call = { id: "fc_1", callId: "1", name: "lookup", arguments: "{}" };
    const withTools: ConversationItem[] = [
      createMessage("user", "u".repeat(40)),
      createToolCallItem(call),
      createToolResultItem(call, "r".repeat(40), true),
      createMessage("assistant", "a".repeat(40)),
    ];

    expect(new SlidingWindowStrategy().manage(withTools, 28, counter)).toEqual([withTools[3]]);
  });
});

describe("applyContextWindow", () => {
  it("should pass the history through without a config", async () => {
    const history = [createMessage("user", "hi")];
    await expect(applyContextWindow(history, undefined)).resolves.toBe(history);
  });

  it("should trim the model request but keep the stored history", async () => {
    const transport = createMockTransport().enqueue(textResponse("answer"));
    const agent = createAgent({
      name: "Assistant",
      instructions: "",
      transport,
      contextWindow: { maxTokens: 20 },
    });
    const context = ConversationContext.create()
      .addUserMessage("u".repeat(40))
      .addAssistantMessage("a".repeat(40))
      .addUserMessage("latest question");

    const result = await agent.run(context);

    expect(transport.requests[0].input).toEqual([
      { type: "message", role: "user", content: "latest question" },
    ]);
    expect(result.history).toHaveLength(4);
  });
});

describe("SummarizationStrategy", () => {
  const history: ConversationItem[] = [0, 1, 2, 3, 4, 5, 6, 7].map((index) =>
    createMessage(index % 2 === 0 ? "user" : "assistant", String(index).repeat(40))
  );

  function createStrategy(transport = createMockTransport().enqueue(textResponse("short"))) {
    const strategy = createSummarizationStrategy({
      transport,
      model: "summary-model",
      keepRecentItems: 2,
      buildPrompt: (conversation) => conversation,
    });
    return { strategy, transport };
  }

  it("should return the history unchanged when it fits", async () => {
    const { strategy, transport } = createStrategy();

    await expect(strategy.manage(history, 200, counter)).resolves.toBe(history);
    expect(transport.callCount).toBe(0);
  });

  it("should replace older items with a summary", async () => {
    const { strategy, transport } = createStrategy();

    const window = await strategy.manage(history, 60, counter);

    expect(window).toEqual([createMessage("developer", `${SUMMARY_PREFIX}short`), history[6], history[7]]);
    expect(transport.requests[0].model).toBe("summary-model");
    expect(transport.requests[0].input).toEqual([
      createMessage(
        "user",
        history
          .slice(0, 6)
          .map((_item, index) => `${index % 2 === 0 ? "user" : "assistant"}: ${String(index).repeat(40)}`)
          .join("\n")
      ),
    ]);
  });

  it("should reuse the summary of unchanged items", async () => {
    const { strategy, transport } = createStrategy();

    await strategy.manage(history, 60, counter);
    await strategy.manage(history, 60, counter);

    expect(transport.callCount).toBe(1);
  });

  it("should fall back to a placeholder when summarization fails", async () => {
    const transport = createMockTransport().respondWith(() => {
      throw new Error("offline");
    });
    const { strategy } = createStrategy(transport);

    const window = await strategy.manage(history, 60, counter);
    await strategy.manage(history, 60, counter);

    expect(window[0]).toEqual(createMessage("developer", SUMMARY_PREFIX + SUMMARIZATION_FAILED));
    expect(transport.callCount).toBe(2);
  });

  it("should use the sliding window when the recent items exceed the budget", async () => {
    const { strategy, transport } = createStrategy();

    await expect(strategy.manage(history, 20, counter)).resolves.toEqual([history[7]]);
    expect(transport.callCount).toBe(0);
  });

  it("should summarize the request of an agent run", async () => {
    const { strategy } = createStrategy();
    const transport = createMockTransport().enqueue(textResponse("answer"));
    const agent = createAgent({
      name: "Assistant",
      instructions: "",
      transport,
      contextWindow: { maxTokens: 60, strategy },
    });
    const context = ConversationContext.create({ history: history.slice(0, 7) });

    await agent.run(context);

    expect(transport.requests[0].input[0]).toEqual(createMessage("developer", `${SUMMARY_PREFIX}short`));
    expect(transport.requests[0].input).toHaveLength(3);
  });
});
