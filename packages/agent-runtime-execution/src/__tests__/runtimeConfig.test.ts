/**
 * Runtime Config Tests
 */

import { AgentConfigurationError } from "@agentloom/agent-runtime-core";
import { describe, expect, it } from "vitest";
import { DEFAULT_AGENT_RUNTIME_CONFIG, resolveAgentRuntimeConfig } from "../index";

describe("resolveAgentRuntimeConfig", () => {
  it("should fall back to defaults", () => {
    expect(resolveAgentRuntimeConfig({}, {})).toEqual(DEFAULT_AGENT_RUNTIME_CONFIG);
  });

  it("should read AGENTLOOM_ environment variables", () => {
    const config = resolveAgentRuntimeConfig(
      {},
      {
        AGENTLOOM_MODEL: "env-model",
        AGENTLOOM_MAX_TURNS: "5",
        AGENTLOOM_TEMPERATURE: "0.5",
        AGENTLOOM_CONTEXT_MAX_TOKENS: "2000",
      }
    );

    expect(config).toEqual({
      model: "env-model",
      maxTurns: 5,
      temperature: 0.5,
      contextMaxTokens: 2000,
    });
  });

  it("should prefer explicit overrides over the environment", () => {
    const config = resolveAgentRuntimeConfig(
      { model: "explicit-model" },
      { AGENTLOOM_MODEL: "env-model", AGENTLOOM_MAX_TURNS: "5" }
    );

    expect(config.model).toBe("explicit-model");
    expect(config.maxTurns).toBe(5);
  });

  it("should ignore environment values that are not numbers", () => {
    expect(resolveAgentRuntimeConfig({}, { AGENTLOOM_MAX_TURNS: "many" }).maxTurns).toBe(10);
  });

  it("should reject invalid values", () => {
    expect(() => resolveAgentRuntimeConfig({ maxTurns: 0 }, {})).toThrow(AgentConfigurationError);
    expect(() => resolveAgentRuntimeConfig({}, { AGENTLOOM_TEMPERATURE: "3" })).toThrow(
      "Invalid agent runtime config: temperature: Number must be less than or equal to 2"
    );
  });
});
