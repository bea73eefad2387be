/**
 * Runtime configuration helpers.
 *
 * Agent defaults come from, in increasing precedence: built-in defaults,
 * `AGENTLOOM_*` environment variables, explicit overrides.
 */

import { AgentConfigurationError } from "@agentloom/agent-runtime-core";
import { z } from "zod";

export const agentRuntimeConfigSchema = z.object({
  model: z.string().min(1),
  maxTurns: z.number().int().positive(),
  temperature: z.number().min(0).max(2).optional(),
  /** Token budget for the request history; unset sends the full history */
  contextMaxTokens: z.number().int().positive().optional(),
});

export type AgentRuntimeConfig = z.infer<typeof agentRuntimeConfigSchema>;

export const DEFAULT_AGENT_RUNTIME_CONFIG: AgentRuntimeConfig = {
  model: "gpt-4o-mini",
  maxTurns: 10,
};

type Env = Readonly<Record<string, string | undefined>>;

export function resolveAgentRuntimeConfig(
  overrides: Partial<AgentRuntimeConfig> = {},
  env: Env = process.env
): AgentRuntimeConfig {
  const fromEnv: Partial<AgentRuntimeConfig> = {
    model: readEnvString(env, ["AGENTLOOM_MODEL"]),
    maxTurns: readEnvNumber(env, ["AGENTLOOM_MAX_TURNS"]),
    temperature: readEnvNumber(env, ["AGENTLOOM_TEMPERATURE"]),
    contextMaxTokens: readEnvNumber(env, ["AGENTLOOM_CONTEXT_MAX_TOKENS"]),
  };

  const merged = {
    ...DEFAULT_AGENT_RUNTIME_CONFIG,
    ...withoutUndefined(fromEnv),
    ...withoutUndefined(overrides),
  };

  const parsed = agentRuntimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new AgentConfigurationError(`Invalid agent runtime config: ${details}`);
  }
  return parsed.data;
}

function withoutUndefined(config: Partial<AgentRuntimeConfig>): Partial<AgentRuntimeConfig> {
  const result: Partial<AgentRuntimeConfig> = {};
  if (config.model !== undefined) {
    result.model = config.model;
  }
  if (config.maxTurns !== undefined) {
    result.maxTurns = config.maxTurns;
  }
  if (config.temperature !== undefined) {
    result.temperature = config.temperature;
  }
  if (config.contextMaxTokens !== undefined) {
    result.contextMaxTokens = config.contextMaxTokens;
  }
  return result;
}

function readEnvString(env: Env, keys: string[]): string | undefined {
  for (const key of keys) {
    const raw = env[key];
    if (raw) {
      return raw;
    }
  }
  return undefined;
}

function readEnvNumber(env: Env, keys: string[]): number | undefined {
  for (const key of keys) {
    const raw = env[key];
    if (!raw) {
      continue;
    }
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return undefined;
}
