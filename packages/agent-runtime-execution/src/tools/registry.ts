/**
 * Tool Registry
 *
 * Name-indexed set of tools. Read-only after construction, so one registry
 * can be shared by every agent that uses it.
 */

import { AgentConfigurationError } from "@agentloom/agent-runtime-core";
import type { ToolDefinition } from "../transport/types";
import type { AgentTool, IToolRegistry } from "./types";

export class ToolRegistry implements IToolRegistry {
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: readonly AgentTool[] = []) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new AgentConfigurationError(`Tool "${tool.name}" is already registered`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  resolve(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): readonly AgentTool[] {
    return [...this.tools.values()];
  }

  definitions(): ToolDefinition[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }
}

export function createToolRegistry(tools: readonly AgentTool[] = []): IToolRegistry {
  return new ToolRegistry(tools);
}
