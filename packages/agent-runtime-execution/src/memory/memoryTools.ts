/**
 * Memory Tools
 *
 * Four tools that let the model add, search, update and delete entries of a
 * Memory. They act for the `userId` of the run; a run without one gets a
 * failed tool result.
 */

import { z } from "zod";
import { defineTool } from "../tools/defineTool";
import type { AgentTool, ToolInvocationContext } from "../tools/types";
import { createMemoryEntry, type Memory } from "./memory";

const DEFAULT_RETRIEVE_LIMIT = 5;

function requireUserId(invocation: ToolInvocationContext): string {
  if (invocation.userId === undefined) {
    throw new Error("no userId in the run options");
  }
  return invocation.userId;
}

export function createMemoryTools(memory: Memory): AgentTool[] {
  const addMemory = defineTool({
    name: "add_memory",
    description:
      "Store a new memory for the current user. Use this to remember important information, " +
      "preferences, or facts the user has shared.",
    parameters: z.object({ content: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: { content: { type: "string", description: "The information to remember" } },
      required: ["content"],
    },
    execute: async ({ content }, invocation) => {
      const entry = createMemoryEntry(content);
      await memory.add(requireUserId(invocation), entry);
      return `Memory stored successfully with id: ${entry.id}`;
    },
  });

  const retrieveMemories = defineTool({
    name: "retrieve_memories",
    description:
      "Search and retrieve relevant memories for the current user. " +
      "Use this to recall information from previous conversations.",
    parameters: z.object({
      query: z.string(),
      limit: z.number().int().positive().optional(),
    }),
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "What to search for" },
        limit: { type: "integer", description: `Maximum results (default ${DEFAULT_RETRIEVE_LIMIT})` },
      },
      required: ["query"],
    },
    execute: async ({ query, limit }, invocation) => {
      const entries = await memory.retrieve(
        requireUserId(invocation),
        query,
        limit ?? DEFAULT_RETRIEVE_LIMIT
      );
      if (entries.length === 0) {
        return "No relevant memories found.";
      }
      const lines = entries.map((entry) => `- [${entry.id}] ${entry.content}`);
      return `Found ${entries.length} memories:\n${lines.join("\n")}`;
    },
  });

  const updateMemory = defineTool({
    name: "update_memory",
    description:
      "Update an existing memory by its ID. Use this to correct or update previously stored information.",
    parameters: z.object({ id: z.string().min(1), content: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "ID of the memory to update" },
        content: { type: "string", description: "The new content" },
      },
      required: ["id", "content"],
    },
    execute: async ({ id, content }, invocation) => {
      await memory.update(requireUserId(invocation), id, createMemoryEntry(content, { id }));
      return "Memory updated successfully.";
    },
  });

  const deleteMemory = defineTool({
    name: "delete_memory",
    description: "Delete a memory by its ID. Use this when the user asks to forget something.",
    parameters: z.object({ id: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: { id: { type: "string", description: "ID of the memory to delete" } },
      required: ["id"],
    },
    execute: async ({ id }, invocation) => {
      const deleted = await memory.delete(requireUserId(invocation), id);
      return deleted ? "Memory deleted successfully." : "Memory not found.";
    },
  });

  return [addMemory, retrieveMemories, updateMemory, deleteMemory];
}
