import { ToolSpec } from "../util/toolDefs.js";
import { ACTIONS, DELEGATE_TOOL } from "./types.js";

export const SUBAGENT_TOOL: ToolSpec = {
  name: DELEGATE_TOOL,
  description:
    "Delegate tasks to specialist agents. " +
    "Use list_agents to see available specialists. " +
    "Use define to create a new specialist at runtime. " +
    "Use spawn to start a task (returns immediately). " +
    "Use status to check progress. " +
    "Use collect to retrieve the result when done.",
  parameters: {
    type: "object",
    properties: {
      action: {
        type: "string",
        enum: [...ACTIONS],
        description:
          "The operation to perform. list_agents: see available specialists. define: register a new specialist at runtime. " +
          "spawn: start a task on a specialist (async). status: check task progress. collect: retrieve completed task result.",
      },
      name: {
        type: "string",
        description: "Agent name for define. Lowercase alphanumeric + underscores + hyphens, max 64 chars.",
      },
      description: { type: "string", description: "One-line agent description for define." },
      instructions: {
        type: "string",
        description: "Operating instructions for the new agent (define). Focused, max ~4000 tokens.",
      },
      capabilities: {
        type: "array",
        items: { type: "string" },
        description: "Tool names available to the agent (define).",
      },
      model: { type: "string", description: "Model identifier for the agent (define)." },
      maxSteps: { type: "integer", description: "Max agent loop iterations (define). Default 10, max 25." },
      agent: { type: "string", description: "Name of the agent to run (spawn)." },
      task: {
        type: "string",
        description: "Task description sent to the agent (spawn). Keep concise; reference shared context keys for large context.",
      },
      taskId: { type: "string", description: "Task identifier (status, collect)." },
    },
    required: ["action"],
  },
};
