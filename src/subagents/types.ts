import { z } from "zod";

export const DELEGATE_TOOL = "subagent";
export const DEFAULT_MAX_STEPS = 10;
export const ABSOLUTE_MAX_STEPS = 25;
export const DEFAULT_MAX_CONCURRENT = 5;

export type AgentConfig = Readonly<{
  name: string;
  description: string;
  instructions: string;
  capabilities: readonly string[];
  model: string;
  maxSteps: number;
}>;

export type AgentSummary = {
  name: string;
  description: string;
  model: string;
  maxSteps: number;
  capabilities: string[];
};

export type TaskStatus = "running" | "completed" | "failed";

// agents/agents.yaml
export const AgentSpec = z.object({
  name: z.string(),
  description: z.string().default(""),
  instructions: z.string(),
  capabilities: z.array(z.string()).default([]),
  model: z.string().default(""),
  max_steps: z.number().int().positive().max(ABSOLUTE_MAX_STEPS).default(DEFAULT_MAX_STEPS),
});

export type AgentSpecT = z.infer<typeof AgentSpec>;

export const AgentsFile = z.object({ agents: z.array(AgentSpec).default([]) });

// Protocol requests. Missing strings default to "" so the registry and tracker report their own errors.
export const ACTIONS = ["list_agents", "define", "spawn", "status", "collect"] as const;
export type Action = (typeof ACTIONS)[number];

export const SubagentRequest = z.discriminatedUnion("action", [
  z.object({ action: z.literal("list_agents") }),
  z.object({
    action: z.literal("define"),
    name: z.string().default(""),
    description: z.string().default(""),
    instructions: z.string().default(""),
    capabilities: z.array(z.string()).optional(),
    model: z.string().default(""),
    maxSteps: z.number().int().default(DEFAULT_MAX_STEPS),
  }),
  z.object({
    action: z.literal("spawn"),
    agent: z.string().default(""),
    task: z.string().default(""),
  }),
  z.object({ action: z.literal("status"), taskId: z.string().default("") }),
  z.object({ action: z.literal("collect"), taskId: z.string().default("") }),
]);

export type SubagentRequestT = z.infer<typeof SubagentRequest>;

export type ListAgentsResponse = { agents: AgentSummary[] };
export type DefineResponse = { defined: string; description: string };
export type SpawnResponse = { taskId: string; agent: string; status: "running" };
export type StatusResponse = {
  taskId: string;
  agent: string;
  status: TaskStatus;
  stepsUsed: number;
  error?: string;
};
export type CollectResponse = StatusResponse & { result?: string };

export type SubagentResponse =
  | ListAgentsResponse
  | DefineResponse
  | SpawnResponse
  | StatusResponse
  | CollectResponse
  | { error: string; message: string };
