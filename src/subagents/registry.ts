import fs from "node:fs";
import * as yaml from "yaml";
import { ZodError } from "zod";
import { ConfigError, errorMessage, formatIssues, AgentAlreadyExistsError, AgentNotFoundError, InvalidAgentNameError, InvalidToolError, PromptTooLargeError } from "../util/errors.js";
import { estimateTokens } from "../util/tokens.js";
import {
  ABSOLUTE_MAX_STEPS,
  AgentConfig,
  AgentsFile,
  AgentSpecT,
  AgentSummary,
  DEFAULT_MAX_STEPS,
  DELEGATE_TOOL,
} from "./types.js";

const NAME_PATTERN = /^[a-z0-9_-]+$/;
const MAX_NAME_LENGTH = 64;
const MAX_PROMPT_TOKENS = 4000;

export type DefineInput = {
  name: string;
  description: string;
  instructions: string;
  capabilities?: readonly string[];
  model?: string;
  maxSteps?: number;
};

export function validateAgentName(name: string) {
  if (!name || name.length > MAX_NAME_LENGTH) {
    throw new InvalidAgentNameError(`Agent name must be 1-${MAX_NAME_LENGTH} characters, got ${name.length}.`);
  }
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidAgentNameError(`Agent name must match [a-z0-9_-]+, got: '${name}'`);
  }
}

// Ordered, de-duplicated, never the delegate tool: workers do not delegate further.
export function normalizeCapabilities(capabilities: Iterable<string>): string[] {
  const out: string[] = [];
  for (const c of capabilities) {
    if (c === DELEGATE_TOOL || out.includes(c)) continue;
    out.push(c);
  }
  return out;
}

export function clampSteps(maxSteps: number | undefined): number {
  if (maxSteps === undefined || !Number.isFinite(maxSteps)) return DEFAULT_MAX_STEPS;
  return Math.min(Math.max(1, Math.trunc(maxSteps)), ABSOLUTE_MAX_STEPS);
}

// Every config goes through here, whether registered, defined or loaded from the agents file.
export function createAgentConfig(fields: {
  name: string;
  description: string;
  instructions: string;
  capabilities?: readonly string[];
  model?: string;
  maxSteps?: number;
}): AgentConfig {
  return Object.freeze({
    name: fields.name,
    description: fields.description,
    instructions: fields.instructions,
    capabilities: Object.freeze(normalizeCapabilities(fields.capabilities ?? [])),
    model: fields.model ?? "",
    maxSteps: clampSteps(fields.maxSteps),
  });
}

export function summarize(config: AgentConfig): AgentSummary {
  return {
    name: config.name,
    description: config.description,
    model: config.model,
    maxSteps: config.maxSteps,
    capabilities: [...config.capabilities],
  };
}

/**
 * Session-scoped store of agent configurations, both registered by the
 * application up front and defined by an orchestrator at runtime.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, AgentConfig>();
  private readonly availableTools: ReadonlySet<string>;

  constructor(opts: { availableTools?: Iterable<string> } = {}) {
    this.availableTools = new Set(opts.availableTools ?? []);
  }

  register(config: AgentConfig) {
    validateAgentName(config.name);
    this.insert(config);
  }

  define(input: DefineInput): AgentConfig {
    validateAgentName(input.name);

    const promptTokens = estimateTokens(input.instructions);
    if (promptTokens > MAX_PROMPT_TOKENS) {
      throw new PromptTooLargeError(`Instructions are ~${promptTokens} tokens, max is ${MAX_PROMPT_TOKENS}.`);
    }

    const capabilities = normalizeCapabilities(input.capabilities ?? []);
    if (this.availableTools.size) {
      const unknown = capabilities.find((c) => !this.availableTools.has(c));
      if (unknown !== undefined) throw new InvalidToolError(`Tool not in application registry: '${unknown}'`);
    }

    const config = createAgentConfig({
      name: input.name,
      description: input.description,
      instructions: input.instructions,
      capabilities,
      model: input.model ?? "",
      maxSteps: input.maxSteps,
    });
    this.insert(config);
    return config;
  }

  get(name: string): AgentConfig {
    const config = this.agents.get(name);
    if (!config) throw new AgentNotFoundError(`Unknown agent: '${name}'`);
    return config;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  list(): AgentSummary[] {
    return Array.from(this.agents.values(), summarize);
  }

  private insert(config: AgentConfig) {
    if (this.agents.has(config.name)) {
      throw new AgentAlreadyExistsError(`Agent already registered: '${config.name}'`);
    }
    this.agents.set(config.name, config);
  }
}

export function configFromSpec(spec: AgentSpecT): AgentConfig {
  return createAgentConfig({
    name: spec.name,
    description: spec.description,
    instructions: spec.instructions,
    capabilities: spec.capabilities,
    model: spec.model,
    maxSteps: spec.max_steps,
  });
}

export function loadAgentsFile(file: string): AgentSpecT[] {
  if (!fs.existsSync(file)) return [];
  try {
    const raw = fs.readFileSync(file, "utf8");
    return AgentsFile.parse(yaml.parse(raw) ?? {}).agents;
  } catch (e: unknown) {
    if (e instanceof ZodError) {
      throw new ConfigError(`Invalid agents file (${file})`, formatIssues(e.issues));
    }
    throw new ConfigError(`Failed to load agents file '${file}': ${errorMessage(e)}`);
  }
}

// Registers every agent in the file; returns the names added.
export function registerFromFile(registry: AgentRegistry, file: string): string[] {
  const specs = loadAgentsFile(file);
  for (const spec of specs) registry.register(configFromSpec(spec));
  return specs.map((s) => s.name);
}
