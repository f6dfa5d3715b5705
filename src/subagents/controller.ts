import { InvalidRequestError, ProtocolError, TaskTooLargeError, errorMessage, formatIssues, invalidAction } from "../util/errors.js";
import { clampTokens, estimateTokens } from "../util/tokens.js";
import { WorkerPool } from "./pool.js";
import { AgentRegistry } from "./registry.js";
import { Runner, callerIdentity, runToOutcome } from "./runner.js";
import { Task, TaskManager } from "./tasks.js";
import {
  ACTIONS,
  AgentConfig,
  CollectResponse,
  DEFAULT_MAX_CONCURRENT,
  DefineResponse,
  ListAgentsResponse,
  SpawnResponse,
  StatusResponse,
  SubagentRequest,
  SubagentRequestT,
  SubagentResponse,
} from "./types.js";

const MAX_RESULT_TOKENS = 1000;
const MAX_TASK_TOKENS = 1000;
export const TRUNCATION_NOTICE = `\n...[truncated: result exceeded ${MAX_RESULT_TOKENS} token limit]`;

export function truncateResult(text: string): string {
  return clampTokens(text, MAX_RESULT_TOKENS, TRUNCATION_NOTICE);
}

export type DispatcherOptions = {
  runner: Runner;
  registry?: AgentRegistry;
  availableTools?: Iterable<string>;
  maxConcurrent?: number;
  debug?: boolean;
};

/**
 * Entry point of the subagent protocol. One instance per orchestrator session:
 * it owns the registry, the task tracker and a worker pool sized to the
 * concurrency ceiling.
 */
export class SubagentDispatcher {
  readonly registry: AgentRegistry;
  readonly tasks: TaskManager;
  private readonly runner: Runner;
  private readonly pool: WorkerPool;
  private readonly debug: boolean;

  constructor(opts: DispatcherOptions) {
    const maxConcurrent = opts.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    this.registry = opts.registry ?? new AgentRegistry({ availableTools: opts.availableTools });
    this.tasks = new TaskManager({ maxConcurrent });
    this.runner = opts.runner;
    this.debug = !!opts.debug;
    this.pool = new WorkerPool(maxConcurrent, (err) => {
      process.stderr.write(`[dispatch] worker error: ${errorMessage(err)}\n`);
    });
  }

  register(config: AgentConfig) {
    this.registry.register(config);
  }

  handle(request: unknown): SubagentResponse {
    const action = isRecord(request) ? request.action : undefined;
    if (!isAction(action)) return invalidAction(action, ACTIONS);

    const parsed = SubagentRequest.safeParse(request);
    if (!parsed.success) {
      return new InvalidRequestError(`Invalid ${action} request`, formatIssues(parsed.error.issues)).toResponse();
    }
    try {
      return this.dispatch(parsed.data);
    } catch (e: unknown) {
      if (e instanceof ProtocolError) {
        this.log(`${action} rejected: ${e.code}`);
        return e.toResponse();
      }
      process.stderr.write(`[dispatch] ${action} failed: ${errorMessage(e)}\n`);
      return { error: "INTERNAL", message: errorMessage(e) };
    }
  }

  /** Resolves once every submitted task has settled. */
  idle(): Promise<void> {
    return this.pool.onIdle();
  }

  async shutdown(opts: { wait?: boolean } = {}) {
    this.pool.close();
    if (opts.wait ?? true) await this.pool.onIdle();
  }

  private dispatch(req: SubagentRequestT): SubagentResponse {
    switch (req.action) {
      case "list_agents":
        return this.listAgents();
      case "define":
        return this.define(req);
      case "spawn":
        return this.spawn(req.agent, req.task);
      case "status":
        return this.status(req.taskId);
      case "collect":
        return this.collect(req.taskId);
    }
  }

  private listAgents(): ListAgentsResponse {
    return { agents: this.registry.list() };
  }

  private define(req: Extract<SubagentRequestT, { action: "define" }>): DefineResponse {
    const config = this.registry.define({
      name: req.name,
      description: req.description,
      instructions: req.instructions,
      capabilities: req.capabilities,
      model: req.model,
      maxSteps: req.maxSteps,
    });
    this.log(`define ${config.name} capabilities=[${config.capabilities.join(",")}] maxSteps=${config.maxSteps}`);
    return { defined: config.name, description: config.description };
  }

  private spawn(agentName: string, taskDescription: string): SpawnResponse {
    const taskTokens = estimateTokens(taskDescription);
    if (taskTokens > MAX_TASK_TOKENS) {
      throw new TaskTooLargeError(`Task string is ~${taskTokens} tokens, max is ${MAX_TASK_TOKENS}.`);
    }
    const config = this.registry.get(agentName);
    const task = this.tasks.create(agentName, taskDescription);
    // Captured first: a fast runner may settle the task before submit returns.
    const ack = task.toSpawnResponse();
    try {
      this.pool.submit(() => this.execute(task, config));
    } catch (e: unknown) {
      this.tasks.fail(task.id, errorMessage(e), 0);
      throw e;
    }
    this.log(`spawn ${task.id} agent=${agentName} running=${this.tasks.runningCount}/${this.tasks.maxConcurrent}`);
    return ack;
  }

  private status(taskId: string): StatusResponse {
    return this.tasks.get(taskId).toStatusResponse();
  }

  private collect(taskId: string): CollectResponse {
    const task = this.tasks.collect(taskId);
    this.log(`collect ${task.id} status=${task.status}`);
    return task.toCollectResponse();
  }

  private async execute(task: Task, config: AgentConfig): Promise<void> {
    const participant = callerIdentity(config.name, task.id);
    const started = Date.now();
    const outcome = await runToOutcome(this.runner, { config, task: task.taskDescription, participant });
    try {
      if (outcome.ok) {
        this.tasks.complete(task.id, truncateResult(outcome.text), outcome.stepsUsed);
      } else {
        this.tasks.fail(task.id, outcome.error, outcome.stepsUsed ?? 0);
      }
    } catch (e: unknown) {
      // a task always leaves running, whatever went wrong above
      if (task.status === "running") this.tasks.fail(task.id, errorMessage(e), 0);
      else throw e;
    }
    this.log(`${task.id} ${task.status} steps=${task.stepsUsed} in ${Date.now() - started}ms`);
  }

  private log(line: string) {
    if (this.debug) process.stderr.write(`[dispatch] ${line}\n`);
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isAction(v: unknown): v is (typeof ACTIONS)[number] {
  return ACTIONS.some((a) => a === v);
}
