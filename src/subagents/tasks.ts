import { MaxTasksExceededError, TaskNotFoundError, TaskNotReadyError } from "../util/errors.js";
import { DEFAULT_MAX_CONCURRENT, SpawnResponse, StatusResponse, CollectResponse, TaskStatus } from "./types.js";

export class Task {
  readonly id: string;
  readonly agentName: string;
  readonly taskDescription: string;
  readonly createdAt = new Date();
  private _status: TaskStatus = "running";
  private _result?: string;
  private _error?: string;
  private _stepsUsed = 0;
  private _completedAt?: Date;

  constructor(id: string, agentName: string, taskDescription: string) {
    this.id = id;
    this.agentName = agentName;
    this.taskDescription = taskDescription;
  }

  get status(): TaskStatus { return this._status; }
  get result(): string | undefined { return this._result; }
  get error(): string | undefined { return this._error; }
  get stepsUsed(): number { return this._stepsUsed; }
  get completedAt(): Date | undefined { return this._completedAt; }

  /** @internal only TaskManager settles a task */
  settle(outcome: { status: "completed"; result: string; stepsUsed: number } | { status: "failed"; error: string; stepsUsed: number }) {
    if (this._status !== "running") {
      throw new Error(`Task ${this.id} already ${this._status}; cannot become ${outcome.status}`);
    }
    if (outcome.status === "completed") this._result = outcome.result;
    else this._error = outcome.error;
    this._stepsUsed = outcome.stepsUsed;
    this._completedAt = new Date();
    this._status = outcome.status;
  }

  toSpawnResponse(): SpawnResponse {
    return { taskId: this.id, agent: this.agentName, status: "running" };
  }

  toStatusResponse(): StatusResponse {
    const out: StatusResponse = { taskId: this.id, agent: this.agentName, status: this._status, stepsUsed: this._stepsUsed };
    if (this._status === "failed" && this._error) out.error = this._error;
    return out;
  }

  toCollectResponse(): CollectResponse {
    const out: CollectResponse = { taskId: this.id, agent: this.agentName, status: this._status, stepsUsed: this._stepsUsed };
    if (this._status === "completed") out.result = this._result;
    else if (this._status === "failed") out.error = this._error;
    return out;
  }
}

export function formatTaskId(n: number): string {
  return `t_${String(n).padStart(2, "0")}`;
}

/**
 * Tracks running and finished-but-uncollected tasks.
 *
 * Every method runs to completion synchronously, so the running-count check
 * and id allocation in `create` cannot interleave with another spawn.
 */
export class TaskManager {
  private readonly tasks = new Map<string, Task>();
  private counter = 0;
  readonly maxConcurrent: number;

  constructor(opts: { maxConcurrent?: number } = {}) {
    this.maxConcurrent = opts.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  }

  create(agentName: string, taskDescription: string): Task {
    const running = this.runningCount;
    if (running >= this.maxConcurrent) {
      throw new MaxTasksExceededError(`Maximum concurrent tasks (${this.maxConcurrent}) reached.`);
    }
    this.counter += 1;
    const task = new Task(formatTaskId(this.counter), agentName, taskDescription);
    this.tasks.set(task.id, task);
    return task;
  }

  get(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw new TaskNotFoundError(`Unknown or already-collected task: '${id}'`);
    return task;
  }

  collect(id: string): Task {
    const task = this.get(id);
    if (task.status === "running") {
      throw new TaskNotReadyError(`Task '${id}' is still running (stepsUsed=${task.stepsUsed}).`);
    }
    this.tasks.delete(id);
    return task;
  }

  complete(id: string, result: string, stepsUsed: number): Task {
    const task = this.get(id);
    task.settle({ status: "completed", result, stepsUsed });
    return task;
  }

  fail(id: string, error: string, stepsUsed: number): Task {
    const task = this.get(id);
    task.settle({ status: "failed", error, stepsUsed });
    return task;
  }

  get runningCount(): number {
    let n = 0;
    for (const t of this.tasks.values()) if (t.status === "running") n++;
    return n;
  }

  get size(): number {
    return this.tasks.size;
  }
}
