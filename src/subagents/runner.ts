import { z } from "zod";
import { errorMessage, formatIssues } from "../util/errors.js";
import { AgentConfig } from "./types.js";

export type RunInput = {
  config: AgentConfig;
  task: string;
  /** Caller identity; attributes shared-context writes to this task. */
  participant: string;
};

const StepCount = z.number().int().nonnegative();

// Runners are host code; their results are checked before they touch task state.
export const RunOutcomeSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), text: z.string(), stepsUsed: StepCount }),
  z.object({ ok: z.literal(false), error: z.string(), stepsUsed: StepCount.optional() }),
]);

export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

export type Runner = (input: RunInput) => Promise<RunOutcome>;

export class RunnerError extends Error {
  readonly tag = "RUNNER" as const;
  stepsUsed: number;
  constructor(message: string, stepsUsed = 0) {
    super(message);
    this.name = "RunnerError";
    this.stepsUsed = stepsUsed;
  }
}

export function callerIdentity(agentName: string, taskId: string): string {
  return `subagent:${agentName}:${taskId}`;
}

// Runs the runner and folds a thrown error or a malformed result into the failure branch.
export async function runToOutcome(runner: Runner, input: RunInput): Promise<RunOutcome> {
  let raw: unknown;
  try {
    raw = await runner(input);
  } catch (e: unknown) {
    return { ok: false, error: errorMessage(e), stepsUsed: e instanceof RunnerError ? e.stepsUsed : 0 };
  }
  const parsed = RunOutcomeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `Invalid runner outcome: ${formatIssues(parsed.error.issues).join("; ")}`, stepsUsed: 0 };
  }
  return parsed.data;
}

// No model call: answers every task with a stub, for wiring checks and the session command.
export const dryRunRunner: Runner = async ({ config, task }) => ({
  ok: true,
  text: `[dry-run] ${config.name} accepted: ${task}`,
  stepsUsed: 1,
});
