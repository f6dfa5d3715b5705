import type { ZodIssue } from "zod";

export type ErrorResponse = { error: string; message: string };

export class ConfigError extends Error {
  readonly tag = "CONFIG" as const;
  details?: string[];
  constructor(message: string, details?: string[]) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

// Protocol errors: returned to the caller as { error, message }, never thrown across the protocol surface.
export abstract class ProtocolError extends Error {
  abstract readonly code: string;
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
  toResponse(): ErrorResponse {
    return { error: this.code, message: this.message };
  }
}

export class InvalidAgentNameError extends ProtocolError {
  readonly code = "INVALID_AGENT_NAME" as const;
}

export class AgentAlreadyExistsError extends ProtocolError {
  readonly code = "AGENT_ALREADY_EXISTS" as const;
}

export class AgentNotFoundError extends ProtocolError {
  readonly code = "AGENT_NOT_FOUND" as const;
}

export class PromptTooLargeError extends ProtocolError {
  readonly code = "PROMPT_TOO_LARGE" as const;
}

export class InvalidToolError extends ProtocolError {
  readonly code = "INVALID_TOOL" as const;
}

export class TaskTooLargeError extends ProtocolError {
  readonly code = "TASK_TOO_LARGE" as const;
}

export class MaxTasksExceededError extends ProtocolError {
  readonly code = "MAX_TASKS_EXCEEDED" as const;
}

export class TaskNotFoundError extends ProtocolError {
  readonly code = "TASK_NOT_FOUND" as const;
}

export class TaskNotReadyError extends ProtocolError {
  readonly code = "TASK_NOT_READY" as const;
}

export class InvalidRequestError extends ProtocolError {
  readonly code = "INVALID_REQUEST" as const;
  issues: string[];
  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

// Shared context store
export class KeyNotFoundError extends ProtocolError {
  readonly code = "KEY_NOT_FOUND" as const;
}

export class ValueTooLargeError extends ProtocolError {
  readonly code = "VALUE_TOO_LARGE" as const;
}

export class StoreFullError extends ProtocolError {
  readonly code = "STORE_FULL" as const;
}

export class InvalidKeyError extends ProtocolError {
  readonly code = "INVALID_KEY" as const;
}

export class SessionNotFoundError extends ProtocolError {
  readonly code = "SESSION_NOT_FOUND" as const;
}

export class SessionArchivedError extends ProtocolError {
  readonly code = "SESSION_ARCHIVED" as const;
}

export class SessionExistsError extends ProtocolError {
  readonly code = "SESSION_EXISTS" as const;
}

export function invalidAction(action: unknown, valid: readonly string[]): ErrorResponse {
  const shown = typeof action === "string" ? `'${action}'` : String(action);
  return {
    error: "INVALID_ACTION",
    message: `Unknown action: ${shown}. Valid: ${[...valid].sort().join(", ")}`,
  };
}

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export function printFriendlyError(err: unknown): number {
  // Returns suggested exit code
  const w = (s: string) => process.stderr.write(s + "\n");
  if (err instanceof ConfigError) {
    w(`ERROR [config]: ${err.message}`);
    if (err.details?.length) err.details.forEach((d) => w(` - ${d}`));
    return 78; // EX_CONFIG
  }
  if (err instanceof ProtocolError) {
    w(`ERROR [${err.code.toLowerCase()}]: ${err.message}`);
    return 65; // EX_DATAERR
  }
  w(`ERROR: ${errorMessage(err) || "Unknown error"}`);
  return 1;
}
