export { SubagentDispatcher, truncateResult, TRUNCATION_NOTICE } from "./subagents/controller.js";
export type { DispatcherOptions } from "./subagents/controller.js";
export { AgentRegistry, createAgentConfig, validateAgentName, registerFromFile, loadAgentsFile } from "./subagents/registry.js";
export type { DefineInput } from "./subagents/registry.js";
export { Task, TaskManager, formatTaskId } from "./subagents/tasks.js";
export { WorkerPool } from "./subagents/pool.js";
export { RunnerError, callerIdentity, dryRunRunner, runToOutcome } from "./subagents/runner.js";
export type { Runner, RunInput, RunOutcome } from "./subagents/runner.js";
export { SUBAGENT_TOOL } from "./subagents/schema.js";
export * from "./subagents/types.js";
export { SharedContextStore, validateKey } from "./context/store.js";
export type { Entry, EntryMeta, WriteResult } from "./context/store.js";
export { SessionManager } from "./context/sessions.js";
export type { SessionInfo } from "./context/sessions.js";
export { CONTEXT_TOOL, handleContextRequest } from "./context/tool.js";
export type { ContextResponse } from "./context/tool.js";
export { openDb } from "./db.js";
export type { Db } from "./db.js";
export { loadConfig, parseConfig } from "./config.js";
export type { DispatchConfig } from "./config.js";
export { createDispatcher, handleLine, runJsonLines } from "./session.js";
export * from "./util/errors.js";
export { estimateTokens } from "./util/tokens.js";
export { openaiTool, anthropicTool } from "./util/toolDefs.js";
export type { ToolSpec, OpenAITool, AnthropicTool } from "./util/toolDefs.js";
