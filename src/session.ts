import readline from "node:readline";
import type { DispatchConfig } from "./config.js";
import { SharedContextStore } from "./context/store.js";
import { handleContextRequest } from "./context/tool.js";
import { SubagentDispatcher } from "./subagents/controller.js";
import { registerFromFile } from "./subagents/registry.js";
import { Runner } from "./subagents/runner.js";
import { DELEGATE_TOOL } from "./subagents/types.js";
import { errorMessage } from "./util/errors.js";

export const ORCHESTRATOR = "orchestrator";

export function createDispatcher(config: DispatchConfig, runner: Runner): SubagentDispatcher {
  const dispatcher = new SubagentDispatcher({
    runner,
    availableTools: config.available_tools,
    maxConcurrent: config.max_concurrent,
    debug: config.debug,
  });
  const names = registerFromFile(dispatcher.registry, config.agents_file);
  if (config.debug) process.stderr.write(`[dispatch] registered ${names.length} agent(s) from ${config.agents_file}\n`);
  return dispatcher;
}

/**
 * Handles one JSON line. `{"tool":"shared_context", ...}` goes to the store
 * as the orchestrator; anything else is a subagent request.
 */
export function handleLine(line: string, dispatcher: SubagentDispatcher, store?: SharedContextStore): unknown {
  let request: unknown;
  try {
    request = JSON.parse(line);
  } catch (e: unknown) {
    return { error: "INVALID_REQUEST", message: `Invalid JSON: ${errorMessage(e)}` };
  }
  const tool = typeof request === "object" && request !== null && "tool" in request ? request.tool : DELEGATE_TOOL;
  if (tool === "shared_context") {
    if (!store) return { error: "INVALID_REQUEST", message: "No shared context session is open" };
    return handleContextRequest(store, request, { participant: ORCHESTRATOR });
  }
  return dispatcher.handle(request);
}

export async function runJsonLines(
  dispatcher: SubagentDispatcher,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  store?: SharedContextStore
) {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  for await (const raw of rl) {
    const line = raw.trim();
    if (!line) continue;
    output.write(JSON.stringify(handleLine(line, dispatcher, store)) + "\n");
  }
  await dispatcher.shutdown({ wait: true });
}
