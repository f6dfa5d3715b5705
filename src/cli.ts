#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs";
import { Command } from "commander";
import { loadConfig, DEFAULT_CONFIG_FILE } from "./config.js";
import { SessionManager } from "./context/sessions.js";
import { CONTEXT_TOOL } from "./context/tool.js";
import { openDb } from "./db.js";
import { createDispatcher, runJsonLines } from "./session.js";
import { SUBAGENT_TOOL } from "./subagents/schema.js";
import { dryRunRunner } from "./subagents/runner.js";
import { AgentRegistry, registerFromFile } from "./subagents/registry.js";
import { printFriendlyError } from "./util/errors.js";
import { anthropicTool, openaiTool } from "./util/toolDefs.js";

const pkg: { version: string } = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"));

const program = new Command();
program
  .name("subagent-dispatch")
  .description("Delegate tasks to specialist agents with bounded concurrency and a shared context store")
  .version(pkg.version)
  .option("-c, --config <file>", "config file", DEFAULT_CONFIG_FILE);

function config() {
  return loadConfig(program.opts<{ config: string }>().config);
}

function sessions() {
  return new SessionManager(openDb(config().database));
}

// Wraps a command body so errors print once and set the exit code.
function guarded<A extends unknown[]>(fn: (...args: A) => void | Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (e) {
      process.exitCode = printFriendlyError(e);
    }
  };
}

program
  .command("agents")
  .description("List agents registered from the agents file")
  .option("--json", "output JSON", false)
  .action(
    guarded((opts: { json: boolean }) => {
      const cfg = config();
      const registry = new AgentRegistry({ availableTools: cfg.available_tools });
      registerFromFile(registry, cfg.agents_file);
      const agents = registry.list();
      if (opts.json) {
        console.log(JSON.stringify(agents));
        return;
      }
      if (!agents.length) {
        console.log(`No agents found. Add entries to ${cfg.agents_file}.`);
        return;
      }
      agents.forEach((a) =>
        console.log(`${a.name.padEnd(16)} model=${a.model || "-"} maxSteps=${a.maxSteps} tools=[${a.capabilities.join(",")}]  ${a.description}`)
      );
    })
  );

program
  .command("schema")
  .description("Print a tool definition for a provider")
  .option("--tool <name>", "subagent | shared_context", "subagent")
  .option("--format <fmt>", "openai | anthropic", "openai")
  .option("--strict", "mark OpenAI function as strict", false)
  .action(
    guarded((opts: { tool: string; format: string; strict: boolean }) => {
      const spec = opts.tool === "shared_context" ? CONTEXT_TOOL : opts.tool === "subagent" ? SUBAGENT_TOOL : undefined;
      if (!spec) throw new Error(`Unknown tool '${opts.tool}' (supported: subagent, shared_context)`);
      if (opts.format === "openai") console.log(JSON.stringify(openaiTool(spec, { strict: opts.strict }), null, 2));
      else if (opts.format === "anthropic") console.log(JSON.stringify(anthropicTool(spec), null, 2));
      else throw new Error(`Unknown format '${opts.format}' (supported: openai, anthropic)`);
    })
  );

program
  .command("session")
  .description("Read JSON requests from stdin (one per line) and print responses; tasks use the dry-run runner")
  .option("--context <sessionId>", "shared context session for {\"tool\":\"shared_context\"} requests")
  .action(
    guarded(async (opts: { context?: string }) => {
      const cfg = config();
      const dispatcher = createDispatcher(cfg, dryRunRunner);
      const store = opts.context ? new SessionManager(openDb(cfg.database)).get(opts.context) : undefined;
      await runJsonLines(dispatcher, process.stdin, process.stdout, store);
    })
  );

program
  .command("context:list")
  .description("List keys in a shared context session")
  .requiredOption("-s, --session <id>")
  .option("--json", "output JSON", false)
  .action(
    guarded((opts: { session: string; json: boolean }) => {
      const out = sessions().get(opts.session).listKeys();
      if (opts.json) {
        console.log(JSON.stringify(out));
        return;
      }
      if (!out.keys.length) {
        console.log(`Session ${opts.session} is empty.`);
        return;
      }
      out.keys.forEach((k) => console.log(`${k.key.padEnd(24)} v${k.version} ~${k.valueSizeTokens}t by ${k.writtenBy} at ${k.writtenAt}`));
      console.log(`total ~${out.totalSizeTokens} tokens`);
    })
  );

program
  .command("context:read")
  .description("Print one key")
  .requiredOption("-s, --session <id>")
  .requiredOption("-k, --key <key>")
  .option("--json", "output JSON", false)
  .action(
    guarded((opts: { session: string; key: string; json: boolean }) => {
      const entry = sessions().get(opts.session).read(opts.key);
      console.log(opts.json ? JSON.stringify(entry) : entry.value);
    })
  );

program
  .command("context:write")
  .description("Create or overwrite a key")
  .requiredOption("-s, --session <id>")
  .requiredOption("-k, --key <key>")
  .requiredOption("-v, --value <text>")
  .option("--as <participant>", "attribute the write to", "orchestrator")
  .action(
    guarded((opts: { session: string; key: string; value: string; as: string }) => {
      const res = sessions().get(opts.session).write(opts.key, opts.value, opts.as);
      console.log(`${res.key} v${res.version} written by ${res.writtenBy}`);
      if (res.warning) console.error(`warning: ${res.warning}`);
    })
  );

program
  .command("context:delete")
  .description("Remove a key")
  .requiredOption("-s, --session <id>")
  .requiredOption("-k, --key <key>")
  .action(
    guarded((opts: { session: string; key: string }) => {
      const res = sessions().get(opts.session).delete(opts.key);
      console.log(`deleted ${res.deleted} (was v${res.previousVersion})`);
    })
  );

program
  .command("sessions:list")
  .description("List shared context sessions")
  .option("--json", "output JSON", false)
  .action(
    guarded((opts: { json: boolean }) => {
      const rows = sessions().list();
      if (opts.json) {
        console.log(JSON.stringify(rows));
        return;
      }
      if (!rows.length) {
        console.log("No sessions.");
        return;
      }
      rows.forEach((r) => console.log(`${r.sessionId}${r.archived ? " [archived]" : ""} keys=${r.keyCount} ~${r.totalSizeTokens}t`));
    })
  );

program
  .command("sessions:create <id>")
  .description("Create an empty session")
  .action(
    guarded((id: string) => {
      sessions().create(id);
      console.log(`Created session ${id}`);
    })
  );

program
  .command("sessions:archive <id>")
  .description("Make a session read-only")
  .action(
    guarded((id: string) => {
      sessions().archive(id);
      console.log(`Archived session ${id}`);
    })
  );

program
  .command("sessions:delete <id>")
  .description("Delete a session and its keys")
  .action(
    guarded((id: string) => {
      sessions().delete(id);
      console.log(`Deleted session ${id}`);
    })
  );

// Workaround: when invoking via some runners (e.g., npm + tsx), a standalone "--" may
// be forwarded in argv and confuse subcommand parsing. Strip it before parsing.
const argv = process.argv.slice();
const dd = argv.indexOf("--");
if (dd !== -1) argv.splice(dd, 1);
program.parseAsync(argv).catch((e: unknown) => {
  process.exitCode = printFriendlyError(e);
});
