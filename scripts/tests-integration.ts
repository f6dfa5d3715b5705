#!/usr/bin/env tsx
import assert from "node:assert";
import { Readable, Writable } from "node:stream";
import { parseConfig } from "../src/config.js";
import { SharedContextStore } from "../src/context/store.js";
import { handleContextRequest } from "../src/context/tool.js";
import { openDb } from "../src/db.js";
import { createDispatcher, handleLine, runJsonLines } from "../src/session.js";
import { SubagentDispatcher, TRUNCATION_NOTICE } from "../src/subagents/controller.js";
import { createAgentConfig } from "../src/subagents/registry.js";
import { RunInput, RunOutcome, Runner, RunnerError, dryRunRunner } from "../src/subagents/runner.js";

const tick = () => new Promise<void>((r) => setImmediate(r));

const researcher = createAgentConfig({
  name: "researcher",
  description: "Investigates questions and reports findings",
  instructions: "You are a research specialist. Report findings concisely.",
  capabilities: ["search", "shared_context"],
  model: "openai/gpt-4o-mini",
});

function dispatcherWith(runner: Runner, maxConcurrent = 5) {
  const d = new SubagentDispatcher({ runner, maxConcurrent });
  d.register(researcher);
  return d;
}

// Runner whose tasks settle only when the test releases them, keyed by caller identity.
function gatedRunner() {
  const gates = new Map<string, (o: RunOutcome) => void>();
  const calls: RunInput[] = [];
  const runner: Runner = (input) => {
    calls.push(input);
    return new Promise<RunOutcome>((resolve) => gates.set(input.participant, resolve));
  };
  const release = (participant: string, outcome: RunOutcome) => {
    const gate = gates.get(participant);
    assert.ok(gate, `no running task for ${participant}`);
    gate(outcome);
  };
  return { runner, calls, release };
}

async function testSpawnStatusCollect() {
  const calls: RunInput[] = [];
  const d = dispatcherWith(async (input) => {
    calls.push(input);
    return { ok: true, text: `findings for ${input.task}`, stepsUsed: 3 };
  });

  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "researcher", task: "investigate X" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "running",
  });
  assert.strictEqual(calls.length, 0, "spawn returns before the runner starts");
  assert.deepStrictEqual(d.handle({ action: "status", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "running",
    stepsUsed: 0,
  });

  await d.idle();
  assert.deepStrictEqual(d.handle({ action: "status", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "completed",
    stepsUsed: 3,
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "completed",
    stepsUsed: 3,
    result: "findings for investigate X",
  });
  assert.deepStrictEqual(d.handle({ action: "status", taskId: "t_01" }), {
    error: "TASK_NOT_FOUND",
    message: "Unknown or already-collected task: 't_01'",
  });

  assert.strictEqual(calls.length, 1);
  assert.strictEqual(calls[0].participant, "subagent:researcher:t_01", "caller identity");
  assert.strictEqual(calls[0].config, researcher, "runner gets the registered config");
  assert.strictEqual(calls[0].task, "investigate X");
  await d.shutdown();
}

async function testListAndDefine() {
  const d = dispatcherWith(dryRunRunner);
  assert.deepStrictEqual(
    d.handle({
      action: "define",
      name: "analyst",
      description: "Analyzes data",
      instructions: "Analyze the data you are given.",
      capabilities: ["subagent", "search"],
      maxSteps: 40,
    }),
    { defined: "analyst", description: "Analyzes data" }
  );
  assert.deepStrictEqual(d.handle({ action: "list_agents" }), {
    agents: [
      {
        name: "researcher",
        description: "Investigates questions and reports findings",
        model: "openai/gpt-4o-mini",
        maxSteps: 10,
        capabilities: ["search", "shared_context"],
      },
      { name: "analyst", description: "Analyzes data", model: "", maxSteps: 25, capabilities: ["search"] },
    ],
  });

  assert.deepStrictEqual(d.handle({ action: "define", description: "nameless", instructions: "x" }), {
    error: "INVALID_AGENT_NAME",
    message: "Agent name must be 1-64 characters, got 0.",
  });
  assert.deepStrictEqual(d.handle({ action: "define", name: "researcher", instructions: "again" }), {
    error: "AGENT_ALREADY_EXISTS",
    message: "Agent already registered: 'researcher'",
  });

  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "analyst", task: "summarize Q3" }), {
    taskId: "t_01",
    agent: "analyst",
    status: "running",
  });
  await d.idle();
  const out = d.handle({ action: "collect", taskId: "t_01" });
  assert.ok("result" in out && out.result === "[dry-run] analyst accepted: summarize Q3");
  await d.shutdown();
}

async function testRequestErrors() {
  const d = dispatcherWith(dryRunRunner);
  const valid = "Valid: collect, define, list_agents, spawn, status";
  assert.deepStrictEqual(d.handle({ action: "explode" }), { error: "INVALID_ACTION", message: `Unknown action: 'explode'. ${valid}` });
  assert.deepStrictEqual(d.handle({}), { error: "INVALID_ACTION", message: `Unknown action: undefined. ${valid}` });
  assert.deepStrictEqual(d.handle("spawn"), { error: "INVALID_ACTION", message: `Unknown action: undefined. ${valid}` });

  assert.deepStrictEqual(d.handle({ action: "define", name: "x", maxSteps: "ten" }), {
    error: "INVALID_REQUEST",
    message: "Invalid define request: maxSteps: Expected number, received string",
  });

  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "ghost", task: "boo" }), {
    error: "AGENT_NOT_FOUND",
    message: "Unknown agent: 'ghost'",
  });
  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "ghost", task: "x".repeat(4004) }), {
    error: "TASK_TOO_LARGE",
    message: "Task string is ~1001 tokens, max is 1000.",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_42" }), {
    error: "TASK_NOT_FOUND",
    message: "Unknown or already-collected task: 't_42'",
  });
  assert.strictEqual(d.tasks.size, 0, "rejected spawns create no task");

  const ok = d.handle({ action: "spawn", agent: "researcher", task: "x".repeat(4000) });
  assert.ok("taskId" in ok && ok.taskId === "t_01", "1000-token task accepted");
  await d.shutdown();
}

async function testConcurrencyCeiling() {
  const g = gatedRunner();
  const d = dispatcherWith(g.runner, 3);
  for (const n of [1, 2, 3]) d.handle({ action: "spawn", agent: "researcher", task: `task ${n}` });
  await tick();
  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "researcher", task: "task 4" }), {
    error: "MAX_TASKS_EXCEEDED",
    message: "Maximum concurrent tasks (3) reached.",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_01" }), {
    error: "TASK_NOT_READY",
    message: "Task 't_01' is still running (stepsUsed=0).",
  });

  g.release("subagent:researcher:t_02", { ok: true, text: "two", stepsUsed: 1 });
  await tick();
  const status = d.handle({ action: "status", taskId: "t_02" });
  assert.ok("status" in status && status.status === "completed");

  const fourth = d.handle({ action: "spawn", agent: "researcher", task: "task 4" });
  assert.ok("taskId" in fourth && fourth.taskId === "t_04", "slot freed by completion, ids keep counting");
  await tick();
  assert.strictEqual(g.calls.length, 4);

  g.release("subagent:researcher:t_01", { ok: true, text: "one", stepsUsed: 1 });
  g.release("subagent:researcher:t_03", { ok: true, text: "three", stepsUsed: 1 });
  g.release("subagent:researcher:t_04", { ok: true, text: "four", stepsUsed: 1 });
  await d.idle();
  assert.strictEqual(d.tasks.runningCount, 0);
  await d.shutdown();
}

async function testFailureIsolation() {
  const d = dispatcherWith(async ({ task }) => {
    if (task === "explode") throw new RunnerError("model exploded", 4);
    if (task === "crash") throw new Error("socket hang up");
    if (task === "limited") return { ok: false, error: "rate limited", stepsUsed: 2 };
    return { ok: true, text: `done: ${task}`, stepsUsed: 1 };
  });
  for (const task of ["explode", "fine", "crash", "limited"]) d.handle({ action: "spawn", agent: "researcher", task });
  await d.idle();

  assert.deepStrictEqual(d.handle({ action: "status", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "failed",
    stepsUsed: 4,
    error: "model exploded",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "failed",
    stepsUsed: 4,
    error: "model exploded",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_02" }), {
    taskId: "t_02",
    agent: "researcher",
    status: "completed",
    stepsUsed: 1,
    result: "done: fine",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_03" }), {
    taskId: "t_03",
    agent: "researcher",
    status: "failed",
    stepsUsed: 0,
    error: "socket hang up",
  });
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_04" }), {
    taskId: "t_04",
    agent: "researcher",
    status: "failed",
    stepsUsed: 2,
    error: "rate limited",
  });
  await d.shutdown();
}

async function testSpawnDoesNotRunInline() {
  let started = 0;
  const d = dispatcherWith(async () => {
    started = Date.now();
    return { ok: true, text: "done", stepsUsed: 1 };
  });
  d.handle({ action: "spawn", agent: "researcher", task: "slow start" });
  const acked = Date.now();
  assert.strictEqual(started, 0, "runner not called inside spawn");
  await d.idle();
  assert.ok(started >= acked, "runner ran after the ack");
  await d.shutdown();
}

async function testMalformedRunnerOutcome() {
  const results: Record<string, string> = {
    nothing: "null",
    number_text: '{"ok":true,"text":42,"stepsUsed":1}',
    good: '{"ok":true,"text":"fine","stepsUsed":2}',
  };
  // JSON.parse stands in for a host runner whose result is not what it claims
  const d = dispatcherWith(async ({ task }) => JSON.parse(results[task] ?? "null"), 1);

  d.handle({ action: "spawn", agent: "researcher", task: "nothing" });
  await d.idle();
  assert.deepStrictEqual(d.handle({ action: "status", taskId: "t_01" }), {
    taskId: "t_01",
    agent: "researcher",
    status: "failed",
    stepsUsed: 0,
    error: "Invalid runner outcome: root: Expected object, received null",
  });

  const second = d.handle({ action: "spawn", agent: "researcher", task: "number_text" });
  assert.ok("taskId" in second && second.taskId === "t_02", "failed task frees its slot");
  await d.idle();
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_02" }), {
    taskId: "t_02",
    agent: "researcher",
    status: "failed",
    stepsUsed: 0,
    error: "Invalid runner outcome: text: Expected string, received number",
  });

  d.handle({ action: "spawn", agent: "researcher", task: "good" });
  await d.idle();
  assert.deepStrictEqual(d.handle({ action: "collect", taskId: "t_03" }), {
    taskId: "t_03",
    agent: "researcher",
    status: "completed",
    stepsUsed: 2,
    result: "fine",
  });
  assert.strictEqual(d.tasks.runningCount, 0);
  await d.shutdown();
}

async function testResultTruncation() {
  const d = dispatcherWith(async () => ({ ok: true, text: "y".repeat(8000), stepsUsed: 2 }));
  d.handle({ action: "spawn", agent: "researcher", task: "dump everything" });
  await d.idle();
  const out = d.handle({ action: "collect", taskId: "t_01" });
  assert.ok("result" in out);
  assert.strictEqual(out.result, "y".repeat(4000) + TRUNCATION_NOTICE);
  await d.shutdown();
}

async function testParallelTasks() {
  const d = dispatcherWith(async ({ task }) => {
    await tick();
    return { ok: true, text: task.toUpperCase(), stepsUsed: 1 };
  });
  for (const t of ["a", "b", "c", "d", "e"]) d.handle({ action: "spawn", agent: "researcher", task: t });
  assert.strictEqual(d.tasks.runningCount, 5);
  await d.idle();
  const results = ["t_01", "t_02", "t_03", "t_04", "t_05"].map((taskId) => {
    const out = d.handle({ action: "collect", taskId });
    return "result" in out ? out.result : undefined;
  });
  assert.deepStrictEqual(results, ["A", "B", "C", "D", "E"]);
  await d.shutdown();
}

async function testSharedContextAttribution() {
  const store = new SharedContextStore(openDb(":memory:"), "incident");
  const d = dispatcherWith(async ({ participant }) => {
    // written_by in the request is ignored; the dispatcher-assigned identity is used
    handleContextRequest(store, { action: "write", key: "finding", value: "root cause: stale cache", written_by: "forged" }, { participant });
    return { ok: true, text: "wrote finding", stepsUsed: 2 };
  });
  handleLine(JSON.stringify({ tool: "shared_context", action: "write", key: "phase", value: "investigating" }), d, store);
  d.handle({ action: "spawn", agent: "researcher", task: "find the root cause" });
  await d.idle();

  assert.strictEqual(store.read("phase").writtenBy, "orchestrator");
  const finding = store.read("finding");
  assert.strictEqual(finding.value, "root cause: stale cache");
  assert.strictEqual(finding.writtenBy, "subagent:researcher:t_01");
  assert.deepStrictEqual(store.listKeys().keys.map((k) => k.key), ["phase", "finding"]);
  await d.shutdown();
}

async function testHandleLine() {
  const d = dispatcherWith(dryRunRunner);
  const bad = handleLine("{not json", d);
  assert.ok(typeof bad === "object" && bad !== null && "error" in bad && bad.error === "INVALID_REQUEST");
  assert.deepStrictEqual(handleLine(JSON.stringify({ tool: "shared_context", action: "list_keys" }), d), {
    error: "INVALID_REQUEST",
    message: "No shared context session is open",
  });
  assert.deepStrictEqual(handleLine(JSON.stringify({ action: "spawn", agent: "researcher", task: "look" }), d), {
    taskId: "t_01",
    agent: "researcher",
    status: "running",
  });
  await d.shutdown();
}

async function testJsonLinesSession() {
  const d = dispatcherWith(dryRunRunner);
  const input = Readable.from([
    Buffer.from(
      [
        JSON.stringify({ action: "list_agents" }),
        "",
        JSON.stringify({ action: "spawn", agent: "researcher", task: "investigate X" }),
        JSON.stringify({ action: "status", taskId: "t_09" }),
      ].join("\n") + "\n"
    ),
  ]);
  const lines: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _enc, cb) {
      lines.push(chunk.toString());
      cb();
    },
  });
  await runJsonLines(d, input, output);

  assert.strictEqual(lines.length, 3, "blank lines skipped");
  const [listed, spawned, missing] = lines.map((l) => JSON.parse(l));
  assert.deepStrictEqual(listed.agents.map((a: { name: string }) => a.name), ["researcher"]);
  assert.deepStrictEqual(spawned, { taskId: "t_01", agent: "researcher", status: "running" });
  assert.strictEqual(missing.error, "TASK_NOT_FOUND");
  // the session drains running tasks before it returns
  assert.strictEqual(d.tasks.get("t_01").result, "[dry-run] researcher accepted: investigate X");
}

async function testShutdownRejectsSpawns() {
  const d = dispatcherWith(dryRunRunner);
  await d.shutdown();
  assert.deepStrictEqual(d.handle({ action: "spawn", agent: "researcher", task: "late" }), {
    error: "INTERNAL",
    message: "Worker pool is closed",
  });
  assert.strictEqual(d.tasks.get("t_01").status, "failed", "task that never ran is failed, not left running");
  assert.strictEqual(d.tasks.runningCount, 0);
}

async function testDispatcherFromConfig() {
  const cfg = parseConfig({ agents_file: "agents/agents.yaml", max_concurrent: 2 }, {});
  const d = createDispatcher(cfg, dryRunRunner);
  const listed = d.handle({ action: "list_agents" });
  assert.ok("agents" in listed);
  assert.deepStrictEqual(listed.agents.map((a) => a.name), ["researcher", "writer"]);
  assert.strictEqual(listed.agents[1].maxSteps, 5);
  assert.strictEqual(d.tasks.maxConcurrent, 2);
  d.handle({ action: "spawn", agent: "writer", task: "draft" });
  d.handle({ action: "spawn", agent: "writer", task: "edit" });
  const third = d.handle({ action: "spawn", agent: "writer", task: "publish" });
  assert.ok("error" in third && third.error === "MAX_TASKS_EXCEEDED");
  await d.shutdown();
}

async function main() {
  await testSpawnStatusCollect();
  await testListAndDefine();
  await testRequestErrors();
  await testConcurrencyCeiling();
  await testFailureIsolation();
  await testSpawnDoesNotRunInline();
  await testMalformedRunnerOutcome();
  await testResultTruncation();
  await testParallelTasks();
  await testSharedContextAttribution();
  await testHandleLine();
  await testJsonLinesSession();
  await testShutdownRejectsSpawns();
  await testDispatcherFromConfig();
  console.log("integration OK");
}

main().catch((e) => { console.error(e); process.exit(1); });
