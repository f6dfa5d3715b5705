#!/usr/bin/env tsx
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseConfig } from "../src/config.js";
import { SessionManager } from "../src/context/sessions.js";
import { SharedContextStore } from "../src/context/store.js";
import { CONTEXT_TOOL, handleContextRequest } from "../src/context/tool.js";
import { openDb } from "../src/db.js";
import { TRUNCATION_NOTICE, truncateResult } from "../src/subagents/controller.js";
import { WorkerPool } from "../src/subagents/pool.js";
import { AgentRegistry, createAgentConfig } from "../src/subagents/registry.js";
import { SUBAGENT_TOOL } from "../src/subagents/schema.js";
import { TaskManager, formatTaskId } from "../src/subagents/tasks.js";
import { ConfigError, ProtocolError } from "../src/util/errors.js";
import { estimateTokens } from "../src/util/tokens.js";
import { anthropicTool, openaiTool } from "../src/util/toolDefs.js";

function throwsCode(fn: () => unknown, code: string, msg: string) {
  assert.throws(fn, (e: unknown) => e instanceof ProtocolError && e.code === code, msg);
}

function agent(name: string) {
  return createAgentConfig({ name, description: `${name} agent`, instructions: `You are ${name}.` });
}

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setImmediate(r));

async function flush() {
  for (let i = 0; i < 3; i++) await tick();
}

// --- tokens -----------------------------------------------------------------

function testTokenEstimate() {
  assert.strictEqual(estimateTokens(""), 1);
  assert.strictEqual(estimateTokens("abc"), 1);
  assert.strictEqual(estimateTokens("x".repeat(16000)), 4000);
  assert.strictEqual(estimateTokens("x".repeat(16003)), 4000);
  assert.strictEqual(estimateTokens("x".repeat(16004)), 4001);
  // code points, not UTF-16 units
  assert.strictEqual(estimateTokens("😀😀😀😀😀😀😀😀"), 2);
}

function testTruncation() {
  const long = "x".repeat(8000);
  const cut = truncateResult(long);
  assert.strictEqual(cut, "x".repeat(4000) + TRUNCATION_NOTICE, "8000 chars cut to 4000 plus notice");
  const short = "y".repeat(400);
  assert.strictEqual(truncateResult(short), short, "400 chars pass through");
  assert.strictEqual(truncateResult("z".repeat(4003)), "z".repeat(4003), "1000 tokens is within limit");
  assert.strictEqual(truncateResult("z".repeat(4004)), "z".repeat(4000) + TRUNCATION_NOTICE, "1001 tokens truncated");
}

// --- registry ---------------------------------------------------------------

function testRegisterAndGet() {
  const reg = new AgentRegistry();
  reg.register(agent("researcher"));
  assert.strictEqual(reg.get("researcher").name, "researcher");
  assert.strictEqual(reg.get("researcher").maxSteps, 10, "default maxSteps");
  throwsCode(() => reg.register(agent("researcher")), "AGENT_ALREADY_EXISTS", "duplicate register rejected");
  throwsCode(() => reg.get("missing"), "AGENT_NOT_FOUND", "unknown agent");
  assert.ok(Object.isFrozen(reg.get("researcher")), "config is immutable");
}

function testAgentNames() {
  const reg = new AgentRegistry();
  for (const bad of ["", "A", "has space", "dot.name", "x".repeat(65), "Ünicode"]) {
    throwsCode(() => reg.register(agent(bad)), "INVALID_AGENT_NAME", `rejects '${bad}'`);
    throwsCode(() => reg.define({ name: bad, description: "d", instructions: "i" }), "INVALID_AGENT_NAME", `define rejects '${bad}'`);
  }
  for (const good of ["a", "my-agent_2", "x".repeat(64)]) {
    reg.register(agent(good));
    assert.strictEqual(reg.get(good).name, good);
  }
}

function testDefineDefaultsAndClamp() {
  const reg = new AgentRegistry();
  const cfg = reg.define({ name: "analyst", description: "Analyzes data", instructions: "Analyze." });
  assert.deepStrictEqual([...cfg.capabilities], []);
  assert.strictEqual(cfg.maxSteps, 10);
  assert.strictEqual(cfg.model, "");
  assert.strictEqual(reg.define({ name: "hi", description: "", instructions: "i", maxSteps: 100 }).maxSteps, 25);
  assert.strictEqual(reg.define({ name: "lo", description: "", instructions: "i", maxSteps: 0 }).maxSteps, 1);
  assert.strictEqual(reg.define({ name: "neg", description: "", instructions: "i", maxSteps: -5 }).maxSteps, 1);
  assert.strictEqual(reg.define({ name: "mid", description: "", instructions: "i", maxSteps: 7 }).maxSteps, 7);
  throwsCode(() => reg.define({ name: "analyst", description: "again", instructions: "i" }), "AGENT_ALREADY_EXISTS", "define collision");
}

function testCapabilityStripping() {
  const reg = new AgentRegistry();
  const a = reg.define({ name: "a1", description: "", instructions: "i", capabilities: ["search", "subagent"] });
  const b = reg.define({ name: "a2", description: "", instructions: "i", capabilities: ["subagent", "search"] });
  assert.deepStrictEqual([...a.capabilities], ["search"]);
  assert.deepStrictEqual([...b.capabilities], ["search"]);
  const c = reg.define({ name: "a3", description: "", instructions: "i", capabilities: ["search", "shared_context", "search"] });
  assert.deepStrictEqual([...c.capabilities], ["search", "shared_context"], "duplicates dropped, first position kept");
}

function testRegisterNormalizesConfig() {
  const reg = new AgentRegistry();
  reg.register(createAgentConfig({ name: "rogue", description: "", instructions: "i", capabilities: ["subagent", "search", "search"], maxSteps: 100 }));
  reg.register(createAgentConfig({ name: "zero", description: "", instructions: "i", maxSteps: 0 }));
  reg.register(createAgentConfig({ name: "frac", description: "", instructions: "i", maxSteps: 3.7 }));
  assert.deepStrictEqual(reg.list(), [
    { name: "rogue", description: "", model: "", maxSteps: 25, capabilities: ["search"] },
    { name: "zero", description: "", model: "", maxSteps: 1, capabilities: [] },
    { name: "frac", description: "", model: "", maxSteps: 3, capabilities: [] },
  ]);
}

function testCapabilityAllowList() {
  const reg = new AgentRegistry({ availableTools: ["search", "shared_context"] });
  throwsCode(
    () => reg.define({ name: "sh", description: "", instructions: "i", capabilities: ["search", "shell"] }),
    "INVALID_TOOL",
    "tool outside allow-list"
  );
  assert.strictEqual(reg.has("sh"), false, "rejected define leaves nothing behind");
  const ok = reg.define({ name: "ok", description: "", instructions: "i", capabilities: ["subagent", "shared_context"] });
  assert.deepStrictEqual([...ok.capabilities], ["shared_context"], "delegate tool dropped before the allow-list check");
}

function testPromptBoundary() {
  const reg = new AgentRegistry();
  reg.define({ name: "edge", description: "", instructions: "p".repeat(16000) });
  assert.ok(reg.has("edge"), "4000 tokens accepted");
  throwsCode(
    () => reg.define({ name: "over", description: "", instructions: "p".repeat(16004) }),
    "PROMPT_TOO_LARGE",
    "4001 tokens rejected"
  );
}

function testListOmitsInstructions() {
  const reg = new AgentRegistry();
  reg.register(createAgentConfig({ name: "w", description: "writes", instructions: "secret sauce", capabilities: ["search"], model: "m1", maxSteps: 4 }));
  reg.define({ name: "r", description: "reads", instructions: "x" });
  assert.deepStrictEqual(reg.list(), [
    { name: "w", description: "writes", model: "m1", maxSteps: 4, capabilities: ["search"] },
    { name: "r", description: "reads", model: "", maxSteps: 10, capabilities: [] },
  ]);
}

// --- tasks ------------------------------------------------------------------

function testTaskIds() {
  assert.strictEqual(formatTaskId(7), "t_07");
  assert.strictEqual(formatTaskId(100), "t_100");
  const tm = new TaskManager({ maxConcurrent: 10 });
  const t1 = tm.create("a", "one");
  const t2 = tm.create("a", "two");
  assert.strictEqual(t1.id, "t_01");
  assert.strictEqual(t2.id, "t_02");
  tm.complete(t1.id, "done", 1);
  tm.collect(t1.id);
  assert.strictEqual(tm.create("a", "three").id, "t_03", "ids never reused after collect");
}

function testConcurrencyCeiling() {
  const tm = new TaskManager({ maxConcurrent: 3 });
  tm.create("a", "1");
  tm.create("a", "2");
  tm.create("a", "3");
  throwsCode(() => tm.create("a", "4"), "MAX_TASKS_EXCEEDED", "4th running task rejected");
  tm.complete("t_02", "ok", 1);
  assert.strictEqual(tm.create("a", "4").id, "t_04", "slot freed by completion");
  throwsCode(() => tm.create("a", "5"), "MAX_TASKS_EXCEEDED", "ceiling holds again");
  tm.fail("t_01", "boom", 0);
  assert.strictEqual(tm.runningCount, 2);
  assert.strictEqual(tm.size, 4, "terminal tasks stay tracked until collected");
}

function testCollect() {
  const tm = new TaskManager();
  const t = tm.create("a", "work");
  throwsCode(() => tm.collect(t.id), "TASK_NOT_READY", "running task not collectable");
  assert.strictEqual(tm.get(t.id).status, "running", "task unchanged");
  assert.strictEqual(tm.size, 1);

  tm.complete(t.id, "done", 3);
  const got = tm.collect(t.id);
  assert.strictEqual(got.result, "done");
  assert.ok(got.completedAt instanceof Date);
  throwsCode(() => tm.collect(t.id), "TASK_NOT_FOUND", "second collect fails");
  throwsCode(() => tm.get(t.id), "TASK_NOT_FOUND", "collected task gone");
  throwsCode(() => tm.get("t_99"), "TASK_NOT_FOUND", "unknown id");
}

function testTaskTransitionsOnce() {
  const tm = new TaskManager();
  const t = tm.create("a", "work");
  tm.fail(t.id, "boom", 2);
  assert.throws(() => tm.complete(t.id, "late", 5), /already failed/);
  assert.strictEqual(t.status, "failed");
  assert.strictEqual(t.result, undefined);
}

function testTaskResponses() {
  const tm = new TaskManager();
  const run = tm.create("a", "x");
  assert.deepStrictEqual(run.toSpawnResponse(), { taskId: "t_01", agent: "a", status: "running" });
  assert.deepStrictEqual(run.toStatusResponse(), { taskId: "t_01", agent: "a", status: "running", stepsUsed: 0 });

  const ok = tm.create("a", "y");
  tm.complete(ok.id, "found it", 3);
  assert.deepStrictEqual(ok.toStatusResponse(), { taskId: "t_02", agent: "a", status: "completed", stepsUsed: 3 });
  assert.deepStrictEqual(ok.toCollectResponse(), { taskId: "t_02", agent: "a", status: "completed", stepsUsed: 3, result: "found it" });

  const bad = tm.create("a", "z");
  tm.fail(bad.id, "timeout", 2);
  assert.deepStrictEqual(bad.toStatusResponse(), { taskId: "t_03", agent: "a", status: "failed", stepsUsed: 2, error: "timeout" });
  assert.deepStrictEqual(bad.toCollectResponse(), { taskId: "t_03", agent: "a", status: "failed", stepsUsed: 2, error: "timeout" });
}

// --- worker pool ------------------------------------------------------------

async function testPoolBounds() {
  const errors: unknown[] = [];
  const pool = new WorkerPool(2, (e) => errors.push(e));
  const gates = [deferred(), deferred(), deferred()];
  const order: number[] = [];
  gates.forEach((g, i) => pool.submit(async () => { order.push(i); await g.promise; }));
  assert.strictEqual(pool.running, 2);
  assert.strictEqual(pool.pending, 1);
  assert.deepStrictEqual(order, [], "jobs start on a later turn");
  await tick();
  assert.deepStrictEqual(order, [0, 1], "third job waits");

  gates[0].resolve();
  await flush();
  assert.strictEqual(pool.running, 2);
  assert.strictEqual(pool.pending, 0);
  assert.deepStrictEqual(order, [0, 1, 2], "queued job starts when a slot frees");

  gates[1].resolve();
  gates[2].resolve();
  await pool.onIdle();
  assert.strictEqual(pool.running, 0);
  assert.deepStrictEqual(errors, []);
}

async function testPoolQueueBoundAndClose() {
  const pool = new WorkerPool(1, () => {});
  const gate = deferred();
  pool.submit(() => gate.promise);
  pool.submit(() => gate.promise);
  assert.throws(() => pool.submit(() => gate.promise), /queue full/);
  pool.close();
  assert.throws(() => pool.submit(async () => {}), /closed/);
  gate.resolve();
  await pool.onIdle();
  assert.throws(() => new WorkerPool(0, () => {}), /positive integer/);
}

async function testPoolReportsJobErrors() {
  const errors: unknown[] = [];
  const pool = new WorkerPool(1, (e) => errors.push(e));
  pool.submit(async () => { throw new Error("job blew up"); });
  let ran = false;
  pool.submit(async () => { ran = true; });
  await pool.onIdle();
  assert.strictEqual(errors.length, 1);
  const [err] = errors;
  assert.ok(err instanceof Error && err.message === "job blew up");
  assert.ok(ran, "pool keeps going after a failed job");
}

// --- config -----------------------------------------------------------------

function testConfig() {
  const d = parseConfig({}, {});
  assert.strictEqual(d.max_concurrent, 5);
  assert.strictEqual(d.available_tools, undefined);
  assert.strictEqual(d.database, path.join("data", "context.db"));
  assert.strictEqual(d.agents_file, path.join("agents", "agents.yaml"));
  assert.strictEqual(d.debug, false);

  const o = parseConfig({ max_concurrent: 4, available_tools: ["search"] }, { SUBAGENT_MAX_CONCURRENT: "3", SUBAGENT_DEBUG: "1", SUBAGENT_DB: ":memory:" });
  assert.strictEqual(o.max_concurrent, 3, "env wins");
  assert.strictEqual(o.debug, true);
  assert.strictEqual(o.database, ":memory:");
  assert.deepStrictEqual(o.available_tools, ["search"]);

  assert.throws(
    () => parseConfig({ max_concurrent: 0 }, {}, "test.yaml"),
    (e: unknown) => e instanceof ConfigError && e.message === "Invalid config (test.yaml)" && !!e.details?.[0]?.startsWith("max_concurrent:")
  );
  assert.throws(() => parseConfig(["nope"], {}), ConfigError);
}

// --- tool definitions -------------------------------------------------------

function testToolDefinitions() {
  const o = openaiTool(SUBAGENT_TOOL);
  assert.strictEqual(o.type, "function");
  assert.strictEqual(o.function.name, "subagent");
  assert.strictEqual("strict" in o.function, false);
  assert.deepStrictEqual(o.function.parameters.properties.action.enum, ["list_agents", "define", "spawn", "status", "collect"]);
  assert.strictEqual(openaiTool(SUBAGENT_TOOL, { strict: true }).function.strict, true);

  const a = anthropicTool(CONTEXT_TOOL, { name: "memory" });
  assert.strictEqual(a.name, "memory");
  assert.deepStrictEqual(a.input_schema.required, ["action"]);
  a.input_schema.required.push("key");
  assert.deepStrictEqual(CONTEXT_TOOL.parameters.required, ["action"], "definitions are copies");
}

// --- shared context ---------------------------------------------------------

function testContextWriteRead() {
  const store = new SharedContextStore(openDb(":memory:"), "s1");
  const w1 = store.write("summary", "abcd", "orchestrator");
  assert.strictEqual(w1.version, 1);
  assert.strictEqual(w1.writtenBy, "orchestrator");
  assert.strictEqual(w1.warning, undefined);
  store.write("notes", "x".repeat(40), "subagent:researcher:t_01");
  const w2 = store.write("summary", "efgh", "subagent:writer:t_02");
  assert.strictEqual(w2.version, 2);

  const e = store.read("summary");
  assert.strictEqual(e.value, "efgh");
  assert.strictEqual(e.writtenBy, "subagent:writer:t_02");
  assert.strictEqual(e.version, 2);
  assert.strictEqual(e.valueSizeTokens, 1);

  const listed = store.listKeys();
  assert.deepStrictEqual(listed.keys.map((k) => k.key), ["summary", "notes"], "overwrite keeps position");
  assert.strictEqual(listed.totalSizeTokens, 11);
  assert.strictEqual("value" in listed.keys[0], false, "listing has no values");
}

function testContextLimits() {
  const store = new SharedContextStore(openDb(":memory:"), "limits");
  throwsCode(() => store.write("Bad-Key", "v"), "INVALID_KEY", "uppercase/hyphen key");
  throwsCode(() => store.write("", "v"), "INVALID_KEY", "empty key");
  throwsCode(() => store.read("k".repeat(65)), "INVALID_KEY", "long key");
  throwsCode(() => store.write("big", "x".repeat(4004)), "VALUE_TOO_LARGE", "1001 tokens");
  assert.strictEqual(store.write("under", "x".repeat(3199)).warning, undefined);
  assert.strictEqual(store.write("warn", "x".repeat(3200)).warning, "Value is ~800 tokens. Consider distilling further.");
  assert.strictEqual(store.listKeys().totalSizeTokens, 1599);
}

function testContextStoreFull() {
  const store = new SharedContextStore(openDb(":memory:"), "full");
  for (let i = 0; i < 10; i++) store.write(`k${i}`, "x".repeat(4000));
  assert.strictEqual(store.listKeys().totalSizeTokens, 10000);
  throwsCode(() => store.write("k10", "abcd"), "STORE_FULL", "over 10000 tokens");
  assert.strictEqual(store.write("k0", "y".repeat(4000)).version, 2, "overwrite counts old value out");
  store.delete("k9");
  assert.strictEqual(store.write("k10", "abcd").version, 1, "room after delete");
}

function testContextDeleteAndArchive() {
  const store = new SharedContextStore(openDb(":memory:"), "arch");
  store.write("a", "1");
  store.write("a", "2");
  assert.deepStrictEqual(store.delete("a"), { deleted: "a", previousVersion: 2 });
  throwsCode(() => store.delete("a"), "KEY_NOT_FOUND", "delete missing");
  throwsCode(() => store.read("a"), "KEY_NOT_FOUND", "read missing");
  store.write("b", "kept");
  store.archive();
  assert.strictEqual(store.archived, true);
  throwsCode(() => store.write("c", "x"), "SESSION_ARCHIVED", "archived is read-only");
  throwsCode(() => store.delete("b"), "SESSION_ARCHIVED", "archived delete");
  assert.strictEqual(store.read("b").value, "kept", "reads still work");
}

function testContextTool() {
  const store = new SharedContextStore(openDb(":memory:"), "tool");
  const bad = handleContextRequest(store, { action: "purge" });
  assert.deepStrictEqual(bad, { error: "INVALID_ACTION", message: "Unknown action: 'purge'. Valid: delete, list_keys, read, write" });

  const w = handleContextRequest(store, { action: "write", key: "finding", value: "cache miss", written_by: "forged" }, { participant: "subagent:r:t_01" });
  assert.ok("version" in w && w.version === 1);
  assert.strictEqual(store.read("finding").writtenBy, "subagent:r:t_01", "participant, not request, is the author");
  handleContextRequest(store, { action: "write", key: "anon", value: "v" });
  assert.strictEqual(store.read("anon").writtenBy, "unknown");

  const missing = handleContextRequest(store, { action: "read", key: "nope" });
  assert.deepStrictEqual(missing, { error: "KEY_NOT_FOUND", message: "Key not found: 'nope'" });
  const typed = handleContextRequest(store, { action: "read", key: 42 });
  assert.ok("error" in typed && typed.error === "INVALID_REQUEST");
  const list = handleContextRequest(store, { action: "list_keys" });
  assert.ok("keys" in list && list.keys.length === 2);
}

function testSessions() {
  const sm = new SessionManager(openDb(":memory:"));
  sm.create("beta");
  sm.create("alpha").write("k", "abcd");
  throwsCode(() => sm.create("alpha"), "SESSION_EXISTS", "duplicate session");
  throwsCode(() => sm.get("gamma"), "SESSION_NOT_FOUND", "unknown session");
  assert.deepStrictEqual(sm.list(), [
    { sessionId: "alpha", archived: false, keyCount: 1, totalSizeTokens: 1 },
    { sessionId: "beta", archived: false, keyCount: 0, totalSizeTokens: 0 },
  ]);
  sm.archive("beta");
  assert.strictEqual(sm.get("beta").archived, true);
  sm.delete("alpha");
  throwsCode(() => sm.get("alpha"), "SESSION_NOT_FOUND", "deleted session");
  throwsCode(() => sm.delete("alpha"), "SESSION_NOT_FOUND", "delete twice");
  sm.create("alpha");
  assert.strictEqual(sm.get("alpha").listKeys().keys.length, 0, "entries went with the session");
}

function testSessionPersistence() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "subagent-dispatch-"));
  const file = path.join(dir, "ctx.db");
  try {
    const db1 = openDb(file);
    new SessionManager(db1).create("persist").write("phase", "investigation", "orchestrator");
    db1.close();

    const db2 = openDb(file);
    const entry = new SessionManager(db2).get("persist").read("phase");
    assert.strictEqual(entry.value, "investigation");
    assert.strictEqual(entry.writtenBy, "orchestrator");
    db2.close();
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

async function main() {
  testTokenEstimate();
  testTruncation();
  testRegisterAndGet();
  testAgentNames();
  testDefineDefaultsAndClamp();
  testCapabilityStripping();
  testRegisterNormalizesConfig();
  testCapabilityAllowList();
  testPromptBoundary();
  testListOmitsInstructions();
  testTaskIds();
  testConcurrencyCeiling();
  testCollect();
  testTaskTransitionsOnce();
  testTaskResponses();
  await testPoolBounds();
  await testPoolQueueBoundAndClose();
  await testPoolReportsJobErrors();
  testConfig();
  testToolDefinitions();
  testContextWriteRead();
  testContextLimits();
  testContextStoreFull();
  testContextDeleteAndArchive();
  testContextTool();
  testSessions();
  testSessionPersistence();
  console.log("tests OK");
}

main().catch((e) => { console.error(e); process.exit(1); });
