#!/usr/bin/env tsx
import { loadAgentsFile } from "../src/subagents/registry.js";
import { estimateTokens } from "../src/util/tokens.js";
import { loadConfig } from "../src/config.js";

function assert(cond: unknown, msg: string) { if (!cond) throw new Error(`Assertion failed: ${msg}`); }

// Token heuristic
assert(estimateTokens("") === 1, "empty text counts as one token");
assert(estimateTokens("abcdefgh") === 2, "eight chars are two tokens");

// Shipped agents file and config load
const agents = loadAgentsFile("agents/agents.yaml");
assert(agents.length >= 1 && agents.some((a) => a.name === "researcher"), "agents.yaml loaded");
const cfg = loadConfig("config/dispatch.yaml", {});
assert(cfg.max_concurrent === 5, "dispatch.yaml loaded");

console.log("sanity OK");
