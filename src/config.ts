import fs from "node:fs";
import path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { DEFAULT_DB_PATH } from "./db.js";
import { DEFAULT_MAX_CONCURRENT } from "./subagents/types.js";
import { ConfigError, errorMessage, formatIssues } from "./util/errors.js";

export const DEFAULT_CONFIG_FILE = path.join("config", "dispatch.yaml");

const ConfigSchema = z.object({
  max_concurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
  available_tools: z.array(z.string()).optional(),
  database: z.string().default(DEFAULT_DB_PATH),
  agents_file: z.string().default(path.join("agents", "agents.yaml")),
  debug: z.boolean().default(false),
});

export type DispatchConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

// Env wins over the file: SUBAGENT_MAX_CONCURRENT, SUBAGENT_DB, SUBAGENT_AGENTS_FILE, SUBAGENT_DEBUG=1
function applyEnv(obj: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out = { ...obj };
  if (env.SUBAGENT_MAX_CONCURRENT) out.max_concurrent = Number(env.SUBAGENT_MAX_CONCURRENT);
  if (env.SUBAGENT_DB) out.database = env.SUBAGENT_DB;
  if (env.SUBAGENT_AGENTS_FILE) out.agents_file = env.SUBAGENT_AGENTS_FILE;
  if (env.SUBAGENT_DEBUG) out.debug = env.SUBAGENT_DEBUG === "1";
  return out;
}

export function parseConfig(obj: unknown, env: Env = {}, source = "config"): DispatchConfig {
  const base = obj ?? {};
  if (typeof base !== "object" || Array.isArray(base)) {
    throw new ConfigError(`Invalid config (${source})`, ["root: expected a mapping"]);
  }
  const parsed = ConfigSchema.safeParse(applyEnv({ ...base }, env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid config (${source})`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function loadConfig(file: string = DEFAULT_CONFIG_FILE, env: Env = process.env): DispatchConfig {
  if (!fs.existsSync(file)) return parseConfig({}, env, file);
  let obj: unknown;
  try {
    obj = yaml.parse(fs.readFileSync(file, "utf8"));
  } catch (e: unknown) {
    throw new ConfigError(`Failed to read config '${file}': ${errorMessage(e)}`);
  }
  return parseConfig(obj, env, file);
}
