#!/usr/bin/env tsx
import fs from "node:fs";
import { loadConfig } from "../src/config.js";
import { errorMessage } from "../src/util/errors.js";

try {
  const dbPath = loadConfig().database;
  const files = [dbPath, `${dbPath}-wal`, `${dbPath}-shm`].filter((f) => fs.existsSync(f));
  if (files.length) {
    files.forEach((f) => fs.rmSync(f));
    console.log(`Removed ${files.join(", ")}`);
  } else {
    console.log(`No DB at ${dbPath}`);
  }
} catch (e: unknown) {
  console.error(errorMessage(e));
  process.exit(1);
}
console.log("db:reset done");
