#!/usr/bin/env tsx
// Quick preflight to ensure native deps (better-sqlite3) are built for this Node.
// If not, print a friendly hint and exit non-zero so `npm test` stops early.
import { errorMessage } from "../src/util/errors.js";

async function main() {
  try {
    const { openDb } = await import("../src/db.js");
    openDb(":memory:").close();
    console.log("pretest OK (SQLite module loaded)");
  } catch (e: unknown) {
    const msg = errorMessage(e);
    const stack = e instanceof Error ? String(e.stack) : "";
    const isAbi = /NODE_MODULE_VERSION|ERR_DLOPEN_FAILED|better-sqlite3/.test(msg + stack);
    console.error("Pretest failed to load SQLite.\n");
    if (isAbi) {
      console.error("It looks like better-sqlite3 needs a rebuild for your Node runtime.\n");
      console.error("Try:\n  npm rebuild better-sqlite3\n");
    } else {
      console.error(msg);
    }
    process.exit(1);
  }
}

void main();
