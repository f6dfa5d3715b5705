import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type Db = Database.Database;

export const DEFAULT_DB_PATH = path.join("data", "context.db");

// Opens (or creates) the shared context database. Pass ":memory:" for a throwaway store.
export function openDb(file: string = DEFAULT_DB_PATH): Db {
  if (file !== ":memory:") fs.mkdirSync(path.dirname(file), { recursive: true });
  const db = new Database(file);
  if (file !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  // schema (idempotent)
  db.exec(`
CREATE TABLE IF NOT EXISTS context_sessions (
  id TEXT PRIMARY KEY,
  created_at TEXT NOT NULL,
  archived INTEGER NOT NULL DEFAULT 0
);
CREATE TABLE IF NOT EXISTS context_entries (
  session_id TEXT NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  written_by TEXT NOT NULL,
  written_at TEXT NOT NULL,
  version INTEGER NOT NULL,
  seq INTEGER NOT NULL,          -- insertion order; an overwrite keeps its slot
  PRIMARY KEY (session_id, key),
  FOREIGN KEY(session_id) REFERENCES context_sessions(id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS entries_session_seq ON context_entries(session_id, seq);
`);
  return db;
}
