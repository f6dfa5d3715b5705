import type { Db } from "../db.js";
import {
  InvalidKeyError,
  KeyNotFoundError,
  SessionArchivedError,
  StoreFullError,
  ValueTooLargeError,
} from "../util/errors.js";
import { estimateTokens } from "../util/tokens.js";

const KEY_PATTERN = /^[a-z0-9_]+$/;
const MAX_KEY_LENGTH = 64;
export const MAX_VALUE_TOKENS = 1000;
export const WARN_VALUE_TOKENS = 800;
export const MAX_STORE_TOKENS = 10_000;

type EntryRow = {
  key: string;
  value: string;
  written_by: string;
  written_at: string;
  version: number;
};

export type EntryMeta = {
  key: string;
  writtenBy: string;
  writtenAt: string;
  version: number;
  valueSizeTokens: number;
};

export type Entry = EntryMeta & { value: string };

export type WriteResult = {
  key: string;
  version: number;
  writtenBy: string;
  writtenAt: string;
  warning?: string;
};

export function validateKey(key: string) {
  if (!key || key.length > MAX_KEY_LENGTH) {
    throw new InvalidKeyError(`Key must be 1-${MAX_KEY_LENGTH} characters, got ${key.length}.`);
  }
  if (!KEY_PATTERN.test(key)) {
    throw new InvalidKeyError(`Key must match [a-z0-9_]+, got: '${key}'`);
  }
}

function toMeta(row: EntryRow): EntryMeta {
  return {
    key: row.key,
    writtenBy: row.written_by,
    writtenAt: row.written_at,
    version: row.version,
    valueSizeTokens: estimateTokens(row.value),
  };
}

/**
 * Versioned key-value working memory for one session, persisted in SQLite.
 * Writes are attributed to the participant passed in by the caller.
 */
export class SharedContextStore {
  readonly sessionId: string;
  private readonly db: Db;

  constructor(db: Db, sessionId: string) {
    this.db = db;
    this.sessionId = sessionId;
    db.prepare<[string, string]>(`INSERT OR IGNORE INTO context_sessions(id, created_at) VALUES(?, ?)`).run(
      sessionId,
      new Date().toISOString()
    );
  }

  get archived(): boolean {
    const row = this.db
      .prepare<[string], { archived: number }>(`SELECT archived FROM context_sessions WHERE id=?`)
      .get(this.sessionId);
    return !!row?.archived;
  }

  archive() {
    this.db.prepare<[string]>(`UPDATE context_sessions SET archived=1 WHERE id=?`).run(this.sessionId);
  }

  listKeys(): { keys: EntryMeta[]; totalSizeTokens: number } {
    const keys = this.rows().map(toMeta);
    return { keys, totalSizeTokens: keys.reduce((sum, k) => sum + k.valueSizeTokens, 0) };
  }

  read(key: string): Entry {
    validateKey(key);
    const row = this.row(key);
    if (!row) throw new KeyNotFoundError(`Key not found: '${key}'`);
    return { ...toMeta(row), value: row.value };
  }

  write(key: string, value: string, writtenBy = "unknown"): WriteResult {
    this.checkWritable();
    validateKey(key);

    const valueTokens = estimateTokens(value);
    if (valueTokens > MAX_VALUE_TOKENS) {
      throw new ValueTooLargeError(`Value is ~${valueTokens} tokens, max is ${MAX_VALUE_TOKENS}.`);
    }

    return this.db.transaction((): WriteResult => {
      const existing = this.row(key);
      const oldTokens = existing ? estimateTokens(existing.value) : 0;
      const version = existing ? existing.version + 1 : 1;
      const currentTotal = this.listKeys().totalSizeTokens;
      const newTotal = currentTotal - oldTokens + valueTokens;
      if (newTotal > MAX_STORE_TOKENS) {
        throw new StoreFullError(`Write would bring store to ~${newTotal} tokens, max is ${MAX_STORE_TOKENS}.`);
      }

      const writtenAt = new Date().toISOString();
      if (existing) {
        this.db
          .prepare<[string, string, string, number, string, string]>(
            `UPDATE context_entries SET value=?, written_by=?, written_at=?, version=? WHERE session_id=? AND key=?`
          )
          .run(value, writtenBy, writtenAt, version, this.sessionId, key);
      } else {
        this.db
          .prepare<[string, string, string, string, string, number, string]>(
            `INSERT INTO context_entries(session_id, key, value, written_by, written_at, version, seq)
             VALUES(?,?,?,?,?,?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM context_entries WHERE session_id=?))`
          )
          .run(this.sessionId, key, value, writtenBy, writtenAt, version, this.sessionId);
      }

      const result: WriteResult = { key, version, writtenBy, writtenAt };
      if (valueTokens >= WARN_VALUE_TOKENS) {
        result.warning = `Value is ~${valueTokens} tokens. Consider distilling further.`;
      }
      return result;
    })();
  }

  delete(key: string): { deleted: string; previousVersion: number } {
    this.checkWritable();
    validateKey(key);
    const row = this.row(key);
    if (!row) throw new KeyNotFoundError(`Key not found: '${key}'`);
    this.db.prepare<[string, string]>(`DELETE FROM context_entries WHERE session_id=? AND key=?`).run(this.sessionId, key);
    return { deleted: key, previousVersion: row.version };
  }

  private checkWritable() {
    if (this.archived) {
      throw new SessionArchivedError(`Session '${this.sessionId}' is archived (read-only).`);
    }
  }

  private row(key: string): EntryRow | undefined {
    return this.db
      .prepare<[string, string], EntryRow>(
        `SELECT key, value, written_by, written_at, version FROM context_entries WHERE session_id=? AND key=?`
      )
      .get(this.sessionId, key);
  }

  private rows(): EntryRow[] {
    return this.db
      .prepare<[string], EntryRow>(
        `SELECT key, value, written_by, written_at, version FROM context_entries WHERE session_id=? ORDER BY seq`
      )
      .all(this.sessionId);
  }
}
