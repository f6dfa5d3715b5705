import type { Db } from "../db.js";
import { SessionExistsError, SessionNotFoundError } from "../util/errors.js";
import { SharedContextStore } from "./store.js";

export type SessionInfo = {
  sessionId: string;
  archived: boolean;
  keyCount: number;
  totalSizeTokens: number;
};

export class SessionManager {
  private readonly db: Db;
  private readonly cache = new Map<string, SharedContextStore>();

  constructor(db: Db) {
    this.db = db;
  }

  create(sessionId: string): SharedContextStore {
    if (this.exists(sessionId)) throw new SessionExistsError(`Session '${sessionId}' already exists.`);
    const store = new SharedContextStore(this.db, sessionId);
    this.cache.set(sessionId, store);
    return store;
  }

  get(sessionId: string): SharedContextStore {
    const cached = this.cache.get(sessionId);
    if (cached) return cached;
    if (!this.exists(sessionId)) throw new SessionNotFoundError(`Session '${sessionId}' not found.`);
    const store = new SharedContextStore(this.db, sessionId);
    this.cache.set(sessionId, store);
    return store;
  }

  archive(sessionId: string) {
    this.get(sessionId).archive();
  }

  delete(sessionId: string) {
    if (!this.exists(sessionId)) throw new SessionNotFoundError(`Session '${sessionId}' not found.`);
    this.db.transaction(() => {
      this.db.prepare<[string]>(`DELETE FROM context_entries WHERE session_id=?`).run(sessionId);
      this.db.prepare<[string]>(`DELETE FROM context_sessions WHERE id=?`).run(sessionId);
    })();
    this.cache.delete(sessionId);
  }

  list(): SessionInfo[] {
    const ids = this.db.prepare<[], { id: string }>(`SELECT id FROM context_sessions ORDER BY id`).all();
    return ids.map(({ id }) => {
      const store = this.get(id);
      const { keys, totalSizeTokens } = store.listKeys();
      return { sessionId: id, archived: store.archived, keyCount: keys.length, totalSizeTokens };
    });
  }

  private exists(sessionId: string): boolean {
    return !!this.db.prepare<[string], { id: string }>(`SELECT id FROM context_sessions WHERE id=?`).get(sessionId);
  }
}
