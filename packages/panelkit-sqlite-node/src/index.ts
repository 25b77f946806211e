import Database from "better-sqlite3";

import type { PersistenceStore, SessionId, SessionLoadResult, SessionRecord } from "@panelkit/interface";
import { StoreError } from "@panelkit/interface/errors";
import { createSessionLocks, generateSessionId } from "@panelkit/core";

export type SqliteSessionStoreOptions = {
  /** An open database. The store does not close it. */
  db?: Database.Database;
  /** Opened (WAL mode) and owned by the store when `db` is not given. */
  path?: string;
  /** Records idle for longer than this load as expired. Unlimited by default. */
  maxIdleMs?: number;
  now?: () => number;
  generateId?: () => SessionId;
};

export type SqliteSessionStore = PersistenceStore & {
  readonly db: Database.Database;
  close: () => void;
};

type SessionRow = {
  session_id: string;
  // Column affinity does not stop other value types from being stored.
  tree: Buffer | string | number | null;
  expired: number;
  created_at: number;
  updated_at: number;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS panel_sessions (
  session_id TEXT PRIMARY KEY,
  tree BLOB,
  expired INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
)`;

function rowToRecord(row: SessionRow, tree: Buffer | null): SessionRecord {
  return {
    sessionId: row.session_id,
    tree: tree ? new Uint8Array(tree) : null,
    expired: row.expired !== 0,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function openDatabase(opts: SqliteSessionStoreOptions): { db: Database.Database; owned: boolean } {
  if (opts.db) return { db: opts.db, owned: false };
  if (!opts.path) throw new Error("createSqliteSessionStore needs either db or path");
  const db = new Database(opts.path);
  db.pragma("journal_mode = WAL");
  return { db, owned: true };
}

export function createSqliteSessionStore(opts: SqliteSessionStoreOptions): SqliteSessionStore {
  const maxIdleMs = Number(opts.maxIdleMs ?? Number.POSITIVE_INFINITY);
  if (Number.isNaN(maxIdleMs) || maxIdleMs <= 0) throw new Error(`invalid maxIdleMs: ${opts.maxIdleMs}`);
  const now = opts.now ?? Date.now;
  const generateId = opts.generateId ?? generateSessionId;

  const { db, owned } = openDatabase(opts);
  db.exec(SCHEMA);

  const insert = db.prepare<[string, number, number]>(
    `INSERT INTO panel_sessions (session_id, tree, expired, created_at, updated_at)
     VALUES (?, NULL, 0, ?, ?)
     ON CONFLICT (session_id) DO NOTHING`
  );
  const select = db.prepare<[string], SessionRow>(
    "SELECT session_id, tree, expired, created_at, updated_at FROM panel_sessions WHERE session_id = ?"
  );
  const upsert = db.prepare<[string, Buffer | null, number, number, number]>(
    `INSERT INTO panel_sessions (session_id, tree, expired, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT (session_id) DO UPDATE SET
       tree = excluded.tree,
       expired = excluded.expired,
       updated_at = excluded.updated_at`
  );
  const expire = db.prepare<[string]>("UPDATE panel_sessions SET expired = 1 WHERE session_id = ?");

  const locks = createSessionLocks();

  const backend = <T>(what: string, fn: () => T): T => {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new StoreError(`${what} failed: ${detail}`, { cause: err });
    }
  };

  return {
    db,
    create: () =>
      backend<SessionRecord>("create", () => {
        const sessionId = generateId();
        const ts = now();
        if (insert.run(sessionId, ts, ts).changes === 0) throw new StoreError(`session id collision: ${sessionId}`);
        return { sessionId, tree: null, expired: false, createdAt: ts, updatedAt: ts };
      }),
    load: (sessionId) =>
      backend<SessionLoadResult>("load", () => {
        const row = select.get(sessionId);
        if (!row) return { status: "missing" };
        if (row.expired !== 0) return { status: "expired" };
        if (now() - row.updated_at > maxIdleMs) {
          expire.run(sessionId);
          return { status: "expired" };
        }
        const { tree } = row;
        if (tree !== null && !Buffer.isBuffer(tree)) {
          return { status: "corrupt", reason: `tree column holds a ${typeof tree}, not a blob` };
        }
        return { status: "found", record: rowToRecord(row, tree) };
      }),
    save: (sessionId, record) =>
      backend("save", () => {
        if (record.sessionId !== sessionId) {
          throw new StoreError(`record for ${record.sessionId} cannot be saved as ${sessionId}`);
        }
        const tree = record.tree ? Buffer.from(record.tree) : null;
        upsert.run(sessionId, tree, record.expired ? 1 : 0, record.createdAt, now());
      }),
    markExpired: (sessionId) =>
      backend("markExpired", () => {
        expire.run(sessionId);
      }),
    acquire: (sessionId) => locks.acquire(sessionId),
    close: () => {
      if (owned && db.open) db.close();
    },
  };
}
