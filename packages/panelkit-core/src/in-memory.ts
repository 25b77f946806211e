import type { PersistenceStore, SessionId, SessionLoadResult, SessionRecord } from "@panelkit/interface";
import { StoreError } from "@panelkit/interface/errors";

import { createSessionLocks, generateSessionId } from "./locks.js";

export type InMemorySessionStoreOptions = {
  /** Records idle for longer than this load as expired. Unlimited by default. */
  maxIdleMs?: number;
  now?: () => number;
  generateId?: () => SessionId;
};

export type InMemorySessionStore = PersistenceStore & {
  readonly size: number;
  get: (sessionId: SessionId) => SessionRecord | undefined;
};

function copyRecord(record: SessionRecord): SessionRecord {
  return { ...record, tree: record.tree ? record.tree.slice() : null };
}

export function createInMemorySessionStore(opts: InMemorySessionStoreOptions = {}): InMemorySessionStore {
  const maxIdleMs = Number(opts.maxIdleMs ?? Number.POSITIVE_INFINITY);
  if (Number.isNaN(maxIdleMs) || maxIdleMs <= 0) throw new Error(`invalid maxIdleMs: ${opts.maxIdleMs}`);
  const now = opts.now ?? Date.now;
  const generateId = opts.generateId ?? generateSessionId;

  const records = new Map<SessionId, SessionRecord>();
  const locks = createSessionLocks();

  return {
    get size() {
      return records.size;
    },
    get: (sessionId) => {
      const record = records.get(sessionId);
      return record ? copyRecord(record) : undefined;
    },
    create: () => {
      const sessionId = generateId();
      if (records.has(sessionId)) throw new StoreError(`session id collision: ${sessionId}`);
      const ts = now();
      const record: SessionRecord = { sessionId, tree: null, expired: false, createdAt: ts, updatedAt: ts };
      records.set(sessionId, record);
      return copyRecord(record);
    },
    load: (sessionId): SessionLoadResult => {
      const record = records.get(sessionId);
      if (!record) return { status: "missing" };
      if (!record.expired && now() - record.updatedAt > maxIdleMs) record.expired = true;
      if (record.expired) return { status: "expired" };
      return { status: "found", record: copyRecord(record) };
    },
    save: (sessionId, record) => {
      if (record.sessionId !== sessionId) {
        throw new StoreError(`record for ${record.sessionId} cannot be saved as ${sessionId}`);
      }
      records.set(sessionId, { ...copyRecord(record), updatedAt: now() });
    },
    markExpired: (sessionId) => {
      const record = records.get(sessionId);
      if (record) record.expired = true;
    },
    acquire: (sessionId) => locks.acquire(sessionId),
  };
}
