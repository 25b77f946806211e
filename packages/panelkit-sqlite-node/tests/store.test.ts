import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import Database from "better-sqlite3";
import { expect, test } from "vitest";

import { StoreError } from "@panelkit/interface/errors";

import { createSqliteSessionStore } from "../src/index.js";

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `s${next}`;
  };
}

test("records survive closing and reopening the database", async () => {
  const dir = mkdtempSync(join(tmpdir(), "panelkit-sqlite-"));
  const path = join(dir, "sessions.sqlite3");

  try {
    {
      const store = createSqliteSessionStore({ path, generateId: sequentialIds(), now: () => 10 });
      const record = await store.create();
      expect(record).toEqual({ sessionId: "s1", tree: null, expired: false, createdAt: 10, updatedAt: 10 });
      await store.save("s1", { ...record, tree: new Uint8Array([7, 8, 9]) });
      store.close();
    }

    {
      const store = createSqliteSessionStore({ path, now: () => 20 });
      expect(await store.load("s1")).toEqual({
        status: "found",
        record: { sessionId: "s1", tree: new Uint8Array([7, 8, 9]), expired: false, createdAt: 10, updatedAt: 10 },
      });
      expect(await store.load("nope")).toEqual({ status: "missing" });
      store.close();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("expired and idle sessions load as expired", async () => {
  const db = new Database(":memory:");
  let clock = 0;
  const store = createSqliteSessionStore({ db, generateId: sequentialIds(), maxIdleMs: 50, now: () => clock });
  try {
    await store.create();
    await store.create();
    await store.markExpired("s1");
    expect(await store.load("s1")).toEqual({ status: "expired" });

    clock = 50;
    expect((await store.load("s2")).status).toBe("found");
    clock = 51;
    expect(await store.load("s2")).toEqual({ status: "expired" });
    clock = 0;
    expect(await store.load("s2")).toEqual({ status: "expired" });
  } finally {
    db.close();
  }
});

test("id collisions and mismatched saves are store errors", async () => {
  const db = new Database(":memory:");
  const store = createSqliteSessionStore({ db, generateId: () => "same" });
  try {
    const record = await store.create();
    expect(() => store.create()).toThrow("session id collision: same");
    expect(() => store.save("other", record)).toThrow(StoreError);
  } finally {
    db.close();
  }
});

test("backend failures are wrapped in store errors", async () => {
  const db = new Database(":memory:");
  const store = createSqliteSessionStore({ db });
  db.close();
  expect(() => store.load("s1")).toThrow(StoreError);
  expect(() => store.load("s1")).toThrow(/^load failed: /);
});

test("a caller-supplied database is left open by close", () => {
  const db = new Database(":memory:");
  const store = createSqliteSessionStore({ db });
  store.close();
  expect(db.open).toBe(true);
  db.close();
});

test("a tree column that is not a blob loads as corrupt", async () => {
  const db = new Database(":memory:");
  const store = createSqliteSessionStore({ db, generateId: sequentialIds() });
  try {
    await store.create();
    db.prepare("UPDATE panel_sessions SET tree = 'not cbor' WHERE session_id = 's1'").run();
    expect(await store.load("s1")).toEqual({ status: "corrupt", reason: "tree column holds a string, not a blob" });
  } finally {
    db.close();
  }
});
