import { expect, test } from "vitest";

import { createSessionLocks, generateSessionId } from "../src/index.js";

test("leases on one session are granted in request order", async () => {
  const locks = createSessionLocks();
  const order: string[] = [];

  const first = await locks.acquire("s1");
  const second = locks.acquire("s1").then((lease) => {
    order.push("second");
    return lease;
  });

  await Promise.resolve();
  order.push("first done");
  expect(locks.isHeld("s1")).toBe(true);
  first.release();

  const lease = await second;
  expect(order).toEqual(["first done", "second"]);
  lease.release();
  expect(locks.isHeld("s1")).toBe(false);
});

test("different sessions do not wait on each other", async () => {
  const locks = createSessionLocks();
  const a = await locks.acquire("a");
  const b = await locks.acquire("b");
  expect(locks.isHeld("a")).toBe(true);
  expect(locks.isHeld("b")).toBe(true);
  b.release();
  a.release();
});

test("releasing twice does not free a later holder", async () => {
  const locks = createSessionLocks();
  const first = await locks.acquire("s1");
  first.release();
  const second = await locks.acquire("s1");
  first.release();
  expect(locks.isHeld("s1")).toBe(true);
  second.release();
  expect(locks.isHeld("s1")).toBe(false);
});

test("generated session ids are 32 hex characters and distinct", () => {
  const a = generateSessionId();
  expect(a).toMatch(/^[0-9a-f]{32}$/);
  expect(generateSessionId()).not.toBe(a);
});
