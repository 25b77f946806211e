import { expect, test } from "vitest";

import { UnknownPanelError } from "@panelkit/interface/errors";

import { IdentityRegistry, parsePanelId } from "../src/index.js";

test("register hands out consecutive ids", () => {
  const registry = new IdentityRegistry<string>();
  expect(registry.register("a")).toBe(0);
  expect(registry.register("b")).toBe(1);
  expect(registry.resolve(1)).toBe("b");
  expect(registry.resolve("0")).toBe("a");
});

test("released ids stay empty and are not handed out again", () => {
  const registry = new IdentityRegistry<string>(["a", "b"]);
  registry.release(0);
  expect(() => registry.resolve(0)).toThrow(UnknownPanelError);
  expect(registry.register("c")).toBe(2);
  expect(registry.map((entry) => entry.toUpperCase())).toEqual([null, "B", "C"]);
});

test("resolve rejects out-of-range and non-canonical ids", () => {
  const registry = new IdentityRegistry<string>(["a"]);
  for (const id of [1, -1, 0.5, "1", "x", "", "00", " 0"]) {
    expect(() => registry.resolve(id)).toThrow(UnknownPanelError);
  }
});

test("parsePanelId accepts canonical decimal integers only", () => {
  expect(parsePanelId("0")).toBe(0);
  expect(parsePanelId("42")).toBe(42);
  expect(parsePanelId("042")).toBeNull();
  expect(parsePanelId("4.2")).toBeNull();
  expect(parsePanelId("99999999999999999999")).toBeNull();
});
