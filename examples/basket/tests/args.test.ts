import path from "node:path";

import { afterEach, beforeEach, expect, test, vi } from "vitest";

import { parseServerCliArgs } from "../src/index.js";

const ENV_VARS = ["HOST", "PORT", "PANELKIT_DB_DIR", "PANELKIT_MAX_IDLE_MS", "PANELKIT_MAX_BODY_BYTES", "PANELKIT_DEBUG"];

function setEnv(name: string, value: string) {
  process.env[name] = value;
}

const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const name of ENV_VARS) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
});

afterEach(() => {
  for (const [name, value] of saved) {
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  }
  vi.restoreAllMocks();
});

test("defaults", () => {
  expect(parseServerCliArgs({ argv: [], cwd: "/srv/app" })).toEqual({
    host: "0.0.0.0",
    port: 8080,
    dbDir: path.resolve("/srv/app", "data"),
    maxIdleMs: 1_800_000,
    maxBodyBytes: 1_048_576,
    debug: false,
  });
});

test("environment variables override the defaults", () => {
  setEnv("HOST", "127.0.0.1");
  setEnv("PORT", "9000");
  setEnv("PANELKIT_DB_DIR", "/var/lib/panelkit");
  setEnv("PANELKIT_MAX_IDLE_MS", "60000");
  setEnv("PANELKIT_DEBUG", "1");

  expect(parseServerCliArgs({ argv: [], cwd: "/srv/app" })).toEqual({
    host: "127.0.0.1",
    port: 9000,
    dbDir: path.resolve("/var/lib/panelkit"),
    maxIdleMs: 60_000,
    maxBodyBytes: 1_048_576,
    debug: true,
  });
});

test("flags override environment variables", () => {
  setEnv("PORT", "9000");

  const args = parseServerCliArgs({ argv: ["--port", "0", "--db-dir", "sessions", "--debug"], cwd: "/srv/app" });
  expect(args.port).toBe(0);
  expect(args.dbDir).toBe(path.resolve("/srv/app", "sessions"));
  expect(args.debug).toBe(true);
});

test("invalid numbers are rejected", () => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  expect(() => parseServerCliArgs({ argv: ["--max-idle-ms", "0"] })).toThrow("invalid --max-idle-ms value: 0");
  expect(() => parseServerCliArgs({ argv: ["--port", "abc"] })).toThrow("invalid --port value: abc");
  vi.restoreAllMocks();
});
