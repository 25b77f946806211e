#!/usr/bin/env node
import { CommanderError } from "commander";

import { startServer } from "@panelkit/server-sqlite-node";

import { parseServerCliArgs } from "./args.js";
import { Basket, SimpleApp, basketPage } from "./panels.js";

async function main() {
  const args = parseServerCliArgs();
  const handle = await startServer({
    root: SimpleApp,
    panels: [Basket],
    page: basketPage,
    host: args.host,
    port: args.port,
    dbDir: args.dbDir,
    maxIdleMs: args.maxIdleMs,
    maxBodyBytes: args.maxBodyBytes,
    debug: args.debug,
  });
  console.log(`panelkit basket demo listening on http://${handle.host}:${handle.port}/`);
  console.log(`- health: http://${handle.host}:${handle.port}/health`);
  console.log(`- sessions: ${handle.dbPath}`);

  const shutdown = () => {
    handle.close().catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});
