import path from "node:path";

import { Command, InvalidArgumentError, Option } from "commander";

export type ServerCliArgs = {
  host: string;
  port: number;
  dbDir: string;
  maxIdleMs: number;
  maxBodyBytes: number;
  debug: boolean;
};

function numberArg(flag: string, opts: { allowZero?: boolean } = {}) {
  return (raw: string): number => {
    const n = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(n) || n < 0 || (n === 0 && !opts.allowZero)) {
      throw new InvalidArgumentError(`invalid ${flag} value: ${raw}`);
    }
    return n;
  };
}

/** Flags win over their environment variables, which win over the defaults. */
export function parseServerCliArgs(opts: { argv?: string[]; cwd?: string } = {}): ServerCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const cwd = opts.cwd ?? process.cwd();

  const program = new Command()
    .name("panelkit-basket")
    .description("Serve the basket demo application.")
    .exitOverride()
    .addOption(new Option("--host <host>", "interface to listen on").env("HOST").default("0.0.0.0"))
    .addOption(
      new Option("--port <n>", "port to listen on (0 picks a free one)")
        .env("PORT")
        .argParser(numberArg("--port", { allowZero: true }))
        .default(8080)
    )
    .addOption(
      new Option("--db-dir <dir>", "directory holding sessions.sqlite3").env("PANELKIT_DB_DIR").default("data")
    )
    .addOption(
      new Option("--max-idle-ms <ms>", "idle time after which a session expires")
        .env("PANELKIT_MAX_IDLE_MS")
        .argParser(numberArg("--max-idle-ms"))
        .default(30 * 60 * 1000)
    )
    .addOption(
      new Option("--max-body-bytes <n>", "largest accepted request body")
        .env("PANELKIT_MAX_BODY_BYTES")
        .argParser(numberArg("--max-body-bytes"))
        .default(1024 * 1024)
    )
    .addOption(new Option("--debug", "log every cycle stage").env("PANELKIT_DEBUG"));

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    host: string;
    port: number;
    dbDir: string;
    maxIdleMs: number;
    maxBodyBytes: number;
    debug?: boolean;
  }>();

  return {
    host: parsed.host,
    port: parsed.port,
    dbDir: path.resolve(cwd, parsed.dbDir),
    maxIdleMs: parsed.maxIdleMs,
    maxBodyBytes: parsed.maxBodyBytes,
    debug: parsed.debug === true,
  };
}
