import fs from "node:fs/promises";
import path from "node:path";

import { type CycleControllerOptions, type PanelClass, createCycleController } from "@panelkit/core";
import { startPanelServer } from "@panelkit/server-core";
import { createSqliteSessionStore } from "@panelkit/sqlite-node";

export type ServerOptions = {
  root: PanelClass;
  panels?: readonly PanelClass[];
  page?: CycleControllerOptions["page"];
  host?: string;
  port?: number;
  dbDir?: string;
  maxIdleMs?: number;
  maxBodyBytes?: number;
  debug?: boolean;
};

export type ServerHandle = {
  host: string;
  port: number;
  dbPath: string;
  close: () => Promise<void>;
};

export async function startServer(opts: ServerOptions): Promise<ServerHandle> {
  const dbDir = path.resolve(opts.dbDir ?? path.join(process.cwd(), "data"));
  const maxIdleMs = Number(opts.maxIdleMs ?? 30 * 60 * 1000);
  if (!Number.isFinite(maxIdleMs) || maxIdleMs <= 0) throw new Error(`invalid maxIdleMs: ${opts.maxIdleMs}`);

  await fs.mkdir(dbDir, { recursive: true });
  const dbPath = path.join(dbDir, "sessions.sqlite3");
  const store = createSqliteSessionStore({ path: dbPath, maxIdleMs });

  try {
    const controller = createCycleController({
      store,
      root: opts.root,
      panels: opts.panels,
      page: opts.page,
      debug: opts.debug,
    });

    const server = await startPanelServer({
      host: opts.host,
      port: opts.port,
      maxBodyBytes: opts.maxBodyBytes,
      controller,
      onCycleError: (err, ctx) => {
        console.error("panel cycle failed", {
          sessionId: ctx.sessionId,
          method: ctx.method,
          path: ctx.path,
          err,
        });
      },
    });

    return {
      host: server.host,
      port: server.port,
      dbPath,
      close: async () => {
        await server.close();
        store.close();
      },
    };
  } catch (err) {
    store.close();
    throw err;
  }
}
