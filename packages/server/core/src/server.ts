import http from "node:http";

import type { CycleController } from "@panelkit/core";
import { SESSION_PARAM } from "@panelkit/interface/events";

export type PanelCycleErrorContext = {
  method: string;
  path: string;
  sessionId: string | null;
};

export type PanelServerOptions = {
  host?: string;
  port?: number;
  /** Path the panel page is served from. */
  path?: string;
  healthPath?: string;
  maxBodyBytes?: number;
  controller: CycleController;
  onCycleError?: (err: unknown, ctx: PanelCycleErrorContext) => void;
};

export type PanelServerHandle = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

class PayloadTooLargeError extends Error {}

class UnsupportedMediaTypeError extends Error {}

function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        reject(new PayloadTooLargeError(`request body exceeds ${maxBytes} bytes`));
        req.resume();
        return;
      }
      chunks.push(chunk);
    });
    req.once("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.once("error", reject);
  });
}

/**
 * Form body parameters come first, then the query string, so that a posted
 * field wins over a query parameter of the same name.
 */
export async function readRequestParams(req: http.IncomingMessage, url: URL, maxBodyBytes: number): Promise<URLSearchParams> {
  const params = new URLSearchParams();
  if (req.method === "POST") {
    const contentType = (req.headers["content-type"] ?? "").split(";")[0].trim().toLowerCase();
    if (contentType !== FORM_CONTENT_TYPE && contentType !== "") {
      req.resume();
      throw new UnsupportedMediaTypeError(`unsupported content type: ${contentType}`);
    }
    const body = await readBody(req, maxBodyBytes);
    for (const [name, value] of new URLSearchParams(body)) params.append(name, value);
  }
  for (const [name, value] of url.searchParams) params.append(name, value);
  return params;
}

function sendText(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "content-type": "text/plain" });
  res.end(body);
}

export async function startPanelServer(opts: PanelServerOptions): Promise<PanelServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8080);
  const pagePath = opts.path ?? "/";
  const healthPath = opts.healthPath ?? "/health";
  const maxBodyBytes = Number(opts.maxBodyBytes ?? 1024 * 1024);
  const { controller } = opts;
  const onCycleError =
    opts.onCycleError ??
    ((err: unknown, ctx: PanelCycleErrorContext) => {
      console.error("panel cycle failed", { ...ctx, err });
    });

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!pagePath.startsWith("/")) throw new Error(`path must start with "/": ${pagePath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (!Number.isFinite(maxBodyBytes) || maxBodyBytes <= 0) {
    throw new Error(`invalid maxBodyBytes: ${opts.maxBodyBytes}`);
  }

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === healthPath) {
      sendText(res, 200, "ok");
      return;
    }
    if (url.pathname !== pagePath) {
      sendText(res, 404, "not found");
      return;
    }
    const method = req.method ?? "GET";
    if (method !== "GET" && method !== "POST") {
      res.setHeader("allow", "GET, POST");
      sendText(res, 405, "method not allowed");
      return;
    }

    let params: URLSearchParams;
    try {
      params = await readRequestParams(req, url, maxBodyBytes);
    } catch (err) {
      if (err instanceof UnsupportedMediaTypeError) {
        sendText(res, 415, "unsupported media type");
        return;
      }
      if (!(err instanceof PayloadTooLargeError)) throw err;
      res.setHeader("connection", "close");
      sendText(res, 413, "payload too large");
      return;
    }

    try {
      const result = await controller.cycle(params);
      res.writeHead(200, { "content-type": "text/html; charset=utf-8", "cache-control": "no-store" });
      res.end(result.markup);
    } catch (err) {
      try {
        onCycleError(err, { method, path: url.pathname, sessionId: params.get(SESSION_PARAM) });
      } catch (callbackErr) {
        console.error("onCycleError callback failed", callbackErr);
      }
      sendText(res, 500, "cycle failed");
    }
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error("panel request failed", { url: req.url, err });
      if (!res.headersSent) sendText(res, 500, "internal error");
      else res.destroy();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  };

  return { host, port: actualPort, close };
}
