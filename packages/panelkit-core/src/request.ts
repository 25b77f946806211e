import type { EventDescriptor, RawParams, SessionId } from "@panelkit/interface";
import { LINK_PARAM, SESSION_PARAM, buttonTokenFromParam, decodeEventToken } from "@panelkit/interface/events";
import { rawParamEntries } from "@panelkit/interface/names";

export type EventSource = "button" | "link";

export type RequestContext = {
  /** Normalized inbound parameters; the first value of a repeated name wins. */
  params: ReadonlyMap<string, string>;
  sessionId: SessionId | null;
  event: EventDescriptor | null;
  eventSource: EventSource | null;
};

export function normalizeParamValue(value: string): string {
  return value.replace(/\0/g, "").replace(/\r\n?/g, "\n");
}

export function createRequestContext(raw: RawParams): RequestContext {
  const params = new Map<string, string>();
  for (const [name, value] of rawParamEntries(raw)) {
    if (!params.has(name)) params.set(name, normalizeParamValue(value));
  }
  const sessionId = params.get(SESSION_PARAM)?.trim() ?? "";
  return { params, sessionId: sessionId.length > 0 ? sessionId : null, event: null, eventSource: null };
}

/**
 * Decode the event carried by the request, if any. A button event wins over a
 * link event; among buttons, the first in parameter order.
 */
export function interpretRequest(ctx: RequestContext): RequestContext {
  for (const name of ctx.params.keys()) {
    const token = buttonTokenFromParam(name);
    if (token !== null) return { ...ctx, event: decodeEventToken(token), eventSource: "button" };
  }
  const link = ctx.params.get(LINK_PARAM);
  if (link !== undefined && link.length > 0) {
    return { ...ctx, event: decodeEventToken(link), eventSource: "link" };
  }
  return ctx;
}
