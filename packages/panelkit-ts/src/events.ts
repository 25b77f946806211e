import { MalformedEventTokenError } from "./errors.js";
import type { EventDescriptor, PanelId, SessionId } from "./index.js";
import { EVENT_SEP, assertWireName } from "./names.js";

export const BUTTON_PREFIX = "eventbutton+";
export const LINK_PARAM = "n";
export const SESSION_PARAM = "session_id";

/**
 * Token grammar: `<eventName>.<routineName>.<panelId>`.
 *
 * The same token is carried in a submit control's name (behind
 * `BUTTON_PREFIX`) and as the value of the `n` link parameter.
 */
export function encodeEventToken(event: { name: string; routine?: string; panelId: PanelId | string }): string {
  const name = assertWireName("event name", event.name);
  const routine = assertWireName("routine name", event.routine ?? event.name);
  const panelId = assertWireName("panel id", String(event.panelId));
  return [name, routine, panelId].join(EVENT_SEP);
}

export function decodeEventToken(token: string): EventDescriptor {
  const parts = token.split(EVENT_SEP);
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new MalformedEventTokenError(token);
  }
  const [name, routine, panelId] = parts;
  return { name, routine, panelId };
}

export function buttonParamName(token: string): string {
  return `${BUTTON_PREFIX}${token}`;
}

export function buttonTokenFromParam(paramName: string): string | null {
  return paramName.startsWith(BUTTON_PREFIX) ? paramName.slice(BUTTON_PREFIX.length) : null;
}

export function linkHref(sessionId: SessionId, token: string): string {
  const query = new URLSearchParams([
    [SESSION_PARAM, sessionId],
    [LINK_PARAM, token],
  ]);
  return `?${query.toString()}`;
}
