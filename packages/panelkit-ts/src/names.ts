import { InvalidNameError } from "./errors.js";
import type { PanelId, RawParams } from "./index.js";

export const PARAM_SEP = ":.:";
export const EVENT_SEP = ".";

const WHITESPACE = /\s/;

/**
 * Reject names that could not survive a round trip through the parameter or
 * event encodings.
 */
export function assertWireName(field: string, value: string, opts: { allowEventSep?: boolean } = {}): string {
  if (value.length === 0) throw new InvalidNameError(field, value, "must not be empty");
  if (value.includes(PARAM_SEP)) throw new InvalidNameError(field, value, `must not contain ${JSON.stringify(PARAM_SEP)}`);
  if (!opts.allowEventSep && value.includes(EVENT_SEP)) {
    throw new InvalidNameError(field, value, `must not contain ${JSON.stringify(EVENT_SEP)}`);
  }
  if (WHITESPACE.test(value)) throw new InvalidNameError(field, value, "must not contain whitespace");
  return value;
}

export function encodeLocalName(panelId: PanelId | string, localName: string): string {
  assertWireName("panel id", String(panelId));
  assertWireName("local name", localName, { allowEventSep: true });
  return `${panelId}${PARAM_SEP}${localName}`;
}

export function* rawParamEntries(params: RawParams): Generator<[string, string]> {
  if (isIterable(params)) {
    for (const [name, value] of params) yield [name, value];
    return;
  }
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === "string") {
      yield [name, value];
    } else if (value.length > 0) {
      yield [name, value[0]];
    }
  }
}

function isIterable(params: RawParams): params is Iterable<readonly [string, string]> {
  return Symbol.iterator in params;
}

/**
 * Project the inbound parameters onto one panel's local namespace.
 *
 * Names belonging to other panels, and names that do not split into exactly
 * `<panelId>:.:<localName>`, are dropped.
 */
export function decodeLocalParams(panelId: PanelId | string, params: RawParams): Record<string, string> {
  const wanted = String(panelId);
  const out: Record<string, string> = {};
  for (const [wireName, value] of rawParamEntries(params)) {
    const parts = wireName.split(PARAM_SEP);
    if (parts.length !== 2) continue;
    const [owner, localName] = parts;
    if (owner !== wanted || localName.length === 0) continue;
    if (!Object.prototype.hasOwnProperty.call(out, localName)) out[localName] = value;
  }
  return out;
}
