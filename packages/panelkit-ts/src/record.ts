import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import { StoreError } from "./errors.js";
import type { PanelSlot, SessionSnapshot } from "./index.js";

const SESSION_SNAPSHOT_V1_TAG = "panelkit/session/v1";

function assertRecord(val: unknown, ctx: string): Record<string, unknown> {
  if (typeof val !== "object" || val === null || Array.isArray(val) || val instanceof Uint8Array) {
    throw new StoreError(`${ctx} must be a map`);
  }
  return Object.fromEntries(Object.entries(val));
}

function assertArray(val: unknown, ctx: string): unknown[] {
  if (!Array.isArray(val)) throw new StoreError(`${ctx} must be an array`);
  return val;
}

function assertString(val: unknown, ctx: string): string {
  if (typeof val !== "string") throw new StoreError(`${ctx} must be a string`);
  return val;
}

function assertIndex(val: unknown, ctx: string): number {
  if (typeof val !== "number" || !Number.isSafeInteger(val) || val < 0) {
    throw new StoreError(`${ctx} must be a non-negative integer`);
  }
  return val;
}

function assertOptionalIndex(val: unknown, ctx: string): number | null {
  return val === null ? null : assertIndex(val, ctx);
}

function decodeSlot(val: unknown, idx: number, nodeCount: number): PanelSlot {
  const ctx = `nodes[${idx}]`;
  const slot = assertRecord(val, ctx);
  const parent = assertOptionalIndex(slot.parent, `${ctx}.parent`);
  if ((idx === 0) !== (parent === null)) throw new StoreError(`${ctx}: only the root has no parent`);
  if (parent !== null && parent >= nodeCount) throw new StoreError(`${ctx}.parent out of range`);

  const children: Record<string, number> = {};
  for (const [name, child] of Object.entries(assertRecord(slot.children, `${ctx}.children`))) {
    const childIdx = assertIndex(child, `${ctx}.children.${name}`);
    if (childIdx === 0 || childIdx >= nodeCount) throw new StoreError(`${ctx}.children.${name} out of range`);
    children[name] = childIdx;
  }

  return {
    type: assertString(slot.type, `${ctx}.type`),
    parent,
    children,
    id: assertOptionalIndex(slot.id, `${ctx}.id`),
    state: slot.state ?? null,
  };
}

export function encodeSessionSnapshot(snapshot: SessionSnapshot): Uint8Array {
  return cborEncode(
    {
      tag: SESSION_SNAPSHOT_V1_TAG,
      nodes: snapshot.nodes,
      registry: snapshot.registry,
    },
    rfc8949EncodeOptions
  );
}

export function decodeSessionSnapshot(bytes: Uint8Array): SessionSnapshot {
  let decoded: unknown;
  try {
    decoded = cborDecode(bytes);
  } catch (err) {
    throw new StoreError("session record is not valid CBOR", { cause: err });
  }

  const map = assertRecord(decoded, "session record");
  if (map.tag !== SESSION_SNAPSHOT_V1_TAG) {
    throw new StoreError(`unsupported session record tag: ${String(map.tag)}`);
  }

  const rawNodes = assertArray(map.nodes, "nodes");
  if (rawNodes.length === 0) throw new StoreError("session record has no root panel");
  const nodes = rawNodes.map((node, idx) => decodeSlot(node, idx, rawNodes.length));

  const registry = assertArray(map.registry, "registry").map((entry, idx) => {
    const nodeIdx = assertOptionalIndex(entry, `registry[${idx}]`);
    if (nodeIdx !== null && nodes[nodeIdx]?.id !== idx) {
      throw new StoreError(`registry[${idx}] does not match its panel`);
    }
    return nodeIdx;
  });

  return { version: 1, nodes, registry };
}
