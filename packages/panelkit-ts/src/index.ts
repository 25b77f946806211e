// Panel ids are registry indices; they travel on the wire as decimal strings.
export type PanelId = number;
export type SessionId = string;

export type EventDescriptor = {
  name: string;
  routine: string;
  panelId: string;
};

export type PanelEvent = {
  name: string;
};

/** Raw inbound parameters, as decoded from a query string or form body. */
export type RawParams =
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string | readonly string[] | undefined>>;

export type PanelSlot = {
  type: string;
  /** Arena index of the parent, `null` for the root (always slot 0). */
  parent: number | null;
  children: Record<string, number>;
  /** Registry id, `null` until the panel is first referenced on the wire. */
  id: PanelId | null;
  state: unknown;
};

export type SessionSnapshot = {
  version: 1;
  nodes: PanelSlot[];
  /** Registry id -> arena index; `null` marks a released id. */
  registry: (number | null)[];
};

export type SessionRecord = {
  sessionId: SessionId;
  /** Encoded SessionSnapshot; `null` until the first cycle persists. */
  tree: Uint8Array | null;
  expired: boolean;
  createdAt: number;
  updatedAt: number;
};

export type SessionLoadResult =
  | { status: "found"; record: SessionRecord }
  | { status: "missing" }
  | { status: "expired" }
  | { status: "corrupt"; reason: string };

export type SessionLease = {
  sessionId: SessionId;
  release: () => void;
};

type Awaitable<T> = T | Promise<T>;

/**
 * Session-keyed storage of serialized panel trees.
 *
 * `acquire` must serialize cycles against the same session id: a second lease
 * for an id resolves only after the first one is released.
 */
export interface PersistenceStore {
  create(): Awaitable<SessionRecord>;
  load(sessionId: SessionId): Awaitable<SessionLoadResult>;
  save(sessionId: SessionId, record: SessionRecord): Awaitable<void>;
  markExpired(sessionId: SessionId): Awaitable<void>;
  acquire(sessionId: SessionId): Promise<SessionLease>;
  close?(): Awaitable<void>;
}

export * from "./errors.js";
export * from "./names.js";
export * from "./events.js";
export * from "./record.js";
