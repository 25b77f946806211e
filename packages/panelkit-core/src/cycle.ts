import type {
  EventDescriptor,
  PersistenceStore,
  RawParams,
  SessionId,
  SessionLease,
  SessionRecord,
} from "@panelkit/interface";
import { StoreError } from "@panelkit/interface/errors";
import { LINK_PARAM } from "@panelkit/interface/events";
import { decodeSessionSnapshot, encodeSessionSnapshot } from "@panelkit/interface/record";

import { PanelCatalog, type PanelClass } from "./catalog.js";
import { element, hiddenSessionField } from "./html.js";
import { type RequestContext, createRequestContext, interpretRequest } from "./request.js";
import { PanelSession } from "./session.js";
import { PanelTree } from "./tree.js";

export type CycleStage = "restored" | "interpreted" | "dispatched" | "rendered" | "persisted" | "failed";

export type CycleStageContext = {
  sessionId: SessionId | null;
  error?: unknown;
};

export type PageRenderer = (body: string, session: PanelSession) => string;

export type CycleControllerOptions = {
  store: PersistenceStore;
  /** Main panel class, instantiated for every new session. */
  root: PanelClass;
  /** Every other panel type that can appear in a tree. */
  panels?: readonly PanelClass[];
  page?: PageRenderer;
  debug?: boolean;
  log?: (line: string) => void;
  onStage?: (stage: CycleStage, ctx: CycleStageContext) => void;
};

export type CycleResult = {
  sessionId: SessionId;
  markup: string;
  /** True when the cycle started a new session instead of restoring one. */
  fresh: boolean;
  event: EventDescriptor | null;
};

export interface CycleController {
  readonly catalog: PanelCatalog;
  cycle(raw: RawParams): Promise<CycleResult>;
}

type Restored = {
  lease: SessionLease;
  record: SessionRecord;
  tree: PanelTree;
  fresh: boolean;
};

export function defaultPage(body: string, session: PanelSession): string {
  return element("form", { method: "post", action: "" }, hiddenSessionField(session.sessionId) + body);
}

/**
 * One pass per request: restore, interpret, dispatch, render, persist.
 *
 * The session lease is held for the whole pass. Nothing reaches the store
 * unless the first four stages succeed.
 */
export function createCycleController(opts: CycleControllerOptions): CycleController {
  const { store } = opts;
  const catalog = new PanelCatalog([opts.root, ...(opts.panels ?? [])]);
  const page = opts.page ?? defaultPage;
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));

  const hydrate = (sessionId: SessionId, bytes: Uint8Array): PanelTree | null => {
    try {
      return PanelTree.restore(decodeSessionSnapshot(bytes), catalog);
    } catch (err) {
      if (!(err instanceof StoreError)) throw err;
      if (debug) log(`[cycle:${sessionId}] discarding unreadable session record: ${err.message}`);
      return null;
    }
  };

  const restore = async (sessionId: SessionId | null): Promise<Restored> => {
    if (sessionId !== null) {
      const lease = await store.acquire(sessionId);
      try {
        const loaded = await store.load(sessionId);
        if (loaded.status === "found" && loaded.record.tree !== null && !loaded.record.expired) {
          const tree = hydrate(sessionId, loaded.record.tree);
          if (tree) return { lease, record: loaded.record, tree, fresh: false };
        } else if (debug) {
          const reason =
            loaded.status === "found" ? "empty" : loaded.status === "corrupt" ? `corrupt (${loaded.reason})` : loaded.status;
          log(`[cycle:${sessionId}] session ${reason}, starting a new one`);
        }
      } catch (err) {
        lease.release();
        throw err;
      }
      lease.release();
    }

    const record = await store.create();
    const lease = await store.acquire(record.sessionId);
    try {
      return { lease, record, tree: PanelTree.create(opts.root, catalog), fresh: true };
    } catch (err) {
      lease.release();
      throw err;
    }
  };

  return {
    catalog,
    async cycle(raw) {
      let request: RequestContext = createRequestContext(raw);
      let sessionId = request.sessionId;
      const enter = (stage: CycleStage, error?: unknown) => {
        if (debug) log(`[cycle:${sessionId ?? "-"}] ${stage}`);
        opts.onStage?.(stage, { sessionId, error });
      };

      let lease: SessionLease | null = null;
      try {
        const restored = await restore(request.sessionId);
        lease = restored.lease;
        sessionId = restored.record.sessionId;
        const session = new PanelSession({ sessionId, tree: restored.tree, request });
        enter("restored");

        request = interpretRequest(request);
        session.request = request;
        const link = request.params.get(LINK_PARAM);
        if (debug && request.eventSource === "button" && link) {
          log(`[cycle:${sessionId}] ignoring link event ${link}, the button event takes precedence`);
        }
        enter("interpreted");

        // Tokens name panels of the tree they were rendered from; a new tree cannot honour them.
        const event = restored.fresh ? null : request.event;
        if (request.event && !event && debug) log(`[cycle:${sessionId}] dropping event for a new session`);
        if (event) {
          const target = restored.tree.panelById(event.panelId);
          target.handleEvent(event.routine, { name: event.name });
        }
        enter("dispatched");

        const markup = page(restored.tree.render(restored.tree.root), session);
        enter("rendered");

        const tree = encodeSessionSnapshot(restored.tree.snapshot());
        await store.save(sessionId, { ...restored.record, tree, expired: false });
        if (session.expired) await store.markExpired(sessionId);
        enter("persisted");

        return { sessionId, markup, fresh: restored.fresh, event };
      } catch (err) {
        enter("failed", err);
        throw err;
      } finally {
        lease?.release();
      }
    },
  };
}
