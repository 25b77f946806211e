import type { PanelId, SessionId } from "@panelkit/interface";
import { decodeLocalParams } from "@panelkit/interface/names";

import type { Panel } from "./panel.js";
import type { RequestContext } from "./request.js";
import type { PanelTree } from "./tree.js";

/**
 * Root capability of a panel tree: the session id, the request being served
 * and the session's lifetime. Only the cycle controller creates one.
 */
export class PanelSession {
  readonly sessionId: SessionId;
  readonly tree: PanelTree;
  request: RequestContext;
  private expireRequested = false;

  constructor(opts: { sessionId: SessionId; tree: PanelTree; request: RequestContext }) {
    if (opts.tree.session) throw new Error("panel tree is already bound to a session");
    this.sessionId = opts.sessionId;
    this.tree = opts.tree;
    this.request = opts.request;
    opts.tree.session = this;
  }

  get root(): Panel<unknown> {
    return this.tree.root;
  }

  get expired(): boolean {
    return this.expireRequested;
  }

  /**
   * End the session once this cycle has been persisted. The next request
   * carrying this session id starts from a fresh main panel.
   */
  expire(): void {
    this.expireRequested = true;
  }

  localParams(panelId: PanelId): Record<string, string> {
    return decodeLocalParams(panelId, this.request.params);
  }
}
