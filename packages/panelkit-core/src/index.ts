export { PanelCatalog } from "./catalog.js";
export type { PanelClass } from "./catalog.js";
export { createCycleController, defaultPage } from "./cycle.js";
export type {
  CycleController,
  CycleControllerOptions,
  CycleResult,
  CycleStage,
  CycleStageContext,
  PageRenderer,
} from "./cycle.js";
export { element, escapeHtml, hiddenSessionField, renderAttributes, voidElement } from "./html.js";
export type { HtmlAttributes } from "./html.js";
export { createInMemorySessionStore } from "./in-memory.js";
export type { InMemorySessionStore, InMemorySessionStoreOptions } from "./in-memory.js";
export { createSessionLocks, generateSessionId } from "./locks.js";
export type { SessionLocks } from "./locks.js";
export { Panel } from "./panel.js";
export type {
  EventButtonOptions,
  EventControlOptions,
  EventHandler,
  EventHandlers,
  EventLinkOptions,
  LocalChoice,
  LocalChoiceOptions,
  LocalInputOptions,
} from "./panel.js";
export { IdentityRegistry, parsePanelId } from "./registry.js";
export { createRequestContext, interpretRequest, normalizeParamValue } from "./request.js";
export type { EventSource, RequestContext } from "./request.js";
export { PanelSession } from "./session.js";
export { PanelTree } from "./tree.js";
