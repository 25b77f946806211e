export { readRequestParams, startPanelServer } from "./server.js";
export type { PanelCycleErrorContext, PanelServerHandle, PanelServerOptions } from "./server.js";
