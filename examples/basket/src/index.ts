export { parseServerCliArgs } from "./args.js";
export type { ServerCliArgs } from "./args.js";
export { Basket, SimpleApp, basketPage } from "./panels.js";
