export { BrowserSession } from "./BrowserSession.js";
export type { BrowserSessionOptions } from "./BrowserSession.js";
export { HumanMotion } from "./HumanMotion.js";
export { PlaywrightDriver } from "./PlaywrightDriver.js";
export type { MouseSurface, PageRenderer, Pointer, ViewportSize } from "./types.js";
