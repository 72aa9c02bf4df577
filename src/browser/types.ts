import type { ViewportPoint } from "../vision/geometry.js";

export type ViewportSize = { width: number; height: number };

/** What the scan pipeline needs from a page */
export interface PageRenderer {
  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  /** Requests a scroll; the browser may clamp it */
  scrollTo(y: number): Promise<void>;
  /** The scroll offset the browser actually realized */
  readScrollY(): Promise<number>;
  captureFullPage(): Promise<Buffer>;
  captureViewport(): Promise<Buffer>;
  viewportSize(): Promise<ViewportSize>;
  pressKey(key: string): Promise<void>;
  /** Close chat popups and stray dialogs sitting over the content */
  dismissOverlays(): Promise<void>;
}

/** Raw input primitives the human-motion layer drives */
export interface MouseSurface {
  viewportSize(): Promise<ViewportSize>;
  moveMouse(x: number, y: number): Promise<void>;
  mouseDown(): Promise<void>;
  mouseUp(): Promise<void>;
  wheel(deltaY: number): Promise<void>;
  focus(selector: string): Promise<void>;
  typeChar(char: string): Promise<void>;
}

/** Click and wait the way a person would */
export interface Pointer {
  click(point: ViewportPoint): Promise<void>;
  pause(minMs: number, maxMs: number): Promise<void>;
  scroll(direction: "up" | "down", amount?: number): Promise<void>;
  type(selector: string, text: string): Promise<void>;
}
