import type { PageRenderer, Pointer } from "../browser/types.js";
import {
  centeringScrollFor,
  isInsideViewport,
  toAbsolute,
  toViewport,
  type CardFrame,
  type CardPoint,
  type ViewportPoint,
} from "../vision/geometry.js";

export type Aim = { ok: true; point: ViewportPoint; scrollY: number } | { ok: false; point: ViewportPoint };

/**
 * Bring a card-local point on screen and translate it to viewport space.
 * The scroll offset is read back after the request settles; the browser
 * clamps scrolls near the end of the page.
 */
export async function aimAt(renderer: PageRenderer, pointer: Pointer, card: CardFrame, local: CardPoint): Promise<Aim> {
  const target = toAbsolute(card, local);
  const viewport = await renderer.viewportSize();
  await renderer.scrollTo(centeringScrollFor(target, viewport.height));
  await pointer.pause(500, 800);

  const scrollY = await renderer.readScrollY();
  const point = toViewport(target, scrollY);
  return isInsideViewport(point, viewport) ? { ok: true, point, scrollY } : { ok: false, point };
}
