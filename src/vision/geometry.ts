/**
 * Pixel coordinate spaces.
 *
 * Three spaces exist and they are not interchangeable:
 *   - card:     relative to the top-left of one segmented card image
 *   - page:     relative to the top-left of the full-page render
 *   - viewport: relative to the top-left of what is currently on screen
 *
 * Each point carries its space as a literal tag, so a CardPoint cannot be
 * passed where a ViewportPoint is expected. The only way across is through
 * toAbsolute / toViewport below.
 */

export type CardPoint = { readonly space: "card"; readonly x: number; readonly y: number };
export type PagePoint = { readonly space: "page"; readonly x: number; readonly y: number };
export type ViewportPoint = { readonly space: "viewport"; readonly x: number; readonly y: number };

export type BoundingBox = { x1: number; y1: number; x2: number; y2: number };

/** Where a card sits in the full page: fixed left offset, vertical start */
export type CardFrame = { left: number; top: number };

export function cardPoint(x: number, y: number): CardPoint {
  return { space: "card", x: Math.round(x), y: Math.round(y) };
}

export function pagePoint(x: number, y: number): PagePoint {
  return { space: "page", x: Math.round(x), y: Math.round(y) };
}

export function viewportPoint(x: number, y: number): ViewportPoint {
  return { space: "viewport", x: Math.round(x), y: Math.round(y) };
}

export function boxCenter(box: BoundingBox): CardPoint {
  return cardPoint(Math.trunc((box.x1 + box.x2) / 2), Math.trunc((box.y1 + box.y2) / 2));
}

/** Card-local → page. Exact because cards are cropped at a fixed left offset and never cut horizontally */
export function toAbsolute(card: CardFrame, local: CardPoint): PagePoint {
  return pagePoint(local.x + card.left, local.y + card.top);
}

/**
 * Page → viewport for the given scroll offset.
 * scrollY must be the offset the browser actually realized, re-read after
 * scrolling, not the one that was requested.
 */
export function toViewport(point: PagePoint, scrollY: number): ViewportPoint {
  return viewportPoint(point.x, point.y - scrollY);
}

/** Scroll offset that puts the point in the vertical centre of the viewport */
export function centeringScrollFor(point: PagePoint, viewportHeight: number): number {
  return Math.max(0, point.y - Math.floor(viewportHeight / 2));
}

export function isInsideViewport(point: ViewportPoint, viewport: { width: number; height: number }): boolean {
  return point.x >= 0 && point.y >= 0 && point.x < viewport.width && point.y < viewport.height;
}
