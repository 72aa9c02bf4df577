import { describe, expect, it } from "vitest";
import {
  boxCenter,
  cardPoint,
  centeringScrollFor,
  isInsideViewport,
  pagePoint,
  toAbsolute,
  toViewport,
} from "./geometry.js";

describe("coordinate translation", () => {
  const card = { left: 360, top: 1_250 };

  it("adds the sidebar width and card top to card-local points", () => {
    expect(toAbsolute(card, cardPoint(868, 46))).toEqual({ space: "page", x: 1_228, y: 1_296 });
  });

  it("round-trips card → page → viewport for any realized scroll", () => {
    for (const scroll of [0, 100, 1_250, 1_296]) {
      for (const [x, y] of [
        [0, 0],
        [120, 46],
        [1_559, 379],
      ] as const) {
        const vp = toViewport(toAbsolute(card, cardPoint(x, y)), scroll);
        expect(vp).toEqual({ space: "viewport", x: x + 360, y: y + 1_250 - scroll });
      }
    }
  });

  it("uses the clamped scroll, not the requested one", () => {
    const target = pagePoint(900, 2_000);
    const requested = centeringScrollFor(target, 864);
    expect(requested).toBe(1_568);

    // The page ends early and the browser only scrolled to 1400
    expect(toViewport(target, 1_400)).toEqual({ space: "viewport", x: 900, y: 600 });
  });

  it("never asks for a negative scroll", () => {
    expect(centeringScrollFor(pagePoint(10, 200), 864)).toBe(0);
  });

  it("truncates bounding-box centres", () => {
    expect(boxCenter({ x1: 834, y1: 30, x2: 903, y2: 63 })).toEqual({ space: "card", x: 868, y: 46 });
  });

  it("checks viewport bounds", () => {
    const viewport = { width: 1536, height: 864 };
    expect(isInsideViewport(toViewport(pagePoint(500, 900), 100), viewport)).toBe(true);
    expect(isInsideViewport(toViewport(pagePoint(500, 900), 0), viewport)).toBe(false);
  });
});
