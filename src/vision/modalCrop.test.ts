import { describe, expect, it } from "vitest";
import { findModalRect } from "./modalCrop.js";
import type { GrayImage } from "./raster.js";

function dimmedWithDialog(dialog?: { left: number; top: number; right: number; bottom: number }): GrayImage {
  const width = 600;
  const height = 400;
  const data = new Uint8Array(width * height).fill(80);
  if (dialog) {
    for (let y = dialog.top; y < dialog.bottom; y++) data.fill(255, y * width + dialog.left, y * width + dialog.right);
  }
  return { width, height, data };
}

describe("findModalRect", () => {
  it("finds the bright dialog and pads it", () => {
    const rect = findModalRect(dimmedWithDialog({ left: 150, top: 100, right: 450, bottom: 300 }));
    expect(rect).toEqual({ left: 145, top: 95, width: 309, height: 209 });
  });

  it("gives up when the bright band is too short", () => {
    expect(findModalRect(dimmedWithDialog({ left: 150, top: 100, right: 450, bottom: 140 }))).toBeUndefined();
  });

  it("gives up when nothing is bright", () => {
    expect(findModalRect(dimmedWithDialog())).toBeUndefined();
  });
});
