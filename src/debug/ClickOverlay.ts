/**
 * ClickOverlay: before each click, save the viewport with a red cross and
 * circle drawn at the click point, optionally asking the validator about it.
 * Failures are logged; they never hold up the click.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import sharp from "sharp";
import type { PageRenderer } from "../browser/types.js";
import { createLogger } from "../logging/logger.js";
import type { ClickObserver } from "../moderation/types.js";
import type { ViewportPoint } from "../vision/geometry.js";
import type { ClickValidator } from "./ClickValidator.js";

const log = createLogger("ClickOverlay");

const MARK_RADIUS = 20;
const CROSS_HALF = 30;

export type ClickOverlayDeps = {
  renderer: PageRenderer;
  outDir: string;
  validator?: ClickValidator;
  now?: () => Date;
};

function clockStamp(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()].map((n) => String(n).padStart(2, "0")).join("");
}

export function markerSvg(width: number, height: number, point: ViewportPoint): string {
  const { x, y } = point;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<circle cx="${x}" cy="${y}" r="${MARK_RADIUS}" fill="none" stroke="#ff0000" stroke-width="3"/>`,
    `<line x1="${x - CROSS_HALF}" y1="${y}" x2="${x + CROSS_HALF}" y2="${y}" stroke="#ff0000" stroke-width="3"/>`,
    `<line x1="${x}" y1="${y - CROSS_HALF}" x2="${x}" y2="${y + CROSS_HALF}" stroke="#ff0000" stroke-width="3"/>`,
    `</svg>`,
  ].join("");
}

export class ClickOverlay implements ClickObserver {
  private readonly deps: ClickOverlayDeps;
  private readonly now: () => Date;

  constructor(deps: ClickOverlayDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async beforeClick(point: ViewportPoint, target: string, cardIndex: number): Promise<void> {
    const path = await this.draw(point, target, cardIndex);
    if (!path || !this.deps.validator) return;
    try {
      await this.deps.validator.validate(path, target);
    } catch (err) {
      log.warn("validation request failed", { target, error: err });
    }
  }

  /** Writes the marked screenshot; undefined when the capture failed */
  async draw(point: ViewportPoint, target: string, cardIndex: number): Promise<string | undefined> {
    const step = target.toLowerCase().replace(/[^a-z0-9]+/g, "-");
    const path = join(this.deps.outDir, `debug_click_${clockStamp(this.now())}_card${cardIndex}_${step}.png`);
    try {
      const shot = await this.deps.renderer.captureViewport();
      const meta = await sharp(shot).metadata();
      const svg = markerSvg(meta.width ?? point.x + 1, meta.height ?? point.y + 1, point);
      await mkdir(this.deps.outDir, { recursive: true });
      await sharp(shot)
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .png()
        .toFile(path);
      log.debug("click overlay saved", { path, x: point.x, y: point.y });
      return path;
    } catch (err) {
      log.warn("click overlay failed", { target, error: err });
      return undefined;
    }
  }
}
