/**
 * Opens a request's answers preview, captures the dialog and closes it again.
 * Every failure ends in "no preview"; the notification goes out regardless.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { PageRenderer, Pointer } from "../browser/types.js";
import { createLogger } from "../logging/logger.js";
import { viewportPoint, type CardPoint } from "../vision/geometry.js";
import { cropModal } from "../vision/modalCrop.js";
import type { Card } from "../vision/CardSegmenter.js";
import { aimAt } from "./aim.js";
import type { ClickObserver } from "./types.js";

const log = createLogger("PreviewCapturer");

/** Left gutter spot that closes the dialog without hitting anything */
const OUTSIDE_CLICK = viewportPoint(50, 400);

export type PreviewCapturerDeps = {
  renderer: PageRenderer;
  pointer: Pointer;
  screenshotsDir: string;
  observer?: ClickObserver;
  crop?: (imagePath: string) => Promise<string | undefined>;
  timestamp?: () => string;
};

export class PreviewCapturer {
  private readonly deps: PreviewCapturerDeps;

  constructor(deps: PreviewCapturerDeps) {
    this.deps = deps;
  }

  async capture(card: Card, link: CardPoint): Promise<string | undefined> {
    const { renderer, pointer, screenshotsDir, observer } = this.deps;
    const crop = this.deps.crop ?? cropModal;
    const stamp = this.deps.timestamp?.() ?? String(Date.now());

    let opened = false;
    try {
      const aim = await aimAt(renderer, pointer, card, link);
      if (!aim.ok) {
        log.warn("preview link off screen", { card: card.index, y: aim.point.y });
        return undefined;
      }
      await observer?.beforeClick(aim.point, "anteprima", card.index).catch((err: unknown) => {
        log.warn("click observer failed", { error: err });
      });
      await pointer.click(aim.point);
      opened = true;
      await pointer.pause(5_000, 6_000);

      const path = join(screenshotsDir, `preview_${stamp}_card${card.index}.png`);
      await writeFile(path, await renderer.captureViewport());
      return (await crop(path)) ?? path;
    } catch (err) {
      log.warn("preview capture failed", { card: card.index, error: err });
      return undefined;
    } finally {
      if (opened) await this.close();
    }
  }

  private async close(): Promise<void> {
    const { renderer, pointer } = this.deps;
    try {
      await renderer.pressKey("Escape");
      await pointer.pause(300, 500);
      await renderer.pressKey("Escape");
      await pointer.pause(300, 500);
      await pointer.click(OUTSIDE_CLICK);
      await pointer.pause(500, 800);
    } catch (err) {
      log.warn("could not close preview", { error: err });
    }
  }
}
