/**
 * PlaywrightDriver: the page renderer and raw input surface over playwright-core.
 *
 * Owns one tab of a persistent context. Scroll position is always read back
 * from the page, never assumed from the last request.
 */

import type { BrowserContext, Page } from "playwright-core";
import { createLogger } from "../logging/logger.js";
import type { MouseSurface, PageRenderer, ViewportSize } from "./types.js";

const log = createLogger("PlaywrightDriver");

const CLOSE_SELECTORS = [
  '[aria-label="Chiudi"]',
  '[aria-label="Close"]',
  '[aria-label="Close chat"]',
  '[aria-label="Chiudi chat"]',
  'div[role="dialog"] [aria-label="Chiudi"]',
  'div[role="dialog"] [aria-label="Close"]',
];

/** Neutral spot in the main column, clear of the sidebar */
const NEUTRAL_CLICK = { x: 700, y: 400 };

export class PlaywrightDriver implements PageRenderer, MouseSurface {
  private context: BrowserContext;
  private _page?: Page;

  constructor(context: BrowserContext) {
    this.context = context;
  }

  private async page(): Promise<Page> {
    if (!this._page || this._page.isClosed()) {
      this._page = this.context.pages()[0] ?? (await this.context.newPage());
    }
    return this._page;
  }

  async navigate(url: string): Promise<void> {
    const pg = await this.page();
    await pg.goto(url, { waitUntil: "domcontentloaded", timeout: 30_000 });
  }

  async currentUrl(): Promise<string> {
    return (await this.page()).url();
  }

  async scrollTo(y: number): Promise<void> {
    const pg = await this.page();
    await pg.evaluate((top: number) => window.scrollTo(0, top), y);
  }

  async readScrollY(): Promise<number> {
    const pg = await this.page();
    return pg.evaluate(() => window.scrollY);
  }

  async captureFullPage(): Promise<Buffer> {
    return (await this.page()).screenshot({ type: "png", fullPage: true });
  }

  async captureViewport(): Promise<Buffer> {
    return (await this.page()).screenshot({ type: "png" });
  }

  async viewportSize(): Promise<ViewportSize> {
    const pg = await this.page();
    const size = pg.viewportSize();
    if (size) return size;
    return pg.evaluate(() => ({ width: window.innerWidth, height: window.innerHeight }));
  }

  async pressKey(key: string): Promise<void> {
    await (await this.page()).keyboard.press(key);
  }

  async dismissOverlays(): Promise<void> {
    const pg = await this.page();
    await pg.keyboard.press("Escape");
    await pg.waitForTimeout(600);

    for (const selector of CLOSE_SELECTORS) {
      const button = pg.locator(selector).first();
      const visible = await button.isVisible().catch(() => false);
      if (!visible) continue;
      try {
        await button.click({ timeout: 3_000 });
        log.info("closed overlay", { selector });
        await pg.waitForTimeout(400);
        break;
      } catch (err) {
        log.debug("overlay close failed", { selector, error: err });
      }
    }

    await pg.mouse.click(NEUTRAL_CLICK.x, NEUTRAL_CLICK.y);
    await pg.waitForTimeout(250);
    await pg.keyboard.press("Escape");
  }

  async moveMouse(x: number, y: number): Promise<void> {
    await (await this.page()).mouse.move(x, y);
  }

  async mouseDown(): Promise<void> {
    await (await this.page()).mouse.down();
  }

  async mouseUp(): Promise<void> {
    await (await this.page()).mouse.up();
  }

  async wheel(deltaY: number): Promise<void> {
    await (await this.page()).mouse.wheel(0, deltaY);
  }

  async focus(selector: string): Promise<void> {
    await (await this.page()).locator(selector).first().click({ timeout: 10_000 });
  }

  async typeChar(char: string): Promise<void> {
    await (await this.page()).keyboard.type(char);
  }

  async close(): Promise<void> {
    if (this._page && !this._page.isClosed()) {
      await this._page.close();
    }
  }
}
