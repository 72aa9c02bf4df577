/**
 * BrowserSession: one persistent Chromium profile for the moderator account.
 *
 * The user-data-dir lives under SESSIONS_DIR so a manual login survives
 * restarts. Launched on demand, closed for night mode and on shutdown.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { BrowserContext } from "playwright-core";
import { chromium } from "playwright-core";
import { createLogger } from "../logging/logger.js";
import { PlaywrightDriver } from "./PlaywrightDriver.js";
import type { ViewportSize } from "./types.js";

const log = createLogger("BrowserSession");

export type BrowserSessionOptions = {
  sessionsDir: string;
  headless: boolean;
  slowMoMs: number;
  proxyServer?: string;
  viewport: ViewportSize;
  locale: string;
};

type OpenSession = { context: BrowserContext; driver: PlaywrightDriver };

export class BrowserSession {
  private readonly options: BrowserSessionOptions;
  private session?: OpenSession;

  constructor(options: BrowserSessionOptions) {
    this.options = options;
  }

  get profileDir(): string {
    return join(this.options.sessionsDir, "moderator-profile");
  }

  get isOpen(): boolean {
    return this.session !== undefined;
  }

  /** Return (launching if needed) the driver for the persistent profile */
  async open(): Promise<PlaywrightDriver> {
    if (this.session) return this.session.driver;

    await mkdir(this.profileDir, { recursive: true });
    const { headless, slowMoMs, proxyServer, viewport, locale } = this.options;
    const context = await chromium.launchPersistentContext(this.profileDir, {
      headless,
      slowMo: slowMoMs,
      viewport,
      locale,
      proxy: proxyServer ? { server: proxyServer } : undefined,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-blink-features=AutomationControlled",
      ],
    });
    context.on("close", () => {
      this.session = undefined;
    });

    const driver = new PlaywrightDriver(context);
    this.session = { context, driver };
    log.info("browser launched", { profile: this.profileDir, headless });
    return driver;
  }

  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = undefined;
    try {
      await session.context.close();
      log.info("browser closed");
    } catch (err) {
      log.warn("browser close failed", { error: err });
    }
  }
}
