/**
 * Process entry point: load .env and configuration, wire the moderator and
 * run until SIGINT / SIGTERM.
 */

import "dotenv/config";
import type { Server } from "node:http";
import { BrowserSession, HumanMotion } from "./browser/index.js";
import { DecisionCache } from "./cache/DecisionCache.js";
import { ConfigError, loadConfig } from "./config/config.js";
import { createLogger, setLogLevel } from "./logging/logger.js";
import { cleanupScreenshots } from "./maintenance/screenshotJanitor.js";
import { createScanOrchestrator } from "./moderation/createScanOrchestrator.js";
import { ModerationRunner } from "./moderation/ModerationRunner.js";
import { RunnerState } from "./moderation/RunnerState.js";
import { createStatusApp } from "./status/status-routes.js";
import { TelegramApi } from "./telegram/TelegramApi.js";
import { TelegramNotifier } from "./telegram/TelegramNotifier.js";
import { TesseractOcrEngine } from "./vision/TesseractOcrEngine.js";

const log = createLogger("Main");

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info("starting", { groupId: config.groupId, dataDir: config.paths.dataDir, headless: config.browser.headless });

  const cache = new DecisionCache(config.paths.cacheFile, { fingerprintThreshold: config.cardHashThreshold });
  const state = new RunnerState();
  const notifier = new TelegramNotifier({
    api: new TelegramApi({ token: config.telegram.botToken }),
    adminIds: config.telegram.adminIds,
    cache,
    state,
  });
  const session = new BrowserSession({ ...config.browser, sessionsDir: config.paths.sessionsDir });
  const ocr = new TesseractOcrEngine({ langs: config.ocrLangs, dataDir: config.paths.ocrDataDir });

  const runner = new ModerationRunner({
    browser: session,
    createPass: (driver) =>
      createScanOrchestrator({ config, renderer: driver, pointer: new HumanMotion(driver), cache, channel: notifier, ocr }),
    cache,
    channel: notifier,
    state,
    options: {
      requestsUrl: config.requestsUrl,
      intervalSeconds: config.polling.intervalSeconds,
      jitter: config.polling.jitter,
      activeHours: config.polling.activeHours,
      undecidedMaxAgeHours: config.retention.undecidedMaxAgeHours,
      staleDecisionMaxAgeHours: config.retention.staleDecisionMaxAgeHours,
    },
    janitor: () => cleanupScreenshots(config.paths.screenshotsDir, config.retention.screenshotMaxAgeHours),
  });

  let server: Server | undefined;
  if (config.statusPort) {
    const port = config.statusPort;
    server = createStatusApp(cache, state).listen(port, () => log.info("status API listening", { port }));
  }

  const shutdown = (signal: string) => {
    log.info("shutdown requested", { signal });
    runner.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  notifier.start();
  await notifier.sendText("🤖 Moderator started\n\n/status /pause /resume /help").catch((err: unknown) => {
    log.warn("startup message failed", { error: err });
  });

  try {
    await runner.run();
  } finally {
    await notifier.stop();
    await session.close();
    await ocr.close();
    server?.close();
    log.info("stopped");
  }
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`moderator failed: ${message}`);
  }
  process.exit(1);
});
