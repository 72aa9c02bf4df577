import "dotenv/config";
import { copyFile, mkdtemp } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BrowserSession } from "../src/browser/BrowserSession.js";
import { HumanMotion } from "../src/browser/HumanMotion.js";
import type { Pointer } from "../src/browser/types.js";
import { DecisionCache } from "../src/cache/DecisionCache.js";
import { loadConfig } from "../src/config/config.js";
import { setLogLevel } from "../src/logging/logger.js";
import { createScanOrchestrator } from "../src/moderation/createScanOrchestrator.js";
import { isSessionUrl, SessionExpiredError } from "../src/moderation/errors.js";
import type { CardOutcome, OperatorChannel, RequestNotice } from "../src/moderation/types.js";
import { TelegramApi } from "../src/telegram/TelegramApi.js";
import { TelegramNotifier } from "../src/telegram/TelegramNotifier.js";
import { RunnerState } from "../src/moderation/RunnerState.js";
import type { ViewportPoint } from "../src/vision/geometry.js";
import { TesseractOcrEngine } from "../src/vision/TesseractOcrEngine.js";

type CliOptions = {
  dryRun: boolean;
  headful: boolean;
};

function printHelp(): void {
  console.log(`Usage: node --import tsx scripts/scan-once.ts [options]

Opens the moderator browser profile, runs exactly one scan pass over the
membership requests page and prints a JSON summary.

Options:
  --dry-run     Record clicks and notifications instead of performing them;
                decisions are read from a scratch copy of the cache
  --headful     Show the browser window (overrides HEADLESS)
  -h, --help    Show help
`);
}

function parseArgs(argv: string[]): CliOptions {
  const out: CliOptions = { dryRun: false, headful: false };
  for (const arg of argv) {
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    }
    if (arg === "--dry-run") out.dryRun = true;
    else if (arg === "--headful") out.headful = true;
    else {
      console.error(`unknown option ${arg}`);
      printHelp();
      process.exit(2);
    }
  }
  return out;
}

/** Moves and waits like the real pointer but never presses the button */
class DryRunPointer implements Pointer {
  readonly clicks: ViewportPoint[] = [];

  constructor(private readonly inner: Pointer) {}

  async click(point: ViewportPoint): Promise<void> {
    this.clicks.push(point);
  }
  pause(minMs: number, maxMs: number): Promise<void> {
    return this.inner.pause(minMs, maxMs);
  }
  scroll(direction: "up" | "down", amount?: number): Promise<void> {
    return this.inner.scroll(direction, amount);
  }
  type(selector: string, text: string): Promise<void> {
    return this.inner.type(selector, text);
  }
}

class RecordingChannel implements OperatorChannel {
  readonly notices: RequestNotice[] = [];
  async notifyRequest(notice: RequestNotice): Promise<void> {
    this.notices.push(notice);
  }
  async sendText(): Promise<void> {}
}

function describeOutcome(outcome: CardOutcome): Record<string, unknown> {
  switch (outcome.kind) {
    case "clicked":
      return { card: outcome.cardIndex, kind: outcome.kind, name: outcome.name, action: outcome.action, via: outcome.via };
    case "queued":
      return { card: outcome.cardIndex, kind: outcome.kind, name: outcome.payload.name, payload: outcome.payload.kind };
    default:
      return { card: outcome.cardIndex, kind: outcome.kind, name: outcome.name, reason: outcome.reason };
  }
}

async function scratchCache(cacheFile: string, threshold: number): Promise<DecisionCache> {
  const scratch = join(await mkdtemp(join(tmpdir(), "scan-once-")), "decisions_cache.json");
  if (existsSync(cacheFile)) await copyFile(cacheFile, scratch);
  return new DecisionCache(scratch, { fingerprintThreshold: threshold });
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const cache = opts.dryRun
    ? await scratchCache(config.paths.cacheFile, config.cardHashThreshold)
    : new DecisionCache(config.paths.cacheFile, { fingerprintThreshold: config.cardHashThreshold });
  const recording = new RecordingChannel();
  const channel: OperatorChannel = opts.dryRun
    ? recording
    : new TelegramNotifier({
        api: new TelegramApi({ token: config.telegram.botToken }),
        adminIds: config.telegram.adminIds,
        cache,
        state: new RunnerState(),
      });

  const session = new BrowserSession({
    ...config.browser,
    headless: opts.headful ? false : config.browser.headless,
    sessionsDir: config.paths.sessionsDir,
  });
  const ocr = new TesseractOcrEngine({ langs: config.ocrLangs, dataDir: config.paths.ocrDataDir });

  try {
    const driver = await session.open();
    const motion = new HumanMotion(driver);
    const pointer = opts.dryRun ? new DryRunPointer(motion) : motion;

    await driver.navigate(config.requestsUrl);
    await driver.dismissOverlays();
    const url = await driver.currentUrl();
    if (!isSessionUrl(url)) throw new SessionExpiredError(url);

    const orchestrator = createScanOrchestrator({
      config,
      renderer: driver,
      pointer,
      cache,
      channel,
      ocr,
      previews: !opts.dryRun,
    });
    const pass = await orchestrator.runPass(cache.listPending());
    if (!opts.dryRun) for (const name of pass.clicked) cache.markExecuted(name);

    console.log(
      JSON.stringify(
        {
          dryRun: opts.dryRun,
          cards: pass.cards,
          clicked: pass.clicked,
          emitted: pass.emitted,
          durationMs: pass.durationMs,
          outcomes: pass.outcomes.map(describeOutcome),
          ...(pointer instanceof DryRunPointer ? { recordedClicks: pointer.clicks } : {}),
          ...(opts.dryRun ? { recordedNotifications: recording.notices.map((n) => n.name) } : {}),
        },
        null,
        2,
      ),
    );
  } finally {
    await session.close();
    await ocr.close();
  }
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`scan-once failed: ${message}`);
  process.exit(1);
});
