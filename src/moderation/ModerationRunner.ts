/**
 * ModerationRunner: the outer loop.
 *
 * Each iteration: pause check → night mode → cache cleanup → screenshot
 * janitor → navigate → session check → one scan pass → mark clicked
 * requests executed. After a click the loop comes back within seconds to
 * work through the rest of the queue; otherwise it sleeps the jittered
 * poll interval.
 *
 * Stop conditions:
 *   - stop() (the current sleep is cut short, a running pass finishes first)
 *
 * Nothing else ends the loop: pass errors and expired sessions are alerted
 * and retried after a fixed wait.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { PageRenderer } from "../browser/types.js";
import type { DecisionCache, PendingRequest } from "../cache/DecisionCache.js";
import type { ActiveHours } from "../config/config.js";
import { createLogger } from "../logging/logger.js";
import { isSessionUrl, SessionExpiredError } from "./errors.js";
import type { RunnerState } from "./RunnerState.js";
import type { OperatorChannel, PassResult } from "./types.js";

const log = createLogger("ModerationRunner");

const PAUSED_POLL_MS = 5_000;
const ERROR_BACKOFF_MS = 30_000;
const MIN_INTERVAL_SECONDS = 60;
const AFTER_CLICK_MS: [number, number] = [5_000, 15_000];

export interface BrowserLifecycle<R extends PageRenderer> {
  open(): Promise<R>;
  close(): Promise<void>;
  readonly isOpen: boolean;
}

export interface PassRunner {
  runPass(pending: PendingRequest[]): Promise<PassResult>;
}

export type ModerationRunnerOptions = {
  requestsUrl: string;
  intervalSeconds: number;
  jitter: number;
  activeHours: ActiveHours;
  undecidedMaxAgeHours: number;
  staleDecisionMaxAgeHours: number;
};

export type ModerationRunnerDeps<R extends PageRenderer> = {
  browser: BrowserLifecycle<R>;
  createPass: (renderer: R) => PassRunner;
  cache: DecisionCache;
  channel: OperatorChannel;
  state: RunnerState;
  options: ModerationRunnerOptions;
  /** Deletes old screenshots, returns how many */
  janitor?: () => Promise<number>;
  now?: () => Date;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function isWithinActiveHours(date: Date, hours: ActiveHours): boolean {
  const hour = date.getHours();
  return hour >= hours.startHour && hour < hours.endHour;
}

/** Seconds until the next poll: base ± jitter, never below a minute */
export function jitteredIntervalSeconds(base: number, jitter: number, random: () => number): number {
  const factor = 1 + (random() * 2 - 1) * jitter;
  return Math.max(MIN_INTERVAL_SECONDS, base * factor);
}

function clockOf(date: Date): string {
  return `${String(date.getHours()).padStart(2, "0")}:${String(date.getMinutes()).padStart(2, "0")}`;
}

export class ModerationRunner<R extends PageRenderer> {
  private readonly deps: ModerationRunnerDeps<R>;
  private readonly now: () => Date;
  private readonly random: () => number;
  private running = false;
  private abort = new AbortController();
  private sessionAlerted = false;

  constructor(deps: ModerationRunnerDeps<R>) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Runs until stop(). Resolves once the loop has exited */
  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    const { options } = this.deps;
    log.info("moderation loop started", { intervalSeconds: options.intervalSeconds, jitter: options.jitter });

    while (this.running) {
      if (this.deps.state.paused) {
        await this.sleep(PAUSED_POLL_MS);
        continue;
      }

      if (!isWithinActiveHours(this.now(), options.activeHours)) {
        await this.enterNightMode();
        await this.sleep(this.pollIntervalMs());
        continue;
      }

      try {
        await this.sleep(await this.iteration());
      } catch (err) {
        await this.handleError(err);
        await this.sleep(ERROR_BACKOFF_MS);
      }
    }
    log.info("moderation loop stopped");
  }

  stop(): void {
    this.running = false;
    this.abort.abort();
  }

  /** One iteration; returns how long to wait before the next */
  private async iteration(): Promise<number> {
    const { cache, options, state, browser } = this.deps;

    cache.cleanup(options.undecidedMaxAgeHours, options.staleDecisionMaxAgeHours);
    if (this.deps.janitor) {
      const deleted = await this.deps.janitor();
      if (deleted > 0) log.info("old screenshots removed", { count: deleted });
    }

    const renderer = await browser.open();
    if (state.nightMode) {
      state.nightMode = false;
      log.info("leaving night mode");
      await this.announce("☀️ Night pause over, browser restarted");
    }

    await renderer.navigate(options.requestsUrl);
    await renderer.dismissOverlays();
    const url = await renderer.currentUrl();
    if (!isSessionUrl(url)) throw new SessionExpiredError(url);
    if (this.sessionAlerted) {
      this.sessionAlerted = false;
      await this.announce("✅ Session valid again");
    }

    const pending = cache.listPending();
    const started = this.now();
    log.info("pass starting", { pendingDecisions: pending.length });
    await this.announce(`🔄 Run of ${clockOf(started)} started`);

    const pass = await this.deps.createPass(renderer).runPass(pending);
    state.lastPass = {
      startedAt: pass.startedAt,
      durationMs: pass.durationMs,
      cards: pass.cards,
      clicked: pass.clicked,
      notified: pass.emitted.sent,
      failedNotifications: pass.emitted.failed,
    };

    if (pass.clicked.length > 0) {
      for (const name of pass.clicked) {
        cache.markExecuted(name);
        await this.announce(`✅ Executed: ${name}`);
      }
      const [min, max] = AFTER_CLICK_MS;
      return min + this.random() * (max - min);
    }

    const minutes = (this.now().getTime() - started.getTime()) / 60_000;
    await this.announce(`✅ Run of ${clockOf(started)} finished, duration: ${minutes.toFixed(1)} min`);
    const wait = this.pollIntervalMs();
    log.info("waiting for next poll", { seconds: Math.round(wait / 1000) });
    return wait;
  }

  private async enterNightMode(): Promise<void> {
    const { state, browser } = this.deps;
    if (state.nightMode) return;
    state.nightMode = true;
    log.info("entering night mode, closing browser");
    await this.announce("🌙 Night pause, closing the browser to keep the session");
    if (browser.isOpen) await browser.close();
  }

  private async handleError(err: unknown): Promise<void> {
    if (err instanceof SessionExpiredError) {
      log.warn("session expired", { url: err.url });
      if (!this.sessionAlerted) {
        this.sessionAlerted = true;
        await this.announce("⚠️ Session expired. Log in again in the browser profile; checking every 30 s.");
      }
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error("iteration failed", { error: message });
    await this.announce(`⚠️ Error: ${message}`);
  }

  private pollIntervalMs(): number {
    const { intervalSeconds, jitter } = this.deps.options;
    return jitteredIntervalSeconds(intervalSeconds, jitter, this.random) * 1000;
  }

  private async announce(text: string): Promise<void> {
    try {
      await this.deps.channel.sendText(text);
    } catch (err) {
      log.warn("operator message failed", { error: err });
    }
  }

  private async sleep(ms: number): Promise<void> {
    if (!this.running) return;
    if (this.deps.sleep) return this.deps.sleep(ms);
    try {
      await delay(ms, undefined, { signal: this.abort.signal });
    } catch (err) {
      if (!this.abort.signal.aborted) throw err;
    }
  }
}
