/**
 * ScanOrchestrator: one scan pass over the requests page.
 *
 *   load → segment → per card (fingerprint, else OCR) → at most one click → emit
 *
 * A click can remove or reflow cards, so the card loop stops at the first
 * click and every later card waits for the next pass. Per-card problems are
 * returned as CardOutcome values; only page-level failures (navigation,
 * capture) throw.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Decision, DecisionCache, PendingRequest, RequestArtifacts } from "../cache/DecisionCache.js";
import { identityKey } from "../cache/DecisionCache.js";
import type { PageRenderer, Pointer } from "../browser/types.js";
import { createLogger } from "../logging/logger.js";
import type { Card } from "../vision/CardSegmenter.js";
import { cardPoint, type CardPoint } from "../vision/geometry.js";
import type { CardExtraction, TextExtractor } from "../vision/TextExtractor.js";
import { aimAt } from "./aim.js";
import { resolvePendingMatch } from "./names.js";
import type { PreviewCapturer } from "./PreviewCapturer.js";
import type {
  CardOutcome,
  ClickObserver,
  EmitSummary,
  NotificationPayload,
  OperatorChannel,
  PassResult,
} from "./types.js";

const log = createLogger("ScanOrchestrator");

/** Card-relative fallback positions when OCR never saw the button captions */
export const FALLBACK_BUTTONS: Record<Decision, { x: number; y: number }> = {
  approve: { x: 0.15, y: 0.85 },
  decline: { x: 0.65, y: 0.85 },
};

const LOAD_SCROLLS = 3;
const LOAD_SCROLL_PX = 800;

export interface Segmenter {
  segment(png: Buffer, outDir: string): Promise<Card[]>;
}

export type ScanDeps = {
  renderer: PageRenderer;
  pointer: Pointer;
  segmenter: Segmenter;
  extractor: TextExtractor;
  fingerprint: (imagePath: string) => Promise<string>;
  cache: DecisionCache;
  channel: OperatorChannel;
  screenshotsDir: string;
  previews?: PreviewCapturer;
  observer?: ClickObserver;
  now?: () => Date;
};

type PassState = {
  pending: PendingRequest[];
  seen: Set<string>;
};

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function stampOf(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
}

export class ScanOrchestrator {
  private readonly deps: ScanDeps;
  private readonly now: () => Date;

  constructor(deps: ScanDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /** Runs one pass against the page that is already open */
  async runPass(pending: PendingRequest[]): Promise<PassResult> {
    const started = this.now();
    const passDir = join(this.deps.screenshotsDir, `pass_${stampOf(started)}`);
    await mkdir(passDir, { recursive: true });

    const png = await this.loadPage();
    await writeFile(join(passDir, "fullpage.png"), png);
    const cards = await this.deps.segmenter.segment(png, passDir);

    const outcomes: CardOutcome[] = [];
    const state: PassState = { pending, seen: new Set() };
    for (const card of cards) {
      const outcome = await this.processCard(card, state, passDir);
      outcomes.push(outcome);
      this.logOutcome(outcome);
      if (outcome.kind === "clicked") break;
    }

    const clicked = outcomes.flatMap((o) => (o.kind === "clicked" ? [o.name] : []));
    const notifications = outcomes.flatMap((o) => (o.kind === "queued" ? [o.payload] : []));
    const emitted = await this.emit(notifications);

    const result: PassResult = {
      cards: cards.length,
      clicked,
      outcomes,
      notifications,
      emitted,
      startedAt: started.toISOString(),
      durationMs: this.now().getTime() - started.getTime(),
    };
    log.info("pass complete", { cards: cards.length, clicked: clicked.length, ...emitted });
    return result;
  }

  private async loadPage(): Promise<Buffer> {
    const { renderer, pointer } = this.deps;
    for (let i = 0; i < LOAD_SCROLLS; i++) {
      await pointer.scroll("down", LOAD_SCROLL_PX);
      await pointer.pause(500, 800);
    }
    await renderer.scrollTo(0);
    await pointer.pause(2_000, 3_000);
    return renderer.captureFullPage();
  }

  private async processCard(card: Card, state: PassState, passDir: string): Promise<CardOutcome> {
    const { cache } = this.deps;
    const cardIndex = card.index;

    let hash: string;
    try {
      hash = await this.deps.fingerprint(card.imagePath);
    } catch (err) {
      return { kind: "failed", cardIndex, reason: "fingerprint-error", error: errorText(err) };
    }

    const match = cache.findByFingerprint(hash);
    if (match) {
      const { request } = match;
      const decision = request.executed ? undefined : request.decision;
      const cached = decision ? request.buttons?.[decision] : undefined;

      if (decision && cached) {
        if (state.seen.has(match.key)) return { kind: "skipped", cardIndex, reason: "duplicate-in-pass", name: request.name };
        state.seen.add(match.key);
        return this.clickDecision(card, cached, decision, request.name, "fingerprint");
      }
      if (!decision) {
        state.seen.add(match.key);
        return { kind: "queued", cardIndex, payload: { kind: "known", name: request.name, cardIndex, request } };
      }
      log.info("fingerprint match without cached buttons, reading card", { card: cardIndex, name: request.name });
    }

    let extraction: CardExtraction;
    try {
      extraction = await this.deps.extractor.extract(card.imagePath);
    } catch (err) {
      return { kind: "failed", cardIndex, reason: "ocr-error", error: errorText(err) };
    }

    const identity = extraction.identity;
    if (!identity) return { kind: "skipped", cardIndex, reason: "no-identity" };
    const key = identityKey(identity);
    if (state.seen.has(key)) return { kind: "skipped", cardIndex, reason: "duplicate-in-pass", name: identity };
    state.seen.add(key);

    const resolved = resolvePendingMatch(identity, state.pending);
    if (resolved.kind === "exact" || resolved.kind === "substring") {
      const request = resolved.item;
      const decision = request.decision;
      if (decision) {
        cache.attachArtifacts(request.name, { fingerprint: hash, buttons: extraction.buttons });
        const local = this.resolveButton(card, extraction, request, decision);
        if (!local) return { kind: "failed", cardIndex, reason: "click-target-not-found", name: request.name };
        return this.clickDecision(card, local, decision, request.name, "ocr");
      }
    } else if (resolved.kind === "ambiguous") {
      log.warn("identity matches several decisions, notifying instead", {
        identity,
        candidates: resolved.candidates.map((c) => c.name),
      });
    }

    return { kind: "queued", cardIndex, payload: await this.buildPayload(card, extraction, identity, hash, passDir) };
  }

  /** This pass's OCR, then buttons cached for the request, then a fixed share of the card */
  private resolveButton(
    card: Card,
    extraction: CardExtraction,
    request: PendingRequest,
    decision: Decision,
  ): CardPoint | undefined {
    const live = this.deps.extractor.locateAction(extraction.spans, decision);
    if (live) return live;

    const cached = request.buttons?.[decision];
    if (cached) return cached;

    if (card.width < 2 || card.height < 2) return undefined;
    const share = FALLBACK_BUTTONS[decision];
    log.warn("button caption not found, using card-relative estimate", { card: card.index, decision });
    return cardPoint(card.width * share.x, card.height * share.y);
  }

  private async clickDecision(
    card: Card,
    local: CardPoint,
    decision: Decision,
    name: string,
    via: "fingerprint" | "ocr",
  ): Promise<CardOutcome> {
    const { renderer, pointer, observer } = this.deps;
    const cardIndex = card.index;
    try {
      const aim = await aimAt(renderer, pointer, card, local);
      if (!aim.ok) {
        return { kind: "failed", cardIndex, reason: "target-outside-viewport", name };
      }

      if (observer) {
        await observer.beforeClick(aim.point, decision, cardIndex).catch((err: unknown) => {
          log.warn("click observer failed", { error: err });
        });
      }
      await pointer.click(aim.point);
      if (decision === "decline") await pointer.pause(2_000, 3_000);
      await pointer.pause(2_000, 3_000);

      return { kind: "clicked", cardIndex, name, action: decision, via, point: aim.point };
    } catch (err) {
      return { kind: "failed", cardIndex, reason: "click-error", name, error: errorText(err) };
    }
  }

  private async buildPayload(
    card: Card,
    extraction: CardExtraction,
    identity: string,
    fingerprint: string,
    passDir: string,
  ): Promise<NotificationPayload> {
    const { cache, previews, extractor } = this.deps;

    let previewPath: string | undefined;
    if (extraction.preview && previews && !cache.has(identity)) {
      previewPath = await previews.capture(card, extraction.preview);
    }

    let imagePath = card.imagePath;
    try {
      imagePath = await extractor.cropToText(card.imagePath, extraction.spans, join(passDir, `card_${card.index}_text.png`));
    } catch (err) {
      log.warn("text crop failed, using the full card", { card: card.index, error: err });
    }

    return {
      kind: "new",
      name: identity,
      cardIndex: card.index,
      imagePath,
      extraInfo: extraction.extraInfo,
      previewPath,
      fingerprint,
      buttons: extraction.buttons,
      unanswered: extraction.unanswered,
    };
  }

  /** Send what is not cached yet. One failed send never stops the rest */
  private async emit(notifications: NotificationPayload[]): Promise<EmitSummary> {
    const { cache, channel } = this.deps;
    const summary: EmitSummary = { sent: 0, suppressed: 0, failed: 0 };

    for (const payload of notifications) {
      try {
        if (payload.kind === "known" || cache.has(payload.name)) {
          if (payload.kind === "new") cache.attachArtifacts(payload.name, artifactsOf(payload));
          summary.suppressed++;
          continue;
        }
        await channel.notifyRequest({
          name: payload.name,
          imagePath: payload.imagePath,
          previewPath: payload.previewPath,
          extraInfo: payload.extraInfo,
          unanswered: payload.unanswered,
        });
        cache.addNotification(payload.name, artifactsOf(payload));
        summary.sent++;
      } catch (err) {
        summary.failed++;
        log.error("notification failed", { name: payload.name, error: err });
      }
    }
    return summary;
  }

  private logOutcome(outcome: CardOutcome): void {
    switch (outcome.kind) {
      case "clicked":
        log.info("clicked", { card: outcome.cardIndex, name: outcome.name, action: outcome.action, via: outcome.via });
        break;
      case "queued":
        log.debug("queued", { card: outcome.cardIndex, name: outcome.payload.name, kind: outcome.payload.kind });
        break;
      case "skipped":
        log.info("skipped", { card: outcome.cardIndex, reason: outcome.reason });
        break;
      default:
        log.warn("card failed", { card: outcome.cardIndex, reason: outcome.reason, error: outcome.error });
    }
  }
}

function artifactsOf(payload: NotificationPayload): RequestArtifacts {
  if (payload.kind === "known") return {};
  return {
    extraInfo: payload.extraInfo || undefined,
    fingerprint: payload.fingerprint,
    previewPath: payload.previewPath,
    buttons: payload.buttons.approve || payload.buttons.decline ? payload.buttons : undefined,
    cardImagePath: payload.imagePath,
    unanswered: payload.unanswered,
  };
}
