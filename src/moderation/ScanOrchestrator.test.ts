import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PageRenderer, Pointer } from "../browser/types.js";
import { DecisionCache } from "../cache/DecisionCache.js";
import type { Card } from "../vision/CardSegmenter.js";
import { cardPoint, type ViewportPoint } from "../vision/geometry.js";
import { TextExtractor } from "../vision/TextExtractor.js";
import type { OcrEngine, TextSpan } from "../vision/types.js";
import { ScanOrchestrator } from "./ScanOrchestrator.js";
import type { RequestNotice } from "./types.js";

const CARD_WIDTH = 1176;
const CARD_HEIGHT = 200;

function span(text: string, x1: number, y1: number, x2: number, y2: number): TextSpan {
  return { text, box: { x1, y1, x2, y2 }, confidence: 90 };
}

const nameSpan = (name: string) => span(name, 120, 20, 260, 44);
const approveSpan = span("Approva", 834, 30, 903, 63);
const declineSpan = span("Rifiuta", 920, 30, 990, 63);

class FakeRenderer implements PageRenderer {
  scrollRequests: number[] = [];
  private scrollY = 0;

  constructor(private readonly maxScroll = 10_000) {}

  async navigate(): Promise<void> {}
  async currentUrl(): Promise<string> {
    return "https://www.facebook.com/groups/4242/participant_requests";
  }
  async scrollTo(y: number): Promise<void> {
    this.scrollRequests.push(y);
    this.scrollY = Math.min(y, this.maxScroll);
  }
  async readScrollY(): Promise<number> {
    return this.scrollY;
  }
  async captureFullPage(): Promise<Buffer> {
    return Buffer.from("full-page");
  }
  async captureViewport(): Promise<Buffer> {
    return Buffer.from("viewport");
  }
  async viewportSize() {
    return { width: 1536, height: 864 };
  }
  async pressKey(): Promise<void> {}
  async dismissOverlays(): Promise<void> {}
}

class FakePointer implements Pointer {
  clicks: ViewportPoint[] = [];
  async click(point: ViewportPoint): Promise<void> {
    this.clicks.push(point);
  }
  async pause(): Promise<void> {}
  async scroll(): Promise<void> {}
  async type(): Promise<void> {}
}

class FakeOcr implements OcrEngine {
  calls: string[] = [];
  constructor(private readonly byPath: Map<string, TextSpan[] | Error>) {}
  async recognize(image: Buffer | string): Promise<TextSpan[]> {
    const path = typeof image === "string" ? image : "";
    this.calls.push(path);
    const result = this.byPath.get(path) ?? [];
    if (result instanceof Error) throw result;
    return result;
  }
  async close(): Promise<void> {}
}

class FakeChannel {
  notices: RequestNotice[] = [];
  failFor = new Set<string>();
  async notifyRequest(notice: RequestNotice): Promise<void> {
    if (this.failFor.has(notice.name)) throw new Error("telegram down");
    this.notices.push(notice);
  }
  async sendText(): Promise<void> {}
}

describe("ScanOrchestrator", () => {
  let dir: string;
  let shots: string;
  let cache: DecisionCache;
  let renderer: FakeRenderer;
  let pointer: FakePointer;
  let channel: FakeChannel;
  const now = () => new Date("2026-03-01T08:00:00.000Z");

  beforeEach(() => {
    dir = fs.mkdtempSync(join(tmpdir(), "orchestrator-"));
    shots = join(dir, "screenshots");
    cache = new DecisionCache(join(dir, "decisions_cache.json"), { now });
    renderer = new FakeRenderer();
    pointer = new FakePointer();
    channel = new FakeChannel();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function makeCards(count: number, firstTop = 276): Promise<Card[]> {
    const cards: Card[] = [];
    for (let index = 0; index < count; index++) {
      const imagePath = join(dir, `card_${index}.png`);
      await sharp({ create: { width: CARD_WIDTH, height: CARD_HEIGHT, channels: 3, background: "#ffffff" } })
        .png()
        .toFile(imagePath);
      const top = firstTop + index * CARD_HEIGHT;
      cards.push({ index, top, bottom: top + CARD_HEIGHT, left: 360, width: CARD_WIDTH, height: CARD_HEIGHT, imagePath });
    }
    return cards;
  }

  function orchestrator(
    cards: Card[],
    ocrByIndex: Array<TextSpan[] | Error>,
    hashes: string[],
  ): { scan: ScanOrchestrator; ocr: FakeOcr } {
    const ocr = new FakeOcr(new Map(cards.map((c, i) => [c.imagePath, ocrByIndex[i] ?? []])));
    const byPath = new Map(cards.map((c, i) => [c.imagePath, hashes[i] ?? "0000000000000000"]));
    const scan = new ScanOrchestrator({
      renderer,
      pointer,
      segmenter: { segment: async () => cards },
      extractor: new TextExtractor(ocr),
      fingerprint: async (path) => byPath.get(path) ?? "0000000000000000",
      cache,
      channel,
      screenshotsDir: shots,
      now,
    });
    return { scan, ocr };
  }

  function decided(name: string, decision: "approve" | "decline", artifacts = {}): void {
    cache.addNotification(name, artifacts);
    cache.setDecision(name, decision);
  }

  it("clicks at most once per pass", async () => {
    for (const name of ["Alice", "Bob", "Carla"]) decided(name, "approve");
    const cards = await makeCards(3);
    const { scan } = orchestrator(
      cards,
      [[nameSpan("Alice"), approveSpan], [nameSpan("Bob"), approveSpan], [nameSpan("Carla"), approveSpan]],
      ["1111111111111111", "2222222222222222", "3333333333333333"],
    );

    const result = await scan.runPass(cache.listPending());

    expect(result.clicked).toEqual(["Alice"]);
    expect(result.outcomes).toHaveLength(1);
    expect(pointer.clicks).toEqual([{ space: "viewport", x: 1228, y: 322 }]);
    expect(cache.listPending().map((r) => r.name)).toEqual(["Alice", "Bob", "Carla"]);
  });

  it("translates through the scroll offset the browser actually reached", async () => {
    renderer = new FakeRenderer(1_700);
    decided("Alice", "approve");
    const cards = await makeCards(1, 2_276);
    const { scan } = orchestrator(cards, [[nameSpan("Alice"), approveSpan]], []);

    await scan.runPass(cache.listPending());

    expect(renderer.scrollRequests).toContain(1_890);
    expect(pointer.clicks).toEqual([{ space: "viewport", x: 1228, y: 622 }]);
  });

  it("abandons a click whose target cannot be brought on screen", async () => {
    renderer = new FakeRenderer(0);
    decided("Alice", "approve");
    const cards = await makeCards(1, 2_276);
    const { scan } = orchestrator(cards, [[nameSpan("Alice"), approveSpan]], []);

    const result = await scan.runPass(cache.listPending());

    expect(result.outcomes).toEqual([{ kind: "failed", cardIndex: 0, reason: "target-outside-viewport", name: "Alice" }]);
    expect(pointer.clicks).toEqual([]);
    expect(result.clicked).toEqual([]);
  });

  it("replays a cached decision from the fingerprint without OCR", async () => {
    decided("Dora", "decline", { fingerprint: "0f0f0f0f0f0f0f0f", buttons: { decline: cardPoint(955, 46) } });
    const cards = await makeCards(1);
    const { scan, ocr } = orchestrator(cards, [], ["0f0f0f0f0f0f0f0e"]);

    const result = await scan.runPass(cache.listPending());

    expect(ocr.calls).toEqual([]);
    expect(result.outcomes[0]).toMatchObject({ kind: "clicked", name: "Dora", action: "decline", via: "fingerprint" });
    expect(pointer.clicks).toEqual([{ space: "viewport", x: 1315, y: 322 }]);
  });

  it("reads the card when a fingerprint match has a decision but no cached buttons", async () => {
    decided("Dora", "decline", { fingerprint: "0f0f0f0f0f0f0f0f" });
    const cards = await makeCards(1);
    const { scan, ocr } = orchestrator(cards, [[nameSpan("Dora"), declineSpan]], ["0f0f0f0f0f0f0f0f"]);

    const result = await scan.runPass(cache.listPending());

    expect(ocr.calls).toEqual([cards[0].imagePath]);
    expect(result.outcomes[0]).toMatchObject({ kind: "clicked", via: "ocr" });
    expect(pointer.clicks).toEqual([{ space: "viewport", x: 1315, y: 322 }]);
  });

  it("skips known undecided cards without OCR or a second notification", async () => {
    cache.addNotification("Eva", { fingerprint: "abababababababab" });
    const cards = await makeCards(1);
    const { scan, ocr } = orchestrator(cards, [], ["abababababababab"]);

    const result = await scan.runPass([]);

    expect(ocr.calls).toEqual([]);
    expect(result.outcomes[0]).toMatchObject({ kind: "queued", payload: { kind: "known", name: "Eva" } });
    expect(result.emitted).toEqual({ sent: 0, suppressed: 1, failed: 0 });
    expect(channel.notices).toEqual([]);
  });

  it("notifies a new request once and recognizes it on the next pass", async () => {
    const cards = await makeCards(1);
    const spans = [nameSpan("Franco Neri"), span("Vive a Torino", 120, 50, 300, 70), approveSpan];
    const { scan, ocr } = orchestrator(cards, [spans], ["1234123412341234"]);

    const first = await scan.runPass([]);

    expect(first.emitted).toEqual({ sent: 1, suppressed: 0, failed: 0 });
    expect(channel.notices).toEqual([
      {
        name: "Franco Neri",
        imagePath: join(shots, "pass_20260301T080000", "card_0_text.png"),
        previewPath: undefined,
        extraInfo: "Vive a Torino",
        unanswered: false,
      },
    ]);
    expect(cache.get("franco neri")?.buttons).toEqual({ approve: { space: "card", x: 868, y: 46 } });

    const second = await scan.runPass([]);
    expect(second.outcomes[0]).toMatchObject({ kind: "queued", payload: { kind: "known" } });
    expect(channel.notices).toHaveLength(1);
    expect(ocr.calls).toHaveLength(1);
  });

  it("keeps going after an OCR failure on one card", async () => {
    const cards = await makeCards(2);
    const { scan } = orchestrator(cards, [new Error("tesseract crashed"), [nameSpan("Gino")]], ["1", "2"]);

    const result = await scan.runPass([]);

    expect(result.outcomes.map((o) => o.kind)).toEqual(["failed", "queued"]);
    expect(result.outcomes[0]).toMatchObject({ reason: "ocr-error", error: "tesseract crashed" });
    expect(channel.notices.map((n) => n.name)).toEqual(["Gino"]);
  });

  it("sends the remaining notifications when one fails", async () => {
    channel.failFor.add("Bob");
    const cards = await makeCards(3);
    const { scan } = orchestrator(
      cards,
      [[nameSpan("Alice")], [nameSpan("Bob")], [nameSpan("Carla")]],
      ["1111111111111111", "2222222222222222", "3333333333333333"],
    );

    const result = await scan.runPass([]);

    expect(result.emitted).toEqual({ sent: 2, suppressed: 0, failed: 1 });
    expect(channel.notices.map((n) => n.name)).toEqual(["Alice", "Carla"]);
    expect(cache.has("bob")).toBe(false);
  });

  it("skips cards without identity and repeated identities", async () => {
    const cards = await makeCards(3);
    const { scan } = orchestrator(
      cards,
      [[span("x", 0, 0, 5, 5)], [nameSpan("Ivo")], [nameSpan("IVO ")]],
      ["1111111111111111", "2222222222222222", "3333333333333333"],
    );

    const result = await scan.runPass([]);

    expect(result.outcomes.map((o) => (o.kind === "skipped" ? o.reason : o.kind))).toEqual([
      "no-identity",
      "queued",
      "duplicate-in-pass",
    ]);
  });

  it("notifies instead of clicking when a name matches several decisions", async () => {
    decided("Ana", "approve");
    decided("Anastasia Verdi", "decline");
    const cards = await makeCards(1);
    const { scan } = orchestrator(cards, [[nameSpan("Anast")]], []);

    const result = await scan.runPass(cache.listPending());

    expect(pointer.clicks).toEqual([]);
    expect(result.outcomes[0]).toMatchObject({ kind: "queued", payload: { kind: "new", name: "Anast" } });
  });

  it("falls back to a card-relative position when no caption is read", async () => {
    decided("Alice", "decline");
    const cards = await makeCards(1);
    const { scan } = orchestrator(cards, [[nameSpan("Alice")]], []);

    await scan.runPass(cache.listPending());

    expect(renderer.scrollRequests).toContain(14);
    expect(pointer.clicks).toEqual([{ space: "viewport", x: 1124, y: 432 }]);
  });

  it("ends the pass quietly when no cards are found", async () => {
    const { scan } = orchestrator([], [], []);
    const result = await scan.runPass([]);
    expect(result).toMatchObject({ cards: 0, clicked: [], outcomes: [], emitted: { sent: 0, suppressed: 0, failed: 0 } });
  });
});
