import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { afterEach, describe, expect, it } from "vitest";
import { groupWords } from "./TesseractOcrEngine.js";
import { analyzeSpans, textBounds, TextExtractor } from "./TextExtractor.js";
import type { OcrEngine, TextSpan } from "./types.js";

function span(text: string, x1: number, y1: number, x2: number, y2: number): TextSpan {
  return { text, box: { x1, y1, x2, y2 }, confidence: 90 };
}

const cardSpans: TextSpan[] = [
  span("Mostra anteprima", 120, 110, 260, 130),
  span("Approva", 834, 30, 903, 63),
  span("x", 10, 5, 15, 10),
  span("Rifiuta", 920, 30, 990, 63),
  span("Mario Rossi", 120, 20, 260, 44),
  span("Vive a Milano", 120, 50, 300, 70),
  span("Invia messaggio", 1000, 30, 1120, 63),
  span("Non ha ancora risposto alle domande", 120, 80, 420, 100),
];

describe("analyzeSpans", () => {
  const result = analyzeSpans(cardSpans);

  it("takes the first substantial span in reading order as identity", () => {
    expect(result.identity).toBe("Mario Rossi");
    expect(result.spans[0].text).toBe("x");
  });

  it("collects extra info without UI captions", () => {
    expect(result.extraInfo).toBe(
      "Vive a Milano\nNon ha ancora risposto alle domande\nMostra anteprima",
    );
  });

  it("locates both action buttons at their box centres", () => {
    expect(result.buttons).toEqual({
      approve: { space: "card", x: 868, y: 46 },
      decline: { space: "card", x: 955, y: 46 },
    });
  });

  it("flags unanswered questions", () => {
    expect(result.unanswered).toBe(true);
    expect(analyzeSpans([span("Luca Bianchi", 0, 0, 90, 20)]).unanswered).toBe(false);
  });

  it("aims at the tail of a preview link inside a sentence", () => {
    expect(result.preview).toEqual({ space: "card", x: 225, y: 120 });
  });

  it("prefers a standalone preview label", () => {
    const extraction = analyzeSpans([
      span("Mostra anteprima", 120, 110, 260, 130),
      span("Anteprima", 300, 140, 380, 160),
    ]);
    expect(extraction.preview).toEqual({ space: "card", x: 345, y: 150 });
  });

  it("produces no identity or buttons from empty OCR", () => {
    const extraction = analyzeSpans([]);
    expect(extraction.identity).toBeUndefined();
    expect(extraction.buttons).toEqual({});
    expect(extraction.extraInfo).toBe("");
    expect(extraction.preview).toBeUndefined();
  });
});

describe("textBounds", () => {
  it("unions text boxes and leaves out button captions", () => {
    const bounds = textBounds([
      span("Mario Rossi", 120, 20, 260, 44),
      span("Vive a Milano", 120, 50, 300, 70),
      span("Approva", 834, 30, 903, 63),
    ]);
    expect(bounds).toEqual({ x1: 120, y1: 20, x2: 300, y2: 70 });
  });

  it("is undefined when only captions were read", () => {
    expect(textBounds([span("Rifiuta", 920, 30, 990, 63)])).toBeUndefined();
  });
});

describe("groupWords", () => {
  const word = (text: string, x0: number, x1: number, y1 = 50) => ({
    text,
    confidence: 80,
    bbox: { x0, y0: 30, x1, y1 },
  });

  it("splits side-by-side buttons and keeps words of one caption together", () => {
    const phrases = groupWords([
      word("messaggio", 1085, 1160, 52),
      word("Approva", 834, 903),
      word("Rifiuta", 940, 1000),
      word("Invia", 1040, 1080),
    ]);

    expect(phrases.map((p) => p.text)).toEqual(["Approva", "Rifiuta", "Invia messaggio"]);
    expect(phrases[2].box).toEqual({ x1: 1040, y1: 30, x2: 1160, y2: 52 });
    expect(phrases[2].confidence).toBe(80);
  });

  it("drops blank words", () => {
    expect(groupWords([word(" ", 0, 10)])).toEqual([]);
  });
});

describe("TextExtractor", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const fakeOcr = (spans: TextSpan[]): OcrEngine => ({
    recognize: async () => spans,
    close: async () => {},
  });

  it("runs OCR and analyzes the result", async () => {
    const extractor = new TextExtractor(fakeOcr(cardSpans));
    const extraction = await extractor.extract("card_0.png");
    expect(extraction.identity).toBe("Mario Rossi");
    expect(extractor.locateAction(extraction.spans, "decline")).toEqual({ space: "card", x: 955, y: 46 });
  });

  it("crops a card to its text with padding", async () => {
    dir = await mkdtemp(join(tmpdir(), "extractor-"));
    const source = join(dir, "card_0.png");
    await sharp({ create: { width: 400, height: 200, channels: 3, background: "#ffffff" } })
      .png()
      .toFile(source);

    const extractor = new TextExtractor(fakeOcr([]));
    const out = await extractor.cropToText(
      source,
      [span("Mario Rossi", 120, 20, 260, 44), span("Vive a Milano", 120, 50, 300, 70)],
      join(dir, "card_0_text.png"),
    );

    expect(out).toBe(join(dir, "card_0_text.png"));
    const meta = await sharp(out).metadata();
    expect([meta.width, meta.height]).toEqual([220, 90]);
  });

  it("keeps the original image when there is no text", async () => {
    const extractor = new TextExtractor(fakeOcr([]));
    expect(await extractor.cropToText("card_3.png", [], "card_3_text.png")).toBe("card_3.png");
  });
});
